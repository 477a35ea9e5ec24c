// Runtime error types

import type { ChangeSet, FieldError } from '@trailkeep/protocol';

/**
 * Base class for all errors raised by the version engine.
 */
export class TrailError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrailError';
    this.code = code;
  }
}

/**
 * Invalid engine options or environment settings.
 */
export class ConfigurationError extends TrailError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A changeset failed validation. Thrown by `unwrapResult`; a failed
 * operation result carries the changeset itself.
 */
export class InvalidChangesetError extends TrailError {
  readonly changeset: ChangeSet;
  readonly errors: FieldError[];

  constructor(changeset: ChangeSet, step?: string) {
    const fields = changeset.errors.map((e) => e.field).join(', ');
    super(
      'INVALID_CHANGESET',
      `Invalid ${changeset.model.name} changeset${step ? ` in step "${step}"` : ''}: ${fields}`
    );
    this.name = 'InvalidChangesetError';
    this.changeset = changeset;
    this.errors = changeset.errors;
  }
}

export class DuplicateStepError extends TrailError {
  readonly step: string;

  constructor(step: string) {
    super('DUPLICATE_STEP', `Step "${step}" is already part of this operation`);
    this.name = 'DuplicateStepError';
    this.step = step;
  }
}

export class UnknownStepError extends TrailError {
  readonly step: string;
  readonly available: string[];

  constructor(step: string, available: string[]) {
    super(
      'UNKNOWN_STEP',
      `Step "${step}" is not in the result (available: ${available.join(', ') || 'none'})`
    );
    this.name = 'UnknownStepError';
    this.step = step;
    this.available = available;
  }
}

/**
 * An option combination the engine does not implement, e.g. strict mode
 * with a bulk operation. Raised before anything is persisted.
 */
export class UnsupportedOperationError extends TrailError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super('UNSUPPORTED_OPERATION', `${operation} is not supported: ${reason}`);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

/**
 * The versions linked from a strict-mode record do not form a chain.
 */
export class BrokenVersionChainError extends TrailError {
  readonly itemType: string;
  readonly itemId: number;

  constructor(itemType: string, itemId: number, reason: string) {
    super('BROKEN_VERSION_CHAIN', `Version chain of ${itemType}#${itemId} is broken: ${reason}`);
    this.name = 'BrokenVersionChainError';
    this.itemType = itemType;
    this.itemId = itemId;
  }
}

/**
 * Carries a step's error value out of the transaction so it rolls back.
 * `transact` unwraps it into the failure result.
 */
export class StepFailedError extends TrailError {
  readonly step: string;
  readonly value: unknown;

  constructor(step: string, value: unknown) {
    super('STEP_FAILED', `Step "${step}" failed`);
    this.name = 'StepFailedError';
    this.step = step;
    this.value = value;
  }
}
