// In-memory repository implementations for development and testing
//
// Tables live in maps keyed by id. Transactions are serialized and rolled
// back by restoring a snapshot taken when they start. As in Postgres, id
// sequences are not transactional: a reserved or consumed id is never handed
// out again.
//
// Data does not persist between restarts.

import type {
  AttributeMap,
  RecordId,
  StoredRecord,
  Version,
  WhereClause,
} from '@trailkeep/protocol';
import type {
  AppendVersionInput,
  RecordRepository,
  RepositoryContext,
  TransactionalRepositoryContext,
  VersionFilter,
  VersionRepository,
} from '../interfaces/index.js';
import { ConstraintViolationError, PersistenceError, RecordNotFoundError } from '../errors.js';
import { matchesWhere } from '../where.js';

/**
 * Constraints enforced on one in-memory table
 */
export type InMemoryTableOptions = {
  /** Columns that must not be null */
  notNull?: string[];
  /** Columns holding the id of a row in another table */
  references?: Array<{ column: string; table: string }>;
};

export type InMemoryRepositoryOptions = {
  tables?: Record<string, InMemoryTableOptions>;
};

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  tables: Map<string, Map<RecordId, StoredRecord>>;
  versions: Map<RecordId, Version>;
  sequences: Map<string, number>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

type Snapshot = Pick<InMemoryDataStore, 'tables' | 'versions'>;

const VERSIONS_SEQUENCE = 'versions_id_seq';

function sequenceName(table: string): string {
  return `${table}_id_seq`;
}

function withoutUndefined(values: AttributeMap): AttributeMap {
  const result: AttributeMap = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function highestId(ids: Iterable<RecordId>): number {
  let max = 0;
  for (const id of ids) {
    if (id > max) max = id;
  }
  return max;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext({
 *   tables: {
 *     simple_people: { references: [{ column: 'company_id', table: 'simple_companies' }] },
 *   },
 * });
 *
 * await repos.transaction(async (tx) => {
 *   const company = await tx.records.insert('simple_companies', { name: 'Acme LLC' });
 *   await tx.records.insert('simple_people', { first_name: 'Izel', company_id: company.id });
 * });
 *
 * console.log(repos._data.tables.get('simple_companies')?.size);
 * ```
 */
export function createInMemoryRepositoryContext(
  options: InMemoryRepositoryOptions = {}
): InMemoryRepositoryContext {
  const tableOptions = options.tables ?? {};
  const data: InMemoryDataStore = {
    tables: new Map(),
    versions: new Map(),
    sequences: new Map(),
  };

  function tableRows(table: string): Map<RecordId, StoredRecord> {
    let rows = data.tables.get(table);
    if (!rows) {
      rows = new Map();
      data.tables.set(table, rows);
    }
    return rows;
  }

  function sortedRows(table: string): StoredRecord[] {
    return Array.from(tableRows(table).values()).sort((a, b) => a.id - b.id);
  }

  function nextValue(sequence: string): RecordId {
    const next = (data.sequences.get(sequence) ?? 0) + 1;
    data.sequences.set(sequence, next);
    return next;
  }

  function takeSnapshot(): Snapshot {
    return structuredClone({ tables: data.tables, versions: data.versions });
  }

  function restore(snapshot: Snapshot): void {
    data.tables = snapshot.tables;
    data.versions = snapshot.versions;
  }

  async function atomically<T>(fn: () => T): Promise<T> {
    const snapshot = takeSnapshot();
    try {
      return fn();
    } catch (error) {
      restore(snapshot);
      throw error;
    }
  }

  function readId(table: string, values: AttributeMap): RecordId | undefined {
    const id = values.id;
    if (id === undefined || id === null) return undefined;
    if (typeof id !== 'number' || !Number.isSafeInteger(id)) {
      throw new PersistenceError(`Invalid id for "${table}": ${String(id)}`, 'INVALID_ID');
    }
    return id;
  }

  function checkConstraints(table: string, row: StoredRecord): void {
    const constraints = tableOptions[table];
    if (!constraints) return;

    for (const column of constraints.notNull ?? []) {
      if (row[column] === null || row[column] === undefined) {
        throw new ConstraintViolationError(
          `null value in column "${column}" of "${table}" violates not-null constraint`,
          { constraint: 'not_null', table, column }
        );
      }
    }

    for (const reference of constraints.references ?? []) {
      const value = row[reference.column];
      if (value === null || value === undefined) continue;
      if (typeof value !== 'number' || !tableRows(reference.table).has(value)) {
        throw new ConstraintViolationError(
          `"${table}.${reference.column}" = ${String(value)} is not present in "${reference.table}"`,
          { constraint: 'foreign_key', table, column: reference.column }
        );
      }
    }
  }

  function checkNotReferenced(table: string, id: RecordId): void {
    for (const [otherTable, constraints] of Object.entries(tableOptions)) {
      for (const reference of constraints.references ?? []) {
        if (reference.table !== table) continue;
        for (const row of tableRows(otherTable).values()) {
          if (row[reference.column] === id) {
            throw new ConstraintViolationError(
              `"${table}" #${id} is still referenced from "${otherTable}.${reference.column}"`,
              { constraint: 'foreign_key', table: otherTable, column: reference.column }
            );
          }
        }
      }
    }
  }

  function insertRow(table: string, values: AttributeMap): StoredRecord {
    const rows = tableRows(table);
    const id = readId(table, values) ?? nextValue(sequenceName(table));
    if (rows.has(id)) {
      throw new ConstraintViolationError(`duplicate key "${table}".id = ${id}`, {
        constraint: 'unique',
        table,
        column: 'id',
      });
    }

    const row: StoredRecord = { ...withoutUndefined(values), id };
    checkConstraints(table, row);
    rows.set(id, row);
    return structuredClone(row);
  }

  function updateRow(table: string, id: RecordId, changes: AttributeMap): StoredRecord {
    const rows = tableRows(table);
    const existing = rows.get(id);
    if (!existing) {
      throw new RecordNotFoundError(table, id);
    }

    const row: StoredRecord = { ...existing, ...withoutUndefined(changes), id };
    checkConstraints(table, row);
    rows.set(id, row);
    return structuredClone(row);
  }

  // Record repository
  const recordRepo: RecordRepository = {
    async get(table, id) {
      const row = tableRows(table).get(id);
      return row ? structuredClone(row) : null;
    },
    async find(table, where: WhereClause = {}) {
      return sortedRows(table)
        .filter((row) => matchesWhere(row, where))
        .map((row) => structuredClone(row));
    },
    async count(table, where: WhereClause = {}) {
      return sortedRows(table).filter((row) => matchesWhere(row, where)).length;
    },
    async insert(table, values) {
      return insertRow(table, values);
    },
    async insertAll(table, rows, insertOptions = {}) {
      const inserted = await atomically(() => rows.map((values) => insertRow(table, values)));
      return {
        count: inserted.length,
        rows: insertOptions.returning ? inserted : null,
      };
    },
    async update(table, id, changes) {
      return updateRow(table, id, changes);
    },
    async updateAll(table, where, set) {
      const matching = sortedRows(table).filter((row) => matchesWhere(row, where));
      await atomically(() => matching.forEach((row) => updateRow(table, row.id, set)));
      return { count: matching.length };
    },
    async delete(table, id) {
      const rows = tableRows(table);
      const existing = rows.get(id);
      if (!existing) {
        throw new RecordNotFoundError(table, id);
      }
      checkNotReferenced(table, id);
      rows.delete(id);
      return structuredClone(existing);
    },
    async maxId(table) {
      return highestId(tableRows(table).keys());
    },
    async reserveId(table) {
      return nextValue(sequenceName(table));
    },
  };

  function appendVersion(input: AppendVersionInput): Version {
    const id = input.id ?? nextValue(VERSIONS_SEQUENCE);
    if (data.versions.has(id)) {
      throw new ConstraintViolationError(`duplicate key "versions".id = ${id}`, {
        constraint: 'unique',
        table: 'versions',
        column: 'id',
      });
    }

    const version: Version = {
      id,
      event: input.event,
      itemType: input.itemType,
      itemId: input.itemId,
      itemChanges: structuredClone(input.itemChanges),
      originatorId: input.originatorId,
      origin: input.origin,
      meta: input.meta === null ? null : structuredClone(input.meta),
      insertedAt: new Date().toISOString(),
    };
    data.versions.set(id, version);
    return structuredClone(version);
  }

  function filterVersions(filter: VersionFilter = {}): Version[] {
    return Array.from(data.versions.values())
      .filter((v) => filter.itemType === undefined || v.itemType === filter.itemType)
      .filter((v) => filter.itemId === undefined || v.itemId === filter.itemId)
      .filter((v) => filter.event === undefined || v.event === filter.event)
      .filter((v) => filter.originatorId === undefined || v.originatorId === filter.originatorId)
      .sort((a, b) => a.id - b.id);
  }

  // Version repository
  const versionRepo: VersionRepository = {
    async insert(input) {
      return appendVersion(input);
    },
    async insertFromQuery(source, projection, insertOptions = {}) {
      const matching = sortedRows(source.table).filter((row) => matchesWhere(row, source.where));
      const inserted = await atomically(() =>
        matching.map((row) => appendVersion({ ...projection, itemId: row.id }))
      );
      return {
        count: inserted.length,
        versions: insertOptions.returning ? inserted : null,
      };
    },
    async patch(id, input) {
      const existing = data.versions.get(id);
      if (!existing) {
        throw new RecordNotFoundError('versions', id);
      }
      const patched: Version = {
        ...existing,
        itemId: input.itemId ?? existing.itemId,
        itemChanges:
          input.itemChanges !== undefined
            ? structuredClone(input.itemChanges)
            : existing.itemChanges,
      };
      data.versions.set(id, patched);
      return structuredClone(patched);
    },
    async get(id) {
      const version = data.versions.get(id);
      return version ? structuredClone(version) : null;
    },
    async list(filter = {}) {
      let result = filterVersions(filter);
      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }
      return result.map((v) => structuredClone(v));
    },
    async count(filter = {}) {
      return filterVersions(filter).length;
    },
    async maxId() {
      return highestId(data.versions.keys());
    },
    async reserveId() {
      return nextValue(VERSIONS_SEQUENCE);
    },
  };

  const scoped: RepositoryContext = {
    records: recordRepo,
    versions: versionRepo,
  };

  // Transactions queue behind each other, so every one of them behaves as
  // serializable. They do not nest.
  let queue: Promise<void> = Promise.resolve();

  return {
    records: recordRepo,
    versions: versionRepo,
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const run = async (): Promise<T> => {
        const snapshot = takeSnapshot();
        try {
          return await fn(scoped);
        } catch (error) {
          restore(snapshot);
          throw error;
        }
      };
      const result = queue.then(run);
      queue = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },
    _data: data,
    clear() {
      data.tables.clear();
      data.versions.clear();
      data.sequences.clear();
    },
  };
}
