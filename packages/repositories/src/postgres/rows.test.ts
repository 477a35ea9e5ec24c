import { describe, it, expect } from 'vitest';
import { PersistenceError } from '../errors.js';
import { toPersistenceError } from './errors.js';
import { rawRowToRecord, rawRowToVersion, resultRows, rowToVersion } from './rows.js';

describe('rowToVersion', () => {
  it('maps drizzle rows to versions', () => {
    const version = rowToVersion({
      id: 4,
      event: 'update',
      itemType: 'SimpleCompany',
      itemId: 9,
      itemChanges: { city: 'Hong Kong' },
      originatorId: null,
      origin: 'admin',
      meta: null,
      insertedAt: new Date('2024-03-01T10:00:00.000Z'),
    });

    expect(version).toEqual({
      id: 4,
      event: 'update',
      itemType: 'SimpleCompany',
      itemId: 9,
      itemChanges: { city: 'Hong Kong' },
      originatorId: null,
      origin: 'admin',
      meta: null,
      insertedAt: '2024-03-01T10:00:00.000Z',
    });
  });
});

describe('rawRowToVersion', () => {
  it('coerces numeric strings and timestamps', () => {
    const version = rawRowToVersion({
      id: '12',
      event: 'soft_delete',
      item_type: 'User',
      item_id: '3',
      item_changes: { id: 3, username: 'isaac' },
      originator_id: '7',
      origin: null,
      meta: { reason: 'cleanup' },
      inserted_at: '2024-03-01T10:00:00.000Z',
    });

    expect(version.id).toBe(12);
    expect(version.itemId).toBe(3);
    expect(version.originatorId).toBe(7);
    expect(version.meta).toEqual({ reason: 'cleanup' });
    expect(version.insertedAt).toBe('2024-03-01T10:00:00.000Z');
  });

  it('rejects rows with an unknown event', () => {
    expect(() =>
      rawRowToVersion({
        id: 1,
        event: 'truncate',
        item_type: 'User',
        item_id: 1,
        item_changes: {},
        originator_id: null,
        origin: null,
        meta: null,
        inserted_at: '2024-03-01T10:00:00.000Z',
      })
    ).toThrow('Malformed versions row: event');
  });
});

describe('resultRows', () => {
  it('accepts plain row arrays and { rows } results', () => {
    expect(resultRows([{ id: 1 }])).toEqual([{ id: 1 }]);
    expect(resultRows({ rows: [{ id: 2 }], rowCount: 1 })).toEqual([{ id: 2 }]);
  });

  it('rejects results without rows', () => {
    expect(() => resultRows({ rowCount: 0 })).toThrow(PersistenceError);
    expect(() => resultRows(null)).toThrow('Query returned no rows array');
  });
});

describe('rawRowToRecord', () => {
  it('normalizes the id', () => {
    expect(rawRowToRecord({ id: '5', name: 'Acme LLC' }, 'companies')).toEqual({
      id: 5,
      name: 'Acme LLC',
    });
  });

  it('rejects rows without an id', () => {
    expect(() => rawRowToRecord({ name: 'Acme LLC' }, 'companies')).toThrow(
      'Row in "companies" has no numeric id'
    );
  });
});

describe('toPersistenceError', () => {
  it('keeps persistence errors as they are', () => {
    const error = new PersistenceError('boom', 'X');
    expect(toPersistenceError(error, 'companies')).toBe(error);
  });

  it('wraps other errors with the generic code', () => {
    const cause = new Error('connection reset');
    const wrapped = toPersistenceError(cause, 'companies');
    expect(wrapped).toBeInstanceOf(PersistenceError);
    expect(wrapped.code).toBe('PERSISTENCE_ERROR');
    expect(wrapped.message).toBe('connection reset');
    expect(wrapped.cause).toBe(cause);
  });
});
