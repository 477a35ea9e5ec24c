import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineModel } from '@trailkeep/protocol';
import { captureProjection, captureVersion, serializeRecord } from './capture.js';

const Company = defineModel({
  name: 'SimpleCompany',
  table: 'simple_companies',
  schema: z.object({ name: z.string(), city: z.string().optional() }),
});

describe('serializeRecord', () => {
  it('turns dates into ISO strings and drops undefined attributes', () => {
    const serialized = serializeRecord({
      id: 1,
      name: 'Acme LLC',
      website: undefined,
      inserted_at: new Date('2024-03-01T10:00:00.000Z'),
    });

    expect(serialized).toEqual({
      id: 1,
      name: 'Acme LLC',
      inserted_at: '2024-03-01T10:00:00.000Z',
    });
    expect('website' in serialized).toBe(false);
  });

  it('serializes nested objects and arrays', () => {
    expect(
      serializeRecord({
        address: { city: 'Greenwich', verified_at: new Date('2024-01-02T00:00:00.000Z'), zip: undefined },
        tags: ['a', undefined, new Date('2024-01-03T00:00:00.000Z')],
      })
    ).toEqual({
      address: { city: 'Greenwich', verified_at: '2024-01-02T00:00:00.000Z' },
      tags: ['a', null, '2024-01-03T00:00:00.000Z'],
    });
  });
});

describe('captureVersion', () => {
  const record = { id: 7, name: 'Acme LLC', city: 'Greenwich' };

  it('snapshots the record on insert', () => {
    expect(captureVersion({ event: 'insert', model: Company, record })).toEqual({
      event: 'insert',
      itemType: 'SimpleCompany',
      itemId: 7,
      itemChanges: { id: 7, name: 'Acme LLC', city: 'Greenwich' },
      originatorId: null,
      origin: null,
      meta: null,
    });
  });

  it('keeps only the changes on update', () => {
    const payload = captureVersion({
      event: 'update',
      model: Company,
      itemId: 7,
      changes: { city: 'Hong Kong' },
    });

    expect(payload.event).toBe('update');
    expect(payload.itemId).toBe(7);
    expect(payload.itemChanges).toEqual({ city: 'Hong Kong' });
  });

  it('snapshots the removed record on delete and soft delete', () => {
    expect(captureVersion({ event: 'delete', model: Company, record }).itemChanges).toEqual(record);
    expect(captureVersion({ event: 'soft_delete', model: Company, record }).event).toBe(
      'soft_delete'
    );
  });

  it('copies attribution verbatim', () => {
    const payload = captureVersion(
      { event: 'insert', model: Company, record },
      { originatorId: 3, origin: 'admin', meta: { ticket: 'OPS-1' } }
    );

    expect(payload.originatorId).toBe(3);
    expect(payload.origin).toBe('admin');
    expect(payload.meta).toEqual({ ticket: 'OPS-1' });
  });
});

describe('captureProjection', () => {
  it('builds a per-row template from the bulk changes', () => {
    expect(
      captureProjection('update', Company, { city: 'Hong Kong' }, { origin: 'import' })
    ).toEqual({
      event: 'update',
      itemType: 'SimpleCompany',
      itemChanges: { city: 'Hong Kong' },
      originatorId: null,
      origin: 'import',
      meta: null,
    });
  });
});
