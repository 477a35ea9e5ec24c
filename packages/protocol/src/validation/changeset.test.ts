// Tests for the changeset layer

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  changeset,
  change,
  dropChanges,
  applyChanges,
  hasChanges,
  isChangeSet,
} from './changeset.js';
import { defineModel } from './models.js';

// --- Test Fixtures ---

const Company = defineModel({
  name: 'SimpleCompany',
  table: 'simple_companies',
  schema: z.object({
    name: z.string().min(1),
    is_active: z.boolean().optional(),
    city: z.string().nullable().optional(),
    website: z.string().nullable().optional(),
    location: z.object({ country: z.string() }).nullable().optional(),
  }),
});

const existing = {
  id: 1,
  name: 'Acme LLC',
  is_active: true,
  city: 'Greenwich',
  website: null,
  location: { country: 'Brazil' },
};

// --- Tests ---

describe('changeset', () => {
  describe('new records', () => {
    it('collects every permitted param as a change', () => {
      const cs = changeset(Company, {}, { name: 'Acme LLC', city: 'Greenwich' });

      expect(cs.valid).toBe(true);
      expect(cs.errors).toEqual([]);
      expect(cs.changes).toEqual({ name: 'Acme LLC', city: 'Greenwich' });
    });

    it('reports missing required attributes', () => {
      const cs = changeset(Company, {}, { city: 'Greenwich' });

      expect(cs.valid).toBe(false);
      expect(cs.errors).toEqual([
        { field: 'name', message: 'Required', code: 'invalid_type' },
      ]);
    });

    it('ignores params outside the schema', () => {
      const cs = changeset(Company, {}, { name: 'Acme LLC', bogus: 42 });

      expect(cs.changes).toEqual({ name: 'Acme LLC' });
    });
  });

  describe('existing records', () => {
    it('keeps only attributes whose value differs', () => {
      const cs = changeset(Company, existing, {
        city: 'Greenwich',
        website: 'http://www.acme.com',
        location: { country: 'Brazil' },
      });

      expect(cs.valid).toBe(true);
      expect(cs.changes).toEqual({ website: 'http://www.acme.com' });
    });

    it('produces an empty change map when nothing changes', () => {
      const cs = changeset(Company, existing, {});

      expect(cs.changes).toEqual({});
      expect(hasChanges(cs)).toBe(false);
    });

    it('rejects null for a required attribute', () => {
      const cs = changeset(Company, existing, { name: null, city: 'Hong Kong' });

      expect(cs.valid).toBe(false);
      expect(cs.errors.map((e) => e.field)).toEqual(['name']);
      expect(cs.changes).toEqual({ name: null, city: 'Hong Kong' });
    });
  });
});

describe('change', () => {
  it('adds differing attributes and drops ones equal to the base', () => {
    const cs = changeset(Company, existing, { city: 'Hong Kong' });

    const updated = change(cs, { current_version_id: 7, city: 'Greenwich' });

    expect(updated.changes).toEqual({ current_version_id: 7 });
    expect(cs.changes).toEqual({ city: 'Hong Kong' });
  });
});

describe('dropChanges', () => {
  it('removes the named attributes only', () => {
    const cs = change(changeset(Company, existing, { city: 'Hong Kong' }), {
      first_version_id: 1,
      current_version_id: 1,
    });

    expect(dropChanges(cs, ['first_version_id', 'current_version_id']).changes).toEqual({
      city: 'Hong Kong',
    });
  });
});

describe('applyChanges', () => {
  it('merges changes over the base data', () => {
    const cs = changeset(Company, existing, { city: 'Hong Kong' });

    expect(applyChanges(cs)).toEqual({ ...existing, city: 'Hong Kong' });
  });
});

describe('isChangeSet', () => {
  it('recognises changesets and rejects plain records', () => {
    expect(isChangeSet(changeset(Company, existing, {}))).toBe(true);
    expect(isChangeSet(existing)).toBe(false);
    expect(isChangeSet(null)).toBe(false);
  });
});

describe('defineModel', () => {
  it('rejects table names that are not plain identifiers', () => {
    expect(() =>
      defineModel({ name: 'Bad', table: 'Bad-Name', schema: z.object({}) })
    ).toThrow('Invalid table name "Bad-Name"');
  });

  it('defaults softDelete to false', () => {
    expect(Company.softDelete).toBe(false);
  });
});
