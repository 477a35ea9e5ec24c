// Flat where-clause evaluation shared by the engines

import type { AttributeMap, WhereClause, WhereScalar, WhereValue } from '@trailkeep/protocol';

export function isWhereList(value: WhereValue): value is readonly WhereScalar[] {
  return Array.isArray(value);
}

/**
 * Evaluate a flat where clause against a row.
 * Missing attributes compare as null.
 */
export function matchesWhere(row: AttributeMap, where: WhereClause): boolean {
  return Object.entries(where).every(([column, expected]) => {
    const actual = row[column] ?? null;
    if (isWhereList(expected)) {
      return expected.some((candidate) => candidate === actual);
    }
    return actual === expected;
  });
}
