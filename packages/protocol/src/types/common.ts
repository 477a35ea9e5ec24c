// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Sequence-assigned numeric identifier (records and versions alike)
 */
export type RecordId = number;

/**
 * Attribute name → value map, as a record is read from or written to storage
 */
export type AttributeMap = Record<string, unknown>;

/**
 * A record that has been persisted and therefore carries its identifier.
 */
export type StoredRecord = AttributeMap & { id: RecordId };

/**
 * Flat filter used by bulk operations.
 *
 * A scalar value matches by equality (`null` matches IS NULL); an array
 * matches by membership. All entries are ANDed.
 */
export type WhereClause = Record<string, WhereValue>;

export type WhereScalar = string | number | boolean | null;

export type WhereValue = WhereScalar | readonly WhereScalar[];
