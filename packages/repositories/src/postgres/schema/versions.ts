import { pgTable, serial, integer, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { VersionEvent } from '@trailkeep/protocol';

/**
 * Versions table - the append-only change ledger.
 *
 * Column names are the persisted layout history viewers and diff renderers
 * read, so they stay stable.
 */
export const versions = pgTable(
  'versions',
  {
    id: serial('id').primaryKey(),
    event: text('event').$type<VersionEvent>().notNull(), // insert | update | delete | soft_delete
    itemType: text('item_type').notNull(),
    itemId: integer('item_id').notNull(),
    itemChanges: jsonb('item_changes').$type<Record<string, unknown>>().notNull(),
    originatorId: integer('originator_id'),
    origin: text('origin'),
    meta: jsonb('meta').$type<Record<string, unknown>>(),
    insertedAt: timestamp('inserted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('versions_item_idx').on(table.itemType, table.itemId),
    index('versions_event_idx').on(table.event),
    index('versions_originator_idx').on(table.originatorId),
  ]
);
