import { pgTable, bigserial, varchar, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the single `registry_records` table.
 *
 * Every collection of the persistence port lives here as a JSONB document
 * keyed by `(collection, record_id)`. `seq` gives a stable insertion order
 * so "most recent N" queries never depend on clock resolution.
 */
export const registryRecords = pgTable('registry_records', {
  seq: bigserial('seq', { mode: 'number' }).primaryKey(),
  collection: varchar('collection', { length: 64 }).notNull(),
  record_id: varchar('record_id', { length: 255 }).notNull(),
  data: jsonb('data').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_registry_records_collection_id').on(table.collection, table.record_id),
  index('idx_registry_records_collection_seq').on(table.collection, table.seq),
]);
