import { pgTable, varchar, text, timestamp, jsonb, index, primaryKey } from 'drizzle-orm/pg-core';
import {
  EVENT_CATEGORIES,
  COMPATIBILITY_MODES,
  PARTITION_STRATEGIES,
  SCHEMA_TYPES,
} from '../../domain/index.js';
import type { EnrichmentStrategy } from '../../domain/index.js';

/**
 * Drizzle schema for the `event_types` table.
 *
 * One row per event type holding its current definition. The current
 * schema snapshot is flattened into `schema_*` columns; its history
 * lives in `event_type_schemas`.
 */
export const eventTypes = pgTable('event_types', {
  name: varchar('name', { length: 255 }).primaryKey(),
  owning_application: varchar('owning_application', { length: 255 }).notNull(),
  category: varchar('category', { length: 20, enum: EVENT_CATEGORIES }).notNull(),
  enrichment_strategies: jsonb('enrichment_strategies').$type<EnrichmentStrategy[]>().notNull().default([]),
  partition_strategy: varchar('partition_strategy', { length: 20, enum: PARTITION_STRATEGIES }).notNull(),
  partition_key_fields: jsonb('partition_key_fields').$type<string[]>().notNull().default([]),
  compatibility_mode: varchar('compatibility_mode', { length: 20, enum: COMPATIBILITY_MODES }).notNull(),
  schema_type: varchar('schema_type', { length: 20, enum: SCHEMA_TYPES }).notNull(),
  schema: text('schema').notNull(),
  schema_version: varchar('schema_version', { length: 32 }).notNull(),
  schema_created_at: timestamp('schema_created_at', { withTimezone: true }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_event_types_owning_application').on(table.owning_application),
  index('idx_event_types_category').on(table.category),
]);

/**
 * Drizzle schema for the `event_type_schemas` table.
 *
 * Append-only schema history keyed by (name, version). An update that
 * keeps the version writes nothing here.
 */
export const eventTypeSchemas = pgTable('event_type_schemas', {
  name: varchar('name', { length: 255 }).notNull(),
  version: varchar('version', { length: 32 }).notNull(),
  schema_type: varchar('schema_type', { length: 20, enum: SCHEMA_TYPES }).notNull(),
  schema: text('schema').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  primaryKey({ columns: [table.name, table.version] }),
  index('idx_event_type_schemas_created_at').on(table.created_at),
]);
