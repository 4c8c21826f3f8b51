import { and, desc, eq } from 'drizzle-orm';
import type { EventType, EventTypeSchema } from '../../domain/index.js';
import type { Database } from './client.js';
import { eventTypes, eventTypeSchemas } from './schema.js';

/** Row shape returned by event-type queries. */
export type EventTypeRow = typeof eventTypes.$inferSelect;

type SchemaRow = typeof eventTypeSchemas.$inferSelect;

/** The stored revision an update was computed from. */
export interface ExpectedRevision {
  version: string;
  updatedAt: string;
}

function toEventType(row: EventTypeRow): EventType {
  return {
    name: row.name,
    owning_application: row.owning_application,
    category: row.category,
    enrichment_strategies: row.enrichment_strategies,
    partition_strategy: row.partition_strategy,
    partition_key_fields: row.partition_key_fields,
    compatibility_mode: row.compatibility_mode,
    schema: {
      type: row.schema_type,
      schema: row.schema,
      version: row.schema_version,
      created_at: row.schema_created_at.toISOString(),
    },
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toSchema(row: SchemaRow): EventTypeSchema {
  return {
    type: row.schema_type,
    schema: row.schema,
    version: row.version,
    created_at: row.created_at.toISOString(),
  };
}

function toColumns(eventType: EventType) {
  return {
    owning_application: eventType.owning_application,
    category: eventType.category,
    enrichment_strategies: [...eventType.enrichment_strategies],
    partition_strategy: eventType.partition_strategy,
    partition_key_fields: [...eventType.partition_key_fields],
    compatibility_mode: eventType.compatibility_mode,
    schema_type: eventType.schema.type,
    schema: eventType.schema.schema,
    schema_version: eventType.schema.version,
    schema_created_at: new Date(eventType.schema.created_at),
    updated_at: new Date(eventType.updated_at),
  };
}

function toHistoryRow(eventType: EventType) {
  return {
    name: eventType.name,
    version: eventType.schema.version,
    schema_type: eventType.schema.type,
    schema: eventType.schema.schema,
    created_at: new Date(eventType.schema.created_at),
  };
}

/**
 * Inserts a new event type and its first schema snapshot.
 *
 * Returns null when an event type with the same name already exists.
 */
export async function insertEventType(db: Database, eventType: EventType): Promise<EventType | null> {
  return db.transaction(async (tx) => {
    const rows = await tx.insert(eventTypes).values({
      name: eventType.name,
      ...toColumns(eventType),
      created_at: new Date(eventType.created_at),
    }).onConflictDoNothing({ target: eventTypes.name }).returning();

    const row = rows[0];
    if (row === undefined) {
      return null;
    }

    await tx.insert(eventTypeSchemas).values(toHistoryRow(eventType)).onConflictDoNothing();
    return toEventType(row);
  });
}

export async function findAllEventTypes(db: Database): Promise<EventType[]> {
  const rows = await db.select().from(eventTypes).orderBy(eventTypes.name);
  return rows.map(toEventType);
}

export async function findEventTypeByName(db: Database, name: string): Promise<EventType | undefined> {
  const rows = await db.select().from(eventTypes).where(eq(eventTypes.name, name)).limit(1);
  const row = rows[0];
  return row === undefined ? undefined : toEventType(row);
}

/**
 * Replaces the current definition of an event type, provided the stored
 * row is still at the `expected` revision.
 *
 * Returns undefined when the row is gone or was changed in between;
 * nothing is written then. Appends the schema to the history when its
 * version is new.
 */
export async function updateEventType(
  db: Database,
  eventType: EventType,
  expected: ExpectedRevision,
): Promise<EventType | undefined> {
  return db.transaction(async (tx) => {
    const rows = await tx.update(eventTypes)
      .set(toColumns(eventType))
      .where(and(
        eq(eventTypes.name, eventType.name),
        eq(eventTypes.schema_version, expected.version),
        eq(eventTypes.updated_at, new Date(expected.updatedAt)),
      ))
      .returning();

    const row = rows[0];
    if (row === undefined) {
      return undefined;
    }

    await tx.insert(eventTypeSchemas).values(toHistoryRow(eventType)).onConflictDoNothing();
    return toEventType(row);
  });
}

/** Schema history of an event type, newest first. */
export async function findSchemaVersions(db: Database, name: string): Promise<EventTypeSchema[]> {
  const rows = await db.select()
    .from(eventTypeSchemas)
    .where(eq(eventTypeSchemas.name, name))
    .orderBy(desc(eventTypeSchemas.created_at));
  return rows.map(toSchema);
}
