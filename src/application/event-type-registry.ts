import type { Database } from '../infrastructure/db/index.js';
import {
  insertEventType,
  findAllEventTypes,
  findEventTypeByName,
  updateEventType,
  findSchemaVersions,
} from '../infrastructure/db/index.js';
import type {
  EventType,
  EventTypeBase,
  EventTypeSchema,
  SchemaIncompatibility,
} from '../domain/index.js';
import { INITIAL_SCHEMA_VERSION, InvalidEventTypeError } from '../domain/index.js';
import { collectTextIncompatibilities } from './meta-schema.js';
import type { SchemaEvolutionService } from './schema-evolution.js';

/**
 * Result of a registry command. Routes map each status to a response;
 * only unexpected failures are thrown.
 */
export type RegistryOutcome<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'not_found' }
  | { readonly status: 'conflict' }
  | { readonly status: 'concurrent_update' }
  | { readonly status: 'invalid_schema'; readonly incompatibilities: SchemaIncompatibility[] }
  | { readonly status: 'invalid_evolution'; readonly error: InvalidEventTypeError };

/**
 * Registers a new event type at version 1.0.0.
 *
 * The schema must pass the meta-schema; an existing name is a conflict.
 */
export async function registerEventType(
  db: Database,
  proposed: EventTypeBase,
  now: () => Date = () => new Date(),
): Promise<RegistryOutcome<EventType>> {
  const incompatibilities = collectTextIncompatibilities(proposed.schema.schema);
  if (incompatibilities.length > 0) {
    return { status: 'invalid_schema', incompatibilities };
  }

  const timestamp = now().toISOString();
  const eventType: EventType = {
    ...proposed,
    schema: {
      ...proposed.schema,
      version: INITIAL_SCHEMA_VERSION,
      created_at: timestamp,
    },
    created_at: timestamp,
    updated_at: timestamp,
  };

  const row = await insertEventType(db, eventType);
  return row === null ? { status: 'conflict' } : { status: 'ok', value: row };
}

/**
 * Evolves a registered event type and persists the result.
 *
 * Nothing is written unless the evolution service accepts the change
 * and the stored row is still the one the change was computed from;
 * otherwise the outcome is `concurrent_update` and the client retries.
 */
export async function evolveEventType(
  db: Database,
  service: SchemaEvolutionService,
  name: string,
  proposed: EventTypeBase,
): Promise<RegistryOutcome<EventType>> {
  const original = await findEventTypeByName(db, name);
  if (original === undefined) {
    return { status: 'not_found' };
  }

  const incompatibilities = collectTextIncompatibilities(proposed.schema.schema);
  if (incompatibilities.length > 0) {
    return { status: 'invalid_schema', incompatibilities };
  }

  let evolved: EventType;
  try {
    evolved = service.evolve(original, proposed);
  } catch (err: unknown) {
    if (err instanceof InvalidEventTypeError) {
      return { status: 'invalid_evolution', error: err };
    }
    throw err;
  }

  const row = await updateEventType(db, evolved, {
    version: original.schema.version,
    updatedAt: original.updated_at,
  });
  return row === undefined ? { status: 'concurrent_update' } : { status: 'ok', value: row };
}

/** Fetch a single event type by name. Returns null if not found. */
export async function getEventType(db: Database, name: string): Promise<EventType | null> {
  const row = await findEventTypeByName(db, name);
  return row ?? null;
}

/** List all event types, ordered by name. */
export async function listEventTypes(db: Database): Promise<EventType[]> {
  return findAllEventTypes(db);
}

/** Schema history of an event type, newest first; null if the type is unknown. */
export async function listSchemaVersions(db: Database, name: string): Promise<EventTypeSchema[] | null> {
  const row = await findEventTypeByName(db, name);
  if (row === undefined) {
    return null;
  }
  return findSchemaVersions(db, name);
}
