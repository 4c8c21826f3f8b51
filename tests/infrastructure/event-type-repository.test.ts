import { describe, it, expect, vi } from 'vitest';
import { updateEventType } from '../../src/infrastructure/db/event-type-repository.js';
import { eventTypes, eventTypeSchemas } from '../../src/infrastructure/db/schema.js';
import type { Database, EventTypeRow } from '../../src/infrastructure/db/index.js';
import { BASE_SCHEMA, makeEventType } from '../helpers.js';

/**
 * Minimal stand-in for the drizzle transaction chain used by
 * updateEventType: update().set().where().returning() and
 * insert().values().onConflictDoNothing().
 */
function fakeDb(updatedRows: EventTypeRow[]) {
  const returning = vi.fn().mockResolvedValue(updatedRows);
  const where = vi.fn(() => ({ returning }));
  const set = vi.fn(() => ({ where }));
  const update = vi.fn(() => ({ set }));

  const onConflictDoNothing = vi.fn().mockResolvedValue(undefined);
  const values = vi.fn(() => ({ onConflictDoNothing }));
  const insert = vi.fn(() => ({ values }));

  const tx = { update, insert };
  const db = {
    transaction: vi.fn(async (run: (t: typeof tx) => Promise<unknown>) => run(tx)),
  } as unknown as Database;

  return { db, update, set, where, insert, values };
}

const STORED_AT = '2026-01-01T00:00:00.000Z';

function storedRow(version: string): EventTypeRow {
  return {
    name: 'order.created',
    owning_application: 'order-service',
    category: 'business',
    enrichment_strategies: ['metadata_enrichment'],
    partition_strategy: 'random',
    partition_key_fields: [],
    compatibility_mode: 'compatible',
    schema_type: 'json_schema',
    schema: BASE_SCHEMA,
    schema_version: version,
    schema_created_at: new Date(STORED_AT),
    created_at: new Date(STORED_AT),
    updated_at: new Date('2026-02-18T12:00:00.000Z'),
  };
}

describe('updateEventType', () => {
  it('writes nothing and returns undefined when the revision no longer matches', async () => {
    const { db, update, where, insert } = fakeDb([]);
    const evolved = makeEventType({ name: 'order.created' });

    const result = await updateEventType(db, evolved, { version: '1.0.0', updatedAt: STORED_AT });

    expect(result).toBeUndefined();
    expect(update).toHaveBeenCalledWith(eventTypes);
    expect(where).toHaveBeenCalledTimes(1);
    expect(insert).not.toHaveBeenCalled();
  });

  it('appends the schema to the history when the update applies', async () => {
    const { db, insert, values } = fakeDb([storedRow('1.1.0')]);
    const evolved = makeEventType({
      name: 'order.created',
      schema: { type: 'json_schema', schema: BASE_SCHEMA, version: '1.1.0', created_at: '2026-02-18T12:00:00.000Z' },
    });

    const result = await updateEventType(db, evolved, { version: '1.0.0', updatedAt: STORED_AT });

    expect(result?.schema.version).toBe('1.1.0');
    expect(result?.updated_at).toBe('2026-02-18T12:00:00.000Z');
    expect(insert).toHaveBeenCalledWith(eventTypeSchemas);
    expect(values).toHaveBeenCalledWith({
      name: 'order.created',
      version: '1.1.0',
      schema_type: 'json_schema',
      schema: BASE_SCHEMA,
      created_at: new Date('2026-02-18T12:00:00.000Z'),
    });
  });
});
