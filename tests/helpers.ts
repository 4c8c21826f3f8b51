import type { EventType, EventTypeBase } from '../src/domain/index.js';

/** Fixed "now" for deterministic version stamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z');
export const CREATED_AT = '2026-01-01T00:00:00.000Z';

export const BASE_SCHEMA = JSON.stringify({
  type: 'object',
  properties: {
    order_id: { type: 'string' },
    amount: { type: 'number' },
  },
  required: ['order_id'],
});

let counter = 0;

/**
 * Factory for a registered event type with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEventType(overrides: Partial<EventType> = {}): EventType {
  counter++;
  return {
    name: overrides.name ?? `order.created.${counter}`,
    owning_application: overrides.owning_application ?? 'order-service',
    category: overrides.category ?? 'business',
    enrichment_strategies: overrides.enrichment_strategies ?? ['metadata_enrichment'],
    partition_strategy: overrides.partition_strategy ?? 'random',
    partition_key_fields: overrides.partition_key_fields ?? [],
    compatibility_mode: overrides.compatibility_mode ?? 'compatible',
    schema: overrides.schema ?? {
      type: 'json_schema',
      schema: BASE_SCHEMA,
      version: '1.0.0',
      created_at: CREATED_AT,
    },
    created_at: overrides.created_at ?? CREATED_AT,
    updated_at: overrides.updated_at ?? CREATED_AT,
  };
}

/**
 * A proposal that repeats `original` except for the given fields.
 * `schema` takes the new schema document (object or raw text).
 */
export function propose(
  original: EventType,
  overrides: Partial<Omit<EventTypeBase, 'schema'>> & { schema?: object | string } = {},
): EventTypeBase {
  const { schema, ...fields } = overrides;
  const text = schema === undefined
    ? original.schema.schema
    : typeof schema === 'string' ? schema : JSON.stringify(schema);

  return {
    name: fields.name ?? original.name,
    owning_application: fields.owning_application ?? original.owning_application,
    category: fields.category ?? original.category,
    enrichment_strategies: fields.enrichment_strategies ?? original.enrichment_strategies,
    partition_strategy: fields.partition_strategy ?? original.partition_strategy,
    partition_key_fields: fields.partition_key_fields ?? original.partition_key_fields,
    compatibility_mode: fields.compatibility_mode ?? original.compatibility_mode,
    schema: { type: 'json_schema', schema: text },
  };
}
