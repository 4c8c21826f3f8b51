import { z } from 'zod';
import {
  EVENT_CATEGORIES,
  COMPATIBILITY_MODES,
  ENRICHMENT_STRATEGIES,
  PARTITION_STRATEGIES,
  SCHEMA_TYPES,
} from '../domain/index.js';

const NAME_RE = /^[a-zA-Z][-0-9a-zA-Z_]*(\.[0-9a-zA-Z][-0-9a-zA-Z_]*)*$/;

/**
 * Zod schema for an event-type create/update body.
 *
 * - `schema.schema` is the JSON Schema as text; its contents are checked
 *   separately against the broker's meta-schema.
 * - Policy fields default to the most permissive values, except
 *   `compatibility_mode`, which defaults to `forward`.
 */
export const eventTypeBodySchema = z.object({
  name: z.string().min(1).max(255).regex(NAME_RE, 'Must be dot-separated identifiers'),
  owning_application: z.string().min(1).max(255),
  category: z.enum(EVENT_CATEGORIES),
  enrichment_strategies: z.array(z.enum(ENRICHMENT_STRATEGIES)).default([]),
  partition_strategy: z.enum(PARTITION_STRATEGIES).default('random'),
  partition_key_fields: z.array(z.string().min(1)).default([]),
  compatibility_mode: z.enum(COMPATIBILITY_MODES).default('forward'),
  schema: z.object({
    type: z.enum(SCHEMA_TYPES),
    schema: z.string().min(1),
  }),
});

/** Inferred type of a validated create/update body. */
export type EventTypeInput = z.infer<typeof eventTypeBodySchema>;

/** Body of POST /api/v1/schemas/validate. */
export const schemaValidationBodySchema = z.object({
  schema: z.string().min(1),
});
