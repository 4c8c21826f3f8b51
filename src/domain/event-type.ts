/**
 * Core domain types for the event-type registry.
 *
 * An event type is the contract producers and consumers of a topic
 * must honour: a JSON Schema plus the policies governing how that
 * schema may change. These types carry no framework dependencies.
 */

export const EVENT_CATEGORIES = ['undefined', 'data', 'business'] as const;
export type EventCategory = (typeof EVENT_CATEGORIES)[number];

/**
 * Evolution contract of an event type.
 *
 * - `none`: no structural enforcement.
 * - `forward`: protects producers only; some breaking edits stay legal.
 * - `compatible`: strictest, no MAJOR change is ever accepted.
 */
export const COMPATIBILITY_MODES = ['none', 'compatible', 'forward'] as const;
export type CompatibilityMode = (typeof COMPATIBILITY_MODES)[number];

export const ENRICHMENT_STRATEGIES = ['metadata_enrichment'] as const;
export type EnrichmentStrategy = (typeof ENRICHMENT_STRATEGIES)[number];

export const PARTITION_STRATEGIES = ['random', 'hash', 'user_defined'] as const;
export type PartitionStrategy = (typeof PARTITION_STRATEGIES)[number];

export const SCHEMA_TYPES = ['json_schema'] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

/** Schema as submitted by a client: the document text, unparsed. */
export interface EventTypeSchemaBase {
  readonly type: SchemaType;
  readonly schema: string;
}

/** A stored schema snapshot. */
export interface EventTypeSchema extends EventTypeSchemaBase {
  readonly version: string;
  readonly created_at: string; // ISO-8601
}

/** Fields shared by a proposed and a stored event type. */
interface EventTypeFields {
  readonly name: string;
  readonly owning_application: string;
  readonly category: EventCategory;
  readonly enrichment_strategies: readonly EnrichmentStrategy[];
  readonly partition_strategy: PartitionStrategy;
  readonly partition_key_fields: readonly string[];
  readonly compatibility_mode: CompatibilityMode;
}

/** A proposed event type, as carried by a create or update request. */
export interface EventTypeBase extends EventTypeFields {
  readonly schema: EventTypeSchemaBase;
}

/**
 * A registered event type.
 *
 * Only replaced through a governed evolution step, which always
 * produces a new value.
 */
export interface EventType extends EventTypeFields {
  readonly schema: EventTypeSchema;
  readonly created_at: string; // ISO-8601
  readonly updated_at: string; // ISO-8601
}

export const INITIAL_SCHEMA_VERSION = '1.0.0';
