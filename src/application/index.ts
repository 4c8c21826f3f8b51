export { eventTypeBodySchema, schemaValidationBodySchema } from './event-type-schema.js';
export type { EventTypeInput } from './event-type-schema.js';
export {
  META_SCHEMA,
  META_SCHEMA_VERSION,
  FORBIDDEN_KEYWORDS,
  collectIncompatibilities,
  collectTextIncompatibilities,
} from './meta-schema.js';
export type { SchemaNode } from './meta-schema.js';
export { toJsonPointer } from './json-pointer.js';
export { collectChanges, createSchemaDiff } from './schema-diff.js';
export type { SchemaDiff } from './schema-diff.js';
export { checkConstraints, defaultConstraints } from './evolution-constraints.js';
export { SchemaEvolutionService, CATEGORY_CHANGE_MESSAGE } from './schema-evolution.js';
export type { SchemaEvolutionOptions, ChangePreview } from './schema-evolution.js';
export {
  registerEventType,
  evolveEventType,
  getEventType,
  listEventTypes,
  listSchemaVersions,
} from './event-type-registry.js';
export type { RegistryOutcome } from './event-type-registry.js';
