export type {
  EventCategory,
  CompatibilityMode,
  EnrichmentStrategy,
  PartitionStrategy,
  SchemaType,
  EventTypeSchemaBase,
  EventTypeSchema,
  EventTypeBase,
  EventType,
} from './event-type.js';
export {
  EVENT_CATEGORIES,
  COMPATIBILITY_MODES,
  ENRICHMENT_STRATEGIES,
  PARTITION_STRATEGIES,
  SCHEMA_TYPES,
  INITIAL_SCHEMA_VERSION,
} from './event-type.js';
export type { Level } from './version.js';
export { LEVELS, Version, mostSevere, compareLevels } from './version.js';
export type { SchemaChange, SchemaChangeType, LevelResolver } from './schema-change.js';
export { SCHEMA_CHANGE_TYPES, CHANGE_MESSAGES, levelOf, formatChange, changeLevel } from './schema-change.js';
export type { SchemaIncompatibility, SchemaEvolutionIncompatibility, IncompatibilityKind } from './incompatibility.js';
export { InvalidEventTypeError, InvalidVersionError, assertNever } from './errors.js';
export type { EvolutionConstraint } from './constraints/index.js';
export {
  createNameChangeConstraint,
  createCategoryChangeConstraint,
  createEnrichmentStrategyChangeConstraint,
  createCompatibilityModeChangeConstraint,
  createPartitionStrategyChangeConstraint,
  createPartitionKeyFieldsChangeConstraint,
} from './constraints/index.js';
