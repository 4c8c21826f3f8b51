import type { CompatibilityMode } from './event-type.js';
import { assertNever } from './errors.js';
import type { Level } from './version.js';
import { mostSevere } from './version.js';

export const SCHEMA_CHANGE_TYPES = [
  'ID_CHANGED',
  'DESCRIPTION_CHANGED',
  'TITLE_CHANGED',
  'PROPERTIES_ADDED',
  'SCHEMA_REMOVED',
  'TYPE_NARROWED',
  'TYPE_CHANGED',
  'NUMBER_OF_ITEMS_CHANGED',
  'PROPERTY_REMOVED',
  'DEPENDENCY_ARRAY_CHANGED',
  'DEPENDENCY_SCHEMA_CHANGED',
  'COMPOSITION_METHOD_CHANGED',
  'ATTRIBUTE_VALUE_CHANGED',
  'ENUM_ARRAY_CHANGED',
  'SUB_SCHEMA_CHANGED',
  'DEPENDENCY_SCHEMA_REMOVED',
  'REQUIRED_ARRAY_CHANGED',
  'REQUIRED_ARRAY_EXTENDED',
  'ADDITIONAL_PROPERTIES_CHANGED',
  'ADDITIONAL_ITEMS_CHANGED',
] as const;

export type SchemaChangeType = (typeof SCHEMA_CHANGE_TYPES)[number];

/**
 * One structural delta between two schema trees.
 *
 * `jsonPath` is a JSON pointer fragment, e.g. `#/properties/order_id`.
 */
export interface SchemaChange {
  readonly type: SchemaChangeType;
  readonly jsonPath: string;
}

interface ModeLevels {
  readonly compatible: Level;
  readonly forward: Level;
}

const BREAKING: ModeLevels = { compatible: 'MAJOR', forward: 'MAJOR' };

/**
 * Severity of every change type per compatibility mode.
 *
 * Forward mode only protects producers, so edits that can only make
 * old events invalid for new readers drop to MINOR there.
 */
const CHANGE_LEVELS: Record<SchemaChangeType, ModeLevels> = {
  ID_CHANGED: BREAKING,
  DESCRIPTION_CHANGED: { compatible: 'PATCH', forward: 'PATCH' },
  TITLE_CHANGED: { compatible: 'PATCH', forward: 'PATCH' },
  PROPERTIES_ADDED: { compatible: 'MINOR', forward: 'MINOR' },
  SCHEMA_REMOVED: BREAKING,
  TYPE_NARROWED: BREAKING,
  TYPE_CHANGED: BREAKING,
  NUMBER_OF_ITEMS_CHANGED: BREAKING,
  PROPERTY_REMOVED: BREAKING,
  DEPENDENCY_ARRAY_CHANGED: BREAKING,
  DEPENDENCY_SCHEMA_CHANGED: BREAKING,
  COMPOSITION_METHOD_CHANGED: BREAKING,
  ATTRIBUTE_VALUE_CHANGED: BREAKING,
  ENUM_ARRAY_CHANGED: BREAKING,
  SUB_SCHEMA_CHANGED: BREAKING,
  DEPENDENCY_SCHEMA_REMOVED: BREAKING,
  REQUIRED_ARRAY_CHANGED: BREAKING,
  REQUIRED_ARRAY_EXTENDED: { compatible: 'MAJOR', forward: 'MINOR' },
  ADDITIONAL_PROPERTIES_CHANGED: { compatible: 'MAJOR', forward: 'MINOR' },
  ADDITIONAL_ITEMS_CHANGED: { compatible: 'MAJOR', forward: 'MINOR' },
};

/** Human-readable text per change type, used in rejection messages. */
export const CHANGE_MESSAGES: Record<SchemaChangeType, string> = {
  ID_CHANGED: 'the field "id" cannot be changed',
  DESCRIPTION_CHANGED: 'the description changed',
  TITLE_CHANGED: 'the title changed',
  PROPERTIES_ADDED: 'properties were added',
  SCHEMA_REMOVED: 'the schema was removed',
  TYPE_NARROWED: 'the type was narrowed',
  TYPE_CHANGED: 'the type cannot be changed',
  NUMBER_OF_ITEMS_CHANGED: 'the number of schemas changed',
  PROPERTY_REMOVED: 'the property was removed',
  DEPENDENCY_ARRAY_CHANGED: 'the dependency array changed',
  DEPENDENCY_SCHEMA_CHANGED: 'the dependency schema changed',
  COMPOSITION_METHOD_CHANGED: 'the composition method changed',
  ATTRIBUTE_VALUE_CHANGED: 'the attribute value changed',
  ENUM_ARRAY_CHANGED: 'the enum array changed',
  SUB_SCHEMA_CHANGED: 'the sub-schema changed',
  DEPENDENCY_SCHEMA_REMOVED: 'the dependency schema was removed',
  REQUIRED_ARRAY_CHANGED: 'the required array changed',
  REQUIRED_ARRAY_EXTENDED: 'the required array was extended',
  ADDITIONAL_PROPERTIES_CHANGED: 'additionalProperties changed',
  ADDITIONAL_ITEMS_CHANGED: 'additionalItems changed',
};

/**
 * Resolves how severe a change type is under a compatibility mode.
 *
 * `none` enforces nothing but still versions: it uses the strict column.
 */
export function levelOf(type: SchemaChangeType, mode: CompatibilityMode): Level {
  const levels = CHANGE_LEVELS[type];
  switch (mode) {
    case 'compatible':
    case 'none':
      return levels.compatible;
    case 'forward':
      return levels.forward;
    default:
      return assertNever(mode);
  }
}

/** Maps a change type to its severity under a mode. */
export type LevelResolver = (type: SchemaChangeType, mode: CompatibilityMode) => Level;

/** Renders a change as `<jsonPath>: <message>`. */
export function formatChange(
  change: SchemaChange,
  messages: Readonly<Record<SchemaChangeType, string>> = CHANGE_MESSAGES,
): string {
  return `${change.jsonPath}: ${messages[change.type]}`;
}

/**
 * Overall level of an update.
 *
 * Text that differs without any structural change (whitespace,
 * key order) is a PATCH; otherwise the most severe change wins and an
 * empty list means NO_CHANGES.
 */
export function changeLevel(
  originalSchema: string,
  updatedSchema: string,
  changes: readonly SchemaChange[],
  mode: CompatibilityMode,
  resolve: LevelResolver = levelOf,
): Level {
  if (changes.length === 0 && originalSchema !== updatedSchema) {
    return 'PATCH';
  }
  return changes
    .map((change) => resolve(change.type, mode))
    .reduce<Level>(mostSevere, 'NO_CHANGES');
}
