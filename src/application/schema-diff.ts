import { isDeepStrictEqual } from 'node:util';
import type { SchemaChange, SchemaChangeType } from '../domain/index.js';
import { toJsonPointer } from './json-pointer.js';

/**
 * Structural differ: describes how one parsed schema differs from
 * another, independent of any compatibility policy.
 */
export interface SchemaDiff {
  collectChanges(original: unknown, updated: unknown): SchemaChange[];
}

type SchemaObject = Record<string, unknown>;
type Path = readonly string[];

const VALIDATION_ATTRIBUTES = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'minLength',
  'maxLength',
  'pattern',
  'format',
  'minItems',
  'maxItems',
  'uniqueItems',
  'minProperties',
  'maxProperties',
] as const;

const COMPOSITION_KEYWORDS = ['allOf', 'anyOf', 'oneOf'] as const;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asObject(value: unknown): SchemaObject {
  return isSchemaObject(value) ? value : {};
}

function asStringSet(value: unknown): Set<string> {
  if (typeof value === 'string') return new Set([value]);
  if (Array.isArray(value)) return new Set(value.map((v) => (typeof v === 'string' ? v : JSON.stringify(v))));
  return new Set();
}

function isSubset(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return [...a].every((v) => b.has(v));
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && isSubset(a, b);
}

/** Accumulates changes in the order the walk discovers them. */
class DiffState {
  readonly changes: SchemaChange[] = [];

  add(type: SchemaChangeType, path: Path): void {
    this.changes.push({ type, jsonPath: toJsonPointer(path) });
  }
}

function compareIdentity(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  if (!isDeepStrictEqual(o['id'] ?? o['$id'], u['id'] ?? u['$id'])) {
    state.add('ID_CHANGED', path);
  }
  if (!isDeepStrictEqual(o['description'], u['description'])) {
    state.add('DESCRIPTION_CHANGED', path);
  }
  if (!isDeepStrictEqual(o['title'], u['title'])) {
    state.add('TITLE_CHANGED', path);
  }
}

/** A missing `type` accepts anything, so adding one narrows. */
function compareType(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = o['type'];
  const after = u['type'];
  if (before === undefined && after === undefined) return;

  if (before === undefined) {
    state.add('TYPE_NARROWED', path);
    return;
  }
  if (after === undefined) {
    state.add('TYPE_CHANGED', path);
    return;
  }

  const beforeSet = asStringSet(before);
  const afterSet = asStringSet(after);
  if (sameSet(beforeSet, afterSet)) return;
  state.add(isSubset(afterSet, beforeSet) ? 'TYPE_NARROWED' : 'TYPE_CHANGED', path);
}

function compareAttributes(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  if (!isDeepStrictEqual(o['enum'], u['enum'])) {
    state.add('ENUM_ARRAY_CHANGED', path);
  }
  for (const keyword of VALIDATION_ATTRIBUTES) {
    if (!isDeepStrictEqual(o[keyword], u[keyword])) {
      state.add('ATTRIBUTE_VALUE_CHANGED', [...path, keyword]);
    }
  }
}

function compareProperties(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = asObject(o['properties']);
  const after = asObject(u['properties']);

  for (const name of Object.keys(before)) {
    const childPath = [...path, 'properties', name];
    if (!Object.hasOwn(after, name)) {
      state.add('PROPERTY_REMOVED', childPath);
    } else {
      compareSchemas(before[name], after[name], childPath, state);
    }
  }

  if (Object.keys(after).some((name) => !Object.hasOwn(before, name))) {
    state.add('PROPERTIES_ADDED', [...path, 'properties']);
  }
}

function compareRequired(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = asStringSet(o['required']);
  const after = asStringSet(u['required']);
  if (sameSet(before, after)) return;
  state.add(isSubset(before, after) ? 'REQUIRED_ARRAY_EXTENDED' : 'REQUIRED_ARRAY_CHANGED', path);
}

const ADDITIONAL_KEYWORDS = [
  ['additionalProperties', 'ADDITIONAL_PROPERTIES_CHANGED'],
  ['additionalItems', 'ADDITIONAL_ITEMS_CHANGED'],
] as const;

/**
 * Switching between absent, boolean and schema is reported as such;
 * two schemas are walked like any other sub-schema.
 */
function compareAdditional(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  for (const [keyword, changeType] of ADDITIONAL_KEYWORDS) {
    const before = o[keyword];
    const after = u[keyword];
    if (isDeepStrictEqual(before, after)) continue;

    const keywordPath = [...path, keyword];
    if (isSchemaObject(before) && isSchemaObject(after)) {
      compareSchemas(before, after, keywordPath, state);
    } else {
      state.add(changeType, keywordPath);
    }
  }
}

/** Compares two lists of sub-schemas position by position. */
function compareSchemaLists(before: unknown[], after: unknown[], path: Path, state: DiffState): void {
  if (before.length !== after.length) {
    state.add('NUMBER_OF_ITEMS_CHANGED', path);
    return;
  }
  before.forEach((schema, i) => compareSchemas(schema, after[i], [...path, String(i)], state));
}

function compareItems(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = o['items'];
  const after = u['items'];
  const itemsPath = [...path, 'items'];
  if (before === undefined && after === undefined) return;

  if (after === undefined) {
    state.add('SCHEMA_REMOVED', itemsPath);
  } else if (before === undefined || Array.isArray(before) !== Array.isArray(after)) {
    state.add('SUB_SCHEMA_CHANGED', itemsPath);
  } else if (Array.isArray(before) && Array.isArray(after)) {
    compareSchemaLists(before, after, itemsPath, state);
  } else {
    compareSchemas(before, after, itemsPath, state);
  }
}

function compareComposition(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = COMPOSITION_KEYWORDS.filter((k) => o[k] !== undefined);
  const after = COMPOSITION_KEYWORDS.filter((k) => u[k] !== undefined);
  if (before.length === 0 && after.length === 0) return;

  if (!isDeepStrictEqual(before, after)) {
    state.add('COMPOSITION_METHOD_CHANGED', path);
    return;
  }
  for (const keyword of before) {
    const b = o[keyword];
    const a = u[keyword];
    if (Array.isArray(b) && Array.isArray(a)) {
      compareSchemaLists(b, a, [...path, keyword], state);
    } else if (!isDeepStrictEqual(b, a)) {
      state.add('SUB_SCHEMA_CHANGED', [...path, keyword]);
    }
  }
}

function compareDefinitions(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = asObject(o['definitions']);
  const after = asObject(u['definitions']);
  for (const name of Object.keys(before)) {
    const childPath = [...path, 'definitions', name];
    if (!Object.hasOwn(after, name)) {
      state.add('SCHEMA_REMOVED', childPath);
    } else {
      compareSchemas(before[name], after[name], childPath, state);
    }
  }
}

/** Property dependencies (arrays) and schema dependencies (objects). */
function compareDependencies(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  const before = asObject(o['dependencies']);
  const after = asObject(u['dependencies']);
  for (const name of Object.keys(before)) {
    const childPath = [...path, 'dependencies', name];
    const b = before[name];
    const a = after[name];
    if (!Object.hasOwn(after, name)) {
      state.add('DEPENDENCY_SCHEMA_REMOVED', childPath);
    } else if (Array.isArray(b) && Array.isArray(a)) {
      if (!sameSet(asStringSet(b), asStringSet(a))) state.add('DEPENDENCY_ARRAY_CHANGED', childPath);
    } else if (Array.isArray(b) || Array.isArray(a)) {
      state.add('DEPENDENCY_SCHEMA_CHANGED', childPath);
    } else {
      compareSchemas(b, a, childPath, state);
    }
  }
}

function compareReferences(o: SchemaObject, u: SchemaObject, path: Path, state: DiffState): void {
  for (const keyword of ['$ref', 'not'] as const) {
    if (!isDeepStrictEqual(o[keyword], u[keyword])) {
      state.add('SUB_SCHEMA_CHANGED', [...path, keyword]);
    }
  }
}

function compareSchemas(original: unknown, updated: unknown, path: Path, state: DiffState): void {
  if (!isSchemaObject(original) || !isSchemaObject(updated)) {
    if (!isDeepStrictEqual(original, updated)) {
      state.add('SUB_SCHEMA_CHANGED', path);
    }
    return;
  }

  compareIdentity(original, updated, path, state);
  compareType(original, updated, path, state);
  compareAttributes(original, updated, path, state);
  compareProperties(original, updated, path, state);
  compareRequired(original, updated, path, state);
  compareAdditional(original, updated, path, state);
  compareItems(original, updated, path, state);
  compareComposition(original, updated, path, state);
  compareDefinitions(original, updated, path, state);
  compareDependencies(original, updated, path, state);
  compareReferences(original, updated, path, state);
}

/**
 * Collects every structural change between two parsed schemas.
 *
 * Deterministic: the same pair always yields the same ordered list.
 * No I/O; inputs are never mutated.
 */
export function collectChanges(original: unknown, updated: unknown): SchemaChange[] {
  const state = new DiffState();
  compareSchemas(original, updated, [], state);
  return state.changes;
}

export function createSchemaDiff(): SchemaDiff {
  return { collectChanges };
}
