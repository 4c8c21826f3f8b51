import { z } from 'zod';
import type { SchemaIncompatibility } from '../domain/index.js';
import { toJsonPointer } from './json-pointer.js';

/**
 * Version of the broker's schema-of-schemas. Bump whenever the set of
 * accepted keywords or shapes changes.
 */
export const META_SCHEMA_VERSION = '1';

/** Keywords the broker refuses anywhere in an event-type schema. */
export const FORBIDDEN_KEYWORDS = ['not', 'patternProperties'] as const;

const JSON_TYPES = ['array', 'boolean', 'integer', 'null', 'number', 'object', 'string'] as const;

/** A JSON-Schema node; keywords the broker does not know pass through. */
export interface SchemaNode {
  [keyword: string]: unknown;
}

const typeKeyword = z.union([z.enum(JSON_TYPES), z.array(z.enum(JSON_TYPES)).min(1)]);
const count = z.number().int().nonnegative();

/** Fails whenever the keyword is present, whatever else the node holds. */
function forbidden(keyword: (typeof FORBIDDEN_KEYWORDS)[number]) {
  return z
    .never({ errorMap: () => ({ message: `the keyword "${keyword}" is not supported` }) })
    .optional();
}

/**
 * The broker's meta-schema.
 *
 * Draft-04 keywords with their expected shapes, recursively, minus
 * {@link FORBIDDEN_KEYWORDS}.
 */
export const META_SCHEMA: z.ZodType<SchemaNode> = z.lazy(() =>
  z
    .object({
      $schema: z.string().optional(),
      id: z.string().optional(),
      $id: z.string().optional(),
      $ref: z.string().optional(),
      title: z.string().optional(),
      description: z.string().optional(),
      type: typeKeyword.optional(),
      properties: z.record(z.string(), META_SCHEMA).optional(),
      required: z.array(z.string()).optional(),
      additionalProperties: z.union([z.boolean(), META_SCHEMA]).optional(),
      items: z.union([META_SCHEMA, z.array(META_SCHEMA)]).optional(),
      additionalItems: z.union([z.boolean(), META_SCHEMA]).optional(),
      enum: z.array(z.unknown()).min(1).optional(),
      allOf: z.array(META_SCHEMA).min(1).optional(),
      anyOf: z.array(META_SCHEMA).min(1).optional(),
      oneOf: z.array(META_SCHEMA).min(1).optional(),
      definitions: z.record(z.string(), META_SCHEMA).optional(),
      dependencies: z.record(z.string(), z.union([META_SCHEMA, z.array(z.string())])).optional(),
      minimum: z.number().optional(),
      maximum: z.number().optional(),
      exclusiveMinimum: z.boolean().optional(),
      exclusiveMaximum: z.boolean().optional(),
      multipleOf: z.number().positive().optional(),
      minLength: count.optional(),
      maxLength: count.optional(),
      pattern: z.string().optional(),
      format: z.string().optional(),
      minItems: count.optional(),
      maxItems: count.optional(),
      uniqueItems: z.boolean().optional(),
      minProperties: count.optional(),
      maxProperties: count.optional(),
      not: forbidden('not'),
      patternProperties: forbidden('patternProperties'),
    })
    .passthrough(),
);

/**
 * Flattens a zod issue tree into leaf diagnostics.
 *
 * A failed union carries the errors of every branch; only those
 * nested leaves are reported, never the union issue itself.
 */
function collectLeaves(issues: readonly z.ZodIssue[], out: SchemaIncompatibility[]): void {
  for (const issue of issues) {
    if (issue.code === 'invalid_union' && issue.unionErrors.length > 0) {
      for (const nested of issue.unionErrors) {
        collectLeaves(nested.issues, out);
      }
    } else {
      out.push({ jsonPath: toJsonPointer(issue.path), message: issue.message });
    }
  }
}

/**
 * Validates a parsed schema document against the meta-schema.
 *
 * Returns an empty list for a supported schema. Never throws.
 */
export function collectIncompatibilities(schemaDoc: unknown): SchemaIncompatibility[] {
  const parsed = META_SCHEMA.safeParse(schemaDoc);
  if (parsed.success) {
    return [];
  }

  const incompatibilities: SchemaIncompatibility[] = [];
  collectLeaves(parsed.error.issues, incompatibilities);
  return incompatibilities;
}

/**
 * Same as {@link collectIncompatibilities} for unparsed schema text.
 * Text that is not JSON yields a single root diagnostic.
 */
export function collectTextIncompatibilities(schemaText: string): SchemaIncompatibility[] {
  let doc: unknown;
  try {
    doc = JSON.parse(schemaText);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return [{ jsonPath: '#', message: `schema is not valid JSON: ${detail}` }];
  }
  return collectIncompatibilities(doc);
}
