import type {
  EventType,
  EventTypeBase,
  EventTypeSchema,
  EvolutionConstraint,
  Level,
  LevelResolver,
  SchemaChange,
  SchemaChangeType,
  SchemaEvolutionIncompatibility,
} from '../domain/index.js';
import {
  CHANGE_MESSAGES,
  InvalidEventTypeError,
  Version,
  changeLevel,
  formatChange,
  levelOf,
} from '../domain/index.js';
import { checkConstraints, defaultConstraints } from './evolution-constraints.js';
import type { SchemaDiff } from './schema-diff.js';
import { createSchemaDiff } from './schema-diff.js';

export const CATEGORY_CHANGE_MESSAGE =
  "Category change is allowed only from 'undefined' to 'business'. " +
  "'enrichment_strategies' should be properly set as well";

/** Non-breaking change types permitted while tightening forward → compatible. */
const FORWARD_TO_COMPATIBLE_ALLOWED_CHANGES: ReadonlySet<SchemaChangeType> = new Set<SchemaChangeType>([
  'DESCRIPTION_CHANGED',
  'TITLE_CHANGED',
  'PROPERTIES_ADDED',
  'REQUIRED_ARRAY_EXTENDED',
  'ADDITIONAL_PROPERTIES_CHANGED',
  'ADDITIONAL_ITEMS_CHANGED',
]);

export interface SchemaEvolutionOptions {
  readonly constraints?: readonly EvolutionConstraint[];
  readonly schemaDiff?: SchemaDiff;
  readonly levelResolver?: LevelResolver;
  readonly messages?: Readonly<Record<SchemaChangeType, string>>;
  /** Clock used to stamp new schemas and `updated_at`. */
  readonly now?: () => Date;
}

/** What an update would change, before any policy is applied. */
export interface ChangePreview {
  readonly changes: SchemaChange[];
  readonly level: Level;
}

/**
 * The only narrow category transition the registry accepts:
 * undefined → business, when the incompatibilities are exactly the
 * category change (plus, optionally, the enrichment change), metadata
 * enrichment is declared and the new mode is not `compatible`.
 *
 * Kept as an explicit special case; do not broaden without new
 * product requirements.
 */
function isAllowedCategoryMigration(
  from: EventType,
  to: EventTypeBase,
  incompatibilities: readonly SchemaEvolutionIncompatibility[],
): boolean {
  const categories = incompatibilities.filter((i) => i.kind === 'category').length;
  const metadata = incompatibilities.filter((i) => i.kind === 'metadata').length;

  return categories === 1
    && metadata <= 1
    && incompatibilities.length === categories + metadata
    && from.category === 'undefined'
    && to.category === 'business'
    && to.enrichment_strategies.includes('metadata_enrichment')
    && to.compatibility_mode !== 'compatible';
}

function parseSchema(eventType: EventTypeBase): unknown {
  try {
    return JSON.parse(eventType.schema.schema);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidEventTypeError(`Invalid schema: ${detail}`);
  }
}

/**
 * Decides whether a proposed event type may replace a registered one
 * and, if so, computes the resulting version.
 *
 * Stateless: every call is a pure decision over its two arguments
 * (apart from the injected clock). Either a complete new EventType is
 * returned or an InvalidEventTypeError is thrown; nothing is partially
 * applied.
 */
export class SchemaEvolutionService {
  private readonly constraints: readonly EvolutionConstraint[];
  private readonly schemaDiff: SchemaDiff;
  private readonly levelResolver: LevelResolver;
  private readonly messages: Readonly<Record<SchemaChangeType, string>>;
  private readonly now: () => Date;

  constructor(options: SchemaEvolutionOptions = {}) {
    this.constraints = options.constraints ?? defaultConstraints();
    this.schemaDiff = options.schemaDiff ?? createSchemaDiff();
    this.levelResolver = options.levelResolver ?? levelOf;
    this.messages = options.messages ?? CHANGE_MESSAGES;
    this.now = options.now ?? (() => new Date());
  }

  evolve(original: EventType, proposed: EventTypeBase): EventType {
    this.checkEvolutionIncompatibilities(original, proposed);

    const { changes, level } = this.previewChanges(original, proposed);

    if (original.compatibility_mode === 'forward' && proposed.compatibility_mode === 'compatible') {
      this.validateCompatibilityModeMigration(changes);
    } else if (original.compatibility_mode !== 'none') {
      this.validateCompatibleChanges(original, changes, level);
    }

    return this.bumpVersion(original, proposed, level);
  }

  /**
   * Structural changes and their overall level under the original
   * mode. Enforces nothing.
   */
  previewChanges(original: EventType, proposed: EventTypeBase): ChangePreview {
    const changes = this.schemaDiff.collectChanges(parseSchema(original), parseSchema(proposed));
    const level = changeLevel(
      original.schema.schema,
      proposed.schema.schema,
      changes,
      original.compatibility_mode,
      this.levelResolver,
    );
    return { changes, level };
  }

  private checkEvolutionIncompatibilities(from: EventType, to: EventTypeBase): void {
    const incompatibilities = checkConstraints(this.constraints, from, to);
    if (incompatibilities.length === 0) {
      return;
    }

    if (incompatibilities.some((i) => i.kind === 'category')) {
      if (isAllowedCategoryMigration(from, to, incompatibilities)) {
        return;
      }
      throw new InvalidEventTypeError(CATEGORY_CHANGE_MESSAGE);
    }

    const reasons = incompatibilities.map((i) => i.reason);
    throw new InvalidEventTypeError(reasons.join('; '), reasons);
  }

  private validateCompatibilityModeMigration(changes: readonly SchemaChange[]): void {
    const forbidden = changes.filter((change) => !FORWARD_TO_COMPATIBLE_ALLOWED_CHANGES.has(change.type));
    if (forbidden.length > 0) {
      this.reject(forbidden);
    }
  }

  private validateCompatibleChanges(original: EventType, changes: readonly SchemaChange[], level: Level): void {
    const mode = original.compatibility_mode;
    if ((mode === 'compatible' || mode === 'forward') && level === 'MAJOR') {
      this.reject(changes.filter((change) => this.levelResolver(change.type, mode) === 'MAJOR'));
    }
  }

  private reject(changes: readonly SchemaChange[]): never {
    const reasons = changes.map((change) => formatChange(change, this.messages));
    throw new InvalidEventTypeError(`Invalid schema: ${reasons.join(', ')}`, reasons);
  }

  private bumpVersion(original: EventType, proposed: EventTypeBase, level: Level): EventType {
    const now = this.now().toISOString();

    const schema: EventTypeSchema = level === 'NO_CHANGES'
      ? original.schema
      : {
        type: proposed.schema.type,
        schema: proposed.schema.schema,
        version: Version.parse(original.schema.version).bump(level).toString(),
        created_at: now,
      };

    return {
      name: proposed.name,
      owning_application: proposed.owning_application,
      category: proposed.category,
      enrichment_strategies: proposed.enrichment_strategies,
      partition_strategy: proposed.partition_strategy,
      partition_key_fields: proposed.partition_key_fields,
      compatibility_mode: proposed.compatibility_mode,
      schema,
      created_at: original.created_at,
      updated_at: now,
    };
  }
}
