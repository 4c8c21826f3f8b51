/**
 * A meta-schema violation: the schema uses a construct the broker
 * does not support. Always a leaf diagnostic.
 */
export interface SchemaIncompatibility {
  readonly jsonPath: string;
  readonly message: string;
}

/**
 * Which categorical rule produced an evolution incompatibility.
 *
 * `category` and `metadata` take part in the undefined → business
 * migration exception; everything else is `general`.
 */
export type IncompatibilityKind = 'category' | 'metadata' | 'general';

export interface SchemaEvolutionIncompatibility {
  readonly kind: IncompatibilityKind;
  readonly constraint_id: string;
  readonly reason: string;
}
