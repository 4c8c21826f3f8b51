import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';

/**
 * A categorical evolution rule.
 *
 * Inspects the registered and the proposed event type for violations
 * that a JSON-Schema diff cannot see (identity, category, enrichment,
 * partitioning). Returns `null` when the transition passes.
 *
 * Constraints do no I/O and never mutate their arguments.
 */
export interface EvolutionConstraint {
  readonly id: string;
  readonly description: string;
  validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null;
}
