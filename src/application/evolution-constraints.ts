import type {
  EventType,
  EventTypeBase,
  EvolutionConstraint,
  SchemaEvolutionIncompatibility,
} from '../domain/index.js';
import {
  createNameChangeConstraint,
  createCategoryChangeConstraint,
  createEnrichmentStrategyChangeConstraint,
  createCompatibilityModeChangeConstraint,
  createPartitionStrategyChangeConstraint,
  createPartitionKeyFieldsChangeConstraint,
} from '../domain/index.js';

/** Constraint set the registry evolves event types with. */
export function defaultConstraints(): EvolutionConstraint[] {
  return [
    createNameChangeConstraint(),
    createCategoryChangeConstraint(),
    createEnrichmentStrategyChangeConstraint(),
    createCompatibilityModeChangeConstraint(),
    createPartitionStrategyChangeConstraint(),
    createPartitionKeyFieldsChangeConstraint(),
  ];
}

/**
 * Runs every constraint against the same pair and collects each
 * incompatibility, in constraint order.
 *
 * Constraints are independent: none short-circuits another.
 */
export function checkConstraints(
  constraints: readonly EvolutionConstraint[],
  from: EventType,
  to: EventTypeBase,
): SchemaEvolutionIncompatibility[] {
  const incompatibilities: SchemaEvolutionIncompatibility[] = [];

  for (const constraint of constraints) {
    const result = constraint.validate(from, to);
    if (result !== null) {
      incompatibilities.push(result);
    }
  }

  return incompatibilities;
}
