import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'enrichment-strategy-change';

/** Enrichment strategies are compared as sets; order is irrelevant. */
export function createEnrichmentStrategyChangeConstraint(): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects changing the enrichment strategies of an event type',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      const before = new Set(from.enrichment_strategies);
      const after = new Set(to.enrichment_strategies);
      const same = before.size === after.size && [...before].every((s) => after.has(s));

      if (same) {
        return null;
      }
      return {
        kind: 'metadata',
        constraint_id: CONSTRAINT_ID,
        reason: 'changing enrichment_strategies is not allowed',
      };
    },
  };
}
