import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'partition-strategy-change';

/**
 * Consumers may rely on key-based ordering once it exists, so only a
 * `random` strategy may be replaced.
 */
export function createPartitionStrategyChangeConstraint(): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects changing a non-random partition strategy',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      if (from.partition_strategy === to.partition_strategy || from.partition_strategy === 'random') {
        return null;
      }
      return {
        kind: 'general',
        constraint_id: CONSTRAINT_ID,
        reason: `changing partition_strategy is only allowed if the original strategy was "random" (was "${from.partition_strategy}")`,
      };
    },
  };
}
