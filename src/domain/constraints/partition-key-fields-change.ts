import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'partition-key-fields-change';

/** Partition key fields may be set once; afterwards they are fixed. */
export function createPartitionKeyFieldsChangeConstraint(): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects changing partition key fields once they are set',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      const before = from.partition_key_fields;
      const after = to.partition_key_fields;

      if (before.length === 0) {
        return null;
      }
      if (before.length === after.length && before.every((field, i) => field === after[i])) {
        return null;
      }
      return {
        kind: 'general',
        constraint_id: CONSTRAINT_ID,
        reason: `changing partition_key_fields is not allowed ([${before.join(', ')}] -> [${after.join(', ')}])`,
      };
    },
  };
}
