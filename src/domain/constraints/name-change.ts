import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'name-change';

/** The name identifies the event type and never changes. */
export function createNameChangeConstraint(): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects renaming an event type',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      if (from.name === to.name) {
        return null;
      }
      return {
        kind: 'general',
        constraint_id: CONSTRAINT_ID,
        reason: `changing name is not allowed ("${from.name}" -> "${to.name}")`,
      };
    },
  };
}
