import type { EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'category-change';

/**
 * Category change detection.
 *
 * Fires on any category transition. The evolution service may still
 * waive it for the undefined → business migration.
 */
export function createCategoryChangeConstraint(): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects changing the category of an event type',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      if (from.category === to.category) {
        return null;
      }
      return {
        kind: 'category',
        constraint_id: CONSTRAINT_ID,
        reason: `changing category is not allowed ("${from.category}" -> "${to.category}")`,
      };
    },
  };
}
