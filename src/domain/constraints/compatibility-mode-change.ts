import type { CompatibilityMode, EventType, EventTypeBase } from '../event-type.js';
import type { SchemaEvolutionIncompatibility } from '../incompatibility.js';
import type { EvolutionConstraint } from './types.js';

const CONSTRAINT_ID = 'compatibility-mode-change';

/**
 * Legal mode transitions. Modes may only tighten, one step at a time:
 * none → forward → compatible.
 */
const ALLOWED_TRANSITIONS: Record<CompatibilityMode, readonly CompatibilityMode[]> = {
  none: ['none', 'forward'],
  forward: ['forward', 'compatible'],
  compatible: ['compatible'],
};

export function createCompatibilityModeChangeConstraint(
  allowed: Record<CompatibilityMode, readonly CompatibilityMode[]> = ALLOWED_TRANSITIONS,
): EvolutionConstraint {
  return {
    id: CONSTRAINT_ID,
    description: 'Rejects compatibility mode transitions that relax the contract',

    validate(from: EventType, to: EventTypeBase): SchemaEvolutionIncompatibility | null {
      if (allowed[from.compatibility_mode].includes(to.compatibility_mode)) {
        return null;
      }
      return {
        kind: 'general',
        constraint_id: CONSTRAINT_ID,
        reason: `changing compatibility_mode from "${from.compatibility_mode}" to "${to.compatibility_mode}" is not allowed`,
      };
    },
  };
}
