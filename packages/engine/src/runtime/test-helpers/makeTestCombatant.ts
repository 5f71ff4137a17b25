import type { Combatant } from '../types';

/**
 * Creates an active test combatant with sensible defaults
 */
export function makeTestCombatant(overrides?: Partial<Combatant>): Combatant {
  const defaultCombatant: Combatant = {
    id: 'hero',
    name: 'Hero',
    team: 'players',
    source: { kind: 'player', id: 'hero' },
    hitChance: 0.5,
    hitChanceOrigin: 'default',
    status: 'active',
  };

  return {
    ...defaultCombatant,
    ...overrides,
    source: {
      ...defaultCombatant.source,
      ...(overrides?.source || {}),
    },
  };
}
