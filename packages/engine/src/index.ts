/**
 * Skirmish Engine
 * Combat resolution for tabletop campaigns: threat table, combat sessions,
 * attack/removal resolution. Storage stays behind CombatRepository.
 */

// Main API
export { CombatEngine } from './runtime/engine';
export type { CombatEngineOptions } from './runtime/engine';

// Threat table
export {
  THREAT_LEVELS,
  HIT_CHANCE_BY_THREAT,
  hitChanceFor,
  isThreatLevel,
  compareThreatLevels,
} from './runtime/threat';

// Pure combat state helpers
export {
  createCombatSession,
  findCombatant,
  applyRemoval,
  addCombatant,
  dismissCombat,
  findDefeatedTeam,
  listTeams,
  isRemovalReason,
  REMOVAL_STATUS,
} from './runtime/combat/session';
export { resolveAttack, isHit } from './runtime/combat/attack';
export { resolveHitChance, makeCombatant } from './runtime/combat/participants';
export { appendCombatLog, describeCombatEvent } from './runtime/combat/narration';

// Storage
export type { CombatRepository } from './runtime/repository';
export { InMemoryCampaignRepository } from './runtime/memoryRepository';

// Utilities
export { RNG, processRng } from './runtime/rng';
export type { IRNG } from './runtime/rng';
export { KeyedMutex } from './runtime/lock';
export { slugify } from './runtime/slug';
export { silentLogger } from './runtime/log';
export type { Logger } from './runtime/log';
export { CampaignError, isCampaignError } from './runtime/errors';
export type { CampaignErrorCode, CampaignErrorCategory } from './runtime/errors';
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_HIT_CHANCE,
  AUDIT_LOG_LIMIT,
  resolveEngineConfig,
} from './runtime/config';
export type { EngineConfig, DuplicateCombatPolicy } from './runtime/config';

// Types
export type * from './runtime/types';
