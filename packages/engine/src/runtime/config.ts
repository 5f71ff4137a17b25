// Combat engine configuration

export type DuplicateCombatPolicy = "reject" | "replace";

export type EngineConfig = {
  /** Hit chance for participants whose record has neither a chance nor a threat level */
  defaultHitChance: number;
  /** What `beginCombat` does when the campaign already has an active fight */
  duplicateCombatPolicy: DuplicateCombatPolicy;
  /** Newest audit events kept per session */
  auditLogLimit: number;
};

export const DEFAULT_HIT_CHANCE = 0.5;
export const DEFAULT_DUPLICATE_COMBAT_POLICY: DuplicateCombatPolicy = "reject";
export const AUDIT_LOG_LIMIT = 200;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  defaultHitChance: DEFAULT_HIT_CHANCE,
  duplicateCombatPolicy: DEFAULT_DUPLICATE_COMBAT_POLICY,
  auditLogLimit: AUDIT_LOG_LIMIT,
};

export function resolveEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}
