import { resolve } from 'path';
import {
  CampaignError,
  resolveEngineConfig,
  type DuplicateCombatPolicy,
  type EngineConfig,
} from '@skirmish/engine';
import { fileValidator, formatSchemaErrors } from './validateSchema.js';

export const DEFAULT_DATA_DIR = 'campaigns';

const ENV_KEYS = [
  'SKIRMISH_DATA_DIR',
  'SKIRMISH_RNG_SEED',
  'SKIRMISH_DUPLICATE_COMBAT',
  'SKIRMISH_DEFAULT_HIT_CHANCE',
  'SKIRMISH_AUDIT_LOG_LIMIT',
] as const;

type ToolsEnv = {
  SKIRMISH_DATA_DIR?: string;
  SKIRMISH_RNG_SEED?: number;
  SKIRMISH_DUPLICATE_COMBAT?: DuplicateCombatPolicy;
  SKIRMISH_DEFAULT_HIT_CHANCE?: number;
  SKIRMISH_AUDIT_LOG_LIMIT?: number;
};

export type ToolsConfig = {
  /** Absolute path of the campaigns directory */
  dataDir: string;
  /** Fixed seed for reproducible rolls; unset means a random process seed */
  rngSeed?: number;
  engine: EngineConfig;
};

/**
 * Reads the SKIRMISH_* environment variables. Blank values count as unset.
 */
export function loadToolsConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ToolsConfig {
  const raw: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) {
      raw[key] = value;
    }
  }

  const validate = fileValidator<ToolsEnv>('tools-config', { coerce: true });
  if (!validate(raw)) {
    throw new CampaignError(
      'InvalidArguments',
      `Invalid environment: ${formatSchemaErrors(validate.errors).join('; ')}`
    );
  }

  const engine: Partial<EngineConfig> = {};
  if (raw.SKIRMISH_DUPLICATE_COMBAT !== undefined) engine.duplicateCombatPolicy = raw.SKIRMISH_DUPLICATE_COMBAT;
  if (raw.SKIRMISH_DEFAULT_HIT_CHANCE !== undefined) engine.defaultHitChance = raw.SKIRMISH_DEFAULT_HIT_CHANCE;
  if (raw.SKIRMISH_AUDIT_LOG_LIMIT !== undefined) engine.auditLogLimit = raw.SKIRMISH_AUDIT_LOG_LIMIT;

  return {
    dataDir: resolve(cwd, raw.SKIRMISH_DATA_DIR ?? DEFAULT_DATA_DIR),
    rngSeed: raw.SKIRMISH_RNG_SEED,
    engine: resolveEngineConfig(engine),
  };
}
