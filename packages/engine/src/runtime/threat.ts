import type { ThreatLevel } from "./types";
import { CampaignError } from "./errors";

/**
 * Threat levels in severity order (harmless first)
 */
export const THREAT_LEVELS: readonly ThreatLevel[] = [
  "none",
  "negligible",
  "low",
  "moderate",
  "high",
  "deadly",
  "certain_death",
];

export const HIT_CHANCE_BY_THREAT: Readonly<Record<ThreatLevel, number>> = {
  none: 0.1,
  negligible: 0.25,
  low: 0.35,
  moderate: 0.5,
  high: 0.65,
  deadly: 0.8,
  certain_death: 0.95,
};

const KNOWN_LEVELS: ReadonlySet<unknown> = new Set(THREAT_LEVELS);

export function isThreatLevel(value: unknown): value is ThreatLevel {
  return KNOWN_LEVELS.has(value);
}

/**
 * Looks up the baseline hit chance for a threat level.
 * Throws InvalidThreatLevel for anything outside the seven known levels.
 */
export function hitChanceFor(level: string): number {
  if (!isThreatLevel(level)) {
    throw new CampaignError(
      "InvalidThreatLevel",
      `Unknown threat level "${level}". Expected one of: ${THREAT_LEVELS.join(", ")}`
    );
  }
  return HIT_CHANCE_BY_THREAT[level];
}

/**
 * Negative when `a` is less severe than `b`
 */
export function compareThreatLevels(a: ThreatLevel, b: ThreatLevel): number {
  return THREAT_LEVELS.indexOf(a) - THREAT_LEVELS.indexOf(b);
}
