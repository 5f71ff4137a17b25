import type {
  Combatant,
  CombatantId,
  HitChanceOrigin,
  ParticipantSource,
  ParticipantSpec,
} from "../types";
import { CampaignError } from "../errors";
import { hitChanceFor } from "../threat";
import { slugify } from "../slug";

function isProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Picks the hit chance a participant fights with:
 * override, then the record's own chance, then its threat level, then the default
 */
export function resolveHitChance(
  spec: ParticipantSpec,
  source: ParticipantSource,
  defaultHitChance: number
): { hitChance: number; origin: HitChanceOrigin } {
  if (spec.hitChanceOverride !== undefined) {
    assertOverride(spec);
    return { hitChance: spec.hitChanceOverride, origin: "override" };
  }

  if (source.hitChance !== undefined) {
    if (!isProbability(source.hitChance)) {
      throw new CampaignError(
        "InvalidCombatSetup",
        `Stored hit chance for ${spec.source.kind} "${spec.source.id}" is out of range: ${source.hitChance}`
      );
    }
    return { hitChance: source.hitChance, origin: "record" };
  }

  if (source.threatLevel !== undefined) {
    return { hitChance: hitChanceFor(source.threatLevel), origin: "threatLevel" };
  }

  return { hitChance: defaultHitChance, origin: "default" };
}

/**
 * Chooses a free combatant id. Explicit ids must be unique;
 * derived ids get a numeric suffix ("goblin", "goblin-2", ...)
 */
export function allocateCombatantId(spec: ParticipantSpec, takenIds: ReadonlySet<CombatantId>): CombatantId {
  if (spec.id !== undefined) {
    const explicit = spec.id.trim();
    if (!explicit) {
      throw new CampaignError("InvalidCombatSetup", "Combatant id must not be blank");
    }
    if (takenIds.has(explicit)) {
      throw new CampaignError("InvalidCombatSetup", `Combatant id "${explicit}" is already in this combat`);
    }
    return explicit;
  }

  const base = slugify(spec.source.id) || spec.source.kind;
  if (!takenIds.has(base)) return base;

  let n = 2;
  while (takenIds.has(`${base}-${n}`)) n++;
  return `${base}-${n}`;
}

export function assertTeam(spec: ParticipantSpec): void {
  if (typeof spec.team !== "string" || spec.team.trim() === "") {
    throw new CampaignError("InvalidCombatSetup", `Participant "${spec.source.id}" has no team`);
  }
}

export function assertOverride(spec: ParticipantSpec): void {
  if (spec.hitChanceOverride !== undefined && !isProbability(spec.hitChanceOverride)) {
    throw new CampaignError(
      "InvalidCombatSetup",
      `Hit chance override for "${spec.source.id}" must be between 0 and 1, got ${spec.hitChanceOverride}`
    );
  }
}

/**
 * Checks what can be checked on the specs alone, before any record is loaded:
 * every participant has a team and a sane override, and at least two teams meet
 */
export function assertParticipantSpecs(specs: readonly ParticipantSpec[]): void {
  if (specs.length === 0) {
    throw new CampaignError("InvalidCombatSetup", "Combat needs at least one participant");
  }
  for (const spec of specs) {
    assertTeam(spec);
    assertOverride(spec);
  }
  const teams = [...new Set(specs.map((spec) => spec.team.trim()))];
  if (teams.length < 2) {
    throw new CampaignError("InvalidCombatSetup", `Combat needs at least two teams, got only "${teams[0]}"`);
  }
}

/**
 * Builds an active combatant from a participant spec and its loaded record
 */
export function makeCombatant(
  spec: ParticipantSpec,
  source: ParticipantSource,
  takenIds: ReadonlySet<CombatantId>,
  defaultHitChance: number
): Combatant {
  assertTeam(spec);
  const { hitChance, origin } = resolveHitChance(spec, source, defaultHitChance);

  return {
    id: allocateCombatantId(spec, takenIds),
    name: spec.name ?? source.name,
    team: spec.team.trim(),
    source: { ...spec.source },
    hitChance,
    hitChanceOrigin: origin,
    status: "active",
  };
}
