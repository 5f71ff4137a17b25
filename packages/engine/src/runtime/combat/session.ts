import type {
  CampaignId,
  Combatant,
  CombatantStatus,
  CombatSession,
  EndReason,
  RemovalReason,
  RemovalResult,
  SessionId,
  TeamId,
} from "../types";
import { CampaignError } from "../errors";
import { appendCombatLog } from "./narration";

export const REMOVAL_STATUS: Readonly<Record<RemovalReason, CombatantStatus>> = {
  death: "dead",
  flee: "fled",
  surrender: "surrendered",
};

export function isRemovalReason(value: unknown): value is RemovalReason {
  return value === "death" || value === "flee" || value === "surrender";
}

/**
 * Distinct team labels in first-seen order
 */
export function listTeams(combatants: readonly Combatant[]): TeamId[] {
  const teams: TeamId[] = [];
  for (const combatant of combatants) {
    if (!teams.includes(combatant.team)) teams.push(combatant.team);
  }
  return teams;
}

/**
 * Creates a new active session. Needs at least two distinct teams.
 */
export function createCombatSession(params: {
  id: SessionId;
  campaignId: CampaignId;
  combatants: Combatant[];
  at: string;
  logLimit?: number;
}): CombatSession {
  const { id, campaignId, combatants, at, logLimit } = params;

  if (combatants.length === 0) {
    throw new CampaignError("InvalidCombatSetup", "Combat needs at least one participant");
  }

  const teams = listTeams(combatants);
  if (teams.length < 2) {
    throw new CampaignError(
      "InvalidCombatSetup",
      `Combat needs at least two teams, got only "${teams[0]}"`
    );
  }

  const session: CombatSession = {
    id,
    campaignId,
    status: "active",
    combatants,
    log: [],
    startedAt: at,
  };

  return appendCombatLog(
    session,
    { type: "begin", at, combatantIds: combatants.map((c) => c.id) },
    logLimit
  );
}

/**
 * Finds a combatant by exact id, falling back to a unique case-insensitive name
 */
export function findCombatant(session: CombatSession, ref: string): Combatant {
  const byId = session.combatants.find((c) => c.id === ref);
  if (byId) return byId;

  const wanted = ref.trim().toLowerCase();
  const byName = session.combatants.filter((c) => c.name.trim().toLowerCase() === wanted);
  if (byName.length === 1) return byName[0];

  throw new CampaignError("ParticipantNotFound", `${ref} is not in combat`);
}

export function assertCombatantActive(combatant: Combatant): void {
  if (combatant.status !== "active") {
    throw new CampaignError(
      "ParticipantInactive",
      `${combatant.name} is ${combatant.status} and can no longer take part in combat`
    );
  }
}

/**
 * First team (in display order) without any active member, if any
 */
export function findDefeatedTeam(session: CombatSession): TeamId | undefined {
  return listTeams(session.combatants).find((team) =>
    session.combatants.filter((c) => c.team === team).every((c) => c.status !== "active")
  );
}

/**
 * Marks the session ended and records why
 */
export function endSession(
  session: CombatSession,
  reason: EndReason,
  at: string,
  defeatedTeam?: TeamId,
  logLimit?: number
): CombatSession {
  const ended: CombatSession = {
    ...session,
    status: "ended",
    endedAt: at,
    endReason: reason,
    ...(defeatedTeam !== undefined ? { defeatedTeam } : {}),
  };

  return appendCombatLog(
    ended,
    { type: "end", at, reason, ...(defeatedTeam !== undefined ? { defeatedTeam } : {}) },
    logLimit
  );
}

/**
 * Takes a combatant out of the fight and checks whether a team has fallen.
 * Returns a NEW session plus the outcome.
 */
export function applyRemoval(
  session: CombatSession,
  participantRef: string,
  reason: RemovalReason,
  at: string,
  logLimit?: number
): { session: CombatSession; result: RemovalResult } {
  const combatant = findCombatant(session, participantRef);
  assertCombatantActive(combatant);

  const status = REMOVAL_STATUS[reason];
  let updated: CombatSession = {
    ...session,
    combatants: session.combatants.map((c) => (c.id === combatant.id ? { ...c, status } : c)),
  };
  updated = appendCombatLog(
    updated,
    { type: "removal", at, participantId: combatant.id, reason, status },
    logLimit
  );

  const defeatedTeam = findDefeatedTeam(updated);
  if (defeatedTeam !== undefined) {
    updated = endSession(updated, "teamDefeated", at, defeatedTeam, logLimit);
  }

  return {
    session: updated,
    result: {
      participantId: combatant.id,
      reason,
      status,
      combatEnded: defeatedTeam !== undefined,
      ...(defeatedTeam !== undefined ? { defeatedTeam } : {}),
    },
  };
}

/**
 * Adds a late arrival to a running fight
 */
export function addCombatant(
  session: CombatSession,
  combatant: Combatant,
  at: string,
  logLimit?: number
): CombatSession {
  return appendCombatLog(
    { ...session, combatants: [...session.combatants, combatant] },
    { type: "join", at, combatantId: combatant.id, team: combatant.team },
    logLimit
  );
}

/**
 * Dismisses everyone still standing and ends the fight
 */
export function dismissCombat(session: CombatSession, at: string, logLimit?: number): CombatSession {
  const combatants = session.combatants.map((c) =>
    c.status === "active" ? { ...c, status: "removed" as const } : c
  );
  return endSession({ ...session, combatants }, "dismissed", at, undefined, logLimit);
}
