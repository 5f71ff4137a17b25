import type { CombatEvent, CombatSession } from "../types";
import { AUDIT_LOG_LIMIT } from "../config";

/**
 * Helper to append an audit event (immutable)
 * Returns a NEW session with the event appended
 */
export function appendCombatLog(
  session: CombatSession,
  event: CombatEvent,
  limit: number = AUDIT_LOG_LIMIT
): CombatSession {
  const newLog = [...session.log, event];
  // Keep only the newest entries
  const trimmedLog = limit > 0 ? newLog.slice(-limit) : newLog;
  return {
    ...session,
    log: trimmedLog,
  };
}

const REASON_TEXT = {
  death: "has been slain!",
  flee: "flees from combat!",
  surrender: "surrenders!",
} as const;

/**
 * One readable line per audit event
 */
export function describeCombatEvent(session: CombatSession, event: CombatEvent): string {
  const nameOf = (id: string) => session.combatants.find((c) => c.id === id)?.name ?? id;

  switch (event.type) {
    case "begin":
      return `Combat begins: ${event.combatantIds.map(nameOf).join(", ")}.`;
    case "join":
      return `${nameOf(event.combatantId)} joins the fight on team ${event.team}.`;
    case "attack": {
      const { attackerId, targetId, hit } = event.result;
      return hit
        ? `${nameOf(attackerId)} attacks ${nameOf(targetId)} and hits.`
        : `${nameOf(attackerId)} attacks ${nameOf(targetId)}; ${nameOf(targetId)} dodges the attack.`;
    }
    case "removal":
      return `${nameOf(event.participantId)} ${REASON_TEXT[event.reason]}`;
    case "end":
      if (event.reason === "teamDefeated") {
        return `Combat has ended! Team ${event.defeatedTeam ?? "?"} has no one left standing.`;
      }
      return "Combat has ended.";
  }
}
