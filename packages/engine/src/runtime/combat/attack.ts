import type { AttackResult, CombatSession } from "../types";
import type { IRNG } from "../rng";
import { CampaignError } from "../errors";
import { appendCombatLog } from "./narration";
import { assertCombatantActive, findCombatant } from "./session";

/**
 * True iff the draw lands strictly under the hit chance
 */
export function isHit(roll: number, hitChance: number): boolean {
  return roll < hitChance;
}

/**
 * Resolves one attack against an active session.
 * The attacker's stored hit chance decides the roll; nobody's status changes,
 * only the audit log grows. Returns a NEW session plus the result.
 */
export function resolveAttack(
  session: CombatSession,
  attackerRef: string,
  targetRef: string,
  rng: IRNG,
  at: string,
  logLimit?: number
): { session: CombatSession; result: AttackResult } {
  if (session.status !== "active") {
    throw new CampaignError("NoActiveCombat", `Combat ${session.id} has already ended`);
  }

  const attacker = findCombatant(session, attackerRef);
  const target = findCombatant(session, targetRef);
  assertCombatantActive(attacker);
  assertCombatantActive(target);

  const roll = rng.next();
  const result: AttackResult = {
    attackerId: attacker.id,
    targetId: target.id,
    hitChance: attacker.hitChance,
    roll,
    hit: isHit(roll, attacker.hitChance),
    targetStatus: target.status,
  };

  return {
    session: appendCombatLog(session, { type: "attack", at, result }, logLimit),
    result,
  };
}
