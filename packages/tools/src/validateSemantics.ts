import { isThreatLevel, listTeams, type CombatSession } from '@skirmish/engine';
import type { Bestiary, NpcRecord } from './records.js';

export type ValidationIssue = {
  type: 'error' | 'warning';
  message: string;
  path?: string;
};

/**
 * Checks a stored combat session for states the engine never produces
 * (the schema only covers shape)
 */
export function validateCombatSessionSemantics(session: CombatSession, campaignId?: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (campaignId !== undefined && session.campaignId !== campaignId) {
    issues.push({
      type: 'error',
      message: `Session belongs to campaign "${session.campaignId}", stored under "${campaignId}"`,
      path: 'campaignId',
    });
  }

  // Check unique combatant ids
  const ids = new Set<string>();
  for (const combatant of session.combatants) {
    if (ids.has(combatant.id)) {
      issues.push({
        type: 'error',
        message: `Duplicate combatant id: "${combatant.id}"`,
        path: `combatants[${combatant.id}]`,
      });
    }
    ids.add(combatant.id);
  }

  const teams = listTeams(session.combatants);
  if (teams.length < 2) {
    issues.push({
      type: 'error',
      message: `Combat needs at least two teams, found ${teams.length}`,
      path: 'combatants',
    });
  }

  const standing = (team: string) =>
    session.combatants.some((c) => c.team === team && c.status === 'active');

  if (session.status === 'active') {
    if (session.endedAt !== undefined || session.endReason !== undefined) {
      issues.push({
        type: 'error',
        message: 'Active session carries end details',
        path: 'endReason',
      });
    }
    for (const team of teams) {
      if (!standing(team)) {
        issues.push({
          type: 'error',
          message: `Session is active but team "${team}" has no one standing`,
          path: 'status',
        });
      }
    }
  } else {
    if (session.endReason === undefined) {
      issues.push({ type: 'warning', message: 'Ended session has no end reason', path: 'endReason' });
    }
    if (session.endReason === 'teamDefeated') {
      if (session.defeatedTeam === undefined) {
        issues.push({ type: 'error', message: 'Defeated team is missing', path: 'defeatedTeam' });
      } else if (standing(session.defeatedTeam)) {
        issues.push({
          type: 'error',
          message: `Team "${session.defeatedTeam}" is marked defeated but still has someone standing`,
          path: 'defeatedTeam',
        });
      }
    }
    if (session.combatants.some((c) => c.status === 'active') && session.endReason === 'dismissed') {
      issues.push({
        type: 'warning',
        message: 'Dismissed session still lists active combatants',
        path: 'combatants',
      });
    }
  }

  // Log entries pointing at unknown combatants
  session.log.forEach((event, i) => {
    const referenced =
      event.type === 'attack'
        ? [event.result.attackerId, event.result.targetId]
        : event.type === 'removal'
          ? [event.participantId]
          : event.type === 'join'
            ? [event.combatantId]
            : [];
    for (const id of referenced) {
      if (!ids.has(id)) {
        issues.push({
          type: 'warning',
          message: `Log entry refers to unknown combatant "${id}"`,
          path: `log[${i}]`,
        });
      }
    }
  });

  return issues;
}

export function validateNpcSemantics(slug: string, npc: NpcRecord): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (npc.threatLevel !== undefined && !isThreatLevel(npc.threatLevel)) {
    issues.push({
      type: 'error',
      message: `Unknown threat level "${npc.threatLevel}"`,
      path: `npcs[${slug}].threatLevel`,
    });
  }
  if (npc.keywords.length === 0) {
    issues.push({
      type: 'warning',
      message: `NPC "${npc.name}" has no keywords`,
      path: `npcs[${slug}].keywords`,
    });
  }

  return issues;
}

export function validateBestiarySemantics(bestiary: Bestiary): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const [key, entry] of Object.entries(bestiary)) {
    if (!isThreatLevel(entry.threatLevel)) {
      issues.push({
        type: 'error',
        message: `Unknown threat level "${entry.threatLevel}"`,
        path: `bestiary[${key}].threatLevel`,
      });
    }
    if (key !== entry.name.trim().toLowerCase()) {
      issues.push({
        type: 'warning',
        message: `Entry "${entry.name}" is filed under "${key}" and cannot be looked up by name`,
        path: `bestiary[${key}]`,
      });
    }
  }

  return issues;
}
