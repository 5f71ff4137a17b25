// Runtime Types for the Skirmish combat engine

/* ---------------------------------- */
/* ID Aliases                          */
/* ---------------------------------- */

export type CampaignId = string;
export type SessionId = string;
export type CombatantId = string;
export type TeamId = string;

/* ---------------------------------- */
/* Threat                              */
/* ---------------------------------- */

/**
 * Coarse severity of a creature, ordered from harmless to unbeatable.
 * Drives the baseline hit chance of whoever carries it.
 */
export type ThreatLevel =
  | "none" // fly
  | "negligible" // dog
  | "low" // wolf
  | "moderate" // bandit
  | "high" // mercenary
  | "deadly" // dragon
  | "certain_death"; // eldritch horror

/* ---------------------------------- */
/* Participant sources                 */
/* ---------------------------------- */

export type SourceKind = "npc" | "bestiary" | "player";

/**
 * Lookup key into the record store. Combatants never own the record,
 * so the underlying NPC/creature can be edited or deleted freely.
 */
export type SourceRef = { kind: SourceKind; id: string };

/**
 * What the store knows about a participant when it joins a fight.
 * `threatLevel` is kept as raw text: stored data may be stale or hand-edited.
 */
export type ParticipantSource = {
  name: string;
  threatLevel?: string;
  hitChance?: number;
};

/**
 * Caller-side description of someone entering combat
 */
export type ParticipantSpec = {
  source: SourceRef;
  team: TeamId;
  hitChanceOverride?: number;
  /** Explicit combatant id; defaults to the slug of `source.id` */
  id?: CombatantId;
  /** Display name; defaults to the source record's name */
  name?: string;
};

/* ---------------------------------- */
/* Combat state                        */
/* ---------------------------------- */

export type CombatantStatus = "active" | "dead" | "fled" | "surrendered" | "removed";
export type RemovalReason = "death" | "flee" | "surrender";
export type HitChanceOrigin = "override" | "record" | "threatLevel" | "default";

export type Combatant = {
  id: CombatantId;
  name: string;
  team: TeamId;
  source: SourceRef;
  // fixed when the combatant joins; later record edits never touch it
  hitChance: number;
  hitChanceOrigin: HitChanceOrigin;
  status: CombatantStatus;
};

export type AttackResult = {
  attackerId: CombatantId;
  targetId: CombatantId;
  hitChance: number;
  roll: number; // [0, 1)
  hit: boolean;
  targetStatus: CombatantStatus;
};

export type RemovalResult = {
  participantId: CombatantId;
  reason: RemovalReason;
  status: CombatantStatus;
  combatEnded: boolean;
  defeatedTeam?: TeamId;
};

export type SessionStatus = "active" | "ended";
export type EndReason = "teamDefeated" | "dismissed";

export type CombatEvent =
  | { type: "begin"; at: string; combatantIds: CombatantId[] }
  | { type: "join"; at: string; combatantId: CombatantId; team: TeamId }
  | { type: "attack"; at: string; result: AttackResult }
  | { type: "removal"; at: string; participantId: CombatantId; reason: RemovalReason; status: CombatantStatus }
  | { type: "end"; at: string; reason: EndReason; defeatedTeam?: TeamId };

export type CombatSession = {
  id: SessionId;
  campaignId: CampaignId;
  status: SessionStatus;
  combatants: Combatant[];
  log: CombatEvent[];
  startedAt: string;
  endedAt?: string;
  endReason?: EndReason;
  defeatedTeam?: TeamId;
  /** Seed of the session's own generator; absent when the engine was given an `rng` */
  rngSeed?: number;
  /** Draws taken from that generator so far */
  rngCounter?: number;
};
