import { randomUUID } from "node:crypto";
import type {
  AttackResult,
  CampaignId,
  Combatant,
  CombatantId,
  CombatSession,
  ParticipantSpec,
  RemovalReason,
  RemovalResult,
  SessionId,
} from "./types";
import type { CombatRepository } from "./repository";
import { type EngineConfig, resolveEngineConfig } from "./config";
import { CampaignError } from "./errors";
import { type IRNG, RNG, processRng } from "./rng";
import { KeyedMutex } from "./lock";
import type { Logger } from "./log";
import { assertOverride, assertParticipantSpecs, assertTeam, makeCombatant } from "./combat/participants";
import {
  addCombatant,
  applyRemoval,
  createCombatSession,
  dismissCombat,
  isRemovalReason,
} from "./combat/session";
import { resolveAttack } from "./combat/attack";

export type CombatEngineOptions = {
  repository: CombatRepository;
  /** Random source shared by every session; wins over `seed`. Nothing about it is stored */
  rng?: IRNG;
  /** Seed given to each new session's own generator; random when absent */
  seed?: number;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  now?: () => Date;
  createSessionId?: () => SessionId;
};

function randomSeed(): number {
  return Math.floor(processRng.next() * 4294967296);
}

/**
 * Owns the live combat state of every campaign it serves.
 * Construct once per process (or per test) and pass it around;
 * mutating operations are serialized per campaign.
 */
export class CombatEngine {
  private readonly repository: CombatRepository;
  private readonly rng?: IRNG;
  private readonly seed?: number;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createSessionId: () => SessionId;
  private readonly locks = new KeyedMutex();

  constructor(options: CombatEngineOptions) {
    this.repository = options.repository;
    this.rng = options.rng;
    this.seed = options.seed === undefined ? undefined : options.seed >>> 0;
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.createSessionId = options.createSessionId ?? (() => randomUUID());
  }

  /**
   * Starts a fight. Every participant's hit chance is resolved and frozen here.
   */
  async beginCombat(campaignId: CampaignId, participants: ParticipantSpec[]): Promise<CombatSession> {
    assertParticipantSpecs(participants);

    return this.locks.runExclusive(campaignId, async () => {
      await this.assertCampaign(campaignId);

      const previous = await this.repository.loadSession(campaignId);
      if (previous?.status === "active" && this.config.duplicateCombatPolicy === "reject") {
        throw new CampaignError(
          "DuplicateCombat",
          `Campaign ${campaignId} already has an active combat (${previous.id})`
        );
      }

      const combatants = await this.buildCombatants(campaignId, participants, []);
      const at = this.timestamp();
      const created = createCombatSession({
        id: this.createSessionId(),
        campaignId,
        combatants,
        at,
        logLimit: this.config.auditLogLimit,
      });
      const session: CombatSession = this.rng
        ? created
        : { ...created, rngSeed: this.seed ?? randomSeed(), rngCounter: 0 };

      if (previous?.status === "active") {
        this.logger.warn(`[combat] ${campaignId}: active combat ${previous.id} replaced by ${session.id}`);
      }

      await this.repository.saveSession(campaignId, session);
      this.logger.info(
        `[combat] ${campaignId}: combat ${session.id} started with ${combatants.length} combatants`
      );
      return structuredClone(session);
    });
  }

  /**
   * Snapshot of the active fight. Takes no lock; the repository hands out copies.
   */
  async getCombatStatus(campaignId: CampaignId): Promise<CombatSession> {
    await this.assertCampaign(campaignId);
    return this.requireActiveSession(campaignId);
  }

  async attack(campaignId: CampaignId, attackerId: CombatantId, targetId: CombatantId): Promise<AttackResult> {
    return this.locks.runExclusive(campaignId, async () => {
      await this.assertCampaign(campaignId);
      const session = await this.requireActiveSession(campaignId);
      const rng = this.rng ?? new RNG(session.rngSeed ?? this.seed ?? randomSeed(), session.rngCounter ?? 0);

      const { session: resolved, result } = resolveAttack(
        session,
        attackerId,
        targetId,
        rng,
        this.timestamp(),
        this.config.auditLogLimit
      );
      const updated: CombatSession = this.rng
        ? resolved
        : { ...resolved, rngSeed: rng.getSeed(), rngCounter: rng.getCounter() };

      await this.repository.saveSession(campaignId, updated);
      return result;
    });
  }

  async removeFromCombat(
    campaignId: CampaignId,
    participantId: CombatantId,
    reason: RemovalReason
  ): Promise<RemovalResult> {
    if (!isRemovalReason(reason)) {
      throw new CampaignError(
        "InvalidArguments",
        `Unknown removal reason "${String(reason)}". Expected death, flee or surrender`
      );
    }

    return this.locks.runExclusive(campaignId, async () => {
      await this.assertCampaign(campaignId);
      const session = await this.requireActiveSession(campaignId);

      const { session: updated, result } = applyRemoval(
        session,
        participantId,
        reason,
        this.timestamp(),
        this.config.auditLogLimit
      );

      await this.repository.saveSession(campaignId, updated);
      this.logger.info(`[combat] ${campaignId}: ${result.participantId} is ${result.status}`);
      if (result.combatEnded) {
        this.logger.info(`[combat] ${campaignId}: combat ${updated.id} ended, team ${result.defeatedTeam} defeated`);
      }
      return result;
    });
  }

  /**
   * Adds a participant to the running fight
   */
  async joinCombat(campaignId: CampaignId, participant: ParticipantSpec): Promise<Combatant> {
    assertTeam(participant);
    assertOverride(participant);

    return this.locks.runExclusive(campaignId, async () => {
      await this.assertCampaign(campaignId);
      const session = await this.requireActiveSession(campaignId);

      const [combatant] = await this.buildCombatants(campaignId, [participant], session.combatants);
      const updated = addCombatant(session, combatant, this.timestamp(), this.config.auditLogLimit);

      await this.repository.saveSession(campaignId, updated);
      this.logger.info(`[combat] ${campaignId}: ${combatant.id} joined team ${combatant.team}`);
      return { ...combatant, source: { ...combatant.source } };
    });
  }

  /**
   * Ends the fight on request; everyone still standing is marked removed
   */
  async endCombat(campaignId: CampaignId): Promise<CombatSession> {
    return this.locks.runExclusive(campaignId, async () => {
      await this.assertCampaign(campaignId);
      const session = await this.requireActiveSession(campaignId);

      const ended = dismissCombat(session, this.timestamp(), this.config.auditLogLimit);
      await this.repository.saveSession(campaignId, ended);
      this.logger.info(`[combat] ${campaignId}: combat ${ended.id} dismissed`);
      return structuredClone(ended);
    });
  }

  private async assertCampaign(campaignId: CampaignId): Promise<void> {
    if (!(await this.repository.campaignExists(campaignId))) {
      throw new CampaignError("CampaignNotFound", `Campaign not found: ${campaignId}`);
    }
  }

  private async requireActiveSession(campaignId: CampaignId): Promise<CombatSession> {
    const session = await this.repository.loadSession(campaignId);
    if (!session || session.status !== "active") {
      throw new CampaignError("NoActiveCombat", `No active combat in campaign ${campaignId}`);
    }
    return session;
  }

  private async buildCombatants(
    campaignId: CampaignId,
    participants: ParticipantSpec[],
    existing: readonly Combatant[]
  ): Promise<Combatant[]> {
    const takenIds = new Set(existing.map((c) => c.id));
    const built: Combatant[] = [];

    for (const spec of participants) {
      const source = await this.repository.loadParticipantSource(campaignId, spec.source);
      if (!source) {
        throw new CampaignError(
          "ParticipantNotFound",
          `No ${spec.source.kind} record "${spec.source.id}" in campaign ${campaignId}`
        );
      }

      const combatant = makeCombatant(spec, source, takenIds, this.config.defaultHitChance);
      takenIds.add(combatant.id);
      built.push(combatant);
    }

    return built;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
