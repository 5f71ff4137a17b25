import { describe, it, expect, vi } from "vitest";
import { CombatEngine, type CombatEngineOptions } from "./engine";
import { RNG } from "./rng";
import { silentLogger } from "./log";
import { FakeRng } from "./test-helpers/fakeRng";
import { makeTestRepository, TEST_CAMPAIGN_ID } from "./test-helpers/makeTestRepository";
import type { ParticipantSpec } from "./types";

const NOW = "2026-01-01T00:00:00.000Z";

function makeEngine(overrides?: Partial<CombatEngineOptions>) {
  const repository = makeTestRepository();
  let n = 0;
  const engine = new CombatEngine({
    repository,
    rng: new FakeRng([]),
    logger: silentLogger,
    now: () => new Date(NOW),
    createSessionId: () => `session-${++n}`,
    ...overrides,
  });
  return { engine, repository };
}

const hero: ParticipantSpec = { source: { kind: "player", id: "hero" }, team: "A", hitChanceOverride: 0.5 };
const goblin: ParticipantSpec = { source: { kind: "bestiary", id: "goblin" }, team: "B" };

describe("beginCombat", () => {
  it("resolves hit chances from override, record, threat level and default", async () => {
    const { engine } = makeEngine();

    const session = await engine.beginCombat(TEST_CAMPAIGN_ID, [
      hero,
      { source: { kind: "npc", id: "marcus" }, team: "A" },
      { source: { kind: "npc", id: "old-tom" }, team: "A" },
      goblin,
      { source: { kind: "bestiary", id: "dragon" }, team: "B" },
    ]);

    expect(session.id).toBe("session-1");
    expect(session.status).toBe("active");
    expect(session.startedAt).toBe(NOW);
    expect(session.combatants.map((c) => [c.id, c.hitChance, c.hitChanceOrigin])).toEqual([
      ["hero", 0.5, "override"],
      ["marcus", 0.65, "record"],
      ["old-tom", 0.5, "default"],
      ["goblin", 0.25, "threatLevel"],
      ["dragon", 0.8, "threatLevel"],
    ]);
    expect(session.combatants.every((c) => c.status === "active")).toBe(true);
    expect(session.log).toEqual([
      { type: "begin", at: NOW, combatantIds: ["hero", "marcus", "old-tom", "goblin", "dragon"] },
    ]);
  });

  it("fails InvalidCombatSetup when every participant is on one team", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [hero, { source: { kind: "npc", id: "marcus" }, team: "A" }])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup", category: "validation" });
  });

  it("fails InvalidCombatSetup without participants", async () => {
    const { engine } = makeEngine();

    await expect(engine.beginCombat(TEST_CAMPAIGN_ID, [])).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("fails InvalidCombatSetup for an override outside [0, 1]", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [{ ...hero, hitChanceOverride: 1.5 }, goblin])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("fails InvalidThreatLevel when a creature carries an unknown threat level", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [hero, { source: { kind: "bestiary", id: "mimic" }, team: "B" }])
    ).rejects.toMatchObject({ code: "InvalidThreatLevel" });
  });

  it("fails CampaignNotFound for an unknown campaign", async () => {
    const { engine } = makeEngine();

    await expect(engine.beginCombat("nowhere", [hero, goblin])).rejects.toMatchObject({
      code: "CampaignNotFound",
      category: "notFound",
    });
  });

  it("fails ParticipantNotFound when a source record is missing", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [hero, { source: { kind: "bestiary", id: "troll" }, team: "B" }])
    ).rejects.toMatchObject({ code: "ParticipantNotFound" });
  });

  it("numbers repeated creatures", async () => {
    const { engine } = makeEngine();

    const session = await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin, goblin]);

    expect(session.combatants.map((c) => c.id)).toEqual(["hero", "goblin", "goblin-2", "goblin-3"]);
  });

  it("rejects a second combat while one is active", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin])).rejects.toMatchObject({
      code: "DuplicateCombat",
      category: "stateConflict",
    });
  });

  it("replaces the active combat under the replace policy and warns", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { engine } = makeEngine({ logger, config: { duplicateCombatPolicy: "replace" } });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const second = await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, { source: { kind: "bestiary", id: "dragon" }, team: "B" }]);

    expect(second.id).toBe("session-2");
    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.combatants.map((c) => c.id)).toEqual(["hero", "dragon"]);
    expect(logger.warn).toHaveBeenCalledWith("[combat] campaign-1: active combat session-1 replaced by session-2");
  });

  it("allows a new combat once the previous one has ended", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);
    await engine.endCombat(TEST_CAMPAIGN_ID);

    const session = await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    expect(session.id).toBe("session-2");
    expect(session.status).toBe("active");
  });

  it("keeps the hit chance fixed after the record changes", async () => {
    const { engine, repository } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    repository.putSource(TEST_CAMPAIGN_ID, { kind: "bestiary", id: "goblin" }, { name: "Goblin", threatLevel: "deadly" });

    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.combatants.find((c) => c.id === "goblin")?.hitChance).toBe(0.25);
  });

  it("keeps a combatant whose record is deleted mid-fight", async () => {
    const { engine, repository } = makeEngine({ rng: new FakeRng([0.1]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    repository.deleteSource(TEST_CAMPAIGN_ID, { kind: "bestiary", id: "goblin" });

    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.combatants.find((c) => c.id === "goblin")).toMatchObject({ status: "active", hitChance: 0.25 });
    const result = await engine.attack(TEST_CAMPAIGN_ID, "goblin", "hero");
    expect(result.hit).toBe(true);
  });

  it("checks the teams before looking at stored combat", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [hero, { source: { kind: "npc", id: "marcus" }, team: " A " }])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("checks the teams before loading records", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [{ source: { kind: "bestiary", id: "troll" }, team: "B" }, goblin])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
    await expect(
      engine.beginCombat(TEST_CAMPAIGN_ID, [{ ...hero, team: "  " }, { source: { kind: "bestiary", id: "troll" }, team: "B" }])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("checks overrides before the campaign lookup", async () => {
    const { engine } = makeEngine();

    await expect(
      engine.beginCombat("nowhere", [{ ...hero, hitChanceOverride: Number.NaN }, goblin])
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("logs the start of combat", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { engine } = makeEngine({ logger });

    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    expect(logger.info).toHaveBeenCalledWith("[combat] campaign-1: combat session-1 started with 2 combatants");
  });
});

describe("attack", () => {
  it("hits when the draw is under the attacker's hit chance", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.1]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const result = await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");

    expect(result).toEqual({
      attackerId: "hero",
      targetId: "goblin",
      hitChance: 0.5,
      roll: 0.1,
      hit: true,
      targetStatus: "active",
    });
  });

  it("misses when the draw equals the hit chance", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.25]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const result = await engine.attack(TEST_CAMPAIGN_ID, "goblin", "hero");

    expect(result.hitChance).toBe(0.25);
    expect(result.hit).toBe(false);
  });

  it("records the attack in the audit log without changing any status", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.9]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const result = await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");
    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);

    expect(status.log).toHaveLength(2);
    expect(status.log[1]).toEqual({ type: "attack", at: NOW, result });
    expect(status.combatants.map((c) => c.status)).toEqual(["active", "active"]);
  });

  it("finds combatants by name, ignoring case", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.2]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const result = await engine.attack(TEST_CAMPAIGN_ID, "HERO", "goblin");

    expect(result.attackerId).toBe("hero");
  });

  it("fails ParticipantNotFound for someone outside the fight", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(engine.attack(TEST_CAMPAIGN_ID, "hero", "marcus")).rejects.toMatchObject({
      code: "ParticipantNotFound",
    });
  });

  it("fails ParticipantInactive against a dead target and for a dead attacker", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin]);
    await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "death");

    await expect(engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin")).rejects.toMatchObject({
      code: "ParticipantInactive",
    });
    await expect(engine.attack(TEST_CAMPAIGN_ID, "goblin", "hero")).rejects.toMatchObject({
      code: "ParticipantInactive",
    });
  });

  it("fails NoActiveCombat before any combat starts", async () => {
    const { engine } = makeEngine();

    await expect(engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin")).rejects.toMatchObject({
      code: "NoActiveCombat",
    });
  });

  it("repeats outcomes for the same seed", async () => {
    const outcomes = async (seed: number) => {
      const { engine } = makeEngine({ rng: undefined, seed });
      await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);
      const hits: boolean[] = [];
      for (let i = 0; i < 20; i++) {
        hits.push((await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin")).hit);
      }
      return hits;
    };

    expect(await outcomes(1234)).toEqual(await outcomes(1234));
  });

  it("uses the seeded RNG draws in order", async () => {
    const expected = new RNG(77);
    const { engine } = makeEngine({ rng: undefined, seed: 77 });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const first = await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");
    const second = await engine.attack(TEST_CAMPAIGN_ID, "goblin", "hero");

    expect(first.roll).toBe(expected.next());
    expect(second.roll).toBe(expected.next());
  });

  it("stores the generator position with the session", async () => {
    const { engine, repository } = makeEngine({ rng: undefined, seed: 77 });
    const session = await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);
    expect(session.rngSeed).toBe(77);
    expect(session.rngCounter).toBe(0);

    await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");
    await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");

    const stored = await repository.loadSession(TEST_CAMPAIGN_ID);
    expect(stored?.rngSeed).toBe(77);
    expect(stored?.rngCounter).toBe(2);
  });

  it("continues the sequence when a new engine picks up the fight", async () => {
    const expected = new RNG(5);
    const { engine: first, repository } = makeEngine({ rng: undefined, seed: 5 });
    await first.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);
    const a = await first.attack(TEST_CAMPAIGN_ID, "hero", "goblin");

    const second = new CombatEngine({ repository, seed: 5, logger: silentLogger });
    const b = await second.attack(TEST_CAMPAIGN_ID, "hero", "goblin");

    expect(a.roll).toBe(expected.next());
    expect(b.roll).toBe(expected.next());
    expect(b.roll).not.toBe(a.roll);
  });

  it("stores nothing about an injected generator", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.3]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);
    await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");

    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.rngSeed).toBeUndefined();
    expect(status.rngCounter).toBeUndefined();
  });
});

describe("removeFromCombat", () => {
  it("plays out the hero and goblin scenario", async () => {
    const { engine } = makeEngine({ rng: new FakeRng([0.1]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const attack = await engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin");
    expect(attack.hit).toBe(true);

    const removal = await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "death");
    expect(removal).toEqual({
      participantId: "goblin",
      reason: "death",
      status: "dead",
      combatEnded: true,
      defeatedTeam: "B",
    });

    await expect(engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin")).rejects.toMatchObject({
      code: "NoActiveCombat",
    });
    await expect(engine.getCombatStatus(TEST_CAMPAIGN_ID)).rejects.toMatchObject({ code: "NoActiveCombat" });
  });

  it("maps flee and surrender to their statuses and keeps combat going while the team stands", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin, goblin]);

    const fled = await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "flee");
    const surrendered = await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin-2", "surrender");

    expect(fled).toEqual({ participantId: "goblin", reason: "flee", status: "fled", combatEnded: false });
    expect(surrendered.status).toBe("surrendered");
    expect(surrendered.combatEnded).toBe(false);

    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.combatants.map((c) => c.status)).toEqual(["active", "fled", "surrendered", "active"]);
  });

  it("fails ParticipantInactive when removing someone twice", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin]);
    await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "death");

    await expect(engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "death")).rejects.toMatchObject({
      code: "ParticipantInactive",
    });
  });

  it("fails ParticipantNotFound for an unknown participant", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(engine.removeFromCombat(TEST_CAMPAIGN_ID, "troll", "death")).rejects.toMatchObject({
      code: "ParticipantNotFound",
    });
  });

  it("ends combat when any one of three teams is wiped out", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [
      hero,
      goblin,
      { source: { kind: "bestiary", id: "dragon" }, team: "C" },
    ]);

    const result = await engine.removeFromCombat(TEST_CAMPAIGN_ID, "dragon", "flee");

    expect(result.combatEnded).toBe(true);
    expect(result.defeatedTeam).toBe("C");
  });

  it("serializes concurrent removals so the end condition sees both", async () => {
    const { engine, repository } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin]);

    const [first, second] = await Promise.all([
      engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "death"),
      engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin-2", "death"),
    ]);

    expect(first.combatEnded).toBe(false);
    expect(second.combatEnded).toBe(true);
    const stored = await repository.loadSession(TEST_CAMPAIGN_ID);
    expect(stored?.status).toBe("ended");
    expect(stored?.endReason).toBe("teamDefeated");
    expect(stored?.combatants.map((c) => c.status)).toEqual(["active", "dead", "dead"]);
  });

  it("serializes concurrent attacks so every one lands in the log", async () => {
    const { engine, repository } = makeEngine({ rng: new FakeRng([0.1, 0.2, 0.3, 0.4, 0.5]) });
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await Promise.all([1, 2, 3, 4, 5].map(() => engine.attack(TEST_CAMPAIGN_ID, "hero", "goblin")));

    const stored = await repository.loadSession(TEST_CAMPAIGN_ID);
    expect(stored?.log.filter((e) => e.type === "attack")).toHaveLength(5);
  });
});

describe("joinCombat", () => {
  it("adds a combatant with its resolved hit chance", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const dragon = await engine.joinCombat(TEST_CAMPAIGN_ID, { source: { kind: "bestiary", id: "dragon" }, team: "B" });

    expect(dragon).toEqual({
      id: "dragon",
      name: "Dragon",
      team: "B",
      source: { kind: "bestiary", id: "dragon" },
      hitChance: 0.8,
      hitChanceOrigin: "threatLevel",
      status: "active",
    });
    const status = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(status.combatants.map((c) => c.id)).toEqual(["hero", "goblin", "dragon"]);
    expect(status.log[1]).toEqual({ type: "join", at: NOW, combatantId: "dragon", team: "B" });
  });

  it("fails InvalidCombatSetup for an explicit id already in the fight", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(
      engine.joinCombat(TEST_CAMPAIGN_ID, { source: { kind: "npc", id: "marcus" }, team: "A", id: "hero" })
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("fails InvalidCombatSetup for a blank team before loading the record", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    await expect(
      engine.joinCombat(TEST_CAMPAIGN_ID, { source: { kind: "bestiary", id: "troll" }, team: "" })
    ).rejects.toMatchObject({ code: "InvalidCombatSetup" });
  });

  it("fails NoActiveCombat without a fight", async () => {
    const { engine } = makeEngine();

    await expect(engine.joinCombat(TEST_CAMPAIGN_ID, goblin)).rejects.toMatchObject({ code: "NoActiveCombat" });
  });
});

describe("endCombat", () => {
  it("marks everyone still standing as removed", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin, goblin]);
    await engine.removeFromCombat(TEST_CAMPAIGN_ID, "goblin", "flee");

    const ended = await engine.endCombat(TEST_CAMPAIGN_ID);

    expect(ended.status).toBe("ended");
    expect(ended.endReason).toBe("dismissed");
    expect(ended.endedAt).toBe(NOW);
    expect(ended.combatants.map((c) => c.status)).toEqual(["removed", "fled", "removed"]);
    expect(ended.log[ended.log.length - 1]).toEqual({ type: "end", at: NOW, reason: "dismissed" });
  });
});

describe("getCombatStatus", () => {
  it("hands out snapshots that do not alias stored state", async () => {
    const { engine } = makeEngine();
    await engine.beginCombat(TEST_CAMPAIGN_ID, [hero, goblin]);

    const snapshot = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    snapshot.combatants[1].status = "dead";

    const again = await engine.getCombatStatus(TEST_CAMPAIGN_ID);
    expect(again.combatants[1].status).toBe("active");
  });

  it("fails CampaignNotFound for an unknown campaign", async () => {
    const { engine } = makeEngine();

    await expect(engine.getCombatStatus("nowhere")).rejects.toMatchObject({ code: "CampaignNotFound" });
  });
});
