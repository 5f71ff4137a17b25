import { mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { randomUUID } from 'crypto';
import {
  CampaignError,
  KeyedMutex,
  hitChanceFor,
  isCampaignError,
  slugify,
  type CampaignId,
  type CombatRepository,
  type CombatSession,
  type ParticipantSource,
  type SourceRef,
} from '@skirmish/engine';
import { fileValidator, formatSchemaErrors, type SchemaName } from './validateSchema.js';
import { ownEntry } from './records.js';
import type {
  Bestiary,
  BestiaryEntry,
  CampaignList,
  CampaignRecord,
  DeletedCampaign,
  NewCampaign,
  NewNpc,
  NpcIndex,
  NpcRecord,
  StoredNpc,
} from './records.js';

export type JsonCampaignRepositoryOptions = {
  dataDir: string;
  createId?: () => CampaignId;
};

const LIST_FILE = 'list.json';
const CAMPAIGN_FILE = 'campaign.json';
const NPC_INDEX_FILE = 'npcs.json';
const BESTIARY_FILE = 'bestiary.json';
const SESSION_FILE = 'combat-current.json';
// lock key for list.json, which no campaign id can collide with
const LIST_LOCK = '|list|';
const CAMPAIGN_FILE_NAME = /^[a-z0-9-]+\.json$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function npcFileName(slug: string): string {
  return `npc-${slug}.json`;
}

function assertThreatLevel(level: string | undefined): void {
  if (level !== undefined) {
    hitChanceFor(level);
  }
}

/**
 * Flat-file campaign store: one directory per campaign, one JSON file per record.
 * Every file is schema-checked on read. Writes go to a temp file first and are
 * renamed into place, so readers see either the old or the new content.
 */
export class JsonCampaignRepository implements CombatRepository {
  readonly dataDir: string;
  private readonly createId: () => CampaignId;
  private readonly locks = new KeyedMutex();
  private writes = 0;

  constructor(options: JsonCampaignRepositoryOptions) {
    this.dataDir = options.dataDir;
    this.createId = options.createId ?? (() => randomUUID());
  }

  /* ---------------------------------- */
  /* Campaigns                           */
  /* ---------------------------------- */

  async listCampaigns(): Promise<CampaignList> {
    return (await this.readJson<CampaignList>(join(this.dataDir, LIST_FILE), 'campaign-list')) ?? {};
  }

  async getCampaign(campaignId: CampaignId): Promise<CampaignRecord | null> {
    const slug = ownEntry(await this.listCampaigns(), campaignId);
    if (slug === undefined) {
      return null;
    }
    return this.readJson<CampaignRecord>(join(this.dataDir, slug, CAMPAIGN_FILE), 'campaign');
  }

  async campaignExists(campaignId: CampaignId): Promise<boolean> {
    return (await this.getCampaign(campaignId)) !== null;
  }

  /**
   * Creates the campaign directory, its record and the player's own NPC record
   */
  async createCampaign(input: NewCampaign): Promise<CampaignRecord> {
    const slug = slugify(input.name);
    const playerSlug = slugify(input.playerName);
    if (!slug || !playerSlug) {
      throw new CampaignError('InvalidArguments', 'Campaign and player names need at least one letter or digit');
    }

    return this.locks.runExclusive(LIST_LOCK, async () => {
      const list = await this.listCampaigns();
      if (Object.values(list).includes(slug)) {
        throw new CampaignError('DuplicateRecord', `A campaign named "${input.name}" already exists`);
      }

      const campaign: CampaignRecord = {
        id: this.createId(),
        name: input.name,
        slug,
        player: { name: input.playerName, slug: playerSlug },
      };
      const dir = join(this.dataDir, slug);
      const player: NpcRecord = { name: input.playerName, keywords: [input.playerName], arc: 'Player character' };
      const index: NpcIndex = { [playerSlug]: { keywords: player.keywords, file: npcFileName(playerSlug) } };

      await this.writeJson(join(dir, CAMPAIGN_FILE), campaign);
      await this.writeJson(join(dir, npcFileName(playerSlug)), player);
      await this.writeJson(join(dir, NPC_INDEX_FILE), index);
      await this.writeJson(join(this.dataDir, LIST_FILE), { ...list, [campaign.id]: slug });
      return campaign;
    });
  }

  /**
   * Removes the campaign directory and its list entry. Permanent.
   */
  async deleteCampaign(campaignId: CampaignId): Promise<DeletedCampaign> {
    return this.locks.runExclusive(LIST_LOCK, () =>
      this.locks.runExclusive(campaignId, async () => {
        const list = await this.listCampaigns();
        const slug = ownEntry(list, campaignId);
        if (slug === undefined) {
          throw new CampaignError('CampaignNotFound', `Campaign not found: ${campaignId}`);
        }

        const dir = join(this.dataDir, slug);
        // a damaged campaign.json must not block the delete
        const campaign = await this.readJson<CampaignRecord>(join(dir, CAMPAIGN_FILE), 'campaign').catch(
          (error: unknown) => {
            if (isCampaignError(error, 'CorruptRecord')) return null;
            throw error;
          }
        );
        await rm(dir, { recursive: true, force: true });
        await this.writeJson(
          join(this.dataDir, LIST_FILE),
          Object.fromEntries(Object.entries(list).filter(([id]) => id !== campaignId))
        );

        const deleted: DeletedCampaign = { id: campaignId, slug };
        if (campaign) deleted.name = campaign.name;
        return deleted;
      })
    );
  }

  /**
   * JSON files in a listed campaign's directory, sorted by name
   */
  async listCampaignFiles(slug: string): Promise<string[]> {
    const dir = await this.listedCampaignDir(slug);
    try {
      return (await readdir(dir)).filter((file) => CAMPAIGN_FILE_NAME.test(file)).sort();
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Raw text of one file of a listed campaign
   */
  async readCampaignFile(slug: string, file: string): Promise<string> {
    const dir = await this.listedCampaignDir(slug);
    if (!CAMPAIGN_FILE_NAME.test(file)) {
      throw new CampaignError('InvalidArguments', `Not a campaign file name: ${file}`);
    }
    try {
      return await readFile(join(dir, file), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new CampaignError('RecordNotFound', `File not found: ${slug}/${file}`);
      }
      throw error;
    }
  }

  /* ---------------------------------- */
  /* NPCs                                */
  /* ---------------------------------- */

  async listNpcs(campaignId: CampaignId): Promise<NpcIndex> {
    const dir = await this.campaignDir(campaignId);
    return (await this.readJson<NpcIndex>(join(dir, NPC_INDEX_FILE), 'npc-index')) ?? {};
  }

  /**
   * Finds an NPC by slug first, then by keyword (case-insensitive)
   */
  async getNpc(campaignId: CampaignId, nameOrKeyword: string): Promise<StoredNpc | null> {
    const dir = await this.campaignDir(campaignId);
    const index = await this.listNpcs(campaignId);

    const direct = slugify(nameOrKeyword);
    const directEntry = ownEntry(index, direct);
    const wanted = nameOrKeyword.trim().toLowerCase();
    const match = directEntry
      ? ([direct, directEntry] as const)
      : Object.entries(index).find(([, candidate]) => candidate.keywords.some((k) => k.toLowerCase() === wanted));
    if (!match) {
      return null;
    }

    const [slug, entry] = match;
    const record = await this.readJson<NpcRecord>(join(dir, entry.file), 'npc');
    return record ? { slug, record } : null;
  }

  async createNpc(campaignId: CampaignId, input: NewNpc): Promise<StoredNpc> {
    assertThreatLevel(input.threatLevel);
    const slug = slugify(input.name);
    if (!slug) {
      throw new CampaignError('InvalidArguments', 'NPC name needs at least one letter or digit');
    }

    return this.locks.runExclusive(campaignId, async () => {
      const dir = await this.campaignDir(campaignId);
      const index = await this.listNpcs(campaignId);
      if (ownEntry(index, slug)) {
        throw new CampaignError('DuplicateRecord', `NPC "${input.name}" already exists`);
      }

      const record: NpcRecord = { name: input.name, keywords: input.keywords, arc: input.arc };
      if (input.threatLevel !== undefined) record.threatLevel = input.threatLevel;
      if (input.hitChance !== undefined) record.hitChance = input.hitChance;

      await this.writeJson(join(dir, npcFileName(slug)), record);
      await this.writeJson(join(dir, NPC_INDEX_FILE), {
        ...index,
        [slug]: { keywords: input.keywords, file: npcFileName(slug) },
      });
      return { slug, record };
    });
  }

  /* ---------------------------------- */
  /* Bestiary                            */
  /* ---------------------------------- */

  async getBestiary(campaignId: CampaignId): Promise<Bestiary> {
    const dir = await this.campaignDir(campaignId);
    return (await this.readJson<Bestiary>(join(dir, BESTIARY_FILE), 'bestiary')) ?? {};
  }

  async createBestiaryEntry(campaignId: CampaignId, entry: BestiaryEntry): Promise<BestiaryEntry> {
    assertThreatLevel(entry.threatLevel);
    const key = entry.name.trim().toLowerCase();
    if (!key) {
      throw new CampaignError('InvalidArguments', 'Creature name must not be blank');
    }

    return this.locks.runExclusive(campaignId, async () => {
      const dir = await this.campaignDir(campaignId);
      const bestiary = await this.getBestiary(campaignId);
      if (ownEntry(bestiary, key)) {
        throw new CampaignError('DuplicateRecord', `Bestiary entry "${entry.name}" already exists`);
      }

      await this.writeJson(join(dir, BESTIARY_FILE), { ...bestiary, [key]: entry });
      return entry;
    });
  }

  /* ---------------------------------- */
  /* Combat (CombatRepository)           */
  /* ---------------------------------- */

  async loadSession(campaignId: CampaignId): Promise<CombatSession | null> {
    const dir = await this.campaignDir(campaignId);
    return this.readJson<CombatSession>(join(dir, SESSION_FILE), 'combat-session');
  }

  async saveSession(campaignId: CampaignId, session: CombatSession): Promise<void> {
    const dir = await this.campaignDir(campaignId);
    await this.writeJson(join(dir, SESSION_FILE), session);
  }

  async loadParticipantSource(campaignId: CampaignId, ref: SourceRef): Promise<ParticipantSource | null> {
    switch (ref.kind) {
      case 'player': {
        const campaign = await this.getCampaign(campaignId);
        if (!campaign) {
          return null;
        }
        const stored = await this.getNpc(campaignId, campaign.player.slug);
        return stored ? toSource(stored.record) : { name: campaign.player.name };
      }
      case 'npc': {
        const stored = await this.getNpc(campaignId, ref.id);
        return stored ? toSource(stored.record) : null;
      }
      case 'bestiary': {
        const entry = ownEntry(await this.getBestiary(campaignId), ref.id.trim().toLowerCase());
        return entry ? { name: entry.name, threatLevel: entry.threatLevel } : null;
      }
    }
  }

  /* ---------------------------------- */
  /* Files                               */
  /* ---------------------------------- */

  private async campaignDir(campaignId: CampaignId): Promise<string> {
    const campaign = await this.getCampaign(campaignId);
    if (!campaign) {
      throw new CampaignError('CampaignNotFound', `Campaign not found: ${campaignId}`);
    }
    return join(this.dataDir, campaign.slug);
  }

  private async listedCampaignDir(slug: string): Promise<string> {
    const list = await this.listCampaigns();
    if (!Object.values(list).includes(slug)) {
      throw new CampaignError('CampaignNotFound', `Campaign not found: ${slug}`);
    }
    return join(this.dataDir, slug);
  }

  private async readJson<T>(file: string, schema: SchemaName): Promise<T | null> {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CampaignError('CorruptRecord', `${file} is not valid JSON: ${reason}`);
    }

    const validate = fileValidator<T>(schema);
    if (!validate(data)) {
      const errors = formatSchemaErrors(validate.errors).join('; ');
      throw new CampaignError('CorruptRecord', `${file} does not match the ${schema} schema: ${errors}`);
    }
    return data;
  }

  private async writeJson(file: string, data: unknown): Promise<void> {
    await mkdir(dirname(file), { recursive: true });
    const temp = `${file}.${process.pid}.${++this.writes}.tmp`;
    await writeFile(temp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await rename(temp, file);
  }
}

function toSource(record: NpcRecord): ParticipantSource {
  const source: ParticipantSource = { name: record.name };
  if (record.threatLevel !== undefined) source.threatLevel = record.threatLevel;
  if (record.hitChance !== undefined) source.hitChance = record.hitChance;
  return source;
}
