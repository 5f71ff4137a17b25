// Stored campaign records (flat JSON files under the data directory)

import type { CampaignId } from '@skirmish/engine';

/** campaign id -> campaign directory slug */
export type CampaignList = Record<CampaignId, string>;

export type CampaignRecord = {
  id: CampaignId;
  name: string;
  slug: string;
  player: {
    name: string;
    /** NPC slug of the player's own record */
    slug: string;
  };
};

export type DeletedCampaign = {
  id: CampaignId;
  slug: string;
  /** Absent when campaign.json was already gone */
  name?: string;
};

export type NpcRecord = {
  name: string;
  keywords: string[];
  /** Story notes */
  arc: string;
  threatLevel?: string;
  hitChance?: number;
};

export type NpcIndexEntry = {
  keywords: string[];
  file: string;
};

/** npc slug -> where its record lives */
export type NpcIndex = Record<string, NpcIndexEntry>;

export type BestiaryEntry = {
  name: string;
  threatLevel: string;
  /** Dice formula, e.g. "2d6+3" */
  hp?: string;
  /** attack name -> damage formula */
  weapons?: Record<string, string>;
};

/** lower-cased creature name -> entry */
export type Bestiary = Record<string, BestiaryEntry>;

export type NewCampaign = {
  name: string;
  playerName: string;
};

export type NewNpc = {
  name: string;
  keywords: string[];
  arc: string;
  threatLevel?: string;
  hitChance?: number;
};

export type StoredNpc = {
  slug: string;
  record: NpcRecord;
};

/**
 * Own-property lookup; stored maps are plain objects, so keys such as
 * "constructor" would otherwise resolve through Object.prototype
 */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
