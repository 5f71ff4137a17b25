import { CampaignError } from '@skirmish/engine';
import type { JsonCampaignRepository } from './jsonRepository.js';
import type { CampaignRecord } from './records.js';

export type CampaignResource = {
  uri: string;
  name: string;
  description: string;
  mimeType: 'application/json';
};

const SCHEME = 'campaign://';
const LIST_URI = `${SCHEME}list`;

function jsonResource(uri: string, name: string, description: string): CampaignResource {
  return { uri, name, description, mimeType: 'application/json' };
}

/**
 * Read-only views of the stored campaigns: the campaign list, then per campaign
 * its record, the active combat, the NPC index, the bestiary and each NPC file
 * that exists on disk
 */
export async function listCampaignResources(repository: JsonCampaignRepository): Promise<CampaignResource[]> {
  const resources = [jsonResource(LIST_URI, 'Campaign List', 'List of all available campaigns')];

  for (const campaignId of Object.keys(await repository.listCampaigns())) {
    const campaign = await repository.getCampaign(campaignId);
    if (!campaign) {
      continue;
    }
    const { name, slug } = campaign;
    const files = await repository.listCampaignFiles(slug);
    const uri = (file: string) => `${SCHEME}${slug}/${file}`;

    resources.push(jsonResource(uri('campaign.json'), name, `Campaign data for ${name}`));
    if (files.includes('combat-current.json')) {
      resources.push(
        jsonResource(uri('combat-current.json'), `${name} - Active Combat`, `Current combat participants and their states in ${name}`)
      );
    }
    if (files.includes('npcs.json')) {
      resources.push(jsonResource(uri('npcs.json'), `${name} - NPC Index`, `List of all NPCs with keywords in ${name}`));
    }
    if (files.includes('bestiary.json')) {
      resources.push(jsonResource(uri('bestiary.json'), `${name} - Bestiary`, `Creature types and threat levels in ${name}`));
    }

    const index = await repository.listNpcs(campaignId);
    for (const [npcSlug, entry] of Object.entries(index)) {
      if (!files.includes(entry.file)) {
        continue;
      }
      const npc = await repository.getNpc(campaignId, npcSlug);
      const npcName = npc?.record.name ?? npcSlug;
      resources.push(jsonResource(uri(entry.file), `${name} - ${npcName}`, `Full record of ${npcName}`));
    }
  }

  return resources;
}

/**
 * Resolves `campaign://list`, `campaign://<slug>` and `campaign://<slug>/<file>` to JSON text
 */
export async function readCampaignResource(repository: JsonCampaignRepository, uri: string): Promise<string> {
  if (uri === LIST_URI) {
    const summaries: Pick<CampaignRecord, 'id' | 'name' | 'slug'>[] = [];
    for (const campaignId of Object.keys(await repository.listCampaigns())) {
      const campaign = await repository.getCampaign(campaignId);
      if (campaign) {
        summaries.push({ id: campaign.id, name: campaign.name, slug: campaign.slug });
      }
    }
    return JSON.stringify(summaries, null, 2);
  }

  const parts = uri.startsWith(SCHEME) ? uri.slice(SCHEME.length).replace(/^\/+|\/+$/g, '').split('/') : [];
  if (parts.length === 1 && parts[0]) {
    const [slug] = parts;
    const files = await repository.listCampaignFiles(slug);
    return JSON.stringify({ campaign: slug, files }, null, 2);
  }
  if (parts.length === 2) {
    const [slug, file] = parts;
    return repository.readCampaignFile(slug, file);
  }

  throw new CampaignError('InvalidArguments', `Unknown resource: ${uri}`);
}
