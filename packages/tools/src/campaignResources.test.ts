import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CombatEngine, silentLogger } from '@skirmish/engine';
import { JsonCampaignRepository } from './jsonRepository.js';
import { listCampaignResources, readCampaignResource } from './campaignResources.js';

const CAMPAIGN_ID = '00000000-0000-4000-8000-000000000003';

let dataDir: string;
let repository: JsonCampaignRepository;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'skirmish-resources-'));
  repository = new JsonCampaignRepository({ dataDir, createId: () => CAMPAIGN_ID });
  await repository.createCampaign({ name: 'Harbor Nights', playerName: 'Aria Vale' });
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

describe('listCampaignResources', () => {
  it('lists the campaign list, the campaign record, the NPC index and each NPC file', async () => {
    expect(await listCampaignResources(repository)).toEqual([
      {
        uri: 'campaign://list',
        name: 'Campaign List',
        description: 'List of all available campaigns',
        mimeType: 'application/json',
      },
      {
        uri: 'campaign://harbor-nights/campaign.json',
        name: 'Harbor Nights',
        description: 'Campaign data for Harbor Nights',
        mimeType: 'application/json',
      },
      {
        uri: 'campaign://harbor-nights/npcs.json',
        name: 'Harbor Nights - NPC Index',
        description: 'List of all NPCs with keywords in Harbor Nights',
        mimeType: 'application/json',
      },
      {
        uri: 'campaign://harbor-nights/npc-aria-vale.json',
        name: 'Harbor Nights - Aria Vale',
        description: 'Full record of Aria Vale',
        mimeType: 'application/json',
      },
    ]);
  });

  it('adds the active combat and the bestiary once they exist', async () => {
    await repository.createBestiaryEntry(CAMPAIGN_ID, { name: 'Eel', threatLevel: 'low' });
    await new CombatEngine({ repository, seed: 1, logger: silentLogger }).beginCombat(CAMPAIGN_ID, [
      { source: { kind: 'player', id: 'Aria Vale' }, team: 'party' },
      { source: { kind: 'bestiary', id: 'eel' }, team: 'sea' },
    ]);

    const uris = (await listCampaignResources(repository)).map((resource) => resource.uri);

    expect(uris).toEqual([
      'campaign://list',
      'campaign://harbor-nights/campaign.json',
      'campaign://harbor-nights/combat-current.json',
      'campaign://harbor-nights/npcs.json',
      'campaign://harbor-nights/bestiary.json',
      'campaign://harbor-nights/npc-aria-vale.json',
    ]);
  });
});

describe('readCampaignResource', () => {
  it('summarises every campaign for campaign://list', async () => {
    const text = await readCampaignResource(repository, 'campaign://list');

    expect(JSON.parse(text)).toEqual([{ id: CAMPAIGN_ID, name: 'Harbor Nights', slug: 'harbor-nights' }]);
  });

  it('lists the files of a campaign, with or without a trailing slash', async () => {
    const expected = { campaign: 'harbor-nights', files: ['campaign.json', 'npc-aria-vale.json', 'npcs.json'] };

    expect(JSON.parse(await readCampaignResource(repository, 'campaign://harbor-nights'))).toEqual(expected);
    expect(JSON.parse(await readCampaignResource(repository, 'campaign://harbor-nights/'))).toEqual(expected);
  });

  it('returns the stored text of a campaign file', async () => {
    const text = await readCampaignResource(repository, 'campaign://harbor-nights/npcs.json');

    expect(JSON.parse(text)).toEqual({ 'aria-vale': { keywords: ['Aria Vale'], file: 'npc-aria-vale.json' } });
  });

  it('fails RecordNotFound for a file the campaign does not have yet', async () => {
    await expect(readCampaignResource(repository, 'campaign://harbor-nights/bestiary.json')).rejects.toMatchObject({
      code: 'RecordNotFound',
      category: 'notFound',
    });
  });

  it('fails CampaignNotFound for a slug that is not in the list', async () => {
    await expect(readCampaignResource(repository, 'campaign://nowhere/campaign.json')).rejects.toMatchObject({
      code: 'CampaignNotFound',
    });
    await expect(readCampaignResource(repository, 'campaign://constructor')).rejects.toMatchObject({
      code: 'CampaignNotFound',
    });
  });

  it('refuses file names that leave the campaign directory', async () => {
    await expect(readCampaignResource(repository, 'campaign://harbor-nights/..')).rejects.toMatchObject({
      code: 'InvalidArguments',
    });
  });

  it('fails InvalidArguments for other uris', async () => {
    await expect(readCampaignResource(repository, 'campaign://')).rejects.toMatchObject({ code: 'InvalidArguments' });
    await expect(readCampaignResource(repository, 'notes://harbor-nights')).rejects.toMatchObject({
      code: 'InvalidArguments',
    });
    await expect(readCampaignResource(repository, 'campaign://a/b/c.json')).rejects.toMatchObject({
      code: 'InvalidArguments',
    });
  });
});
