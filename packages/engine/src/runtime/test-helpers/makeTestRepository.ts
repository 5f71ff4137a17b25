import { InMemoryCampaignRepository } from '../memoryRepository';

export const TEST_CAMPAIGN_ID = 'campaign-1';

/**
 * Creates a repository with one campaign holding a player, two NPCs
 * and a small bestiary
 */
export function makeTestRepository(campaignId: string = TEST_CAMPAIGN_ID): InMemoryCampaignRepository {
  return new InMemoryCampaignRepository()
    .addCampaign(campaignId)
    .putSource(campaignId, { kind: 'player', id: 'hero' }, { name: 'Hero' })
    .putSource(campaignId, { kind: 'npc', id: 'marcus' }, { name: 'Marcus', hitChance: 0.65 })
    .putSource(campaignId, { kind: 'npc', id: 'old-tom' }, { name: 'Old Tom' })
    .putSource(campaignId, { kind: 'bestiary', id: 'goblin' }, { name: 'Goblin', threatLevel: 'negligible' })
    .putSource(campaignId, { kind: 'bestiary', id: 'dragon' }, { name: 'Dragon', threatLevel: 'deadly' })
    .putSource(campaignId, { kind: 'bestiary', id: 'mimic' }, { name: 'Mimic', threatLevel: 'sneaky' });
}
