import { isCampaignError, type CampaignId } from '@skirmish/engine';
import type { JsonCampaignRepository } from './jsonRepository.js';
import { ownEntry } from './records.js';
import {
  validateBestiarySemantics,
  validateCombatSessionSemantics,
  validateNpcSemantics,
  type ValidationIssue,
} from './validateSemantics.js';

export type CampaignReport = {
  campaignId: CampaignId;
  name?: string;
  issues: ValidationIssue[];
};

/**
 * Runs `check` and turns a storage error (unreadable or off-schema file)
 * into an issue, so one bad file does not hide the rest of the report
 */
async function collect<T>(issues: ValidationIssue[], path: string, check: () => Promise<T>): Promise<T | null> {
  try {
    return await check();
  } catch (error) {
    if (isCampaignError(error, 'CorruptRecord')) {
      issues.push({ type: 'error', message: error.message, path });
      return null;
    }
    throw error;
  }
}

export async function auditCampaign(repository: JsonCampaignRepository, campaignId: CampaignId): Promise<CampaignReport> {
  const issues: ValidationIssue[] = [];

  const campaign = await collect(issues, 'campaign', () => repository.getCampaign(campaignId));
  if (!campaign) {
    if (issues.length === 0) {
      issues.push({ type: 'error', message: 'Campaign directory or campaign.json is missing', path: 'campaign' });
    }
    return { campaignId, issues };
  }

  const index = (await collect(issues, 'npcs', () => repository.listNpcs(campaignId))) ?? {};
  if (!ownEntry(index, campaign.player.slug)) {
    issues.push({
      type: 'warning',
      message: `Player "${campaign.player.name}" has no NPC record`,
      path: 'player',
    });
  }
  for (const [slug, entry] of Object.entries(index)) {
    const stored = await collect(issues, `npcs[${slug}]`, () => repository.getNpc(campaignId, slug));
    if (stored) {
      issues.push(...validateNpcSemantics(slug, stored.record));
    } else if (!issues.some((issue) => issue.path === `npcs[${slug}]`)) {
      issues.push({ type: 'error', message: `Indexed file ${entry.file} is missing`, path: `npcs[${slug}]` });
    }
  }

  const bestiary = await collect(issues, 'bestiary', () => repository.getBestiary(campaignId));
  if (bestiary) {
    issues.push(...validateBestiarySemantics(bestiary));
  }

  const session = await collect(issues, 'combat', () => repository.loadSession(campaignId));
  if (session) {
    issues.push(...validateCombatSessionSemantics(session, campaignId));
  }

  return { campaignId, name: campaign.name, issues };
}

/**
 * Audits every campaign listed in the data directory
 */
export async function auditCampaigns(repository: JsonCampaignRepository): Promise<CampaignReport[]> {
  const list = await repository.listCampaigns();
  const reports: CampaignReport[] = [];
  for (const campaignId of Object.keys(list)) {
    reports.push(await auditCampaign(repository, campaignId));
  }
  return reports;
}
