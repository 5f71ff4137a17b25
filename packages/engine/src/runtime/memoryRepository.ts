import type { CampaignId, CombatSession, ParticipantSource, SourceRef } from "./types";
import type { CombatRepository } from "./repository";

function sourceKey(campaignId: CampaignId, ref: SourceRef): string {
  return `${campaignId}|${ref.kind}|${ref.id.toLowerCase()}`;
}

/**
 * Process-local repository. Backs tests and embedders that keep
 * campaign data elsewhere; everything crosses the boundary as a deep copy.
 */
export class InMemoryCampaignRepository implements CombatRepository {
  private readonly campaigns = new Set<CampaignId>();
  private readonly sessions = new Map<CampaignId, CombatSession>();
  private readonly sources = new Map<string, ParticipantSource>();

  addCampaign(campaignId: CampaignId): this {
    this.campaigns.add(campaignId);
    return this;
  }

  putSource(campaignId: CampaignId, ref: SourceRef, source: ParticipantSource): this {
    this.sources.set(sourceKey(campaignId, ref), { ...source });
    return this;
  }

  deleteSource(campaignId: CampaignId, ref: SourceRef): void {
    this.sources.delete(sourceKey(campaignId, ref));
  }

  async campaignExists(campaignId: CampaignId): Promise<boolean> {
    return this.campaigns.has(campaignId);
  }

  async loadSession(campaignId: CampaignId): Promise<CombatSession | null> {
    const session = this.sessions.get(campaignId);
    return session ? structuredClone(session) : null;
  }

  async saveSession(campaignId: CampaignId, session: CombatSession): Promise<void> {
    this.sessions.set(campaignId, structuredClone(session));
  }

  async loadParticipantSource(campaignId: CampaignId, ref: SourceRef): Promise<ParticipantSource | null> {
    const source = this.sources.get(sourceKey(campaignId, ref));
    return source ? { ...source } : null;
  }
}
