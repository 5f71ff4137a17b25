import type { CampaignId, CombatSession, ParticipantSource, SourceRef } from "./types";

/**
 * Storage contract the engine depends on.
 * Adapters may be flat files, a database or memory; the engine only needs
 * load+save to be atomic within its own per-campaign exclusive section.
 * Returned sessions must be copies the caller is free to mutate.
 */
export interface CombatRepository {
  campaignExists(campaignId: CampaignId): Promise<boolean>;
  loadSession(campaignId: CampaignId): Promise<CombatSession | null>;
  saveSession(campaignId: CampaignId, session: CombatSession): Promise<void>;
  loadParticipantSource(campaignId: CampaignId, ref: SourceRef): Promise<ParticipantSource | null>;
}
