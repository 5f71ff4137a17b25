export type CampaignErrorCode =
  | "InvalidThreatLevel"
  | "InvalidCombatSetup"
  | "InvalidArguments"
  | "CampaignNotFound"
  | "NoActiveCombat"
  | "ParticipantNotFound"
  | "RecordNotFound"
  | "ParticipantInactive"
  | "DuplicateCombat"
  | "DuplicateRecord"
  | "CorruptRecord";

export type CampaignErrorCategory = "validation" | "notFound" | "stateConflict" | "storage";

const CATEGORY_BY_CODE: Record<CampaignErrorCode, CampaignErrorCategory> = {
  InvalidThreatLevel: "validation",
  InvalidCombatSetup: "validation",
  InvalidArguments: "validation",
  CampaignNotFound: "notFound",
  NoActiveCombat: "notFound",
  ParticipantNotFound: "notFound",
  RecordNotFound: "notFound",
  ParticipantInactive: "stateConflict",
  DuplicateCombat: "stateConflict",
  DuplicateRecord: "stateConflict",
  CorruptRecord: "storage",
};

/**
 * Typed failure of a single operation.
 * Scoped to the request that raised it; the engine stays usable afterwards.
 */
export class CampaignError extends Error {
  readonly code: CampaignErrorCode;
  readonly category: CampaignErrorCategory;

  constructor(code: CampaignErrorCode, message: string) {
    super(message);
    this.name = "CampaignError";
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }
}

export function isCampaignError(error: unknown, code?: CampaignErrorCode): error is CampaignError {
  return error instanceof CampaignError && (code === undefined || error.code === code);
}
