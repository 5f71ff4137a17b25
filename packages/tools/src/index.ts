/**
 * Skirmish Tools
 * Node-side storage, validation and the tool-call surface around @skirmish/engine
 */

export { JsonCampaignRepository } from './jsonRepository.js';
export type { JsonCampaignRepositoryOptions } from './jsonRepository.js';
export { callTool, listToolDefinitions } from './combatTools.js';
export type { ToolContext, ToolDefinition, ToolResult } from './combatTools.js';
export { listCampaignResources, readCampaignResource } from './campaignResources.js';
export type { CampaignResource } from './campaignResources.js';
export { loadToolsConfig, DEFAULT_DATA_DIR } from './config.js';
export type { ToolsConfig } from './config.js';
export { auditCampaign, auditCampaigns } from './auditCampaigns.js';
export type { CampaignReport } from './auditCampaigns.js';
export {
  validateCombatSessionSemantics,
  validateNpcSemantics,
  validateBestiarySemantics,
} from './validateSemantics.js';
export type { ValidationIssue } from './validateSemantics.js';
export type { SchemaName } from './validateSchema.js';
export type * from './records.js';
