import type { SchemaObject } from 'ajv';
import {
  CampaignError,
  THREAT_LEVELS,
  describeCombatEvent,
  isCampaignError,
  type CampaignErrorCategory,
  type CampaignErrorCode,
  type CombatEngine,
  type ParticipantSpec,
  type RemovalReason,
  type SourceKind,
} from '@skirmish/engine';
import type { JsonCampaignRepository } from './jsonRepository.js';
import { compileSchema, formatSchemaErrors } from './validateSchema.js';

export type ToolContext = {
  engine: CombatEngine;
  repository: JsonCampaignRepository;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: SchemaObject;
};

export type ToolResult =
  | { ok: true; tool: string; data: unknown }
  | { ok: false; tool: string; error: { code: CampaignErrorCode; category: CampaignErrorCategory; message: string } };

type ToolHandler = {
  definition: ToolDefinition;
  invoke(context: ToolContext, args: unknown): Promise<unknown>;
};

function defineTool<Args>(
  definition: ToolDefinition,
  run: (context: ToolContext, args: Args) => Promise<unknown>
): ToolHandler {
  const validate = compileSchema<Args>(definition.inputSchema);
  return {
    definition,
    async invoke(context, args) {
      // defaults are filled in place; keep the caller's object untouched
      const input: unknown = structuredClone(args);
      if (!validate(input)) {
        throw new CampaignError(
          'InvalidArguments',
          `Invalid arguments for ${definition.name}: ${formatSchemaErrors(validate.errors).join('; ')}`
        );
      }
      return run(context, input);
    },
  };
}

/* ---------------------------------- */
/* Shared argument schemas             */
/* ---------------------------------- */

const campaignId = {
  type: 'string',
  minLength: 1,
  description: 'The campaign ID (use list_campaigns to get this)',
} as const;

const threatLevel = {
  type: 'string',
  enum: [...THREAT_LEVELS],
  description:
    'Combat threat level: none (10% hit), negligible (25%), low (35%), moderate (50%), high (65%), deadly (80%), certain_death (95%)',
} as const;

const hitChance = { type: 'number', minimum: 0, maximum: 1 } as const;

type ParticipantArgs = {
  kind: SourceKind;
  id: string;
  team: string;
  hit_chance?: number;
  combatant_id?: string;
  name?: string;
};

const participant = {
  type: 'object',
  properties: {
    kind: { type: 'string', enum: ['npc', 'bestiary', 'player'], description: 'Which record the participant comes from' },
    id: { type: 'string', minLength: 1, description: 'NPC name or keyword, creature name, or the player name' },
    team: { type: 'string', minLength: 1, description: 'Side label; the fight ends when a side has no one standing' },
    hit_chance: { ...hitChance, description: 'Optional: fixed hit chance, wins over the record' },
    combatant_id: { type: 'string', minLength: 1, description: 'Optional: id used in later calls' },
    name: { type: 'string', minLength: 1, description: 'Optional: display name' },
  },
  required: ['kind', 'id', 'team'],
  additionalProperties: false,
} as const;

function toParticipantSpec(args: ParticipantArgs): ParticipantSpec {
  const spec: ParticipantSpec = { source: { kind: args.kind, id: args.id }, team: args.team };
  if (args.hit_chance !== undefined) spec.hitChanceOverride = args.hit_chance;
  if (args.combatant_id !== undefined) spec.id = args.combatant_id;
  if (args.name !== undefined) spec.name = args.name;
  return spec;
}

/* ---------------------------------- */
/* Combat tools                        */
/* ---------------------------------- */

const beginCombat = defineTool<{ campaign_id: string; participants: ParticipantArgs[] }>(
  {
    name: 'begin_combat',
    description: 'Start a fight between two or more teams. Hit chances are fixed when combat begins.',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        participants: { type: 'array', items: participant },
      },
      required: ['campaign_id', 'participants'],
    },
  },
  ({ engine }, args) => engine.beginCombat(args.campaign_id, args.participants.map(toParticipantSpec))
);

const joinCombat = defineTool<{ campaign_id: string; participant: ParticipantArgs }>(
  {
    name: 'join_combat',
    description: 'Add a participant to the running fight.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId, participant },
      required: ['campaign_id', 'participant'],
    },
  },
  ({ engine }, args) => engine.joinCombat(args.campaign_id, toParticipantSpec(args.participant))
);

const attack = defineTool<{ campaign_id: string; attacker: string; target: string }>(
  {
    name: 'attack',
    description: "Roll one attack. Lands when the roll is under the attacker's hit chance. Deals no damage.",
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        attacker: { type: 'string', minLength: 1, description: 'Combatant id or name' },
        target: { type: 'string', minLength: 1, description: 'Combatant id or name' },
      },
      required: ['campaign_id', 'attacker', 'target'],
    },
  },
  ({ engine }, args) => engine.attack(args.campaign_id, args.attacker, args.target)
);

const removeFromCombat = defineTool<{ campaign_id: string; participant: string; reason: RemovalReason }>(
  {
    name: 'remove_from_combat',
    description: 'Take a combatant out of the fight. Ends the combat when their team has no one left standing.',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        participant: { type: 'string', minLength: 1, description: 'Combatant id or name' },
        reason: { type: 'string', enum: ['death', 'flee', 'surrender'], default: 'death' },
      },
      required: ['campaign_id', 'participant'],
    },
  },
  ({ engine }, args) => engine.removeFromCombat(args.campaign_id, args.participant, args.reason)
);

const getCombatStatus = defineTool<{ campaign_id: string }>(
  {
    name: 'get_combat_status',
    description: 'Show the active fight with a readable log.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  async ({ engine }, args) => {
    const session = await engine.getCombatStatus(args.campaign_id);
    return { session, narration: session.log.map((event) => describeCombatEvent(session, event)) };
  }
);

const endCombat = defineTool<{ campaign_id: string }>(
  {
    name: 'end_combat',
    description: 'End the active fight; everyone still standing leaves it.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  ({ engine }, args) => engine.endCombat(args.campaign_id)
);

/* ---------------------------------- */
/* Record tools                        */
/* ---------------------------------- */

const createCampaign = defineTool<{ name: string; player_name: string }>(
  {
    name: 'create_campaign',
    description: 'Create a campaign and the player character record.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', minLength: 1 },
        player_name: { type: 'string', minLength: 1 },
      },
      required: ['name', 'player_name'],
    },
  },
  ({ repository }, args) => repository.createCampaign({ name: args.name, playerName: args.player_name })
);

const listCampaigns = defineTool<Record<string, unknown>>(
  {
    name: 'list_campaigns',
    description: 'List campaign ids and their directory slugs.',
    inputSchema: { type: 'object', properties: {} },
  },
  ({ repository }) => repository.listCampaigns()
);

const getCampaign = defineTool<{ campaign_id: string }>(
  {
    name: 'get_campaign',
    description: 'Get a campaign record, including the player character.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  async ({ repository }, args) => {
    const campaign = await repository.getCampaign(args.campaign_id);
    if (!campaign) {
      throw new CampaignError('CampaignNotFound', `Campaign not found: ${args.campaign_id}`);
    }
    return campaign;
  }
);

const deleteCampaign = defineTool<{ campaign_id: string }>(
  {
    name: 'delete_campaign',
    description: 'Delete a campaign with all its NPCs, bestiary and combat data. Permanent.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  ({ repository }, args) => repository.deleteCampaign(args.campaign_id)
);

const listNpcs = defineTool<{ campaign_id: string }>(
  {
    name: 'list_npcs',
    description: 'List the NPCs of a campaign with their keywords. Use it to find names for get_npc.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  ({ repository }, args) => repository.listNpcs(args.campaign_id)
);

const getNpc = defineTool<{ campaign_id: string; name: string }>(
  {
    name: 'get_npc',
    description: 'Get an NPC record by name or keyword.',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        name: { type: 'string', minLength: 1, description: 'NPC name or one of its keywords' },
      },
      required: ['campaign_id', 'name'],
    },
  },
  async ({ repository }, args) => {
    const npc = await repository.getNpc(args.campaign_id, args.name);
    if (!npc) {
      throw new CampaignError('RecordNotFound', `NPC not found: ${args.name}. Use list_npcs to see who exists.`);
    }
    return npc;
  }
);

const createNpc = defineTool<{
  campaign_id: string;
  name: string;
  keywords: string[];
  arc: string;
  threat_level?: string;
  hit_chance?: number;
}>(
  {
    name: 'create_npc',
    description: 'Create an NPC in the campaign so it can be referenced by name or keyword later.',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        name: { type: 'string', minLength: 1 },
        keywords: { type: 'array', items: { type: 'string' } },
        arc: { type: 'string' },
        threat_level: threatLevel,
        hit_chance: { ...hitChance, description: 'Optional: explicit hit chance, wins over threat_level' },
      },
      required: ['campaign_id', 'name', 'keywords', 'arc'],
    },
  },
  ({ repository }, args) =>
    repository.createNpc(args.campaign_id, {
      name: args.name,
      keywords: args.keywords,
      arc: args.arc,
      threatLevel: args.threat_level,
      hitChance: args.hit_chance,
    })
);

const createBestiaryEntry = defineTool<{
  campaign_id: string;
  name: string;
  threat_level: string;
  hp?: string;
  weapons?: Record<string, string>;
}>(
  {
    name: 'create_bestiary_entry',
    description: 'Add a creature type to the campaign bestiary.',
    inputSchema: {
      type: 'object',
      properties: {
        campaign_id: campaignId,
        name: { type: 'string', minLength: 1 },
        threat_level: threatLevel,
        hp: { type: 'string', description: 'Optional: hit point dice, e.g. "2d6+3"' },
        weapons: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Optional: attack name to damage dice, e.g. {"Bite": "1d6"}',
        },
      },
      required: ['campaign_id', 'name', 'threat_level'],
    },
  },
  ({ repository }, args) => {
    const entry: { name: string; threatLevel: string; hp?: string; weapons?: Record<string, string> } = {
      name: args.name,
      threatLevel: args.threat_level,
    };
    if (args.hp !== undefined) entry.hp = args.hp;
    if (args.weapons !== undefined) entry.weapons = args.weapons;
    return repository.createBestiaryEntry(args.campaign_id, entry);
  }
);

const getBestiary = defineTool<{ campaign_id: string }>(
  {
    name: 'get_bestiary',
    description: 'List the creature types of a campaign.',
    inputSchema: {
      type: 'object',
      properties: { campaign_id: campaignId },
      required: ['campaign_id'],
    },
  },
  ({ repository }, args) => repository.getBestiary(args.campaign_id)
);

const TOOLS = new Map<string, ToolHandler>(
  [
    beginCombat,
    joinCombat,
    attack,
    removeFromCombat,
    getCombatStatus,
    endCombat,
    createCampaign,
    listCampaigns,
    getCampaign,
    deleteCampaign,
    createNpc,
    listNpcs,
    getNpc,
    createBestiaryEntry,
    getBestiary,
  ].map((tool): [string, ToolHandler] => [tool.definition.name, tool])
);

export function listToolDefinitions(): ToolDefinition[] {
  return [...TOOLS.values()].map((tool) => tool.definition);
}

/**
 * Runs one tool call. Domain failures come back as `ok: false`;
 * anything else (a bug, a disk failure) is rethrown.
 */
export async function callTool(context: ToolContext, name: string, args: unknown): Promise<ToolResult> {
  try {
    const tool = TOOLS.get(name);
    if (!tool) {
      throw new CampaignError('InvalidArguments', `Unknown tool "${name}"`);
    }
    const data = await tool.invoke(context, args ?? {});
    return { ok: true, tool: name, data };
  } catch (error) {
    if (isCampaignError(error)) {
      return {
        ok: false,
        tool: name,
        error: { code: error.code, category: error.category, message: error.message },
      };
    }
    throw error;
  }
}
