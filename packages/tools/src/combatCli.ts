import { CombatEngine, isCampaignError, type Logger } from '@skirmish/engine';
import { JsonCampaignRepository } from './jsonRepository.js';
import { callTool, listToolDefinitions } from './combatTools.js';
import { listCampaignResources, readCampaignResource } from './campaignResources.js';
import { loadToolsConfig } from './config.js';

// stdout carries the JSON result; lifecycle messages go to stderr
const stderrLogger: Logger = {
  info: (...data: unknown[]) => console.error(...data),
  warn: (...data: unknown[]) => console.warn(...data),
  error: (...data: unknown[]) => console.error(...data),
};

function printUsage(): void {
  console.error("Usage: npm run combat -- <tool> '<json arguments>'");
  console.error('       npm run combat -- resources');
  console.error('       npm run combat -- read <campaign://uri>\n');
  console.error('Tools:');
  for (const tool of listToolDefinitions()) {
    console.error(`   ${tool.name.padEnd(22)} ${tool.description}`);
  }
}

/**
 * Runs a single tool call against the campaigns directory
 */
async function runCombatTool(argv: string[]): Promise<number> {
  const [name, rawArgs] = argv;
  if (!name || name === '--help') {
    printUsage();
    return name ? 0 : 1;
  }

  if (name === 'resources' || name === 'read') {
    return runResourceCommand(name, rawArgs);
  }

  let args: unknown = {};
  if (rawArgs !== undefined) {
    try {
      args = JSON.parse(rawArgs);
    } catch (error) {
      console.error('❌ Arguments are not valid JSON:', error instanceof Error ? error.message : error);
      return 1;
    }
  }

  const config = loadToolsConfig();
  const repository = new JsonCampaignRepository({ dataDir: config.dataDir });
  const engine = new CombatEngine({
    repository,
    seed: config.rngSeed,
    config: config.engine,
    logger: stderrLogger,
  });

  const result = await callTool({ engine, repository }, name, args);
  console.log(JSON.stringify(result, null, 2));
  return result.ok ? 0 : 1;
}

/**
 * Lists the campaign:// resources, or prints one of them
 */
async function runResourceCommand(command: 'resources' | 'read', uri: string | undefined): Promise<number> {
  const repository = new JsonCampaignRepository({ dataDir: loadToolsConfig().dataDir });
  if (command === 'resources') {
    console.log(JSON.stringify(await listCampaignResources(repository), null, 2));
    return 0;
  }
  if (!uri) {
    console.error('❌ read needs a campaign:// uri');
    return 1;
  }
  try {
    console.log(await readCampaignResource(repository, uri));
    return 0;
  } catch (error) {
    if (isCampaignError(error)) {
      console.error(`❌ ${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

runCombatTool(process.argv.slice(2)).then(
  code => process.exit(code),
  (error: unknown) => {
    if (error instanceof Error) {
      console.error('❌ Combat tool error:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Combat tool error:', error);
    }
    process.exit(1);
  }
);
