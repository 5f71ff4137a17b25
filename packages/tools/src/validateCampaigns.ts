import { JsonCampaignRepository } from './jsonRepository.js';
import { auditCampaigns } from './auditCampaigns.js';
import { loadToolsConfig } from './config.js';

/**
 * Validates every stored campaign (schema + semantics)
 */
async function validateCampaigns(): Promise<number> {
  const config = loadToolsConfig();
  const repository = new JsonCampaignRepository({ dataDir: config.dataDir });

  console.log(`Loading campaigns from: ${config.dataDir}`);
  const reports = await auditCampaigns(repository);
  if (reports.length === 0) {
    console.log('No campaigns found.');
    return 0;
  }

  let hasErrors = false;
  let hasWarnings = false;

  for (const report of reports) {
    console.log(`\n📖 Campaign: ${report.name ?? 'unknown'} (${report.campaignId})`);

    const errors = report.issues.filter(i => i.type === 'error');
    const warnings = report.issues.filter(i => i.type === 'warning');

    if (errors.length > 0) {
      hasErrors = true;
      console.error(`❌ Found ${errors.length} error(s):`);
      for (const error of errors) {
        const pathStr = error.path ? ` (${error.path})` : '';
        console.error(`   ${error.message}${pathStr}`);
      }
    }

    if (warnings.length > 0) {
      hasWarnings = true;
      console.warn(`⚠️  Found ${warnings.length} warning(s):`);
      for (const warning of warnings) {
        const pathStr = warning.path ? ` (${warning.path})` : '';
        console.warn(`   ${warning.message}${pathStr}`);
      }
    }

    if (errors.length === 0 && warnings.length === 0) {
      console.log('✅ All checks passed');
    }
  }

  if (hasErrors) {
    console.error('\n❌ Validation failed');
    return 1;
  }
  console.log(hasWarnings ? '\n✅ Validation passed with warnings' : '\n✅ Validation passed');
  return 0;
}

validateCampaigns().then(
  code => process.exit(code),
  (error: unknown) => {
    console.error('❌ Error validating campaigns:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
);
