#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, USAGE, type CliOptions } from './lib/cliArgs.js';
import { loadConfig } from './lib/config.js';
import { UsageError } from './lib/errors.js';
import { printDeploymentReport, printJson, printSubscriptions } from './lib/report.js';
import { connect } from './services/authService.js';
import { getDeploymentUsage } from './services/deploymentService.js';
import { getSubscriptions } from './services/subscriptionService.js';

function printUsage() {
  console.log(USAGE);
}

function readArgs(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    printUsage();
    process.exit(1);
  }
}

async function main() {
  const opts = readArgs();
  if (opts.command === 'help') {
    printUsage();
    process.exit(0);
  }

  const config = loadConfig();
  const refreshToken = opts.refreshToken || config.refreshToken;
  const orgId = opts.orgId || config.orgId;
  if (!refreshToken || !orgId) {
    console.error('A refresh token and org id are required (VMC_REFRESH_TOKEN / VMC_ORG_ID or --refresh-token / --org-id)');
    process.exit(1);
  }

  await connect({
    refreshToken,
    orgId,
    cspServer: opts.cspServer || config.cspServer,
    vmcServer: opts.vmcServer || config.vmcServer,
  });

  if (opts.command === 'deployments') {
    const report = await getDeploymentUsage({ name: opts.name, id: opts.id });
    if (opts.json) printJson(report);
    else printDeploymentReport(report);
  } else {
    const rows = await getSubscriptions({ id: opts.id, expand: opts.expand });
    if (opts.json) printJson(rows);
    else printSubscriptions(rows);
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
