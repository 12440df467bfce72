import { UsageError } from './errors.js';

export type CliCommand = 'deployments' | 'subscriptions' | 'help';

export interface CliOptions {
  command: CliCommand;
  name?: string;
  id?: string;
  expand: boolean;
  json: boolean;
  refreshToken?: string;
  orgId?: string;
  cspServer?: string;
  vmcServer?: string;
}

type ValueFlag = 'name' | 'id' | 'refreshToken' | 'orgId' | 'cspServer' | 'vmcServer';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--name', 'name'],
  ['--id', 'id'],
  ['--refresh-token', 'refreshToken'],
  ['--org-id', 'orgId'],
  ['--csp-server', 'cspServer'],
  ['--vmc-server', 'vmcServer'],
]);

export const USAGE = [
  'Usage: vmc-usage <deployments|subscriptions> [options]',
  '',
  'Options:',
  '  --name <name>            only the deployment with this name (deployments)',
  '  --id <id>                only the deployment or subscription with this id',
  '  --expand                 one row per product of a bundled subscription',
  '  --json                   print JSON instead of tables',
  '  --refresh-token <token>  overrides VMC_REFRESH_TOKEN',
  '  --org-id <id>            overrides VMC_ORG_ID',
  '  --csp-server <host>      overrides CSP_SERVER',
  '  --vmc-server <host>      overrides VMC_SERVER',
].join('\n');

export function parseCliArgs(args: string[]): CliOptions {
  const cmd = args[0];
  const opts: CliOptions = { command: 'help', expand: false, json: false };
  if (!cmd || cmd === '--help' || cmd === '-h') return opts;

  if (cmd !== 'deployments' && cmd !== 'subscriptions') {
    throw new UsageError(`Unknown command: ${cmd}`);
  }
  opts.command = cmd;

  const rest = args.slice(1);
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--help' || arg === '-h') return { ...opts, command: 'help' };
    if (arg === '--expand') {
      opts.expand = true;
      continue;
    }
    if (arg === '--json') {
      opts.json = true;
      continue;
    }
    const key = VALUE_FLAGS.get(arg);
    if (!key) throw new UsageError(`Unknown option: ${arg}`);
    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Option ${arg} needs a value`);
    }
    opts[key] = value;
    i++;
  }

  if (opts.command === 'subscriptions' && opts.name !== undefined) {
    throw new UsageError('--name applies to deployments only');
  }
  return opts;
}
