import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_CSP_SERVER = 'console.cloud.vmware.com';
export const DEFAULT_VMC_SERVER = 'vmc.vmware.com';

const optionalString = z.string().trim().min(1).optional();

const envSchema = z.object({
  VMC_REFRESH_TOKEN: optionalString,
  VMC_ORG_ID: optionalString,
  CSP_SERVER: z.string().trim().min(1).default(DEFAULT_CSP_SERVER),
  VMC_SERVER: z.string().trim().min(1).default(DEFAULT_VMC_SERVER),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3102),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  VMC_USAGE_API_TOKEN: optionalString,
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  refreshToken?: string;
  orgId?: string;
  cspServer: string;
  vmcServer: string;
  logLevel: LogLevel;
  port: number;
  host: string;
  apiToken?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat `FOO=` in a .env file the same as leaving FOO out.
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === 'string' && v.trim() !== '') present[k] = v;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const vars = Array.from(new Set(parsed.error.issues.map((i) => i.path.join('.'))));
    throw new ConfigError(`Invalid configuration: ${vars.join(', ')}`);
  }

  const e = parsed.data;
  return {
    refreshToken: e.VMC_REFRESH_TOKEN,
    orgId: e.VMC_ORG_ID,
    cspServer: e.CSP_SERVER,
    vmcServer: e.VMC_SERVER,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
    host: e.HOST,
    apiToken: e.VMC_USAGE_API_TOKEN,
  };
}
