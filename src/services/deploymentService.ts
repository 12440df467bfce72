import { z } from 'zod';
import { getConnection, type Connection } from '../lib/connection.js';
import { logger } from '../lib/logger.js';
import { collectionOf, DEPLOYMENT_USAGE_PATH, vmcGet } from '../lib/vmcClient.js';

export const PRODUCT_IDS = {
  vsphere: 'VSPHERE_PLUS',
  vsan: 'VSAN_PLUS',
} as const;

const usageEntrySchema = z.object({
  product_id: z.string(),
  quantity: z.coerce.number().default(0),
  unit: z.string().optional(),
});

export const deploymentSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  usage: z.array(usageEntrySchema).default([]),
});

export const deploymentCollectionSchema = collectionOf(deploymentSchema);

export type Deployment = z.infer<typeof deploymentSchema>;

export interface DeploymentFilter {
  name?: string;
  id?: string;
}

export interface DeploymentRecord {
  id: string;
  name: string;
  vsphereUsage: number;
  vsanUsage: number;
}

export interface DeploymentTotals {
  deployments: number;
  vsphereUsage: number;
  vsanUsage: number;
}

export interface DeploymentReport {
  deployments: DeploymentRecord[];
  totals: DeploymentTotals;
}

export function matchesDeployment(d: Deployment, filter: DeploymentFilter): boolean {
  if (filter.id !== undefined && d.id !== filter.id) return false;
  if (filter.name !== undefined && d.name !== filter.name) return false;
  return true;
}

const usageFor = (d: Deployment, productId: string): number =>
  d.usage.filter((u) => u.product_id === productId).reduce((sum, u) => sum + u.quantity, 0);

export function toDeploymentRecord(d: Deployment): DeploymentRecord {
  return {
    id: d.id,
    name: d.name,
    vsphereUsage: usageFor(d, PRODUCT_IDS.vsphere),
    vsanUsage: usageFor(d, PRODUCT_IDS.vsan),
  };
}

export function summarizeDeployments(records: DeploymentRecord[]): DeploymentTotals {
  return records.reduce<DeploymentTotals>(
    (acc, r) => ({
      deployments: acc.deployments + 1,
      vsphereUsage: acc.vsphereUsage + r.vsphereUsage,
      vsanUsage: acc.vsanUsage + r.vsanUsage,
    }),
    { deployments: 0, vsphereUsage: 0, vsanUsage: 0 },
  );
}

export async function getDeploymentUsage(
  filter: DeploymentFilter = {},
  connection: Connection = getConnection(),
): Promise<DeploymentReport> {
  try {
    const all = await vmcGet(connection, DEPLOYMENT_USAGE_PATH, deploymentCollectionSchema);
    const deployments = all.filter((d) => matchesDeployment(d, filter)).map(toDeploymentRecord);
    logger.debug({ fetched: all.length, kept: deployments.length }, 'deployment usage');
    return { deployments, totals: summarizeDeployments(deployments) };
  } catch (err) {
    logger.error({ err, orgId: connection.orgId }, 'failed to fetch deployment usage');
    throw err;
  }
}
