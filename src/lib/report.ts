import type { DeploymentReport } from '../services/deploymentService.js';
import type { SubscriptionRecord } from '../services/subscriptionService.js';

export function printDeploymentReport(report: DeploymentReport): void {
  if (report.deployments.length === 0) {
    console.log('No deployments found.');
    return;
  }
  console.table(report.deployments);
  console.log('\n[totals]');
  console.table([report.totals]);
}

export function printSubscriptions(records: SubscriptionRecord[]): void {
  if (records.length === 0) {
    console.log('No subscriptions found.');
    return;
  }
  console.table(records);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
