import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { printDeploymentReport, printJson, printSubscriptions } from './report.js';
import type { SubscriptionRecord } from '../services/subscriptionService.js';

describe('report output', () => {
  beforeEach(() => {
    vi.spyOn(console, 'table').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints deployments then the totals', () => {
    const deployments = [{ id: 'd-1', name: 'edge-east', vsphereUsage: 64, vsanUsage: 12.5 }];
    const totals = { deployments: 1, vsphereUsage: 64, vsanUsage: 12.5 };

    printDeploymentReport({ deployments, totals });

    expect(console.table).toHaveBeenNthCalledWith(1, deployments);
    expect(console.table).toHaveBeenNthCalledWith(2, [totals]);
    expect(console.log).toHaveBeenCalledWith('\n[totals]');
  });

  it('prints a notice instead of an empty deployment table', () => {
    printDeploymentReport({ deployments: [], totals: { deployments: 0, vsphereUsage: 0, vsanUsage: 0 } });

    expect(console.table).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('No deployments found.');
  });

  it('prints subscription rows as a table', () => {
    const rows: SubscriptionRecord[] = [
      {
        id: 'sub-1',
        status: 'ACTIVE',
        quantity: '5',
        units: 'units',
        type: 'TERM',
        flexible: false,
        seller: 'VMWARE',
        billingOption: 'PREPAID',
        term: '12 MONTHS',
        location: 'us-west-2',
        startDate: '2026-01-01',
        endDate: '2026-12-31',
      },
    ];

    printSubscriptions(rows);

    expect(console.table).toHaveBeenCalledWith(rows);
  });

  it('prints a notice when there are no subscriptions', () => {
    printSubscriptions([]);
    expect(console.log).toHaveBeenCalledWith('No subscriptions found.');
  });

  it('prints indented JSON', () => {
    printJson({ a: 1 });
    expect(console.log).toHaveBeenCalledWith('{\n  "a": 1\n}');
  });
});
