import { z } from 'zod';
import { getConnection, type Connection } from '../lib/connection.js';
import { logger } from '../lib/logger.js';
import { collectionOf, SUBSCRIPTIONS_PATH, vmcGet } from '../lib/vmcClient.js';

const scalar = z.union([z.string(), z.number()]);

export const subscriptionSchema = z.object({
  id: z.string(),
  status: z.string().default(''),
  quantity: scalar.optional(),
  unit: z.string().optional(),
  offer_type: z.string().optional(),
  flexible: z.boolean().default(false),
  seller: z.string().optional(),
  billing_option: z.string().optional(),
  commitment_term: scalar.optional(),
  commitment_term_uom: z.string().optional(),
  region: z.string().optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  // Bundled subscriptions list each product as "<quantity> <units>".
  context: z.record(scalar).optional(),
});

export const subscriptionCollectionSchema = collectionOf(subscriptionSchema);

export type Subscription = z.infer<typeof subscriptionSchema>;

export interface SubscriptionRecord {
  id: string;
  status: string;
  quantity: string;
  units: string;
  type: string;
  flexible: boolean;
  seller: string;
  billingOption: string;
  term: string;
  location: string;
  startDate: string;
  endDate: string;
}

export interface SubscriptionQuery {
  id?: string;
  expand?: boolean;
}

const text = (v: string | number | undefined): string => (v === undefined ? '' : String(v));

export function formatTerm(s: Subscription): string {
  return [text(s.commitment_term), text(s.commitment_term_uom)].filter(Boolean).join(' ');
}

export function splitQuantity(value: string): { quantity: string; units: string } {
  const [quantity = '', ...rest] = value.trim().split(/\s+/);
  return { quantity, units: rest.join(' ') };
}

export function isBundled(s: Subscription): boolean {
  return s.context !== undefined && Object.keys(s.context).length > 0;
}

export function toSubscriptionRecord(s: Subscription): SubscriptionRecord {
  return {
    id: s.id,
    status: s.status,
    quantity: text(s.quantity),
    units: text(s.unit),
    type: text(s.offer_type),
    flexible: s.flexible,
    seller: text(s.seller),
    billingOption: text(s.billing_option),
    term: formatTerm(s),
    location: text(s.region),
    startDate: text(s.start_date),
    endDate: text(s.end_date),
  };
}

export function flattenSubscription(s: Subscription, expand = false): SubscriptionRecord[] {
  const base = toSubscriptionRecord(s);
  if (!expand || !s.context || !isBundled(s)) return [base];

  return Object.entries(s.context).map(([product, value]) => ({
    ...base,
    ...splitQuantity(String(value)),
    type: product,
  }));
}

export async function getSubscriptions(
  query: SubscriptionQuery = {},
  connection: Connection = getConnection(),
): Promise<SubscriptionRecord[]> {
  try {
    const all = await vmcGet(connection, SUBSCRIPTIONS_PATH, subscriptionCollectionSchema);
    const kept = query.id === undefined ? all : all.filter((s) => s.id === query.id);
    const rows = kept.flatMap((s) => flattenSubscription(s, query.expand ?? false));
    logger.debug({ fetched: all.length, rows: rows.length }, 'subscriptions');
    return rows;
  } catch (err) {
    logger.error({ err, orgId: connection.orgId }, 'failed to fetch subscriptions');
    throw err;
  }
}
