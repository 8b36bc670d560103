import type { Identity } from './types';

export type CampaignEvent =
  | { type: 'Contributed'; contributor: Identity; amount: bigint }
  | { type: 'Claimed'; claimer: Identity; tokenCount: number }
  | { type: 'Withdrawn'; to: Identity; amount: bigint }
  | { type: 'Cancelled' }
  | { type: 'Refunded'; contributor: Identity; amount: bigint };

export type CampaignEventType = CampaignEvent['type'];

const AUDIT_NAMES: Record<CampaignEventType, string> = {
  Contributed: 'CONTRIBUTED',
  Claimed: 'CLAIMED',
  Withdrawn: 'WITHDRAWN',
  Cancelled: 'CANCELLED',
  Refunded: 'REFUNDED',
};

/** Name under which the event is written to the audit history. */
export function auditEventName(event: CampaignEvent): string {
  return AUDIT_NAMES[event.type];
}

export function auditEventDetails(event: CampaignEvent): Record<string, string | number> {
  switch (event.type) {
    case 'Contributed':
    case 'Refunded':
      return { contributor: event.contributor, amount: event.amount.toString() };
    case 'Claimed':
      return { claimer: event.claimer, tokenCount: event.tokenCount };
    case 'Withdrawn':
      return { to: event.to, amount: event.amount.toString() };
    case 'Cancelled':
      return {};
  }
}
