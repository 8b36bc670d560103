export type CampaignStatus = 'Active' | 'Cancelled' | 'Expired' | 'Completed';

export interface StatusFields {
  cancelled: boolean;
  totalContributed: bigint;
  goal: bigint;
  deadline: number;
}

/**
 * Status is never stored. Precedence: cancellation, then goal reached, then
 * deadline passed. A goal met at or after the deadline still reads Completed.
 */
export function deriveCampaignStatus(fields: StatusFields, now: number): CampaignStatus {
  if (fields.cancelled) return 'Cancelled';
  if (fields.totalContributed >= fields.goal) return 'Completed';
  if (now >= fields.deadline) return 'Expired';
  return 'Active';
}

export function isTerminalStatus(status: CampaignStatus): boolean {
  return status !== 'Active';
}
