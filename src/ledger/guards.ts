import type { CampaignStatus } from './campaignStatus';
import { LedgerError, type LedgerErrorCode } from './errors';
import type { Identity } from './types';

export type Guard = () => LedgerError | undefined;

export function onlyOwner(owner: Identity, caller: Identity): Guard {
  return () => (caller === owner ? undefined : new LedgerError('not-owner', { owner, caller }));
}

export function inStatus(
  current: CampaignStatus,
  allowed: readonly CampaignStatus[],
  code: LedgerErrorCode,
): Guard {
  return () => (allowed.includes(current) ? undefined : new LedgerError(code, { status: current }));
}

export function atLeast(amount: bigint, minimum: bigint, code: LedgerErrorCode): Guard {
  return () =>
    amount >= minimum
      ? undefined
      : new LedgerError(code, { amount: amount.toString(), minimum: minimum.toString() });
}

export function atMost(amount: bigint, maximum: bigint, code: LedgerErrorCode): Guard {
  return () =>
    amount <= maximum
      ? undefined
      : new LedgerError(code, { amount: amount.toString(), available: maximum.toString() });
}

/** Runs guards in order and throws the first failure. */
export function ensure(...guards: Guard[]): void {
  for (const guard of guards) {
    const failure = guard();
    if (failure) throw failure;
  }
}
