import type { ContributionEntry, ContributionRecord, Identity } from './types';

/** Per-identity contribution records, created lazily at zero. */
export class ContributionBook {
  private readonly records = new Map<Identity, ContributionRecord>();

  constructor(entries: Iterable<ContributionEntry> = []) {
    for (const entry of entries) {
      this.records.set(entry.identity, {
        amountContributed: entry.amountContributed,
        tokensClaimed: entry.tokensClaimed,
      });
    }
  }

  get(identity: Identity): ContributionRecord {
    const record = this.records.get(identity);
    return record ? { ...record } : { amountContributed: 0n, tokensClaimed: 0 };
  }

  credit(identity: Identity, amount: bigint): ContributionRecord {
    const record = this.mutable(identity);
    record.amountContributed += amount;
    return { ...record };
  }

  /** Zeroes the identity's amount and returns what it held. */
  clearAmount(identity: Identity): bigint {
    const record = this.mutable(identity);
    const cleared = record.amountContributed;
    record.amountContributed = 0n;
    return cleared;
  }

  setClaimed(identity: Identity, tokensClaimed: number): void {
    this.mutable(identity).tokensClaimed = tokensClaimed;
  }

  releaseClaimed(identity: Identity, count: number): void {
    this.mutable(identity).tokensClaimed -= count;
  }

  entries(): ContributionEntry[] {
    return Array.from(this.records, ([identity, record]) => ({ identity, ...record }));
  }

  private mutable(identity: Identity): ContributionRecord {
    let record = this.records.get(identity);
    if (!record) {
      record = { amountContributed: 0n, tokensClaimed: 0 };
      this.records.set(identity, record);
    }
    return record;
  }
}
