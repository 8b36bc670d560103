import type { Identity, ValueTransfer } from '../ledger/types';

/**
 * Local settlement for payouts: credits recipients in memory. Recipients can
 * be flagged as rejecting to exercise the ledger's rollback paths.
 */
export class PayoutBook implements ValueTransfer {
  private readonly balances = new Map<Identity, bigint>();
  private readonly rejecting = new Set<Identity>();

  async send(to: Identity, amount: bigint): Promise<boolean> {
    if (!to.trim() || this.rejecting.has(to)) {
      return false;
    }
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  balanceOf(identity: Identity): bigint {
    return this.balances.get(identity) ?? 0n;
  }

  rejectPaymentsTo(identity: Identity): void {
    this.rejecting.add(identity);
  }

  acceptPaymentsTo(identity: Identity): void {
    this.rejecting.delete(identity);
  }
}
