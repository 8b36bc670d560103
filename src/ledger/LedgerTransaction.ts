import type { CampaignEvent } from './events';

/**
 * Scope of one ledger operation. Events stay buffered until the operation
 * succeeds; compensations undo committed effects if an external call fails.
 */
export class LedgerTransaction {
  private readonly pending: CampaignEvent[] = [];
  private readonly compensations: Array<() => void> = [];

  emit(event: CampaignEvent): void {
    this.pending.push(event);
  }

  onRollback(compensate: () => void): void {
    this.compensations.push(compensate);
  }

  get events(): readonly CampaignEvent[] {
    return this.pending;
  }

  rollback(): void {
    for (const compensate of [...this.compensations].reverse()) {
      compensate();
    }
    this.compensations.length = 0;
    this.pending.length = 0;
  }
}
