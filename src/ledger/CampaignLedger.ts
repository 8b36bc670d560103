import { CAMPAIGN_DURATION_MS, MIN_CONTRIBUTION } from '../config/constants';
import { deriveCampaignStatus, type CampaignStatus } from './campaignStatus';
import { ContributionBook } from './ContributionBook';
import { LedgerError } from './errors';
import type { CampaignEvent } from './events';
import { atLeast, atMost, ensure, inStatus, onlyOwner } from './guards';
import { LedgerTransaction } from './LedgerTransaction';
import { RewardIssuer, TokenIdSequence } from './RewardIssuer';
import {
  systemClock,
  type CampaignSnapshot,
  type Clock,
  type ContributionRecord,
  type Identity,
  type RewardTokenMinter,
  type ValueTransfer,
} from './types';

export interface CampaignParams {
  id: string;
  owner: Identity;
  goal: bigint;
  name: string;
  symbol: string;
}

export interface LedgerCollaborators {
  transfer: ValueTransfer;
  minter: RewardTokenMinter;
  clock?: Clock;
}

export interface LedgerReceipt<T> {
  result: T;
  events: readonly CampaignEvent[];
}

/**
 * Accounting for one crowdfunding campaign.
 *
 * Every operation validates and applies its effects synchronously, before the
 * first external call, so a re-entrant caller only ever observes committed
 * state. External calls that fail unwind through the operation's
 * {@link LedgerTransaction}.
 */
export class CampaignLedger {
  readonly id: string;
  readonly owner: Identity;
  readonly name: string;
  readonly symbol: string;
  readonly goal: bigint;
  readonly createdAt: number;
  readonly deadline: number;

  private cancelled: boolean;
  private totalContributed: bigint;
  private currentFunds: bigint;
  private readonly book: ContributionBook;
  private readonly tokenIds: TokenIdSequence;
  private readonly rewards: RewardIssuer;
  private readonly transfer: ValueTransfer;
  private readonly clock: Clock;

  static open(params: CampaignParams, collaborators: LedgerCollaborators): CampaignLedger {
    if (!params.owner.trim()) throw new Error('owner-required');
    if (params.goal <= 0n) throw new LedgerError('invalid-goal', { goal: params.goal.toString() });
    const createdAt = (collaborators.clock ?? systemClock).now();
    return new CampaignLedger(
      {
        ...params,
        createdAt,
        deadline: createdAt + CAMPAIGN_DURATION_MS,
        cancelled: false,
        totalContributed: 0n,
        currentFunds: 0n,
        nextTokenId: 1,
        contributions: [],
      },
      collaborators,
    );
  }

  static restore(snapshot: CampaignSnapshot, collaborators: LedgerCollaborators): CampaignLedger {
    return new CampaignLedger(snapshot, collaborators);
  }

  private constructor(state: CampaignSnapshot, collaborators: LedgerCollaborators) {
    this.id = state.id;
    this.owner = state.owner;
    this.name = state.name;
    this.symbol = state.symbol;
    this.goal = state.goal;
    this.createdAt = state.createdAt;
    this.deadline = state.deadline;
    this.cancelled = state.cancelled;
    this.totalContributed = state.totalContributed;
    this.currentFunds = state.currentFunds;
    this.book = new ContributionBook(state.contributions);
    this.tokenIds = new TokenIdSequence(state.nextTokenId);
    this.rewards = new RewardIssuer(this.book, this.tokenIds, collaborators.minter);
    this.transfer = collaborators.transfer;
    this.clock = collaborators.clock ?? systemClock;
  }

  getStatus(): CampaignStatus {
    return deriveCampaignStatus(
      {
        cancelled: this.cancelled,
        totalContributed: this.totalContributed,
        goal: this.goal,
        deadline: this.deadline,
      },
      this.clock.now(),
    );
  }

  contribute(identity: Identity, amount: bigint): LedgerReceipt<ContributionRecord> {
    return this.execute((tx) => {
      ensure(
        inStatus(this.getStatus(), ['Active'], 'not-accepting-contributions'),
        atLeast(amount, MIN_CONTRIBUTION, 'contribution-too-small'),
      );
      const record = this.book.credit(identity, amount);
      this.totalContributed += amount;
      this.currentFunds += amount;
      tx.emit({ type: 'Contributed', contributor: identity, amount });
      return record;
    });
  }

  cancel(identity: Identity): LedgerReceipt<CampaignStatus> {
    return this.execute((tx) => {
      ensure(onlyOwner(this.owner, identity), inStatus(this.getStatus(), ['Active'], 'cannot-cancel'));
      this.cancelled = true;
      tx.emit({ type: 'Cancelled' });
      return this.getStatus();
    });
  }

  /** Returns the funds still held after the payout. */
  withdraw(identity: Identity, to: Identity, amount: bigint): Promise<LedgerReceipt<bigint>> {
    return this.executeAsync(async (tx) => {
      ensure(
        onlyOwner(this.owner, identity),
        inStatus(this.getStatus(), ['Completed'], 'cannot-withdraw'),
        atLeast(amount, 1n, 'invalid-withdrawal-amount'),
        atMost(amount, this.currentFunds, 'insufficient-funds'),
      );
      this.currentFunds -= amount;
      tx.onRollback(() => {
        this.currentFunds += amount;
      });

      await this.send(to, amount);
      tx.emit({ type: 'Withdrawn', to, amount });
      return this.currentFunds;
    });
  }

  /** Returns the refunded amount: everything the identity ever contributed. */
  refund(identity: Identity, to: Identity): Promise<LedgerReceipt<bigint>> {
    return this.executeAsync(async (tx) => {
      ensure(inStatus(this.getStatus(), ['Expired', 'Cancelled'], 'cannot-refund'));
      if (this.book.get(identity).amountContributed === 0n) {
        throw new LedgerError('cannot-refund', { contributor: identity });
      }
      const amount = this.book.clearAmount(identity);
      this.currentFunds -= amount;
      tx.onRollback(() => {
        this.book.credit(identity, amount);
        this.currentFunds += amount;
      });

      await this.send(to, amount);
      tx.emit({ type: 'Refunded', contributor: identity, amount });
      return amount;
    });
  }

  /** Mints every badge owed to `identity` into `to`; returns the new token ids. */
  claim(identity: Identity, to: Identity): Promise<LedgerReceipt<number[]>> {
    return this.executeAsync((tx) => this.rewards.claim(identity, to, tx));
  }

  contributionOf(identity: Identity): bigint {
    return this.book.get(identity).amountContributed;
  }

  tokensClaimedOf(identity: Identity): number {
    return this.book.get(identity).tokensClaimed;
  }

  claimable(identity: Identity): number {
    return this.rewards.claimable(identity);
  }

  getTotalContributed(): bigint {
    return this.totalContributed;
  }

  getCurrentFunds(): bigint {
    return this.currentFunds;
  }

  getNextTokenId(): number {
    return this.tokenIds.peek();
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  toSnapshot(): CampaignSnapshot {
    return {
      id: this.id,
      owner: this.owner,
      name: this.name,
      symbol: this.symbol,
      goal: this.goal,
      createdAt: this.createdAt,
      deadline: this.deadline,
      cancelled: this.cancelled,
      totalContributed: this.totalContributed,
      currentFunds: this.currentFunds,
      nextTokenId: this.tokenIds.peek(),
      contributions: this.book.entries(),
    };
  }

  private async send(to: Identity, amount: bigint): Promise<void> {
    let delivered: boolean;
    try {
      delivered = await this.transfer.send(to, amount);
    } catch (err) {
      throw new LedgerError('transfer-failed', { to, amount: amount.toString() }, { cause: err });
    }
    if (!delivered) {
      throw new LedgerError('transfer-failed', { to, amount: amount.toString() });
    }
  }

  private execute<T>(work: (tx: LedgerTransaction) => T): LedgerReceipt<T> {
    const tx = new LedgerTransaction();
    const result = work(tx);
    return { result, events: this.commit(tx) };
  }

  private async executeAsync<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<LedgerReceipt<T>> {
    const tx = new LedgerTransaction();
    try {
      const result = await work(tx);
      return { result, events: this.commit(tx) };
    } catch (err) {
      tx.rollback();
      throw err;
    }
  }

  private commit(tx: LedgerTransaction): readonly CampaignEvent[] {
    return [...tx.events];
  }
}
