import { randomUUID } from 'crypto';
import { isProduction } from '../config/constants';
import { CampaignLedger, type LedgerReceipt } from '../ledger/CampaignLedger';
import type { CampaignStatus } from '../ledger/campaignStatus';
import { auditEventDetails, auditEventName } from '../ledger/events';
import { isLedgerError } from '../ledger/errors';
import { systemClock, type Clock, type ContributionRecord, type Identity, type ValueTransfer } from '../ledger/types';
import { PayoutBook } from '../payments/PayoutBook';
import type { CampaignStore, HistoryEntry } from '../store/campaignStore';
import { BadgeRegistry } from '../tokens/BadgeRegistry';

export interface CreateCampaignInput {
  owner: Identity;
  goal: bigint;
  name: string;
  symbol: string;
}

export interface ServiceOptions {
  store?: CampaignStore;
  transfer?: ValueTransfer;
  clock?: Clock;
}

type HostedCampaign = {
  ledger: CampaignLedger;
  badges: BadgeRegistry;
  history: HistoryEntry[];
  /** Entries a failed save left behind; written with the next save. */
  unsaved: HistoryEntry[];
};

function log(message: string): void {
  if (!isProduction()) {
    console.log(`[campaigns] ${message}`);
  }
}

/**
 * Hosts campaign ledgers by id and writes each committed operation through
 * to the store, when one is configured.
 */
export class CampaignService {
  private readonly campaigns = new Map<string, HostedCampaign>();
  private readonly store?: CampaignStore;
  private readonly transfer: ValueTransfer;
  private readonly clock: Clock;

  constructor(options: ServiceOptions = {}) {
    this.store = options.store;
    this.transfer = options.transfer ?? new PayoutBook();
    this.clock = options.clock ?? systemClock;
  }

  /** Rebuilds ledgers and badge registries from the store. */
  async restore(): Promise<number> {
    if (!this.store) return 0;
    const states = await this.store.loadAll();
    for (const { snapshot, badges } of states) {
      const registry = new BadgeRegistry(snapshot.name, snapshot.symbol, badges);
      const ledger = CampaignLedger.restore(snapshot, {
        transfer: this.transfer,
        minter: registry,
        clock: this.clock,
      });
      this.campaigns.set(snapshot.id, { ledger, badges: registry, history: [], unsaved: [] });
    }
    log(`restored ${states.length} campaign(s) from store`);
    return states.length;
  }

  async createCampaign(input: CreateCampaignInput): Promise<CampaignLedger> {
    const name = input.name.trim();
    const symbol = input.symbol.trim();
    if (!name) throw new Error('name-required');
    if (!symbol) throw new Error('symbol-required');

    const id = `campaign-${randomUUID()}`;
    const badges = new BadgeRegistry(name, symbol);
    const ledger = CampaignLedger.open(
      { id, owner: input.owner.trim(), goal: input.goal, name, symbol },
      { transfer: this.transfer, minter: badges, clock: this.clock },
    );
    const hosted: HostedCampaign = { ledger, badges, history: [], unsaved: [] };

    const created = this.entry('CAMPAIGN_CREATED', {
      owner: ledger.owner,
      goal: ledger.goal.toString(),
      deadline: new Date(ledger.deadline).toISOString(),
    });
    await this.persist(hosted, [created]);
    this.campaigns.set(id, hosted);
    log(`created ${id} owner=${ledger.owner} goal=${ledger.goal}`);
    return ledger;
  }

  getCampaign(id: string): CampaignLedger | null {
    return this.campaigns.get(id)?.ledger ?? null;
  }

  listCampaigns(): CampaignLedger[] {
    return Array.from(this.campaigns.values(), (hosted) => hosted.ledger);
  }

  getBadges(id: string): BadgeRegistry {
    return this.require(id).badges;
  }

  async getCampaignHistory(id: string): Promise<HistoryEntry[]> {
    const hosted = this.require(id);
    if (this.store) return this.store.history(id);
    return [...hosted.history];
  }

  async contribute(id: string, identity: Identity, amount: bigint): Promise<ContributionRecord> {
    const hosted = this.require(id);
    return this.run(hosted, 'contribute', identity, async () => hosted.ledger.contribute(identity, amount));
  }

  async cancel(id: string, identity: Identity): Promise<CampaignStatus> {
    const hosted = this.require(id);
    return this.run(hosted, 'cancel', identity, async () => hosted.ledger.cancel(identity));
  }

  async withdraw(id: string, identity: Identity, to: Identity, amount: bigint): Promise<bigint> {
    const hosted = this.require(id);
    return this.run(hosted, 'withdraw', identity, () => hosted.ledger.withdraw(identity, to, amount));
  }

  async refund(id: string, identity: Identity, to: Identity): Promise<bigint> {
    const hosted = this.require(id);
    return this.run(hosted, 'refund', identity, () => hosted.ledger.refund(identity, to));
  }

  async claim(id: string, identity: Identity, to: Identity): Promise<number[]> {
    const hosted = this.require(id);
    return this.run(hosted, 'claim', identity, () => hosted.ledger.claim(identity, to));
  }

  private require(id: string): HostedCampaign {
    const hosted = this.campaigns.get(id);
    if (!hosted) throw new Error('campaign-not-found');
    return hosted;
  }

  private async run<T>(
    hosted: HostedCampaign,
    action: string,
    identity: Identity,
    operation: () => Promise<LedgerReceipt<T>>,
  ): Promise<T> {
    let receipt: LedgerReceipt<T>;
    try {
      receipt = await operation();
    } catch (err) {
      if (isLedgerError(err)) {
        if (err.kind === 'TransferFailed') {
          console.warn(`[campaigns] ${action} on ${hosted.ledger.id} rolled back: ${err.code}`, err.details);
          // A rolled-back operation may have been captured mid-flight by another save.
          await this.persist(hosted, []).catch((storeErr: unknown) => {
            console.warn(`[store] ${hosted.ledger.id} not resynced after ${action}`, storeErr);
          });
        }
      } else {
        console.error(`[campaigns] ${action} on ${hosted.ledger.id} failed`, err);
      }
      throw err;
    }

    const entries = receipt.events.map((event) => this.entry(auditEventName(event), auditEventDetails(event)));
    await this.persist(hosted, entries);
    log(`${action} ${hosted.ledger.id} by ${identity} -> ${hosted.ledger.getStatus()}`);
    return receipt.result;
  }

  private entry(event: string, details: Record<string, string | number>): HistoryEntry {
    return { event, details, timestamp: new Date(this.clock.now()).toISOString() };
  }

  private async persist(hosted: HostedCampaign, entries: HistoryEntry[]): Promise<void> {
    hosted.history.push(...entries);
    if (!this.store) return;
    hosted.unsaved.push(...entries);
    const batch = hosted.unsaved.splice(0);
    try {
      await this.store.save(hosted.ledger.toSnapshot(), batch, hosted.badges.list());
    } catch (err) {
      hosted.unsaved.unshift(...batch);
      console.error(`[store] failed to persist ${hosted.ledger.id}`, err);
      throw err;
    }
  }
}
