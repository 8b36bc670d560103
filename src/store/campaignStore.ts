import type { CampaignSnapshot } from '../ledger/types';
import type { BadgeRecord } from '../tokens/BadgeRegistry';
import {
  initializeDatabase,
  listCampaignHistory,
  loadCampaignStates,
  openDatabase,
  saveCampaignState,
  type HistoryEntry,
  type StoredCampaignState,
} from '../db/SQLiteStore';

export type { HistoryEntry, StoredCampaignState } from '../db/SQLiteStore';

export interface CampaignStore {
  /** Writes the full campaign state; `history` holds only entries not yet stored. */
  save(snapshot: CampaignSnapshot, history: readonly HistoryEntry[], badges: readonly BadgeRecord[]): Promise<void>;
  loadAll(): Promise<StoredCampaignState[]>;
  history(campaignId: string): Promise<HistoryEntry[]>;
}

export function createSqliteCampaignStore(dbPath?: string): CampaignStore {
  let ready: Promise<void> | null = null;
  const database = async () => {
    const db = await openDatabase(dbPath);
    ready ??= initializeDatabase(db);
    await ready;
    return db;
  };

  return {
    async save(snapshot, history, badges) {
      await saveCampaignState(snapshot, history, badges, await database());
    },
    async loadAll() {
      return loadCampaignStates(await database());
    },
    async history(campaignId) {
      return listCampaignHistory(campaignId, await database());
    },
  };
}
