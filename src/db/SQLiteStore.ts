import fs from 'fs';
import path from 'path';
import { openConnection, type Connection, type Row } from './connection';
import type { CampaignSnapshot, ContributionEntry } from '../ledger/types';
import type { BadgeRecord } from '../tokens/BadgeRegistry';

export type HistoryEntry = {
  event: string;
  details: Record<string, string | number>;
  timestamp: string;
};

export type StoredCampaignState = {
  snapshot: CampaignSnapshot;
  badges: BadgeRecord[];
};

const DEFAULT_DB_FILENAME = 'ledger.db';

let dbPromise: Promise<Connection> | null = null;
let dbPromisePath: string | null = null;
let writeQueue: Promise<void> = Promise.resolve();

function getDataDir(): string {
  const dataDir = path.join(process.cwd(), 'data');
  fs.mkdirSync(dataDir, { recursive: true });
  return dataDir;
}

export function getDefaultDbPath(): string {
  return path.join(getDataDir(), DEFAULT_DB_FILENAME);
}

function getEffectiveDbPath(dbPath?: string): string {
  const envPath = process.env.LEDGER_SQLITE_PATH?.trim();
  return dbPath ?? (envPath && envPath.length > 0 ? envPath : getDefaultDbPath());
}

export async function openDatabase(dbPath?: string): Promise<Connection> {
  const effectivePath = getEffectiveDbPath(dbPath);
  if (!dbPromise || dbPromisePath !== effectivePath) {
    dbPromise = openConnection(effectivePath);
    dbPromisePath = effectivePath;
  }
  return dbPromise;
}

export async function initializeDatabase(database?: Connection): Promise<void> {
  const db = database ?? (await openDatabase());

  await db.exec(`
    CREATE TABLE IF NOT EXISTS campaigns (
      id TEXT PRIMARY KEY,
      owner TEXT NOT NULL,
      name TEXT NOT NULL,
      symbol TEXT NOT NULL,
      goal TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      deadline INTEGER NOT NULL,
      cancelled INTEGER NOT NULL DEFAULT 0,
      totalContributed TEXT NOT NULL DEFAULT '0',
      currentFunds TEXT NOT NULL DEFAULT '0',
      nextTokenId INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS contributions (
      campaignId TEXT NOT NULL,
      identity TEXT NOT NULL,
      amountContributed TEXT NOT NULL,
      tokensClaimed INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (campaignId, identity),
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS badges (
      campaignId TEXT NOT NULL,
      tokenId INTEGER NOT NULL,
      owner TEXT NOT NULL,
      PRIMARY KEY (campaignId, tokenId),
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS campaign_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      campaignId TEXT NOT NULL,
      event TEXT NOT NULL,
      details TEXT,
      timestamp TEXT NOT NULL,
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );
  `);
}

/** Transactions share one connection; run them one after another. */
function enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
  const run = writeQueue.then(task);
  writeQueue = run.then(
    () => undefined,
    () => undefined,
  );
  return run;
}

export async function saveCampaignState(
  snapshot: CampaignSnapshot,
  history: readonly HistoryEntry[],
  badges: readonly BadgeRecord[],
  database?: Connection,
): Promise<void> {
  const db = database ?? (await openDatabase());
  return enqueueWrite(async () => {
    await db.exec('BEGIN TRANSACTION');
    try {
      await db.run(
        `INSERT INTO campaigns (
          id, owner, name, symbol, goal, createdAt, deadline,
          cancelled, totalContributed, currentFunds, nextTokenId
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          cancelled = excluded.cancelled,
          totalContributed = excluded.totalContributed,
          currentFunds = excluded.currentFunds,
          nextTokenId = excluded.nextTokenId`,
        [
          snapshot.id,
          snapshot.owner,
          snapshot.name,
          snapshot.symbol,
          snapshot.goal.toString(),
          snapshot.createdAt,
          snapshot.deadline,
          snapshot.cancelled ? 1 : 0,
          snapshot.totalContributed.toString(),
          snapshot.currentFunds.toString(),
          snapshot.nextTokenId,
        ],
      );

      for (const entry of snapshot.contributions) {
        await db.run(
          `INSERT INTO contributions (campaignId, identity, amountContributed, tokensClaimed)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(campaignId, identity) DO UPDATE SET
             amountContributed = excluded.amountContributed,
             tokensClaimed = excluded.tokensClaimed`,
          [snapshot.id, entry.identity, entry.amountContributed.toString(), entry.tokensClaimed],
        );
      }

      for (const badge of badges) {
        await db.run(
          'INSERT OR IGNORE INTO badges (campaignId, tokenId, owner) VALUES (?, ?, ?)',
          [snapshot.id, badge.tokenId, badge.owner],
        );
      }

      for (const entry of history) {
        await db.run(
          'INSERT INTO campaign_events (campaignId, event, details, timestamp) VALUES (?, ?, ?, ?)',
          [snapshot.id, entry.event, JSON.stringify(entry.details), entry.timestamp],
        );
      }

      await db.exec('COMMIT');
    } catch (error) {
      await db.exec('ROLLBACK');
      throw error;
    }
  });
}

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`column-invalid:${column}`);
}

function integer(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  throw new Error(`column-invalid:${column}`);
}

function groupByCampaign(rows: Row[]): Map<string, Row[]> {
  const grouped = new Map<string, Row[]>();
  for (const row of rows) {
    const campaignId = text(row, 'campaignId');
    const list = grouped.get(campaignId) ?? [];
    list.push(row);
    grouped.set(campaignId, list);
  }
  return grouped;
}

function toContributionEntry(row: Row): ContributionEntry {
  return {
    identity: text(row, 'identity'),
    amountContributed: BigInt(text(row, 'amountContributed')),
    tokensClaimed: integer(row, 'tokensClaimed'),
  };
}

export async function loadCampaignStates(database?: Connection): Promise<StoredCampaignState[]> {
  const db = database ?? (await openDatabase());
  const campaigns = await db.all('SELECT * FROM campaigns ORDER BY createdAt ASC, id ASC');
  const contributions = groupByCampaign(await db.all('SELECT * FROM contributions ORDER BY identity ASC'));
  const badges = groupByCampaign(await db.all('SELECT * FROM badges ORDER BY tokenId ASC'));

  return campaigns.map((row) => {
    const id = text(row, 'id');
    return {
      snapshot: {
        id,
        owner: text(row, 'owner'),
        name: text(row, 'name'),
        symbol: text(row, 'symbol'),
        goal: BigInt(text(row, 'goal')),
        createdAt: integer(row, 'createdAt'),
        deadline: integer(row, 'deadline'),
        cancelled: integer(row, 'cancelled') === 1,
        totalContributed: BigInt(text(row, 'totalContributed')),
        currentFunds: BigInt(text(row, 'currentFunds')),
        nextTokenId: integer(row, 'nextTokenId'),
        contributions: (contributions.get(id) ?? []).map(toContributionEntry),
      },
      badges: (badges.get(id) ?? []).map((badge) => ({
        tokenId: integer(badge, 'tokenId'),
        owner: text(badge, 'owner'),
      })),
    };
  });
}

export async function listCampaignHistory(campaignId: string, database?: Connection): Promise<HistoryEntry[]> {
  const db = database ?? (await openDatabase());
  const rows = await db.all(
    'SELECT event, details, timestamp FROM campaign_events WHERE campaignId = ? ORDER BY id ASC',
    [campaignId],
  );
  return rows.map((row) => ({
    event: text(row, 'event'),
    details: parseDetails(row.details),
    timestamp: text(row, 'timestamp'),
  }));
}

function parseDetails(raw: Row[string]): Record<string, string | number> {
  if (typeof raw !== 'string' || !raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
  const details: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number') {
      details[key] = value;
    }
  }
  return details;
}
