export const UNIT_DECIMALS = 18;
export const ONE_UNIT = 10n ** BigInt(UNIT_DECIMALS);

/** Smallest accepted contribution: 0.01 unit. */
export const MIN_CONTRIBUTION = ONE_UNIT / 100n;

const DAY_MS = 24 * 60 * 60 * 1000;
export const CAMPAIGN_DURATION_DAYS = 30;
export const CAMPAIGN_DURATION_MS = CAMPAIGN_DURATION_DAYS * DAY_MS;

const DEFAULT_PORT = 3001;
const DEFAULT_HOST = '127.0.0.1';

export function parsePositiveIntegerEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || !Number.isInteger(parsed)) {
    return fallback;
  }
  return parsed;
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export function getServerPort(): number {
  return parsePositiveIntegerEnv(process.env.PORT ?? process.env.API_PORT, DEFAULT_PORT);
}

export function getServerHost(): string {
  return process.env.HOST?.trim() || DEFAULT_HOST;
}

export function shouldPersistLedger(): boolean {
  return parseBooleanEnv(process.env.LEDGER_PERSISTENCE, true);
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}
