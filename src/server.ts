import fs from 'fs';
import path from 'path';

function loadDotEnv(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const contents = fs.readFileSync(envPath, 'utf8');
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const separatorIndex = trimmed.indexOf('=');
    if (separatorIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    if (!key) {
      continue;
    }

    let value = trimmed.slice(separatorIndex + 1).trim();
    const hasMatchingQuotes =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"));
    if (hasMatchingQuotes) {
      value = value.slice(1, -1);
    }

    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadDotEnv();

// Loaded after .env so configuration reads the final environment.
const { createApp } = require('./app') as typeof import('./app');
const { CampaignService } = require('./services/CampaignService') as typeof import('./services/CampaignService');
const { createSqliteCampaignStore } = require('./store/campaignStore') as typeof import('./store/campaignStore');
const { getServerHost, getServerPort, shouldPersistLedger } =
  require('./config/constants') as typeof import('./config/constants');

async function main(): Promise<void> {
  const persist = shouldPersistLedger();
  const service = new CampaignService({ store: persist ? createSqliteCampaignStore() : undefined });
  await service.restore();

  const port = getServerPort();
  const host = getServerHost();
  createApp(service).listen(port, host, () => {
    console.log(`[config] persistence=${persist ? 'sqlite' : 'memory'}`);
    console.log(`Crowdfund ledger listening on http://${host}:${port}`);
  });
}

main().catch((err) => {
  console.error('[server] failed to start', err);
  process.exitCode = 1;
});
