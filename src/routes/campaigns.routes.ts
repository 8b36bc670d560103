import { Router, type Request, type Response } from 'express';
import { isLedgerError, type LedgerErrorKind } from '../ledger/errors';
import type { CampaignService } from '../services/CampaignService';
import { parseBaseUnits, parseUnits } from '../utils/amount';
import { serializeCampaign, serializeContribution } from './serialize';

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  Unauthorized: 403,
  InvalidState: 409,
  NothingToClaim: 409,
  InvalidAmount: 400,
  TransferFailed: 502,
};

const NOT_FOUND_ERRORS = new Set(['campaign-not-found', 'badge-not-found']);

export function sendError(res: Response, err: unknown) {
  if (isLedgerError(err)) {
    return res.status(STATUS_BY_KIND[err.kind]).json({ error: err.code, details: err.details });
  }
  const message = err instanceof Error ? err.message : String(err);
  if (NOT_FOUND_ERRORS.has(message)) {
    return res.status(404).json({ error: message });
  }
  if (/-(required|invalid|too-precise)$/.test(message)) {
    return res.status(400).json({ error: message });
  }
  console.error('[campaigns] unexpected error', err);
  return res.status(500).json({ error: 'internal-error' });
}

function readIdentity(req: Request): string {
  const identity = req.header('x-identity')?.trim();
  if (!identity) throw new Error('identity-required');
  return identity;
}

function readText(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) throw new Error(`${field}-required`);
  return value.trim();
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return body && typeof body === 'object' ? { ...body } : {};
}

function readTokenId(raw: string): number {
  const tokenId = Number(raw);
  if (!Number.isSafeInteger(tokenId) || tokenId <= 0) throw new Error('tokenId-invalid');
  return tokenId;
}

function lookupCampaign(service: CampaignService, id: string) {
  const ledger = service.getCampaign(id);
  if (!ledger) throw new Error('campaign-not-found');
  return ledger;
}

export function createCampaignsRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns', async (req, res) => {
    try {
      const body = readBody(req);
      const ledger = await service.createCampaign({
        owner: readText(body.owner, 'owner'),
        goal: readAmount(body, 'goal'),
        name: readText(body.name, 'name'),
        symbol: readText(body.symbol, 'symbol'),
      });
      return res.status(201).json(serializeCampaign(ledger));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns', (_req, res) => {
    return res.json(service.listCampaigns().map(serializeCampaign));
  });

  router.get('/campaigns/:id', (req, res) => {
    try {
      return res.json(serializeCampaign(lookupCampaign(service, req.params.id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/contributions/:identity', (req, res) => {
    try {
      const ledger = lookupCampaign(service, req.params.id);
      return res.json(serializeContribution(ledger, req.params.identity));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/history', async (req, res) => {
    try {
      return res.json(await service.getCampaignHistory(req.params.id));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/badges', (req, res) => {
    try {
      const badges = service.getBadges(req.params.id);
      return res.json({
        campaignId: req.params.id,
        name: badges.name,
        symbol: badges.symbol,
        totalSupply: badges.totalSupply(),
        badges: badges.list(),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/badges/:tokenId', (req, res) => {
    try {
      const badges = service.getBadges(req.params.id);
      const tokenId = readTokenId(req.params.tokenId);
      const owner = badges.ownerOf(tokenId);
      if (!owner) throw new Error('badge-not-found');
      return res.json({ tokenId, owner, name: badges.name, symbol: badges.symbol });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/contribute', async (req, res) => {
    try {
      const identity = readIdentity(req);
      const amount = readAmount(readBody(req), 'amount');
      const record = await service.contribute(req.params.id, identity, amount);
      return res.json({
        identity,
        amountContributed: record.amountContributed.toString(),
        tokensClaimed: record.tokensClaimed,
        status: lookupCampaign(service, req.params.id).getStatus(),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/cancel', async (req, res) => {
    try {
      const status = await service.cancel(req.params.id, readIdentity(req));
      return res.json({ status });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/withdraw', async (req, res) => {
    try {
      const identity = readIdentity(req);
      const body = readBody(req);
      const to = readText(body.to, 'to');
      const amount = readAmount(body, 'amount');
      const currentFunds = await service.withdraw(req.params.id, identity, to, amount);
      return res.json({ to, amount: amount.toString(), currentFunds: currentFunds.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/refund', async (req, res) => {
    try {
      const identity = readIdentity(req);
      const to = readText(readBody(req).to, 'to');
      const amount = await service.refund(req.params.id, identity, to);
      return res.json({ to, amount: amount.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/claim', async (req, res) => {
    try {
      const identity = readIdentity(req);
      const to = readText(readBody(req).to, 'to');
      const tokenIds = await service.claim(req.params.id, identity, to);
      return res.json({ to, tokenIds });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}

function readAmountField(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

/** Base units in `field`, or a decimal string in `${field}Display`. */
function readAmount(body: Record<string, unknown>, field: string): bigint {
  const display = body[`${field}Display`];
  if (body[field] === undefined && typeof display === 'string') {
    return parseUnits(display);
  }
  return parseBaseUnits(readAmountField(body[field]), field);
}
