import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { CAMPAIGN_DURATION_MS } from '../config/constants';
import { PayoutBook } from '../payments/PayoutBook';
import { CampaignService } from '../services/CampaignService';
import { parseUnits } from '../utils/amount';
import { FakeClock, START } from './helpers/fakes';

const GOAL = parseUnits('3').toString();

function setup() {
  const payouts = new PayoutBook();
  const service = new CampaignService({ transfer: payouts, clock: new FakeClock(START) });
  return { app: createApp(service), payouts, service };
}

async function createCampaign(app: ReturnType<typeof createApp>): Promise<string> {
  const res = await request(app)
    .post('/api/campaigns')
    .send({ owner: 'owner', goal: GOAL, name: 'Test Project', symbol: 'TST' });
  expect(res.status).toBe(201);
  return res.body.id;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('campaign routes', () => {
  it('creates a campaign', async () => {
    const { app } = setup();

    const res = await request(app)
      .post('/api/campaigns')
      .send({ owner: 'owner', goal: GOAL, name: 'Test Project', symbol: 'TST' });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      name: 'Test Project',
      symbol: 'TST',
      owner: 'owner',
      status: 'Active',
      acceptingContributions: true,
      goal: GOAL,
      goalDisplay: '3',
      totalContributed: '0',
      currentFunds: '0',
      progress: 0,
      cancelled: false,
      nextTokenId: 1,
      createdAt: new Date(START).toISOString(),
      deadline: new Date(START + CAMPAIGN_DURATION_MS).toISOString(),
    });
    expect(res.body.id).toMatch(/^campaign-/);
  });

  it('validates campaign input', async () => {
    const { app } = setup();

    const missingOwner = await request(app).post('/api/campaigns').send({ goal: GOAL, name: 'Test', symbol: 'TST' });
    expect(missingOwner.status).toBe(400);
    expect(missingOwner.body).toEqual({ error: 'owner-required' });

    const badGoal = await request(app)
      .post('/api/campaigns')
      .send({ owner: 'owner', goal: 'lots', name: 'Test', symbol: 'TST' });
    expect(badGoal.status).toBe(400);
    expect(badGoal.body).toEqual({ error: 'goal-invalid' });

    const zeroGoal = await request(app)
      .post('/api/campaigns')
      .send({ owner: 'owner', goal: '0', name: 'Test', symbol: 'TST' });
    expect(zeroGoal.status).toBe(400);
    expect(zeroGoal.body).toEqual({ error: 'invalid-goal', details: { goal: '0' } });

    const list = await request(app).get('/api/campaigns');
    expect(list.body).toEqual([]);
  });

  it('requires an identity header for contributions', async () => {
    const { app } = setup();
    const id = await createCampaign(app);

    const res = await request(app).post(`/api/campaigns/${id}/contribute`).send({ amount: GOAL });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'identity-required' });
  });

  it('maps ledger failures to HTTP statuses', async () => {
    const { app } = setup();
    const id = await createCampaign(app);

    const tooSmall = await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'alice')
      .send({ amount: '1' });
    expect(tooSmall.status).toBe(400);
    expect(tooSmall.body).toEqual({
      error: 'contribution-too-small',
      details: { amount: '1', minimum: '10000000000000000' },
    });

    const completed = await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'alice')
      .send({ amount: GOAL });
    expect(completed.status).toBe(200);
    expect(completed.body).toEqual({ identity: 'alice', amountContributed: GOAL, tokensClaimed: 0, status: 'Completed' });

    const late = await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'bob')
      .send({ amount: GOAL });
    expect(late.status).toBe(409);
    expect(late.body).toEqual({ error: 'not-accepting-contributions', details: { status: 'Completed' } });

    const stranger = await request(app)
      .post(`/api/campaigns/${id}/withdraw`)
      .set('X-Identity', 'mallory')
      .send({ to: 'mallory', amount: GOAL });
    expect(stranger.status).toBe(403);
    expect(stranger.body).toEqual({ error: 'not-owner', details: { owner: 'owner', caller: 'mallory' } });
  });

  it('lets the owner withdraw from a completed campaign', async () => {
    const { app, payouts } = setup();
    const id = await createCampaign(app);
    await request(app).post(`/api/campaigns/${id}/contribute`).set('X-Identity', 'alice').send({ amount: GOAL });

    const res = await request(app)
      .post(`/api/campaigns/${id}/withdraw`)
      .set('X-Identity', 'owner')
      .send({ to: 'owner-vault', amount: parseUnits('1').toString() });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      to: 'owner-vault',
      amount: parseUnits('1').toString(),
      currentFunds: parseUnits('2').toString(),
    });
    expect(payouts.balanceOf('owner-vault')).toBe(parseUnits('1'));

    const overdraw = await request(app)
      .post(`/api/campaigns/${id}/withdraw`)
      .set('X-Identity', 'owner')
      .send({ to: 'owner-vault', amount: GOAL });
    expect(overdraw.status).toBe(400);
    expect(overdraw.body.error).toBe('insufficient-funds');
  });

  it('claims badges and serves them by token id', async () => {
    const { app } = setup();
    const id = await createCampaign(app);
    await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'alice')
      .send({ amount: parseUnits('3.5').toString() });

    const claim = await request(app).post(`/api/campaigns/${id}/claim`).set('X-Identity', 'alice').send({ to: 'alice' });
    expect(claim.status).toBe(200);
    expect(claim.body).toEqual({ to: 'alice', tokenIds: [1, 2, 3] });

    const again = await request(app).post(`/api/campaigns/${id}/claim`).set('X-Identity', 'alice').send({ to: 'alice' });
    expect(again.status).toBe(409);
    expect(again.body).toEqual({ error: 'nothing-to-claim', details: { claimer: 'alice' } });

    const badge = await request(app).get(`/api/campaigns/${id}/badges/2`);
    expect(badge.body).toEqual({ tokenId: 2, owner: 'alice', name: 'Test Project', symbol: 'TST' });

    const missing = await request(app).get(`/api/campaigns/${id}/badges/9`);
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'badge-not-found' });

    const malformed = await request(app).get(`/api/campaigns/${id}/badges/first`);
    expect(malformed.status).toBe(400);
    expect(malformed.body).toEqual({ error: 'tokenId-invalid' });

    const contribution = await request(app).get(`/api/campaigns/${id}/contributions/alice`);
    expect(contribution.body).toEqual({
      campaignId: id,
      identity: 'alice',
      amountContributed: parseUnits('3.5').toString(),
      amountContributedDisplay: '3.5',
      tokensClaimed: 3,
      claimable: 0,
    });
  });

  it('refunds a cancelled campaign and reports rejected payouts', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { app, payouts } = setup();
    const id = await createCampaign(app);
    await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'alice')
      .send({ amount: parseUnits('1').toString() });

    const cancel = await request(app).post(`/api/campaigns/${id}/cancel`).set('X-Identity', 'owner').send();
    expect(cancel.body).toEqual({ status: 'Cancelled' });

    payouts.rejectPaymentsTo('alice-vault');
    const rejected = await request(app)
      .post(`/api/campaigns/${id}/refund`)
      .set('X-Identity', 'alice')
      .send({ to: 'alice-vault' });
    expect(rejected.status).toBe(502);
    expect(rejected.body).toEqual({
      error: 'transfer-failed',
      details: { to: 'alice-vault', amount: parseUnits('1').toString() },
    });
    expect(warn).toHaveBeenCalledTimes(1);

    const refunded = await request(app).post(`/api/campaigns/${id}/refund`).set('X-Identity', 'alice').send({ to: 'alice' });
    expect(refunded.body).toEqual({ to: 'alice', amount: parseUnits('1').toString() });
    expect(payouts.balanceOf('alice')).toBe(parseUnits('1'));

    const history = await request(app).get(`/api/campaigns/${id}/history`);
    expect(history.body.map((entry: { event: string }) => entry.event)).toEqual([
      'CAMPAIGN_CREATED',
      'CONTRIBUTED',
      'CANCELLED',
      'REFUNDED',
    ]);
  });

  it('accepts decimal amounts and lists minted badges', async () => {
    const { app } = setup();
    const created = await request(app)
      .post('/api/campaigns')
      .send({ owner: 'owner', goalDisplay: '2.5', name: 'Test Project', symbol: 'TST' });
    expect(created.body.goal).toBe(parseUnits('2.5').toString());
    const id: string = created.body.id;

    const contributed = await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'alice')
      .send({ amountDisplay: '2,5' });
    expect(contributed.body.amountContributed).toBe(parseUnits('2.5').toString());

    const tooPrecise = await request(app)
      .post(`/api/campaigns/${id}/contribute`)
      .set('X-Identity', 'bob')
      .send({ amountDisplay: '0.0000000000000000001' });
    expect(tooPrecise.status).toBe(400);
    expect(tooPrecise.body).toEqual({ error: 'amount-too-precise' });

    await request(app).post(`/api/campaigns/${id}/claim`).set('X-Identity', 'alice').send({ to: 'alice' });
    const badges = await request(app).get(`/api/campaigns/${id}/badges`);
    expect(badges.body).toEqual({
      campaignId: id,
      name: 'Test Project',
      symbol: 'TST',
      totalSupply: 2,
      badges: [
        { tokenId: 1, owner: 'alice' },
        { tokenId: 2, owner: 'alice' },
      ],
    });
  });

  it('returns 404 for unknown campaigns', async () => {
    const { app } = setup();

    const read = await request(app).get('/api/campaigns/campaign-missing');
    expect(read.status).toBe(404);
    expect(read.body).toEqual({ error: 'campaign-not-found' });

    const write = await request(app)
      .post('/api/campaigns/campaign-missing/contribute')
      .set('X-Identity', 'alice')
      .send({ amount: GOAL });
    expect(write.status).toBe(404);
  });

  it('reports health with the hosted campaign count', async () => {
    const { app } = setup();
    await createCampaign(app);

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', campaigns: 1 });
    expect(typeof res.body.timestamp).toBe('string');
  });
});
