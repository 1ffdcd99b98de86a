import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { CALLER_HEADER } from '../api/leverage.routes.js';
import { RecordingValueTransfer, SimulatedStakingGateway } from '../gateway/simulated.gateway.js';
import { ManualBlockClock } from '../gateway/staking.gateway.js';
import { macro } from '../math/fixed-point.js';
import { LeverageProtocol } from '../orchestrator/protocol.orchestrator.js';
import { createProtocolState } from '../state/protocol.state.js';
import { OWNER, createMockLogger, testParams } from './fixtures.js';

const API = '/api/leverage';

describe('leverage routes', () => {
  let app: FastifyInstance;

  function post(url: string, caller: string | undefined, payload: object = {}) {
    return app.inject({
      method: 'POST',
      url: `${API}${url}`,
      headers: caller ? { [CALLER_HEADER]: caller } : {},
      payload,
    });
  }

  function openAlice(leverage = '2') {
    return post('/positions/open', 'alice', { pairId: 1, collateral: '10', leverage, maxSlippage: '0.01' });
  }

  beforeEach(async () => {
    const protocol = new LeverageProtocol({
      state: createProtocolState(OWNER, testParams({ minLiquidityThreshold: macro('100') }), 100),
      gateway: new SimulatedStakingGateway(),
      transfers: new RecordingValueTransfer(),
      clock: new ManualBlockClock(100),
      logger: createMockLogger(),
    });
    app = await buildApp({ protocol });

    const pair = await post('/admin/pairs/register', OWNER, { pairId: 1, maxLeverage: '10' });
    expect(pair.statusCode).toBe(200);
    const deposit = await post('/liquidity/add', 'lp', { amount: '500' });
    expect(deposit.json()).toEqual({ ok: true, data: { shares: '500000000000000000000', stake: '500000000000000000000' } });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, paused: false });
  });

  it('opens a position and renders amounts as integer strings', async () => {
    const res = await openAlice();

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.tradingFee).toBe('60000000000000000');
    expect(body.data.position.tokenAmount).toBe('19940000000');
    expect(body.data.position.borrowed).toBe('10000000000000000000');
  });

  it('serves position, stats and event views', async () => {
    await openAlice();

    const position = await app.inject({ method: 'GET', url: `${API}/positions/alice/1` });
    expect(position.json().data.healthRatio).toBe('1994000000');

    const stats = await app.inject({ method: 'GET', url: `${API}/stats/protocol` });
    expect(stats.json().data).toMatchObject({ totalTrades: 1, totalBorrowed: '10000000000000000000' });

    const events = await app.inject({ method: 'GET', url: `${API}/events?limit=1` });
    const tail = events.json().data;
    expect(tail).toHaveLength(1);
    expect(tail[0].type).toBe('PositionOpened');

    const params = await app.inject({ method: 'GET', url: `${API}/parameters` });
    expect(params.json().data.tradingFeeRate).toBe('3000000');

    const rewards = await post('/rewards/lp/claim', 'lp');
    expect(rewards.json()).toEqual({ ok: true, data: { claimed: '18000000000000000' } });
  });

  it('returns 404 for a missing position', async () => {
    const res = await app.inject({ method: 'GET', url: `${API}/positions/bob/1` });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('POSITION_NOT_FOUND');
  });

  it('requires the caller header', async () => {
    const res = await post('/positions/open', undefined, { pairId: 1, collateral: '10', leverage: '2', maxSlippage: '0.01' });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ ok: false, error: 'UNAUTHORIZED', kind: 'Admission' });
  });

  it('rejects malformed bodies', async () => {
    const res = await post('/positions/open', 'alice', { pairId: 1, collateral: 'ten', leverage: '2', maxSlippage: '0.01' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
  });

  it('maps protocol errors to status codes', async () => {
    const tooHigh = await openAlice('3');
    expect(tooHigh.statusCode).toBe(400);
    expect(tooHigh.json()).toMatchObject({ error: 'LEVERAGE_OUT_OF_RANGE', kind: 'Validation', retryable: false });

    await openAlice();
    const cooling = await post('/positions/close', 'alice', { pairId: 1, maxSlippage: '0.01' });
    expect(cooling.statusCode).toBe(429);
    expect(cooling.json()).toMatchObject({ error: 'COOLDOWN_ACTIVE', retryable: true });

    const pause = await post('/admin/pause', 'mallory');
    expect(pause.statusCode).toBe(403);
    expect(pause.json().error).toBe('UNAUTHORIZED');
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('NOT_FOUND');
  });
});
