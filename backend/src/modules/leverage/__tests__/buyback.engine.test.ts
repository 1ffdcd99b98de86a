import { describe, it, expect, beforeEach } from 'vitest';
import { claimableAmount, vestedAmount } from '../buyback/buyback.engine.js';
import { fixed, macro } from '../math/fixed-point.js';
import type { VestingSchedule } from '../leverage.types.js';
import { HOTKEY, createHarness, expectProtocolError, expectThrowsCode, type Harness } from './fixtures.js';

const BUYBACK_PAIR = 67;
const INTERVAL = 7200;
const CLIFF = 648_000;
const DURATION = 2_628_000;

describe('vesting math', () => {
  const schedule: VestingSchedule = {
    totalAmount: 1000n,
    claimedAmount: 0n,
    startBlock: 100,
    cliffBlock: 200,
    endBlock: 1100,
    revoked: false,
  };

  it('vests nothing before the cliff', () => {
    expect(vestedAmount(schedule, 150)).toBe(0n);
  });

  it('vests linearly from the start once past the cliff', () => {
    expect(vestedAmount(schedule, 200)).toBe(100n);
    expect(vestedAmount(schedule, 600)).toBe(500n);
  });

  it('vests everything at and after the end', () => {
    expect(vestedAmount(schedule, 1100)).toBe(1000n);
    expect(vestedAmount(schedule, 5000)).toBe(1000n);
  });

  it('never decreases over time', () => {
    let previous = 0n;
    for (let block = 0; block <= 1200; block += 50) {
      const vested = vestedAmount(schedule, block);
      expect(vested >= previous).toBe(true);
      previous = vested;
    }
  });

  it('subtracts claims and returns nothing once revoked', () => {
    expect(claimableAmount({ ...schedule, claimedAmount: 300n }, 600)).toBe(200n);
    expect(claimableAmount({ ...schedule, revoked: true }, 600)).toBe(0n);
  });
});

describe('BuybackEngine', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness(undefined, 0);
    h.state.totals.buybackPool = macro('10');
    h.state.totals.nativeBalance = macro('10');
  });

  describe('plan', () => {
    it('waits for a full interval', () => {
      h.ctx.block = INTERVAL - 1;
      expect(h.buyback.plan().ready).toBe(false);
      expect(h.buyback.canExecute()).toBe(false);
    });

    it('spends the base rate after one interval', () => {
      h.ctx.block = INTERVAL;
      expect(h.buyback.plan()).toEqual({
        ready: true,
        blocksSinceLast: INTERVAL,
        missedIntervals: 0,
        spendFraction: fixed('0.5'),
        plannedSpend: macro('5'),
      });
    });

    it('ramps up 10% per missed interval', () => {
      h.ctx.block = 3 * INTERVAL;
      const plan = h.buyback.plan();
      expect(plan.missedIntervals).toBe(2);
      expect(plan.spendFraction).toBe(fixed('0.6'));
      expect(plan.plannedSpend).toBe(macro('6'));
    });

    it('caps the ramp at 50%', () => {
      h.ctx.block = 100 * INTERVAL;
      expect(h.buyback.plan().spendFraction).toBe(fixed('0.75'));
    });

    it('never spends more than the whole pool', () => {
      h.state.params.buybackRate = fixed('0.8');
      h.ctx.block = 6 * INTERVAL;
      expect(h.buyback.plan().spendFraction).toBe(fixed('1'));
      expect(h.buyback.plan().plannedSpend).toBe(macro('10'));
    });

    it('requires the pool threshold', () => {
      h.state.totals.buybackPool = macro('0.5');
      h.ctx.block = INTERVAL;
      expect(h.buyback.plan().ready).toBe(false);
    });
  });

  describe('execute', () => {
    it('stakes the planned spend and vests it for the treasury', async () => {
      h.ctx.block = INTERVAL;

      const result = await h.buyback.execute();

      expect(result.spent).toBe(macro('5'));
      expect(result.tokensBought).toBe(5_000_000_000n);
      expect(result.actualSlippage).toBe(0n);
      expect(result.schedule).toEqual({
        totalAmount: 5_000_000_000n,
        claimedAmount: 0n,
        startBlock: INTERVAL,
        cliffBlock: INTERVAL + CLIFF,
        endBlock: INTERVAL + DURATION,
        revoked: false,
      });

      const totals = h.state.totals;
      expect(totals.buybackPool).toBe(macro('5'));
      expect(totals.nativeBalance).toBe(macro('5'));
      expect(totals.totalTaoUsedForBuybacks).toBe(macro('5'));
      expect(totals.totalTokensBought).toBe(5_000_000_000n);
      expect(totals.lastBuybackBlock).toBe(INTERVAL);
      expect(h.state.vestingSchedules.get('treasury')).toHaveLength(1);
    });

    it('reports execution slippage', async () => {
      h.ctx.block = INTERVAL;
      h.gateway.setExecutionSlippage(BUYBACK_PAIR, fixed('0.02'));

      const result = await h.buyback.execute();

      expect(result.tokensBought).toBe(4_900_000_000n);
      expect(result.actualSlippage).toBe(fixed('0.02'));
    });

    it('refuses to run early', async () => {
      h.ctx.block = 10;
      await expectProtocolError(h.buyback.execute(), 'BUYBACK_NOT_READY');
    });
  });

  describe('claimVested', () => {
    beforeEach(async () => {
      h.ctx.block = INTERVAL;
      await h.buyback.execute();
    });

    it('returns zero before the cliff', async () => {
      h.ctx.block = INTERVAL + 800;
      await expect(h.buyback.claimVested('treasury', 'cold-wallet')).resolves.toBe(0n);
    });

    it('transfers the vested part and never pays it twice', async () => {
      h.ctx.block = INTERVAL + DURATION / 2;

      await expect(h.buyback.claimVested('treasury', 'cold-wallet')).resolves.toBe(2_500_000_000n);
      await expect(h.gateway.stakeBalance(HOTKEY, 'cold-wallet', BUYBACK_PAIR)).resolves.toBe(2_500_000_000n);
      await expect(h.buyback.claimVested('treasury', 'cold-wallet')).resolves.toBe(0n);

      h.ctx.block = INTERVAL + DURATION;
      await expect(h.buyback.claimVested('treasury', 'cold-wallet')).resolves.toBe(2_500_000_000n);
      expect(h.state.vestingSchedules.get('treasury')?.[0].claimedAmount).toBe(5_000_000_000n);
    });

    it('rejects beneficiaries without schedules', async () => {
      await expectProtocolError(h.buyback.claimVested('nobody', 'x'), 'NO_VESTING_SCHEDULES');
    });

    it('stops vesting once revoked', async () => {
      h.buyback.revokeSchedule('treasury', 0);
      h.ctx.block = INTERVAL + DURATION;

      await expect(h.buyback.claimVested('treasury', 'cold-wallet')).resolves.toBe(0n);
      expectThrowsCode(() => h.buyback.revokeSchedule('treasury', 5), 'VESTING_SCHEDULE_NOT_FOUND');
    });
  });
});
