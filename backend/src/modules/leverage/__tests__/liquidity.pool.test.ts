import { describe, it, expect, beforeEach } from 'vitest';
import { fixed, macro } from '../math/fixed-point.js';
import {
  HOTKEY,
  OTHER_HOTKEY,
  createHarness,
  expectProtocolError,
  expectThrowsCode,
  testParams,
  type Harness,
} from './fixtures.js';

describe('LiquidityPool', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('deposit', () => {
    it('issues shares 1:1 with stake', () => {
      expect(h.pool.deposit('lp1', macro('100'), HOTKEY)).toEqual({ shares: macro('100'), stake: macro('100') });
      expect(h.pool.deposit('lp2', macro('50'), HOTKEY)).toEqual({ shares: macro('50'), stake: macro('50') });

      expect(h.state.totals.totalLpStakes).toBe(macro('150'));
      expect(h.state.totals.totalLpShares).toBe(macro('150'));
      expect(h.state.totals.nativeBalance).toBe(macro('150'));
      expect(h.state.hotkeyLpCount.get(HOTKEY)).toBe(2);
    });

    it('rejects zero, dust and malformed keys', () => {
      expectThrowsCode(() => h.pool.deposit('lp1', 0n, HOTKEY), 'AMOUNT_ZERO');
      expectThrowsCode(() => h.pool.deposit('lp1', macro('0.05'), HOTKEY), 'AMOUNT_BELOW_MINIMUM');
      expectThrowsCode(() => h.pool.deposit('lp1', macro('1'), '0x1234'), 'INVALID_VALIDATOR_KEY');
      expectThrowsCode(() => h.pool.deposit('lp1', macro('1'), `0x${'0'.repeat(64)}`), 'INVALID_VALIDATOR_KEY');
    });

    it('keeps an active LP on its first validator key', () => {
      h.pool.deposit('lp1', macro('10'), HOTKEY);
      expectThrowsCode(() => h.pool.deposit('lp1', macro('10'), OTHER_HOTKEY), 'INVALID_VALIDATOR_KEY');
    });

    it('enforces the LP limit per validator key', () => {
      h.state.params.maxLiquidityProvidersPerHotkey = 2;
      h.pool.deposit('lp1', macro('10'), HOTKEY);
      h.pool.deposit('lp2', macro('10'), HOTKEY);

      expectThrowsCode(() => h.pool.deposit('lp3', macro('10'), HOTKEY), 'HOTKEY_LP_LIMIT');
      // topping up an existing LP does not count again
      expect(h.pool.deposit('lp1', macro('10'), HOTKEY).stake).toBe(macro('20'));
    });

    it('frees a slot when an LP leaves', async () => {
      h.state.params.maxLiquidityProvidersPerHotkey = 1;
      h.pool.deposit('lp1', macro('10'), HOTKEY);
      await h.pool.withdraw('lp1', 0n);

      expect(h.state.hotkeyLpCount.has(HOTKEY)).toBe(false);
      expect(h.pool.deposit('lp2', macro('10'), HOTKEY).shares).toBe(macro('10'));
    });
  });

  describe('withdraw', () => {
    it('returns the full deposit on a round trip', async () => {
      h.pool.deposit('lp1', macro('10'), HOTKEY);

      const result = await h.pool.withdraw('lp1', macro('10'));

      expect(result).toEqual({ amount: macro('10'), sharesBurned: macro('10') });
      expect(h.transfers.transfers).toEqual([{ to: 'lp1', amount: macro('10') }]);
      expect(h.state.liquidityProviders.get('lp1')?.isActive).toBe(false);
      expect(h.state.totals.totalLpStakes).toBe(0n);
      expect(h.state.totals.nativeBalance).toBe(0n);
    });

    it('treats zero as the whole stake', async () => {
      h.pool.deposit('lp1', macro('7'), HOTKEY);
      await expect(h.pool.withdraw('lp1', 0n)).resolves.toEqual({ amount: macro('7'), sharesBurned: macro('7') });
    });

    it('burns shares in proportion on a partial withdrawal', async () => {
      h.pool.deposit('lp1', macro('10'), HOTKEY);
      await expect(h.pool.withdraw('lp1', macro('4'))).resolves.toEqual({ amount: macro('4'), sharesBurned: macro('4') });
      expect(h.state.liquidityProviders.get('lp1')?.shares).toBe(macro('6'));
    });

    it('rejects unknown LPs and over-withdrawal', async () => {
      await expectProtocolError(h.pool.withdraw('ghost', macro('1')), 'LP_NOT_FOUND');
      h.pool.deposit('lp1', macro('10'), HOTKEY);
      await expectProtocolError(h.pool.withdraw('lp1', macro('11')), 'INSUFFICIENT_STAKE');
    });

    it('blocks withdrawals that push utilization over the cap', async () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.state.totals.totalBorrowed = macro('80');

      await expectProtocolError(h.pool.withdraw('lp1', macro('20')), 'UTILIZATION_EXCEEDED');
      await expectProtocolError(h.pool.withdraw('lp1', 0n), 'UTILIZATION_EXCEEDED');
      await expect(h.pool.withdraw('lp1', macro('10'))).resolves.toEqual({
        amount: macro('10'),
        sharesBurned: macro('10'),
      });
    });
  });

  describe('metrics', () => {
    it('reports available liquidity and utilization', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.state.totals.totalBorrowed = macro('30');

      expect(h.pool.availableLiquidity()).toBe(macro('70'));
      expect(h.pool.utilization()).toBe(fixed('0.3'));
    });

    it('snapshots the borrow rate onto a pair', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.state.totals.totalBorrowed = macro('40');
      const pair = {
        pairId: 1,
        totalCollateral: 0n,
        totalBorrowed: 0n,
        utilizationRate: 0n,
        borrowingRate: 0n,
        maxLeverage: fixed('10'),
        isActive: true,
      };

      h.pool.refreshPairRate(pair);

      expect(pair.utilizationRate).toBe(fixed('0.4'));
      expect(pair.borrowingRate).toBe(75_000n);
    });
  });

  describe('circuitBreakerCheck', () => {
    it('trips below the minimum liquidity and emits once', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.events.drain();

      expect(h.pool.circuitBreakerCheck()).toBe(true);
      expect(h.pool.circuitBreakerCheck()).toBe(true);

      const changes = h.events.drain().filter((e) => e.type === 'CircuitBreakerChanged');
      expect(changes).toHaveLength(1);
      expect(changes[0].data.active).toBe(true);
    });

    it('clears once liquidity recovers', () => {
      h = createHarness(testParams({ minLiquidityThreshold: macro('50') }));
      h.state.liquidityCircuitBreaker = true;
      h.pool.deposit('lp1', macro('100'), HOTKEY);

      expect(h.pool.circuitBreakerCheck()).toBe(false);
      expect(h.state.liquidityCircuitBreaker).toBe(false);
    });

    it('trips on utilization over the cap', () => {
      h = createHarness(testParams({ minLiquidityThreshold: macro('50') }));
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.state.totals.totalBorrowed = macro('95');

      expect(h.pool.circuitBreakerCheck()).toBe(true);
    });
  });
});
