import { describe, it, expect, beforeEach } from 'vitest';
import { fixed, macro } from '../math/fixed-point.js';
import { HOTKEY, createHarness, expectProtocolError, testParams, type Harness } from './fixtures.js';

describe('FeeAccounting', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('distribution', () => {
    it('splits a trading fee between LPs and the protocol', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);

      const split = h.fees.distributeTradingFee(macro('1'));

      expect(split).toEqual({ lp: 300_000_000_000_000_000n, liquidator: 0n, protocol: 700_000_000_000_000_000n });
      expect(h.state.totals.accLpFeesPerShare).toBe(3_000_000_000_000_000n);
      expect(h.state.totals.protocolFees).toBe(700_000_000_000_000_000n);
      expect(h.state.totals.buybackPool).toBe(700_000_000_000_000_000n);
      expect(h.state.totals.totalFeesCollected).toBe(macro('1'));
      expect(h.fees.pendingLpRewards('lp1')).toBe(300_000_000_000_000_000n);
    });

    it('does not pay late depositors for fees earned before they joined', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.fees.distributeTradingFee(macro('1'));

      h.pool.deposit('lp2', macro('100'), HOTKEY);
      expect(h.fees.pendingLpRewards('lp2')).toBe(0n);

      h.fees.distributeTradingFee(macro('1'));
      expect(h.fees.pendingLpRewards('lp1')).toBe(450_000_000_000_000_000n);
      expect(h.fees.pendingLpRewards('lp2')).toBe(150_000_000_000_000_000n);
    });

    it('counts shares with no recipient as orphaned', () => {
      h.state.params.borrowingFeeDistribution = {
        lpShare: fixed('0.35'),
        liquidatorShare: fixed('0.15'),
        protocolShare: fixed('0.5'),
      };

      h.fees.distributeBorrowingFee(macro('1'));

      expect(h.state.totals.orphanedFees).toBe(500_000_000_000_000_000n);
      expect(h.state.totals.accLpFeesPerShare).toBe(0n);
      expect(h.state.totals.accLiquidatorFeesPerScore).toBe(0n);
      expect(h.state.totals.buybackPool).toBe(500_000_000_000_000_000n);
    });

    it('returns the liquidator share of a liquidation fee instead of pooling it', () => {
      const split = h.fees.distributeLiquidationFee(macro('1'));

      expect(split.liquidator).toBe(400_000_000_000_000_000n);
      expect(split.protocol).toBe(600_000_000_000_000_000n);
      expect(h.state.totals.accLiquidatorFeesPerScore).toBe(0n);
      expect(h.state.totals.totalLiquidatorFees).toBe(400_000_000_000_000_000n);
      expect(h.state.totals.orphanedFees).toBe(0n);
    });

    it('ignores a zero fee', () => {
      h.fees.distributeTradingFee(0n);
      expect(h.state.totals.totalFeesCollected).toBe(0n);
      expect(h.events.drain()).toEqual([]);
    });
  });

  describe('LP rewards', () => {
    it('pays accrued rewards once', async () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.fees.distributeTradingFee(macro('1'));

      const claimed = await h.fees.claimLpRewards('lp1');

      expect(claimed).toBe(300_000_000_000_000_000n);
      expect(h.transfers.transfers).toEqual([{ to: 'lp1', amount: 300_000_000_000_000_000n }]);
      await expectProtocolError(h.fees.claimLpRewards('lp1'), 'NO_REWARDS');
    });

    it('settles pending rewards before a share change', () => {
      h.pool.deposit('lp1', macro('100'), HOTKEY);
      h.fees.distributeTradingFee(macro('1'));

      h.pool.deposit('lp1', macro('100'), HOTKEY);

      expect(h.state.lpClaimable.get('lp1')).toBe(300_000_000_000_000_000n);
      expect(h.fees.pendingLpRewards('lp1')).toBe(0n);
    });
  });

  describe('liquidator rewards', () => {
    beforeEach(() => {
      h.state.params.borrowingFeeDistribution = {
        lpShare: 0n,
        liquidatorShare: fixed('0.5'),
        protocolShare: fixed('0.5'),
      };
    });

    it('accrues by score and ignores scores added later', () => {
      h.fees.addLiquidatorScore('liq1', macro('10'));
      h.fees.distributeBorrowingFee(macro('1'));
      h.fees.addLiquidatorScore('liq2', macro('10'));

      expect(h.state.totals.accLiquidatorFeesPerScore).toBe(50_000_000_000_000_000n);
      expect(h.fees.pendingLiquidatorRewards('liq1')).toBe(500_000_000_000_000_000n);
      expect(h.fees.pendingLiquidatorRewards('liq2')).toBe(0n);
    });

    it('keeps pending rewards when the score grows', () => {
      h.fees.addLiquidatorScore('liq1', macro('10'));
      h.fees.distributeBorrowingFee(macro('1'));
      h.fees.addLiquidatorScore('liq1', macro('10'));

      expect(h.state.liquidatorClaimable.get('liq1')).toBe(500_000_000_000_000_000n);
    });

    it('claims through the ledger', async () => {
      h.ctx.ledger.receive(macro('1'));
      h.fees.addLiquidatorScore('liq1', macro('10'));
      h.fees.distributeBorrowingFee(macro('1'));

      await expect(h.fees.claimLiquidatorRewards('liq1')).resolves.toBe(500_000_000_000_000_000n);
      expect(h.transfers.totalTo('liq1')).toBe(500_000_000_000_000_000n);
      await expectProtocolError(h.fees.claimLiquidatorRewards('liq1'), 'NO_REWARDS');
    });
  });

  describe('tiers', () => {
    const params = testParams();

    it('is tier 0 without stake', async () => {
      await expect(h.fees.userTier('nobody')).resolves.toEqual({
        tier: 0,
        feeDiscount: 0n,
        maxLeverage: fixed('2'),
      });
    });

    it('maps the buyback-pair stake to a tier', async () => {
      h.gateway.setStakeBalance(HOTKEY, 'whale', params.buybackPairId, 1_000_000_000_000n);

      await expect(h.fees.userTier('whale')).resolves.toEqual({
        tier: 2,
        feeDiscount: fixed('0.2'),
        maxLeverage: fixed('4'),
      });
      await expect(h.fees.discountedFee('whale', macro('1'))).resolves.toBe(800_000_000_000_000_000n);
    });

    it('stays below a threshold by one micro unit', async () => {
      h.gateway.setStakeBalance(HOTKEY, 'almost', params.buybackPairId, 99_999_999_999n);
      await expect(h.fees.tierOf('almost')).resolves.toBe(0);
    });

    it('caps tier leverage at the protocol maximum', async () => {
      h.gateway.setStakeBalance(HOTKEY, 'top', params.buybackPairId, 100_000_000_000_000n);
      h.state.params.maxLeverage = fixed('8');

      const tier = await h.fees.userTier('top');
      expect(tier.tier).toBe(5);
      expect(tier.maxLeverage).toBe(fixed('8'));
    });
  });
});
