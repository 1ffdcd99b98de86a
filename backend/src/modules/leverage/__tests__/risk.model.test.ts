import { describe, it, expect } from 'vitest';
import { fixed, macro } from '../math/fixed-point.js';
import {
  HEALTHY_SENTINEL,
  accruedBorrowingFee,
  borrowRatePer360Blocks,
  healthRatio,
  isLiquidatable,
  liquidationPrice,
  utilizationRate,
  type RateCurve,
} from '../risk/risk.model.js';

const curve: RateCurve = {
  baseRate: fixed('0.00005'),
  kink: fixed('0.8'),
  slope1: fixed('0.00005'),
  slope2: fixed('0.00045'),
};

describe('risk model', () => {
  describe('health', () => {
    it('returns the sentinel for debt-free positions', () => {
      expect(healthRatio(macro('5'), 0n)).toBe(HEALTHY_SENTINEL);
    });

    it('computes value / debt at PRECISION', () => {
      expect(healthRatio(macro('11'), macro('10'))).toBe(1_100_000_000n);
    });

    it('is not liquidatable exactly at the threshold', () => {
      expect(isLiquidatable(macro('11'), macro('10'), fixed('1.1'))).toBe(false);
    });

    it('is liquidatable one unit below the threshold', () => {
      expect(healthRatio(macro('11') - 1n, macro('10'))).toBe(1_099_999_999n);
      expect(isLiquidatable(macro('11') - 1n, macro('10'), fixed('1.1'))).toBe(true);
    });
  });

  describe('liquidationPrice', () => {
    it('gives macro per whole token', () => {
      // (10 + 1) × 1.1 / 20 tokens
      expect(liquidationPrice(macro('10'), macro('1'), 20_000_000_000n, fixed('1.1'))).toBe(605_000_000_000_000_000n);
    });

    it('is zero without tokens', () => {
      expect(liquidationPrice(macro('10'), 0n, 0n, fixed('1.1'))).toBe(0n);
    });
  });

  describe('utilization and rate curve', () => {
    it('computes utilization, zero without stakes', () => {
      expect(utilizationRate(macro('45'), macro('100'))).toBe(450_000_000n);
      expect(utilizationRate(macro('45'), 0n)).toBe(0n);
    });

    it('follows slope1 up to the kink', () => {
      expect(borrowRatePer360Blocks(0n, curve)).toBe(50_000n);
      expect(borrowRatePer360Blocks(fixed('0.4'), curve)).toBe(75_000n);
      expect(borrowRatePer360Blocks(fixed('0.8'), curve)).toBe(100_000n);
    });

    it('follows slope2 beyond the kink and caps at 100%', () => {
      expect(borrowRatePer360Blocks(fixed('0.9'), curve)).toBe(325_000n);
      expect(borrowRatePer360Blocks(fixed('1'), curve)).toBe(550_000n);
      expect(borrowRatePer360Blocks(fixed('1.5'), curve)).toBe(550_000n);
    });
  });

  describe('accruedBorrowingFee', () => {
    it('accrues linearly per 360-block window', () => {
      expect(accruedBorrowingFee(macro('100'), 100_000n, 360)).toBe(10_000_000_000_000_000n);
      expect(accruedBorrowingFee(macro('100'), 100_000n, 36)).toBe(1_000_000_000_000_000n);
    });

    it('is zero with no elapsed blocks or no debt', () => {
      expect(accruedBorrowingFee(macro('100'), 100_000n, 0)).toBe(0n);
      expect(accruedBorrowingFee(0n, 100_000n, 360)).toBe(0n);
    });
  });
});
