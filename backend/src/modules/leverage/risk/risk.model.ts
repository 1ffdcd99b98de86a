/**
 * RISK MODEL
 *
 * Pure functions: health ratio, liquidation price, the kinked borrow
 * rate curve and interest accrual.
 *
 * Liquidation uses a single threshold: no separate at-risk band.
 */

import { LEVERAGE_CONFIG } from '../leverage.config.js';
import { MAX_UINT256, PRECISION, add, div, minOf, mul, mulDiv, sub } from '../math/fixed-point.js';
import type { Amount, FixedPoint } from '../leverage.types.js';

export interface RateCurve {
  /** rate at 0% utilization */
  baseRate: FixedPoint;
  /** utilization where slope2 takes over */
  kink: FixedPoint;
  /** rate added between 0% and kink */
  slope1: FixedPoint;
  /** rate added between kink and 100% */
  slope2: FixedPoint;
}

/** Returned for debt-free positions */
export const HEALTHY_SENTINEL = MAX_UINT256;

// ═══════════════════════════════════════════════════════════════
// HEALTH
// ═══════════════════════════════════════════════════════════════

export function healthRatio(positionValue: Amount, totalDebt: Amount): FixedPoint {
  if (totalDebt === 0n) return HEALTHY_SENTINEL;
  return mulDiv(positionValue, PRECISION, totalDebt);
}

export function isLiquidatable(positionValue: Amount, totalDebt: Amount, threshold: FixedPoint): boolean {
  return healthRatio(positionValue, totalDebt) < threshold;
}

/**
 * (borrowed + accruedFees) × threshold / tokenAmount.
 * With macro debt and micro tokens the result is macro per whole token.
 */
export function liquidationPrice(
  borrowed: Amount,
  accruedFees: Amount,
  tokenAmount: Amount,
  threshold: FixedPoint,
): Amount {
  if (tokenAmount === 0n) return 0n;
  return mulDiv(add(borrowed, accruedFees), threshold, tokenAmount);
}

// ═══════════════════════════════════════════════════════════════
// INTEREST
// ═══════════════════════════════════════════════════════════════

export function utilizationRate(totalBorrowed: Amount, totalLpStakes: Amount): FixedPoint {
  if (totalLpStakes === 0n) return 0n;
  return mulDiv(totalBorrowed, PRECISION, totalLpStakes);
}

/** Piecewise-linear: slope1 up to the kink, slope2 beyond it. */
export function borrowRatePer360Blocks(utilization: FixedPoint, curve: RateCurve): FixedPoint {
  const u = minOf(utilization, PRECISION);

  if (u <= curve.kink) {
    return add(curve.baseRate, mulDiv(curve.slope1, u, curve.kink));
  }

  const excess = sub(u, curve.kink);
  const span = sub(PRECISION, curve.kink);
  return add(add(curve.baseRate, curve.slope1), mulDiv(curve.slope2, excess, span));
}

/** borrowed × ratePer360 × blocks / (PRECISION × 360) */
export function accruedBorrowingFee(borrowed: Amount, ratePer360Blocks: FixedPoint, blocksElapsed: number): Amount {
  if (blocksElapsed <= 0 || borrowed === 0n) return 0n;
  const window = BigInt(LEVERAGE_CONFIG.rateWindowBlocks);
  return div(mul(mul(borrowed, ratePer360Blocks), BigInt(blocksElapsed)), mul(PRECISION, window));
}
