/**
 * PROTOCOL PARAMETERS
 *
 * Governable parameter set plus the validation rules each admin setter
 * enforces before committing. The same rules run over a parameters file
 * loaded at boot, so a bad file fails the boot rather than the first call.
 */

import fs from 'fs';
import { z } from 'zod';
import { ProtocolError } from '../leverage.errors.js';
import { PRECISION, add } from '../math/fixed-point.js';
import type { Address, Amount, FeeDistribution, FixedPoint, PairId, ValidatorKey } from '../leverage.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** Kinked curve above borrowingFeeRate (the rate at zero utilization) */
export interface RateCurveParameters {
  kink: FixedPoint;
  slope1: FixedPoint;
  slope2: FixedPoint;
}

export interface FunctionPermissions {
  openPosition: boolean;
  closePosition: boolean;
  liquidatePosition: boolean;
}

export type RestrictedFunction = keyof FunctionPermissions;

export interface ProtocolParameters {
  maxLeverage: FixedPoint;
  liquidationThreshold: FixedPoint;

  minLiquidityThreshold: Amount;
  maxUtilizationRate: FixedPoint;
  liquidityBufferRatio: FixedPoint;

  userActionCooldownBlocks: number;
  lpActionCooldownBlocks: number;

  buybackRate: FixedPoint;
  buybackIntervalBlocks: number;
  buybackExecutionThreshold: Amount;
  vestingDurationBlocks: number;
  cliffDurationBlocks: number;

  tradingFeeRate: FixedPoint;
  borrowingFeeRate: FixedPoint;
  liquidationFeeRate: FixedPoint;

  tradingFeeDistribution: FeeDistribution;
  borrowingFeeDistribution: FeeDistribution;
  liquidationFeeDistribution: FeeDistribution;

  /** 5 ascending balance thresholds for tiers 1..5 */
  tierThresholds: Amount[];
  /** 6 entries, tiers 0..5 */
  tierFeeDiscounts: FixedPoint[];
  /** 6 entries, tiers 0..5 */
  tierMaxLeverages: FixedPoint[];

  rateCurve: RateCurveParameters;

  minPositionCollateral: Amount;
  minLiquidityDeposit: Amount;
  maxJustificationLength: number;

  protocolValidatorHotkey: ValidatorKey;
  buybackPairId: PairId;
  treasury: Address;

  functionPermissions: FunctionPermissions;
  maxLiquidityProvidersPerHotkey: number;
}

export const TIER_COUNT = 6;
export const MAX_COOLDOWN_BLOCKS = 7200;
export const MAX_LEVERAGE_CAP = 20n * PRECISION;
export const MAX_TRADING_FEE = PRECISION / 100n;
export const MAX_BORROWING_FEE = PRECISION / 1000n;
export const MAX_LIQUIDATION_FEE = PRECISION / 10n;

// ═══════════════════════════════════════════════════════════════
// SETTER RULES
// ═══════════════════════════════════════════════════════════════

function invalid(message: string, details?: Record<string, unknown>): never {
  throw new ProtocolError('INVALID_PARAMETER', message, details);
}

export function validateRiskParameters(maxLeverage: FixedPoint, liquidationThreshold: FixedPoint): void {
  if (maxLeverage <= PRECISION || maxLeverage > MAX_LEVERAGE_CAP) {
    invalid('maxLeverage must be in (1x, 20x]', { maxLeverage });
  }
  if (liquidationThreshold <= PRECISION || liquidationThreshold > 2n * PRECISION) {
    invalid('liquidationThreshold must be in (100%, 200%]', { liquidationThreshold });
  }
}

export function validateLiquidityGuardrails(
  minLiquidityThreshold: Amount,
  maxUtilizationRate: FixedPoint,
  liquidityBufferRatio: FixedPoint,
): void {
  if (minLiquidityThreshold <= 0n) invalid('minLiquidityThreshold must be positive');
  if (maxUtilizationRate <= 0n || maxUtilizationRate > PRECISION) {
    invalid('maxUtilizationRate must be in (0, 100%]', { maxUtilizationRate });
  }
  if (liquidityBufferRatio < 0n || liquidityBufferRatio > PRECISION / 2n) {
    invalid('liquidityBufferRatio must be in [0, 50%]', { liquidityBufferRatio });
  }
}

export function validateActionCooldowns(userBlocks: number, lpBlocks: number): void {
  for (const [name, value] of [['userActionCooldownBlocks', userBlocks], ['lpActionCooldownBlocks', lpBlocks]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > MAX_COOLDOWN_BLOCKS) {
      invalid(`${name} must be an integer in [0, ${MAX_COOLDOWN_BLOCKS}]`, { [name]: value });
    }
  }
}

export function validateBuybackParameters(rate: FixedPoint, intervalBlocks: number, threshold: Amount): void {
  if (rate <= 0n || rate > PRECISION) invalid('buybackRate must be in (0, 100%]', { rate });
  if (!Number.isInteger(intervalBlocks) || intervalBlocks < 1) {
    invalid('buybackIntervalBlocks must be >= 1', { intervalBlocks });
  }
  if (threshold <= 0n) invalid('buybackExecutionThreshold must be positive');
}

export function validateVestingParameters(durationBlocks: number, cliffBlocks: number): void {
  if (!Number.isInteger(durationBlocks) || durationBlocks <= 0) {
    invalid('vestingDurationBlocks must be positive', { durationBlocks });
  }
  if (!Number.isInteger(cliffBlocks) || cliffBlocks < 0 || cliffBlocks > durationBlocks) {
    invalid('cliffDurationBlocks must be in [0, vestingDurationBlocks]', { cliffBlocks });
  }
}

export function validateFeeParameters(trading: FixedPoint, borrowing: FixedPoint, liquidation: FixedPoint): void {
  if (trading < 0n || trading > MAX_TRADING_FEE) invalid('tradingFeeRate must be <= 1%', { trading });
  if (borrowing < 0n || borrowing > MAX_BORROWING_FEE) invalid('borrowingFeeRate must be <= 0.1%', { borrowing });
  if (liquidation < 0n || liquidation > MAX_LIQUIDATION_FEE) {
    invalid('liquidationFeeRate must be <= 10%', { liquidation });
  }
}

export function validateFeeDistribution(name: string, distribution: FeeDistribution): void {
  const { lpShare, liquidatorShare, protocolShare } = distribution;
  if (lpShare < 0n || liquidatorShare < 0n || protocolShare < 0n) {
    invalid(`${name}: shares must be non-negative`);
  }
  const sum = add(add(lpShare, liquidatorShare), protocolShare);
  if (sum !== PRECISION) {
    throw new ProtocolError('DISTRIBUTION_SUM_MISMATCH', `${name}: shares sum to ${sum}, expected ${PRECISION}`);
  }
}

export function validateTierParameters(
  thresholds: Amount[],
  discounts: FixedPoint[],
  leverages: FixedPoint[],
  maxLeverage: FixedPoint,
): void {
  if (thresholds.length !== TIER_COUNT - 1) invalid(`tierThresholds needs ${TIER_COUNT - 1} entries`);
  if (discounts.length !== TIER_COUNT) invalid(`tierFeeDiscounts needs ${TIER_COUNT} entries`);
  if (leverages.length !== TIER_COUNT) invalid(`tierMaxLeverages needs ${TIER_COUNT} entries`);

  thresholds.forEach((threshold, i) => {
    if (threshold <= 0n) invalid('tier thresholds must be positive');
    if (i > 0 && threshold <= thresholds[i - 1]) invalid('tier thresholds must be strictly ascending');
  });
  discounts.forEach((discount, i) => {
    if (discount < 0n || discount > PRECISION) invalid('tier discounts must be in [0, 100%]');
    if (i > 0 && discount < discounts[i - 1]) invalid('tier discounts must be non-decreasing');
  });
  leverages.forEach((leverage, i) => {
    if (leverage < PRECISION || leverage > maxLeverage) invalid('tier leverage must be in [1x, maxLeverage]');
    if (i > 0 && leverage < leverages[i - 1]) invalid('tier leverages must be non-decreasing');
  });
}

export function validateRateCurve(borrowingFeeRate: FixedPoint, curve: RateCurveParameters): void {
  if (curve.kink <= 0n || curve.kink >= PRECISION) invalid('kink must be in (0, 100%)', { kink: curve.kink });
  if (curve.slope1 < 0n || curve.slope2 < 0n) invalid('slopes must be non-negative');
  if (add(add(borrowingFeeRate, curve.slope1), curve.slope2) > PRECISION) {
    invalid('rate at full utilization must not exceed 100% per window');
  }
}

const VALIDATOR_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isValidatorKey(value: string): boolean {
  return VALIDATOR_KEY_PATTERN.test(value) && !/^0x0{64}$/.test(value);
}

export function validateValidatorKey(key: string): void {
  if (!isValidatorKey(key)) {
    throw new ProtocolError('INVALID_VALIDATOR_KEY', 'validator key must be a nonzero 32-byte hex string');
  }
}

/** Runs every setter rule over a full parameter set */
export function validateParameters(params: ProtocolParameters): void {
  validateRiskParameters(params.maxLeverage, params.liquidationThreshold);
  validateLiquidityGuardrails(params.minLiquidityThreshold, params.maxUtilizationRate, params.liquidityBufferRatio);
  validateActionCooldowns(params.userActionCooldownBlocks, params.lpActionCooldownBlocks);
  validateBuybackParameters(params.buybackRate, params.buybackIntervalBlocks, params.buybackExecutionThreshold);
  validateVestingParameters(params.vestingDurationBlocks, params.cliffDurationBlocks);
  validateFeeParameters(params.tradingFeeRate, params.borrowingFeeRate, params.liquidationFeeRate);
  validateFeeDistribution('tradingFeeDistribution', params.tradingFeeDistribution);
  validateFeeDistribution('borrowingFeeDistribution', params.borrowingFeeDistribution);
  validateFeeDistribution('liquidationFeeDistribution', params.liquidationFeeDistribution);
  validateTierParameters(params.tierThresholds, params.tierFeeDiscounts, params.tierMaxLeverages, params.maxLeverage);
  validateRateCurve(params.borrowingFeeRate, params.rateCurve);
  validateValidatorKey(params.protocolValidatorHotkey);
  if (params.minPositionCollateral <= 0n) invalid('minPositionCollateral must be positive');
  if (params.minLiquidityDeposit <= 0n) invalid('minLiquidityDeposit must be positive');
  if (!Number.isInteger(params.maxJustificationLength) || params.maxJustificationLength < 1) {
    invalid('maxJustificationLength must be >= 1');
  }
  if (!params.treasury) invalid('treasury must be set');
  if (!Number.isInteger(params.maxLiquidityProvidersPerHotkey) || params.maxLiquidityProvidersPerHotkey < 1) {
    invalid('maxLiquidityProvidersPerHotkey must be >= 1');
  }
}

// ═══════════════════════════════════════════════════════════════
// SCHEMA (files / snapshots)
// ═══════════════════════════════════════════════════════════════

export const uintString = z
  .union([z.string().regex(/^\d+$/, 'expected an unsigned integer string'), z.bigint().nonnegative()])
  .transform((v) => (typeof v === 'bigint' ? v : BigInt(v)));

const distributionSchema = z.object({
  lpShare: uintString,
  liquidatorShare: uintString,
  protocolShare: uintString,
});

export const protocolParametersSchema = z.object({
  maxLeverage: uintString,
  liquidationThreshold: uintString,
  minLiquidityThreshold: uintString,
  maxUtilizationRate: uintString,
  liquidityBufferRatio: uintString,
  userActionCooldownBlocks: z.number().int().nonnegative(),
  lpActionCooldownBlocks: z.number().int().nonnegative(),
  buybackRate: uintString,
  buybackIntervalBlocks: z.number().int().positive(),
  buybackExecutionThreshold: uintString,
  vestingDurationBlocks: z.number().int().positive(),
  cliffDurationBlocks: z.number().int().nonnegative(),
  tradingFeeRate: uintString,
  borrowingFeeRate: uintString,
  liquidationFeeRate: uintString,
  tradingFeeDistribution: distributionSchema,
  borrowingFeeDistribution: distributionSchema,
  liquidationFeeDistribution: distributionSchema,
  tierThresholds: z.array(uintString),
  tierFeeDiscounts: z.array(uintString),
  tierMaxLeverages: z.array(uintString),
  rateCurve: z.object({ kink: uintString, slope1: uintString, slope2: uintString }),
  minPositionCollateral: uintString,
  minLiquidityDeposit: uintString,
  maxJustificationLength: z.number().int().positive(),
  protocolValidatorHotkey: z.string(),
  buybackPairId: z.number().int().nonnegative(),
  treasury: z.string().min(1),
  functionPermissions: z.object({
    openPosition: z.boolean(),
    closePosition: z.boolean(),
    liquidatePosition: z.boolean(),
  }),
  maxLiquidityProvidersPerHotkey: z.number().int().positive(),
});

/**
 * Reads a JSON parameters file (scaled integer strings) over the
 * given defaults. Missing keys keep their default.
 */
export function loadParametersFile(path: string, defaults: ProtocolParameters): ProtocolParameters {
  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf-8'));
  const parsed = protocolParametersSchema.partial().safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ProtocolError('INVALID_PARAMETER', `Invalid parameters file ${path}: ${issues}`);
  }

  const merged: ProtocolParameters = { ...defaults, ...parsed.data };
  validateParameters(merged);
  return merged;
}

export function cloneParameters(params: ProtocolParameters): ProtocolParameters {
  return structuredClone(params);
}

export interface BootParameterSources {
  paramsPath?: string;
  treasury?: Address;
}

/** Defaults, then the parameters file, then the treasury override */
export function resolveBootParameters(sources: BootParameterSources, defaults: ProtocolParameters): ProtocolParameters {
  const params = sources.paramsPath ? loadParametersFile(sources.paramsPath, defaults) : cloneParameters(defaults);
  if (sources.treasury !== undefined) {
    if (!sources.treasury) invalid('treasury must be set');
    params.treasury = sources.treasury;
  }
  return params;
}
