/**
 * Leverage API — request schemas
 *
 * Amounts travel as decimal strings in the macro unit ("1.5"),
 * ratios/leverage as decimal strings ("2" = 2x, "0.01" = 1%),
 * token amounts as integer strings in the micro unit.
 */

import { z } from 'zod';
import { fixed, macro } from '../math/fixed-point.js';
import { uintString } from '../params/protocol.params.js';

const DECIMAL_18 = /^\d+(\.\d{1,18})?$/;
const DECIMAL_9 = /^\d+(\.\d{1,9})?$/;

export const amountSchema = z.string().regex(DECIMAL_18, 'expected a decimal amount (max 18 decimals)').transform(macro);
export const ratioSchema = z.string().regex(DECIMAL_9, 'expected a decimal ratio (max 9 decimals)').transform(fixed);
export const tokenAmountSchema = uintString;

export const pairIdSchema = z.coerce.number().int().nonnegative();
export const addressSchema = z.string().min(1).max(128);
export const validatorKeySchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected a 32-byte hex key');

const blocksSchema = z.number().int().nonnegative();

const distributionSchema = z.object({
  lpShare: ratioSchema,
  liquidatorShare: ratioSchema,
  protocolShare: ratioSchema,
});

// ═══════════════════════════════════════════════════════════════
// POSITIONS
// ═══════════════════════════════════════════════════════════════

export const OpenPositionBody = z.object({
  pairId: pairIdSchema,
  collateral: amountSchema,
  leverage: ratioSchema,
  maxSlippage: ratioSchema,
  validatorKey: validatorKeySchema.optional(),
});

export const ClosePositionBody = z.object({
  pairId: pairIdSchema,
  tokenAmount: tokenAmountSchema.default('0'),
  maxSlippage: ratioSchema,
});

export const AddCollateralBody = z.object({
  pairId: pairIdSchema,
  amount: amountSchema,
});

export const LiquidateBody = z.object({
  user: addressSchema,
  pairId: pairIdSchema,
  justification: z.string(),
  contentHash: z.string(),
});

export const PositionParams = z.object({
  user: addressSchema,
  pairId: pairIdSchema,
});

// ═══════════════════════════════════════════════════════════════
// LIQUIDITY / REWARDS / VESTING
// ═══════════════════════════════════════════════════════════════

export const AddLiquidityBody = z.object({
  amount: amountSchema,
  validatorKey: validatorKeySchema.optional(),
});

export const RemoveLiquidityBody = z.object({
  /** "0" withdraws everything */
  amount: amountSchema,
});

export const ClaimVestedBody = z.object({
  destination: addressSchema.optional(),
});

export const AddressParams = z.object({ address: addressSchema });
export const BeneficiaryParams = z.object({ beneficiary: addressSchema });

export const EventsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

// ═══════════════════════════════════════════════════════════════
// ADMIN
// ═══════════════════════════════════════════════════════════════

export const RiskParametersBody = z.object({
  maxLeverage: ratioSchema,
  liquidationThreshold: ratioSchema,
});

export const LiquidityGuardrailsBody = z.object({
  minLiquidityThreshold: amountSchema,
  maxUtilizationRate: ratioSchema,
  liquidityBufferRatio: ratioSchema,
});

export const ActionCooldownsBody = z.object({
  userBlocks: blocksSchema,
  lpBlocks: blocksSchema,
});

export const BuybackParametersBody = z.object({
  rate: ratioSchema,
  intervalBlocks: blocksSchema,
  threshold: amountSchema,
});

export const VestingParametersBody = z.object({
  durationBlocks: blocksSchema,
  cliffBlocks: blocksSchema,
});

export const FeeParametersBody = z.object({
  trading: ratioSchema,
  borrowing: ratioSchema,
  liquidation: ratioSchema,
});

export const FeeDistributionsBody = z.object({
  trading: distributionSchema,
  borrowing: distributionSchema,
  liquidation: distributionSchema,
});

export const TierParametersBody = z.object({
  thresholds: z.array(amountSchema),
  discounts: z.array(ratioSchema),
  leverages: z.array(ratioSchema),
});

export const RateModelBody = z.object({
  kink: ratioSchema,
  slope1: ratioSchema,
  slope2: ratioSchema,
});

export const HotkeyBody = z.object({ hotkey: z.string() });
export const TreasuryBody = z.object({ treasury: addressSchema });

export const FunctionPermissionsBody = z.object({
  openPosition: z.boolean(),
  closePosition: z.boolean(),
  liquidatePosition: z.boolean(),
});

export const PermittedCallerBody = z.object({
  account: addressSchema,
  allowed: z.boolean(),
});

export const LpLimitBody = z.object({ limit: z.number().int() });

export const RegisterPairBody = z.object({
  pairId: pairIdSchema,
  maxLeverage: ratioSchema,
});

export const UpdatePairBody = z.object({
  pairId: pairIdSchema,
  isActive: z.boolean().optional(),
  maxLeverage: ratioSchema.optional(),
});

export const CircuitBreakerBody = z.object({ active: z.boolean() });

export const RevokeVestingBody = z.object({
  beneficiary: addressSchema,
  index: z.number().int().nonnegative(),
});
