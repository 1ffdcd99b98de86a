/**
 * LEVERAGE PROTOCOL — TYPES
 *
 * Entity records of the shared ledger. Amounts are bigint in the macro
 * unit unless noted; ratios/rates/leverage are PRECISION-scaled bigint;
 * token amounts are in the gateway's micro unit.
 */

// ═══════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════

export type Address = string;
export type PairId = number;
/** 32-byte hex key, 0x-prefixed */
export type ValidatorKey = string;
export type Amount = bigint;
export type FixedPoint = bigint;
export type BlockHeight = number;

export type FeeKind = 'TRADING' | 'BORROWING' | 'LIQUIDATION';

export interface FeeDistribution {
  lpShare: FixedPoint;
  liquidatorShare: FixedPoint;
  protocolShare: FixedPoint;
}

// ═══════════════════════════════════════════════════════════════
// ENTITIES
// ═══════════════════════════════════════════════════════════════

export interface Position {
  user: Address;
  pairId: PairId;
  collateral: Amount;
  borrowed: Amount;
  /** micro-unit tokens held under validatorKey */
  tokenAmount: Amount;
  leverage: FixedPoint;
  entryPrice: FixedPoint;
  openedAtBlock: BlockHeight;
  lastUpdateBlock: BlockHeight;
  accruedFees: Amount;
  isActive: boolean;
  validatorKey: ValidatorKey;
}

export interface Pair {
  pairId: PairId;
  totalCollateral: Amount;
  totalBorrowed: Amount;
  /** pool utilization snapshotted the last time this pair was touched */
  utilizationRate: FixedPoint;
  /** rate per 360 blocks that applied at that snapshot */
  borrowingRate: FixedPoint;
  maxLeverage: FixedPoint;
  isActive: boolean;
}

export interface LiquidityProvider {
  address: Address;
  stake: Amount;
  shares: Amount;
  rewardDebt: Amount;
  lastRewardBlock: BlockHeight;
  isActive: boolean;
  validatorKey: ValidatorKey;
}

export interface LiquidatorAccount {
  score: Amount;
  rewardDebt: Amount;
}

export interface UserAccount {
  totalCollateral: Amount;
  totalBorrowed: Amount;
  totalVolume: Amount;
  lastPositionActionBlock?: BlockHeight;
  lastLpActionBlock?: BlockHeight;
}

export interface VestingSchedule {
  /** micro-unit tokens */
  totalAmount: Amount;
  claimedAmount: Amount;
  startBlock: BlockHeight;
  cliffBlock: BlockHeight;
  endBlock: BlockHeight;
  revoked: boolean;
}

export interface ProtocolTotals {
  totalLpStakes: Amount;
  totalLpShares: Amount;
  totalBorrowed: Amount;
  totalCollateral: Amount;
  accLpFeesPerShare: Amount;
  accLiquidatorFeesPerScore: Amount;
  totalLiquidatorScore: Amount;
  buybackPool: Amount;
  protocolFees: Amount;
  lastBuybackBlock: BlockHeight;
  /** native balance held by the protocol */
  nativeBalance: Amount;

  totalVolume: Amount;
  totalTrades: number;
  totalFeesCollected: Amount;
  totalLpFees: Amount;
  totalLiquidatorFees: Amount;
  totalTaoUsedForBuybacks: Amount;
  totalTokensBought: Amount;
  totalBadDebt: Amount;
  orphanedFees: Amount;
}

// ═══════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════

export interface OpenPositionRequest {
  pairId: PairId;
  collateral: Amount;
  leverage: FixedPoint;
  maxSlippage: FixedPoint;
  validatorKey?: ValidatorKey;
}

export interface ClosePositionRequest {
  pairId: PairId;
  /** micro-unit tokens to unwind; 0 closes everything */
  tokenAmount: Amount;
  maxSlippage: FixedPoint;
}

export interface LiquidationRequest {
  user: Address;
  pairId: PairId;
  justification: string;
  contentHash: string;
}

// ═══════════════════════════════════════════════════════════════
// VIEWS
// ═══════════════════════════════════════════════════════════════

export interface PositionView extends Position {
  liveAccruedFees: Amount;
  totalDebt: Amount;
  currentValue: Amount;
  healthRatio: FixedPoint;
  liquidationPrice: FixedPoint;
  liquidatable: boolean;
}

export interface ProtocolStats {
  totalCollateral: Amount;
  totalBorrowed: Amount;
  totalVolume: Amount;
  totalTrades: number;
  protocolFees: Amount;
  totalLpStakes: Amount;
  buybackPool: Amount;
  totalFeesCollected: Amount;
  totalLpFees: Amount;
  totalLiquidatorFees: Amount;
  totalTaoUsedForBuybacks: Amount;
  totalTokensBought: Amount;
  totalBadDebt: Amount;
  orphanedFees: Amount;
  nativeBalance: Amount;
  paused: boolean;
}

export interface LiquidityStats {
  totalLpStakes: Amount;
  totalLpShares: Amount;
  totalBorrowed: Amount;
  availableLiquidity: Amount;
  utilizationRate: FixedPoint;
  borrowRate: FixedPoint;
  circuitBreaker: boolean;
}

export interface UserStats {
  totalCollateral: Amount;
  totalBorrowed: Amount;
  totalVolume: Amount;
  tier: number;
  maxLeverage: FixedPoint;
  feeDiscount: FixedPoint;
  isLiquidityProvider: boolean;
}

export interface LpValue {
  stake: Amount;
  shares: Amount;
  pendingRewards: Amount;
  totalValue: Amount;
}
