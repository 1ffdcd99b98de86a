/**
 * FEE ACCOUNTING
 *
 * Accumulator-per-share distribution to LPs and liquidators, the fee
 * split per kind, reward claims and the tier lookup behind fee discounts
 * and leverage caps.
 *
 * Invariant: an LP's shares or a liquidator's score only change after
 * settle*(); the matching sync*Debt() follows the change.
 */

import { ProtocolError } from '../leverage.errors.js';
import { ACC_PRECISION, PRECISION, add, applyRate, minOf, mulDiv, sub, subOrZero } from '../math/fixed-point.js';
import type { ProtocolContext } from '../leverage.context.js';
import type { Address, Amount, FeeDistribution, FeeKind, FixedPoint } from '../leverage.types.js';

export interface FeeSplit {
  lp: Amount;
  liquidator: Amount;
  protocol: Amount;
}

export interface UserTier {
  tier: number;
  feeDiscount: FixedPoint;
  maxLeverage: FixedPoint;
}

export class FeeAccounting {
  constructor(private readonly ctx: ProtocolContext) {}

  // ═══════════════════════════════════════════════════════════════
  // DISTRIBUTION
  // ═══════════════════════════════════════════════════════════════

  split(amount: Amount, distribution: FeeDistribution): FeeSplit {
    const lp = applyRate(amount, distribution.lpShare);
    const liquidator = applyRate(amount, distribution.liquidatorShare);
    const protocol = sub(sub(amount, lp), liquidator);
    return { lp, liquidator, protocol };
  }

  distributeTradingFee(amount: Amount): FeeSplit {
    return this.distribute('TRADING', amount);
  }

  distributeBorrowingFee(amount: Amount): FeeSplit {
    return this.distribute('BORROWING', amount);
  }

  /**
   * The liquidator share is not pooled: it is returned so the caller can
   * pay it straight to the liquidating account.
   */
  distributeLiquidationFee(amount: Amount): FeeSplit {
    const split = this.split(amount, this.ctx.state.params.liquidationFeeDistribution);
    if (amount === 0n) return split;

    const totals = this.ctx.state.totals;
    this.creditLpPool(split.lp);
    this.creditProtocol(split.protocol);
    totals.totalLiquidatorFees = add(totals.totalLiquidatorFees, split.liquidator);
    totals.totalFeesCollected = add(totals.totalFeesCollected, amount);

    this.ctx.events.emit('FeesDistributed', { kind: 'LIQUIDATION', amount, ...split });
    return split;
  }

  private distribute(kind: Exclude<FeeKind, 'LIQUIDATION'>, amount: Amount): FeeSplit {
    const params = this.ctx.state.params;
    const distribution = kind === 'TRADING' ? params.tradingFeeDistribution : params.borrowingFeeDistribution;
    const split = this.split(amount, distribution);
    if (amount === 0n) return split;

    const totals = this.ctx.state.totals;
    this.creditLpPool(split.lp);
    this.creditLiquidatorPool(split.liquidator);
    this.creditProtocol(split.protocol);
    totals.totalFeesCollected = add(totals.totalFeesCollected, amount);

    this.ctx.events.emit('FeesDistributed', { kind, amount, ...split });
    return split;
  }

  private creditLpPool(amount: Amount): void {
    if (amount === 0n) return;
    const totals = this.ctx.state.totals;
    if (totals.totalLpStakes === 0n) {
      totals.orphanedFees = add(totals.orphanedFees, amount);
      return;
    }
    totals.accLpFeesPerShare = add(totals.accLpFeesPerShare, mulDiv(amount, ACC_PRECISION, totals.totalLpStakes));
    totals.totalLpFees = add(totals.totalLpFees, amount);
  }

  private creditLiquidatorPool(amount: Amount): void {
    if (amount === 0n) return;
    const totals = this.ctx.state.totals;
    if (totals.totalLiquidatorScore === 0n) {
      totals.orphanedFees = add(totals.orphanedFees, amount);
      return;
    }
    totals.accLiquidatorFeesPerScore = add(
      totals.accLiquidatorFeesPerScore,
      mulDiv(amount, ACC_PRECISION, totals.totalLiquidatorScore),
    );
    totals.totalLiquidatorFees = add(totals.totalLiquidatorFees, amount);
  }

  private creditProtocol(amount: Amount): void {
    if (amount === 0n) return;
    const totals = this.ctx.state.totals;
    totals.protocolFees = add(totals.protocolFees, amount);
    totals.buybackPool = add(totals.buybackPool, amount);
  }

  // ═══════════════════════════════════════════════════════════════
  // LP REWARDS
  // ═══════════════════════════════════════════════════════════════

  pendingLpRewards(address: Address): Amount {
    const lp = this.ctx.state.liquidityProviders.get(address);
    if (!lp) return 0n;
    const accrued = mulDiv(lp.shares, this.ctx.state.totals.accLpFeesPerShare, ACC_PRECISION);
    return subOrZero(accrued, lp.rewardDebt);
  }

  settleLp(address: Address): Amount {
    const lp = this.ctx.state.liquidityProviders.get(address);
    if (!lp) return 0n;
    const pending = this.pendingLpRewards(address);
    if (pending > 0n) {
      const claimable = this.ctx.state.lpClaimable;
      claimable.set(address, add(claimable.get(address) ?? 0n, pending));
    }
    this.syncLpDebt(address);
    lp.lastRewardBlock = this.ctx.block;
    return pending;
  }

  syncLpDebt(address: Address): void {
    const lp = this.ctx.state.liquidityProviders.get(address);
    if (!lp) return;
    lp.rewardDebt = mulDiv(lp.shares, this.ctx.state.totals.accLpFeesPerShare, ACC_PRECISION);
  }

  async claimLpRewards(address: Address): Promise<Amount> {
    this.settleLp(address);
    const amount = this.ctx.state.lpClaimable.get(address) ?? 0n;
    if (amount === 0n) {
      throw new ProtocolError('NO_REWARDS', 'no LP rewards to claim', { address });
    }
    this.ctx.state.lpClaimable.delete(address);
    await this.ctx.ledger.pay(address, amount);
    this.ctx.events.emit('LpRewardsClaimed', { address, amount });
    return amount;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIQUIDATOR REWARDS
  // ═══════════════════════════════════════════════════════════════

  pendingLiquidatorRewards(address: Address): Amount {
    const account = this.ctx.state.liquidators.get(address);
    if (!account) return 0n;
    const accrued = mulDiv(account.score, this.ctx.state.totals.accLiquidatorFeesPerScore, ACC_PRECISION);
    return subOrZero(accrued, account.rewardDebt);
  }

  settleLiquidator(address: Address): Amount {
    const account = this.ctx.state.liquidators.get(address);
    if (!account) return 0n;
    const pending = this.pendingLiquidatorRewards(address);
    if (pending > 0n) {
      const claimable = this.ctx.state.liquidatorClaimable;
      claimable.set(address, add(claimable.get(address) ?? 0n, pending));
    }
    account.rewardDebt = mulDiv(account.score, this.ctx.state.totals.accLiquidatorFeesPerScore, ACC_PRECISION);
    return pending;
  }

  /** score = cumulative value liquidated */
  addLiquidatorScore(address: Address, value: Amount): void {
    const state = this.ctx.state;
    this.settleLiquidator(address);

    let account = state.liquidators.get(address);
    if (!account) {
      account = { score: 0n, rewardDebt: 0n };
      state.liquidators.set(address, account);
    }
    account.score = add(account.score, value);
    state.totals.totalLiquidatorScore = add(state.totals.totalLiquidatorScore, value);
    account.rewardDebt = mulDiv(account.score, state.totals.accLiquidatorFeesPerScore, ACC_PRECISION);
  }

  async claimLiquidatorRewards(address: Address): Promise<Amount> {
    this.settleLiquidator(address);
    const amount = this.ctx.state.liquidatorClaimable.get(address) ?? 0n;
    if (amount === 0n) {
      throw new ProtocolError('NO_REWARDS', 'no liquidator rewards to claim', { address });
    }
    this.ctx.state.liquidatorClaimable.delete(address);
    await this.ctx.ledger.pay(address, amount);
    this.ctx.events.emit('LiquidatorRewardsClaimed', { address, amount });
    return amount;
  }

  // ═══════════════════════════════════════════════════════════════
  // TIERS
  // ═══════════════════════════════════════════════════════════════

  /** Tier 0..5 from the user's stake on the buyback pair */
  async tierOf(user: Address): Promise<number> {
    const params = this.ctx.state.params;
    const balance = await this.ctx.staking.stakeBalance(params.protocolValidatorHotkey, user, params.buybackPairId);
    for (let i = params.tierThresholds.length - 1; i >= 0; i--) {
      if (balance >= params.tierThresholds[i]) return i + 1;
    }
    return 0;
  }

  async userTier(user: Address): Promise<UserTier> {
    const params = this.ctx.state.params;
    const tier = await this.tierOf(user);
    return {
      tier,
      feeDiscount: params.tierFeeDiscounts[tier],
      maxLeverage: minOf(params.tierMaxLeverages[tier], params.maxLeverage),
    };
  }

  async discountedFee(user: Address, originalFee: Amount): Promise<Amount> {
    if (originalFee === 0n) return 0n;
    const { feeDiscount } = await this.userTier(user);
    return mulDiv(originalFee, sub(PRECISION, feeDiscount), PRECISION);
  }
}
