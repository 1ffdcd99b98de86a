/**
 * LIQUIDITY POOL
 *
 * Pooled base asset that positions borrow from. Shares are issued 1:1
 * with stake; rewards are settled before any share change.
 */

import { ProtocolError } from '../leverage.errors.js';
import { validateValidatorKey } from '../params/protocol.params.js';
import { add, mulDiv, sub, subOrZero } from '../math/fixed-point.js';
import { borrowRatePer360Blocks, utilizationRate, type RateCurve } from '../risk/risk.model.js';
import type { ProtocolContext } from '../leverage.context.js';
import type { Address, Amount, FixedPoint, LiquidityProvider, Pair, ValidatorKey } from '../leverage.types.js';
import type { FeeAccounting } from '../fees/fee.accounting.js';

export interface DepositResult {
  shares: Amount;
  stake: Amount;
}

export interface WithdrawResult {
  amount: Amount;
  sharesBurned: Amount;
}

export class LiquidityPool {
  constructor(
    private readonly ctx: ProtocolContext,
    private readonly fees: FeeAccounting,
  ) {}

  // ═══════════════════════════════════════════════════════════════
  // POOL METRICS
  // ═══════════════════════════════════════════════════════════════

  availableLiquidity(): Amount {
    const totals = this.ctx.state.totals;
    return subOrZero(totals.totalLpStakes, totals.totalBorrowed);
  }

  utilization(): FixedPoint {
    const totals = this.ctx.state.totals;
    return utilizationRate(totals.totalBorrowed, totals.totalLpStakes);
  }

  rateCurve(): RateCurve {
    const params = this.ctx.state.params;
    return { baseRate: params.borrowingFeeRate, ...params.rateCurve };
  }

  currentBorrowRate(): FixedPoint {
    return borrowRatePer360Blocks(this.utilization(), this.rateCurve());
  }

  /** Snapshots utilization and the applicable rate on the pair */
  refreshPairRate(pair: Pair): void {
    pair.utilizationRate = this.utilization();
    pair.borrowingRate = this.currentBorrowRate();
  }

  // ═══════════════════════════════════════════════════════════════
  // DEPOSIT / WITHDRAW
  // ═══════════════════════════════════════════════════════════════

  deposit(address: Address, amount: Amount, validatorKey: ValidatorKey): DepositResult {
    const { state } = this.ctx;
    const params = state.params;

    if (amount === 0n) throw new ProtocolError('AMOUNT_ZERO', 'deposit amount is zero');
    if (amount < params.minLiquidityDeposit) {
      throw new ProtocolError('AMOUNT_BELOW_MINIMUM', 'deposit below minimum', {
        amount,
        minimum: params.minLiquidityDeposit,
      });
    }
    validateValidatorKey(validatorKey);

    let lp = state.liquidityProviders.get(address);
    const joining = !lp || !lp.isActive;

    if (lp && lp.isActive && lp.validatorKey !== validatorKey) {
      throw new ProtocolError('INVALID_VALIDATOR_KEY', 'LP is already associated with another validator key', {
        current: lp.validatorKey,
      });
    }
    if (joining && (state.hotkeyLpCount.get(validatorKey) ?? 0) >= params.maxLiquidityProvidersPerHotkey) {
      throw new ProtocolError('HOTKEY_LP_LIMIT', 'validator key has reached its LP limit', { validatorKey });
    }

    if (!lp) {
      lp = newProvider(address, validatorKey, this.ctx.block);
      state.liquidityProviders.set(address, lp);
    } else {
      this.fees.settleLp(address);
    }

    const totals = state.totals;
    const shares = totals.totalLpShares === 0n ? amount : mulDiv(amount, totals.totalLpShares, totals.totalLpStakes);

    this.ctx.ledger.receive(amount);
    lp.stake = add(lp.stake, amount);
    lp.shares = add(lp.shares, shares);
    lp.lastRewardBlock = this.ctx.block;
    totals.totalLpStakes = add(totals.totalLpStakes, amount);
    totals.totalLpShares = add(totals.totalLpShares, shares);

    if (joining) {
      lp.isActive = true;
      lp.validatorKey = validatorKey;
      state.hotkeyLpCount.set(validatorKey, (state.hotkeyLpCount.get(validatorKey) ?? 0) + 1);
    }
    this.fees.syncLpDebt(address);

    this.ctx.events.emit('LiquidityAdded', { address, amount, shares, validatorKey });
    return { shares, stake: lp.stake };
  }

  /** amount 0 withdraws the whole stake */
  async withdraw(address: Address, amount: Amount): Promise<WithdrawResult> {
    const { state } = this.ctx;
    const lp = state.liquidityProviders.get(address);
    if (!lp || !lp.isActive) {
      throw new ProtocolError('LP_NOT_FOUND', 'no active liquidity position', { address });
    }

    const requested = amount === 0n ? lp.stake : amount;
    if (requested === 0n) throw new ProtocolError('AMOUNT_ZERO', 'nothing to withdraw');
    if (requested > lp.stake) {
      throw new ProtocolError('INSUFFICIENT_STAKE', 'withdrawal exceeds stake', { stake: lp.stake, requested });
    }

    const totals = state.totals;
    const remainingStakes = sub(totals.totalLpStakes, requested);
    if (totals.totalBorrowed > 0n) {
      const exceeded =
        remainingStakes === 0n ||
        utilizationRate(totals.totalBorrowed, remainingStakes) > state.params.maxUtilizationRate;
      if (exceeded) {
        throw new ProtocolError('UTILIZATION_EXCEEDED', 'withdrawal would push utilization over the cap', {
          totalBorrowed: totals.totalBorrowed,
          remainingStakes,
        });
      }
    }

    this.fees.settleLp(address);

    const sharesBurned = requested === lp.stake ? lp.shares : mulDiv(requested, lp.shares, lp.stake);
    lp.stake = sub(lp.stake, requested);
    lp.shares = sub(lp.shares, sharesBurned);
    totals.totalLpStakes = remainingStakes;
    totals.totalLpShares = sub(totals.totalLpShares, sharesBurned);

    if (lp.stake === 0n) {
      lp.isActive = false;
      const count = state.hotkeyLpCount.get(lp.validatorKey) ?? 0;
      if (count <= 1) state.hotkeyLpCount.delete(lp.validatorKey);
      else state.hotkeyLpCount.set(lp.validatorKey, count - 1);
    }
    this.fees.syncLpDebt(address);

    await this.ctx.ledger.pay(address, requested);
    this.ctx.events.emit('LiquidityRemoved', { address, amount: requested, sharesBurned });
    return { amount: requested, sharesBurned };
  }

  // ═══════════════════════════════════════════════════════════════
  // CIRCUIT BREAKER
  // ═══════════════════════════════════════════════════════════════

  /** Recomputes the breaker flag; returns the new value */
  circuitBreakerCheck(): boolean {
    const { state } = this.ctx;
    const params = state.params;
    const tripped =
      state.totals.totalLpStakes < params.minLiquidityThreshold || this.utilization() > params.maxUtilizationRate;

    if (tripped !== state.liquidityCircuitBreaker) {
      state.liquidityCircuitBreaker = tripped;
      this.ctx.events.emit('CircuitBreakerChanged', {
        active: tripped,
        totalLpStakes: state.totals.totalLpStakes,
        utilization: this.utilization(),
      });
    }
    return tripped;
  }
}

function newProvider(address: Address, validatorKey: ValidatorKey, block: number): LiquidityProvider {
  return {
    address,
    stake: 0n,
    shares: 0n,
    rewardDebt: 0n,
    lastRewardBlock: block,
    isActive: false,
    validatorKey,
  };
}
