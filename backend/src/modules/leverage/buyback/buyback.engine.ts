/**
 * BUYBACK ENGINE
 *
 * Spends part of the buyback pool on the buyback pair at a fixed
 * cadence and locks the purchased tokens in a linear vesting schedule
 * for the treasury.
 *
 * Spend fraction = buybackRate × (1 + ramp), ramp = +10% per missed
 * interval, capped at +50%, fraction capped at 100%.
 */

import { LEVERAGE_CONFIG } from '../leverage.config.js';
import { ProtocolError } from '../leverage.errors.js';
import { PRECISION, add, applyRate, minOf, mul, mulDiv, sub } from '../math/fixed-point.js';
import type { ProtocolContext } from '../leverage.context.js';
import type { Address, Amount, BlockHeight, FixedPoint, VestingSchedule } from '../leverage.types.js';

export interface BuybackPlan {
  ready: boolean;
  blocksSinceLast: number;
  missedIntervals: number;
  spendFraction: FixedPoint;
  plannedSpend: Amount;
}

export interface BuybackResult {
  spent: Amount;
  tokensBought: Amount;
  expectedTokens: Amount;
  actualSlippage: FixedPoint;
  schedule: VestingSchedule;
}

// ═══════════════════════════════════════════════════════════════
// VESTING (pure)
// ═══════════════════════════════════════════════════════════════

export function vestedAmount(schedule: VestingSchedule, now: BlockHeight): Amount {
  if (now < schedule.cliffBlock) return 0n;
  if (now >= schedule.endBlock) return schedule.totalAmount;
  const elapsed = BigInt(now - schedule.startBlock);
  const duration = BigInt(schedule.endBlock - schedule.startBlock);
  return mulDiv(schedule.totalAmount, elapsed, duration);
}

export function claimableAmount(schedule: VestingSchedule, now: BlockHeight): Amount {
  if (schedule.revoked) return 0n;
  const vested = vestedAmount(schedule, now);
  return vested > schedule.claimedAmount ? vested - schedule.claimedAmount : 0n;
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class BuybackEngine {
  constructor(private readonly ctx: ProtocolContext) {}

  plan(): BuybackPlan {
    const { state, block } = this.ctx;
    const params = state.params;
    const totals = state.totals;

    const blocksSinceLast = Math.max(0, block - totals.lastBuybackBlock);
    const missedIntervals = Math.max(0, Math.floor(blocksSinceLast / params.buybackIntervalBlocks) - 1);
    const ramp = minOf(mul(BigInt(missedIntervals), LEVERAGE_CONFIG.buybackRampStep), LEVERAGE_CONFIG.buybackRampCap);
    const spendFraction = minOf(mulDiv(params.buybackRate, add(PRECISION, ramp), PRECISION), PRECISION);
    const plannedSpend = applyRate(totals.buybackPool, spendFraction);

    const ready =
      blocksSinceLast >= params.buybackIntervalBlocks &&
      totals.buybackPool >= params.buybackExecutionThreshold &&
      plannedSpend > 0n &&
      totals.nativeBalance >= plannedSpend;

    return { ready, blocksSinceLast, missedIntervals, spendFraction, plannedSpend };
  }

  canExecute(): boolean {
    return this.plan().ready;
  }

  async execute(): Promise<BuybackResult> {
    const { state, staking, block } = this.ctx;
    const params = state.params;
    const totals = state.totals;

    const plan = this.plan();
    if (!plan.ready) {
      throw new ProtocolError('BUYBACK_NOT_READY', 'buyback interval, pool threshold or balance not met', {
        blocksSinceLast: plan.blocksSinceLast,
        buybackPool: totals.buybackPool,
        plannedSpend: plan.plannedSpend,
      });
    }

    const expectedTokens = await staking.quoteBuy(params.buybackPairId, plan.plannedSpend);
    const { tokensReceived, spent } = await staking.stake(
      params.protocolValidatorHotkey,
      params.buybackPairId,
      plan.plannedSpend,
    );
    this.ctx.ledger.spend(spent);

    const actualSlippage =
      expectedTokens > 0n && tokensReceived < expectedTokens
        ? mulDiv(expectedTokens - tokensReceived, PRECISION, expectedTokens)
        : 0n;

    totals.buybackPool = sub(totals.buybackPool, spent);
    totals.totalTaoUsedForBuybacks = add(totals.totalTaoUsedForBuybacks, spent);
    totals.totalTokensBought = add(totals.totalTokensBought, tokensReceived);
    totals.lastBuybackBlock = block;

    const schedule: VestingSchedule = {
      totalAmount: tokensReceived,
      claimedAmount: 0n,
      startBlock: block,
      cliffBlock: block + params.cliffDurationBlocks,
      endBlock: block + params.vestingDurationBlocks,
      revoked: false,
    };
    const schedules = state.vestingSchedules.get(params.treasury) ?? [];
    schedules.push(schedule);
    state.vestingSchedules.set(params.treasury, schedules);

    this.ctx.events.emit('BuybackExecuted', {
      spent,
      tokensBought: tokensReceived,
      expectedTokens,
      actualSlippage,
      spendFraction: plan.spendFraction,
      missedIntervals: plan.missedIntervals,
    });
    this.ctx.events.emit('VestingScheduleCreated', {
      beneficiary: params.treasury,
      index: schedules.length - 1,
      ...schedule,
    });

    return { spent, tokensBought: tokensReceived, expectedTokens, actualSlippage, schedule: { ...schedule } };
  }

  /**
   * Claims everything vested across the beneficiary's schedules.
   * Returns 0 when nothing has vested yet.
   */
  async claimVested(beneficiary: Address, destination: Address): Promise<Amount> {
    const { state, staking, block } = this.ctx;
    const schedules = state.vestingSchedules.get(beneficiary) ?? [];
    if (schedules.length === 0) {
      throw new ProtocolError('NO_VESTING_SCHEDULES', 'no vesting schedules for beneficiary', { beneficiary });
    }

    let total = 0n;
    for (const schedule of schedules) {
      const claimable = claimableAmount(schedule, block);
      if (claimable === 0n) continue;
      schedule.claimedAmount = add(schedule.claimedAmount, claimable);
      total = add(total, claimable);
    }
    if (total === 0n) return 0n;

    const params = state.params;
    await staking.transferStake(params.protocolValidatorHotkey, destination, params.buybackPairId, total);
    this.ctx.events.emit('VestedTokensClaimed', { beneficiary, destination, amount: total });
    return total;
  }

  revokeSchedule(beneficiary: Address, index: number): VestingSchedule {
    const schedule = this.ctx.state.vestingSchedules.get(beneficiary)?.[index];
    if (!schedule) {
      throw new ProtocolError('VESTING_SCHEDULE_NOT_FOUND', 'vesting schedule not found', { beneficiary, index });
    }
    schedule.revoked = true;
    this.ctx.events.emit('VestingScheduleRevoked', {
      beneficiary,
      index,
      unvested: sub(schedule.totalAmount, schedule.claimedAmount),
    });
    return { ...schedule };
  }
}
