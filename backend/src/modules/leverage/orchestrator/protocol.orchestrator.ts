/**
 * LEVERAGE PROTOCOL — Orchestrator
 *
 * External entry points over the shared ledger. Every mutating call:
 *   1. queues behind the running one (single writer, reentrancy rejected)
 *   2. passes admission: pause → permissions → circuit breaker → cooldown
 *   3. runs against the live state with a journaled gateway
 *   4. commits (breaker re-check, events published, snapshot persisted)
 *      or restores the pre-call snapshot and compensates external calls
 *
 * Views read the last committed state.
 */

import { createConsoleLogger, type Logger } from '../../../common/logger.js';
import { FeeAccounting } from '../fees/fee.accounting.js';
import { StakingAdapter } from '../gateway/staking.adapter.js';
import { TransactionJournal } from '../gateway/transaction.journal.js';
import type { BlockClock, StakingGateway, ValueTransfer } from '../gateway/staking.gateway.js';
import { NativeLedger } from '../ledger/native.ledger.js';
import { LEVERAGE_CONFIG } from '../leverage.config.js';
import type { ProtocolContext } from '../leverage.context.js';
import { ProtocolError, isProtocolError } from '../leverage.errors.js';
import { LiquidityPool } from '../liquidity/liquidity.pool.js';
import { PRECISION, add } from '../math/fixed-point.js';
import {
  cloneParameters,
  validateActionCooldowns,
  validateBuybackParameters,
  validateFeeDistribution,
  validateFeeParameters,
  validateLiquidityGuardrails,
  validateRateCurve,
  validateRiskParameters,
  validateTierParameters,
  validateValidatorKey,
  validateVestingParameters,
  type FunctionPermissions,
  type ProtocolParameters,
  type RateCurveParameters,
  type RestrictedFunction,
} from '../params/protocol.params.js';
import { PositionEngine, type CloseResult, type LiquidationResult, type OpenResult } from '../positions/position.engine.js';
import { BuybackEngine, claimableAmount, vestedAmount, type BuybackPlan, type BuybackResult } from '../buyback/buyback.engine.js';
import { EventBuffer, type ProtocolEvent } from '../protocol.events.js';
import { healthRatio, isLiquidatable, liquidationPrice } from '../risk/risk.model.js';
import { cloneState, createProtocolState, positionKey, userAccount, type ProtocolState } from '../state/protocol.state.js';
import type { ProtocolStore } from '../storage/protocol.store.js';
import type {
  Address,
  Amount,
  ClosePositionRequest,
  FeeDistribution,
  FixedPoint,
  LiquidationRequest,
  LiquidityStats,
  LpValue,
  OpenPositionRequest,
  Pair,
  PairId,
  Position,
  PositionView,
  ProtocolStats,
  UserStats,
  ValidatorKey,
  VestingSchedule,
} from '../leverage.types.js';
import type { DepositResult, WithdrawResult } from '../liquidity/liquidity.pool.js';
import { SerialExecutor } from './serial.executor.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface LeverageProtocolDeps {
  state: ProtocolState;
  gateway: StakingGateway;
  transfers: ValueTransfer;
  clock: BlockClock;
  store?: ProtocolStore;
  logger?: Logger;
}

export interface CreateProtocolOptions extends Omit<LeverageProtocolDeps, 'state'> {
  owner: Address;
  params: ProtocolParameters;
}

type EntryKind = 'position' | 'liquidity' | 'liquidation' | 'claim' | 'buyback' | 'admin';

interface EntryPoint {
  name: string;
  kind: EntryKind;
  permission?: RestrictedFunction;
  cooldown?: 'position' | 'lp';
  /** rejected while the liquidity circuit breaker is active */
  blockedByBreaker?: boolean;
  /** re-evaluate the breaker before commit */
  checkBreaker?: boolean;
}

interface Services {
  ctx: ProtocolContext;
  fees: FeeAccounting;
  pool: LiquidityPool;
  positions: PositionEngine;
  buyback: BuybackEngine;
}

export interface VestingScheduleView extends VestingSchedule {
  index: number;
  vested: Amount;
  claimable: Amount;
}

export interface FeeDistributionsUpdate {
  trading: FeeDistribution;
  borrowing: FeeDistribution;
  liquidation: FeeDistribution;
}

export interface TierParametersUpdate {
  thresholds: Amount[];
  discounts: FixedPoint[];
  leverages: FixedPoint[];
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export class LeverageProtocol {
  private state: ProtocolState;
  /** pre-call state while a mutating call is in flight */
  private committed: ProtocolState | null = null;

  private readonly gateway: StakingGateway;
  private readonly transfers: ValueTransfer;
  private readonly clock: BlockClock;
  private readonly store?: ProtocolStore;
  private readonly logger: Logger;
  private readonly executor = new SerialExecutor();
  private readonly recentEvents: ProtocolEvent[] = [];

  constructor(deps: LeverageProtocolDeps) {
    this.state = deps.state;
    this.gateway = deps.gateway;
    this.transfers = deps.transfers;
    this.clock = deps.clock;
    this.store = deps.store;
    this.logger = deps.logger ?? createConsoleLogger('Leverage');
  }

  /** Restores the latest stored snapshot, or starts a fresh ledger */
  static async create(options: CreateProtocolOptions): Promise<LeverageProtocol> {
    const restored = options.store ? await options.store.loadLatest() : null;
    const state = restored ?? createProtocolState(options.owner, options.params, options.clock.currentBlock());
    return new LeverageProtocol({ ...options, state });
  }

  // ═══════════════════════════════════════════════════════════════
  // POSITIONS
  // ═══════════════════════════════════════════════════════════════

  openPosition(caller: Address, req: OpenPositionRequest): Promise<OpenResult> {
    return this.execute(
      caller,
      {
        name: 'openPosition',
        kind: 'position',
        permission: 'openPosition',
        cooldown: 'position',
        blockedByBreaker: true,
        checkBreaker: true,
      },
      ({ positions }) => positions.open(caller, req),
    );
  }

  closePosition(caller: Address, req: ClosePositionRequest): Promise<CloseResult> {
    return this.execute(
      caller,
      { name: 'closePosition', kind: 'position', permission: 'closePosition', cooldown: 'position', checkBreaker: true },
      ({ positions }) => positions.close(caller, req),
    );
  }

  addCollateral(caller: Address, pairId: PairId, amount: Amount): Promise<Position> {
    return this.execute(
      caller,
      { name: 'addCollateral', kind: 'position', cooldown: 'position', checkBreaker: true },
      ({ positions }) => positions.addCollateral(caller, pairId, amount),
    );
  }

  liquidatePosition(caller: Address, req: LiquidationRequest): Promise<LiquidationResult> {
    return this.execute(
      caller,
      { name: 'liquidatePosition', kind: 'liquidation', permission: 'liquidatePosition', checkBreaker: true },
      ({ positions }) => positions.liquidate(caller, req),
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // LIQUIDITY & REWARDS
  // ═══════════════════════════════════════════════════════════════

  addLiquidity(caller: Address, amount: Amount, validatorKey?: ValidatorKey): Promise<DepositResult> {
    return this.execute(
      caller,
      { name: 'addLiquidity', kind: 'liquidity', cooldown: 'lp', checkBreaker: true },
      ({ pool, positions, ctx }) => {
        const result = pool.deposit(caller, amount, validatorKey ?? ctx.state.params.protocolValidatorHotkey);
        positions.repriceBorrowing();
        return result;
      },
    );
  }

  removeLiquidity(caller: Address, amount: Amount): Promise<WithdrawResult> {
    return this.execute(
      caller,
      { name: 'removeLiquidity', kind: 'liquidity', cooldown: 'lp', checkBreaker: true },
      async ({ pool, positions }) => {
        const result = await pool.withdraw(caller, amount);
        positions.repriceBorrowing();
        return result;
      },
    );
  }

  claimLpRewards(caller: Address): Promise<Amount> {
    return this.execute(caller, { name: 'claimLpRewards', kind: 'claim' }, ({ fees }) => fees.claimLpRewards(caller));
  }

  claimLiquidatorRewards(caller: Address): Promise<Amount> {
    return this.execute(caller, { name: 'claimLiquidatorRewards', kind: 'claim' }, ({ fees }) =>
      fees.claimLiquidatorRewards(caller),
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // BUYBACK & VESTING
  // ═══════════════════════════════════════════════════════════════

  executeBuyback(caller: Address): Promise<BuybackResult> {
    return this.execute(caller, { name: 'executeBuyback', kind: 'buyback' }, ({ buyback }) => buyback.execute());
  }

  /** Beneficiary is the caller; tokens go to `destination` (default: caller) */
  claimVested(caller: Address, destination?: Address): Promise<Amount> {
    return this.execute(caller, { name: 'claimVested', kind: 'claim' }, ({ buyback }) =>
      buyback.claimVested(caller, destination ?? caller),
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // ADMIN
  // ═══════════════════════════════════════════════════════════════

  updateRiskParameters(caller: Address, maxLeverage: FixedPoint, liquidationThreshold: FixedPoint): Promise<void> {
    return this.admin(caller, 'updateRiskParameters', ({ params }) => {
      validateRiskParameters(maxLeverage, liquidationThreshold);
      params.maxLeverage = maxLeverage;
      params.liquidationThreshold = liquidationThreshold;
      return { maxLeverage, liquidationThreshold };
    });
  }

  updateLiquidityGuardrails(
    caller: Address,
    minLiquidityThreshold: Amount,
    maxUtilizationRate: FixedPoint,
    liquidityBufferRatio: FixedPoint,
  ): Promise<void> {
    return this.admin(caller, 'updateLiquidityGuardrails', ({ params }) => {
      validateLiquidityGuardrails(minLiquidityThreshold, maxUtilizationRate, liquidityBufferRatio);
      params.minLiquidityThreshold = minLiquidityThreshold;
      params.maxUtilizationRate = maxUtilizationRate;
      params.liquidityBufferRatio = liquidityBufferRatio;
      return { minLiquidityThreshold, maxUtilizationRate, liquidityBufferRatio };
    });
  }

  updateActionCooldowns(caller: Address, userBlocks: number, lpBlocks: number): Promise<void> {
    return this.admin(caller, 'updateActionCooldowns', ({ params }) => {
      validateActionCooldowns(userBlocks, lpBlocks);
      params.userActionCooldownBlocks = userBlocks;
      params.lpActionCooldownBlocks = lpBlocks;
      return { userBlocks, lpBlocks };
    });
  }

  updateBuybackParameters(caller: Address, rate: FixedPoint, intervalBlocks: number, threshold: Amount): Promise<void> {
    return this.admin(caller, 'updateBuybackParameters', ({ params }) => {
      validateBuybackParameters(rate, intervalBlocks, threshold);
      params.buybackRate = rate;
      params.buybackIntervalBlocks = intervalBlocks;
      params.buybackExecutionThreshold = threshold;
      return { rate, intervalBlocks, threshold };
    });
  }

  updateVestingParameters(caller: Address, durationBlocks: number, cliffBlocks: number): Promise<void> {
    return this.admin(caller, 'updateVestingParameters', ({ params }) => {
      validateVestingParameters(durationBlocks, cliffBlocks);
      params.vestingDurationBlocks = durationBlocks;
      params.cliffDurationBlocks = cliffBlocks;
      return { durationBlocks, cliffBlocks };
    });
  }

  updateFeeParameters(caller: Address, trading: FixedPoint, borrowing: FixedPoint, liquidation: FixedPoint): Promise<void> {
    return this.admin(caller, 'updateFeeParameters', ({ params }, { positions }) => {
      validateFeeParameters(trading, borrowing, liquidation);
      validateRateCurve(borrowing, params.rateCurve);
      params.tradingFeeRate = trading;
      params.borrowingFeeRate = borrowing;
      params.liquidationFeeRate = liquidation;
      positions.repriceBorrowing();
      return { trading, borrowing, liquidation };
    });
  }

  updateFeeDistributions(caller: Address, update: FeeDistributionsUpdate): Promise<void> {
    return this.admin(caller, 'updateFeeDistributions', ({ params }) => {
      validateFeeDistribution('trading', update.trading);
      validateFeeDistribution('borrowing', update.borrowing);
      validateFeeDistribution('liquidation', update.liquidation);
      params.tradingFeeDistribution = { ...update.trading };
      params.borrowingFeeDistribution = { ...update.borrowing };
      params.liquidationFeeDistribution = { ...update.liquidation };
      return { ...update };
    });
  }

  updateTierParameters(caller: Address, update: TierParametersUpdate): Promise<void> {
    return this.admin(caller, 'updateTierParameters', ({ params }) => {
      validateTierParameters(update.thresholds, update.discounts, update.leverages, params.maxLeverage);
      params.tierThresholds = [...update.thresholds];
      params.tierFeeDiscounts = [...update.discounts];
      params.tierMaxLeverages = [...update.leverages];
      return { ...update };
    });
  }

  updateRateModel(caller: Address, curve: RateCurveParameters): Promise<void> {
    return this.admin(caller, 'updateRateModel', ({ params }, services) => {
      validateRateCurve(params.borrowingFeeRate, curve);
      params.rateCurve = { ...curve };
      services.positions.repriceBorrowing();
      return { ...curve };
    });
  }

  updateProtocolValidatorHotkey(caller: Address, hotkey: ValidatorKey): Promise<void> {
    return this.admin(caller, 'updateProtocolValidatorHotkey', ({ params }) => {
      validateValidatorKey(hotkey);
      params.protocolValidatorHotkey = hotkey;
      return { hotkey };
    });
  }

  updateTreasury(caller: Address, treasury: Address): Promise<void> {
    return this.admin(caller, 'updateTreasury', ({ params }) => {
      if (!treasury) throw new ProtocolError('INVALID_PARAMETER', 'treasury must be set');
      params.treasury = treasury;
      return { treasury };
    });
  }

  updateFunctionPermissions(caller: Address, permissions: FunctionPermissions): Promise<void> {
    return this.admin(caller, 'updateFunctionPermissions', ({ params }) => {
      params.functionPermissions = { ...permissions };
      return { ...permissions };
    });
  }

  setPermittedCaller(caller: Address, account: Address, allowed: boolean): Promise<void> {
    return this.admin(caller, 'setPermittedCaller', (state) => {
      if (allowed) state.permittedCallers.add(account);
      else state.permittedCallers.delete(account);
      return { account, allowed };
    });
  }

  setMaxLiquidityProvidersPerHotkey(caller: Address, limit: number): Promise<void> {
    return this.admin(caller, 'setMaxLiquidityProvidersPerHotkey', ({ params }) => {
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ProtocolError('INVALID_PARAMETER', 'maxLiquidityProvidersPerHotkey must be >= 1', { limit });
      }
      params.maxLiquidityProvidersPerHotkey = limit;
      return { limit };
    });
  }

  registerPair(caller: Address, pairId: PairId, maxLeverage: FixedPoint): Promise<Pair> {
    return this.execute(caller, { name: 'registerPair', kind: 'admin' }, ({ ctx, pool }) => {
      const { state } = ctx;
      if (!Number.isInteger(pairId) || pairId < 0) {
        throw new ProtocolError('INVALID_PARAMETER', 'pairId must be a non-negative integer', { pairId });
      }
      if (state.pairs.has(pairId)) throw new ProtocolError('PAIR_EXISTS', `pair ${pairId} already registered`);
      validatePairLeverage(maxLeverage, state.params.maxLeverage);

      const pair: Pair = {
        pairId,
        totalCollateral: 0n,
        totalBorrowed: 0n,
        utilizationRate: 0n,
        borrowingRate: 0n,
        maxLeverage,
        isActive: true,
      };
      pool.refreshPairRate(pair);
      state.pairs.set(pairId, pair);
      ctx.events.emit('PairRegistered', { ...pair });
      return { ...pair };
    });
  }

  updatePair(caller: Address, pairId: PairId, update: { isActive?: boolean; maxLeverage?: FixedPoint }): Promise<Pair> {
    return this.execute(caller, { name: 'updatePair', kind: 'admin' }, ({ ctx }) => {
      const pair = ctx.state.pairs.get(pairId);
      if (!pair) throw new ProtocolError('PAIR_NOT_FOUND', `pair ${pairId} is not registered`);
      if (update.maxLeverage !== undefined) {
        validatePairLeverage(update.maxLeverage, ctx.state.params.maxLeverage);
        pair.maxLeverage = update.maxLeverage;
      }
      if (update.isActive !== undefined) pair.isActive = update.isActive;
      ctx.events.emit('PairUpdated', { pairId, maxLeverage: pair.maxLeverage, isActive: pair.isActive });
      return { ...pair };
    });
  }

  setPairActive(caller: Address, pairId: PairId, active: boolean): Promise<Pair> {
    return this.updatePair(caller, pairId, { isActive: active });
  }

  /** Toggles the pause flag; returns the new value */
  emergencyPause(caller: Address): Promise<boolean> {
    return this.execute(caller, { name: 'emergencyPause', kind: 'admin' }, ({ ctx }) => {
      ctx.state.paused = !ctx.state.paused;
      ctx.events.emit('EmergencyPauseToggled', { paused: ctx.state.paused });
      return ctx.state.paused;
    });
  }

  resetLiquidityCircuitBreaker(caller: Address, active: boolean): Promise<void> {
    return this.admin(caller, 'resetLiquidityCircuitBreaker', (state, { ctx }) => {
      state.liquidityCircuitBreaker = active;
      ctx.events.emit('CircuitBreakerChanged', { active, manual: true });
      return { active };
    });
  }

  revokeVestingSchedule(caller: Address, beneficiary: Address, index: number): Promise<VestingSchedule> {
    return this.execute(caller, { name: 'revokeVestingSchedule', kind: 'admin' }, ({ buyback }) =>
      buyback.revokeSchedule(beneficiary, index),
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // VIEWS
  // ═══════════════════════════════════════════════════════════════

  get owner(): Address {
    return this.readState().owner;
  }

  isPaused(): boolean {
    return this.readState().paused;
  }

  getParameters(): ProtocolParameters {
    return cloneParameters(this.readState().params);
  }

  getPair(pairId: PairId): Pair | null {
    const pair = this.readState().pairs.get(pairId);
    return pair ? { ...pair } : null;
  }

  async getPosition(user: Address, pairId: PairId): Promise<PositionView | null> {
    const services = this.readServices();
    const { state, staking } = services.ctx;
    const position = state.positions.get(positionKey(user, pairId));
    const pair = state.pairs.get(pairId);
    if (!position || !pair) return null;

    const liveAccruedFees = add(position.accruedFees, services.positions.pendingInterest(position, pair));
    const totalDebt = add(position.borrowed, liveAccruedFees);
    const currentValue = position.isActive ? await staking.quoteSell(pairId, position.tokenAmount) : 0n;
    const threshold = state.params.liquidationThreshold;

    return {
      ...position,
      liveAccruedFees,
      totalDebt,
      currentValue,
      healthRatio: healthRatio(currentValue, totalDebt),
      liquidationPrice: liquidationPrice(position.borrowed, liveAccruedFees, position.tokenAmount, threshold),
      liquidatable: position.isActive && isLiquidatable(currentValue, totalDebt, threshold),
    };
  }

  getProtocolStats(): ProtocolStats {
    const state = this.readState();
    const t = state.totals;
    return {
      totalCollateral: t.totalCollateral,
      totalBorrowed: t.totalBorrowed,
      totalVolume: t.totalVolume,
      totalTrades: t.totalTrades,
      protocolFees: t.protocolFees,
      totalLpStakes: t.totalLpStakes,
      buybackPool: t.buybackPool,
      totalFeesCollected: t.totalFeesCollected,
      totalLpFees: t.totalLpFees,
      totalLiquidatorFees: t.totalLiquidatorFees,
      totalTaoUsedForBuybacks: t.totalTaoUsedForBuybacks,
      totalTokensBought: t.totalTokensBought,
      totalBadDebt: t.totalBadDebt,
      orphanedFees: t.orphanedFees,
      nativeBalance: t.nativeBalance,
      paused: state.paused,
    };
  }

  getLiquidityStats(): LiquidityStats {
    const { ctx, pool } = this.readServices();
    const t = ctx.state.totals;
    return {
      totalLpStakes: t.totalLpStakes,
      totalLpShares: t.totalLpShares,
      totalBorrowed: t.totalBorrowed,
      availableLiquidity: pool.availableLiquidity(),
      utilizationRate: pool.utilization(),
      borrowRate: pool.currentBorrowRate(),
      circuitBreaker: ctx.state.liquidityCircuitBreaker,
    };
  }

  getBorrowRate(): FixedPoint {
    return this.readServices().pool.currentBorrowRate();
  }

  async getUserStats(user: Address): Promise<UserStats> {
    const { ctx, fees } = this.readServices();
    const account = ctx.state.users.get(user);
    const tier = await fees.userTier(user);
    return {
      totalCollateral: account?.totalCollateral ?? 0n,
      totalBorrowed: account?.totalBorrowed ?? 0n,
      totalVolume: account?.totalVolume ?? 0n,
      tier: tier.tier,
      maxLeverage: tier.maxLeverage,
      feeDiscount: tier.feeDiscount,
      isLiquidityProvider: ctx.state.liquidityProviders.get(user)?.isActive ?? false,
    };
  }

  calculateLpValue(address: Address): LpValue {
    const { ctx, fees } = this.readServices();
    const lp = ctx.state.liquidityProviders.get(address);
    const stake = lp?.stake ?? 0n;
    const pendingRewards = add(ctx.state.lpClaimable.get(address) ?? 0n, fees.pendingLpRewards(address));
    return {
      stake,
      shares: lp?.shares ?? 0n,
      pendingRewards,
      totalValue: add(stake, pendingRewards),
    };
  }

  getVestingSchedules(beneficiary: Address): VestingScheduleView[] {
    const block = this.clock.currentBlock();
    const schedules = this.readState().vestingSchedules.get(beneficiary) ?? [];
    return schedules.map((schedule, index) => ({
      ...schedule,
      index,
      vested: vestedAmount(schedule, block),
      claimable: claimableAmount(schedule, block),
    }));
  }

  getBuybackPlan(): BuybackPlan {
    return this.readServices().buyback.plan();
  }

  /** Newest last */
  getRecentEvents(limit = 100): ProtocolEvent[] {
    if (limit <= 0) return [];
    return this.recentEvents.slice(-limit);
  }

  // ═══════════════════════════════════════════════════════════════
  // EXECUTION
  // ═══════════════════════════════════════════════════════════════

  private admin(
    caller: Address,
    name: string,
    apply: (state: ProtocolState, services: Services) => Record<string, unknown>,
  ): Promise<void> {
    return this.execute(caller, { name, kind: 'admin' }, (services) => {
      const state = services.ctx.state;
      const values = apply(state, services);
      services.ctx.events.emit('ParametersUpdated', { setter: name, ...values });
    });
  }

  private execute<T>(caller: Address, entry: EntryPoint, run: (services: Services) => Promise<T> | T): Promise<T> {
    return this.executor.run(entry.name, async () => {
      const block = this.clock.currentBlock();
      try {
        this.admit(caller, entry, block);
      } catch (err) {
        this.logRejection(entry.name, caller, err);
        throw err;
      }

      const snapshot = cloneState(this.state);
      this.committed = snapshot;
      const journal = new TransactionJournal(this.gateway, this.transfers);
      const events = new EventBuffer(block);
      const services = this.services(this.state, journal.gateway, journal.transfers, events, block);

      let result: T;
      try {
        result = await run(services);
        this.touchCooldown(caller, entry, block);
        if (entry.checkBreaker) services.pool.circuitBreakerCheck();
      } catch (err) {
        this.state = snapshot;
        this.committed = null;
        await journal.compensate(this.logger);
        this.logRejection(entry.name, caller, err);
        throw err;
      }
      this.committed = null;

      const published = events.drain();
      this.publish(published);
      this.logger.info(
        { op: entry.name, caller, block, events: published.map((e) => e.type) },
        `${entry.name} committed`,
      );
      await this.persist(block, published);
      return result;
    });
  }

  private admit(caller: Address, entry: EntryPoint, block: number): void {
    const state = this.state;
    const params = state.params;

    if (!caller) throw new ProtocolError('UNAUTHORIZED', 'caller address is required');

    if (state.paused && entry.kind !== 'admin' && entry.kind !== 'claim') {
      throw new ProtocolError('PAUSED', 'protocol is paused', { op: entry.name });
    }

    if (entry.kind === 'admin' && caller !== state.owner) {
      throw new ProtocolError('UNAUTHORIZED', `${entry.name} is restricted to the owner`, { caller });
    }
    if (entry.permission && params.functionPermissions[entry.permission] && !state.permittedCallers.has(caller)) {
      throw new ProtocolError('FUNCTION_RESTRICTED', `${entry.name} is restricted to permitted callers`, { caller });
    }

    if (entry.blockedByBreaker && state.liquidityCircuitBreaker) {
      throw new ProtocolError('CIRCUIT_BREAKER_ACTIVE', 'liquidity circuit breaker is active', { op: entry.name });
    }

    if (entry.cooldown) {
      const account = state.users.get(caller);
      const last = entry.cooldown === 'position' ? account?.lastPositionActionBlock : account?.lastLpActionBlock;
      const cooldown = entry.cooldown === 'position' ? params.userActionCooldownBlocks : params.lpActionCooldownBlocks;
      if (last !== undefined && block - last < cooldown) {
        throw new ProtocolError('COOLDOWN_ACTIVE', `${entry.name} is cooling down`, {
          readyAtBlock: last + cooldown,
        });
      }
    }
  }

  private touchCooldown(caller: Address, entry: EntryPoint, block: number): void {
    if (!entry.cooldown) return;
    const account = userAccount(this.state, caller);
    if (entry.cooldown === 'position') account.lastPositionActionBlock = block;
    else account.lastLpActionBlock = block;
  }

  private services(
    state: ProtocolState,
    gateway: StakingGateway,
    transfers: ValueTransfer,
    events: EventBuffer,
    block: number,
  ): Services {
    const ctx: ProtocolContext = {
      state,
      staking: new StakingAdapter(gateway),
      ledger: new NativeLedger(state, transfers),
      events,
      logger: this.logger,
      block,
    };
    const fees = new FeeAccounting(ctx);
    const pool = new LiquidityPool(ctx, fees);
    return {
      ctx,
      fees,
      pool,
      positions: new PositionEngine(ctx, fees, pool),
      buyback: new BuybackEngine(ctx),
    };
  }

  /** Services bound to the committed state; nothing they emit is kept */
  private readServices(): Services {
    const block = this.clock.currentBlock();
    return this.services(this.readState(), this.gateway, this.transfers, new EventBuffer(block), block);
  }

  private readState(): ProtocolState {
    return this.committed ?? this.state;
  }

  private publish(events: ProtocolEvent[]): void {
    this.recentEvents.push(...events);
    const overflow = this.recentEvents.length - LEVERAGE_CONFIG.eventTailSize;
    if (overflow > 0) this.recentEvents.splice(0, overflow);
  }

  private async persist(block: number, events: ProtocolEvent[]): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.saveSnapshot(this.state, block);
      await this.store.appendEvents(events);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ block, store: this.store.kind, err: message }, 'Failed to persist committed call');
    }
  }

  private logRejection(op: string, caller: Address, err: unknown): void {
    if (isProtocolError(err)) {
      this.logger.warn({ op, caller, code: err.code, kind: err.kind }, `${op} rejected: ${err.message}`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ op, caller, err: message }, `${op} failed`);
    }
  }
}

function validatePairLeverage(maxLeverage: FixedPoint, protocolMax: FixedPoint): void {
  if (maxLeverage < PRECISION || maxLeverage > protocolMax) {
    throw new ProtocolError('LEVERAGE_OUT_OF_RANGE', 'pair maxLeverage must be within [1x, protocol maxLeverage]', {
      maxLeverage,
      max: protocolMax,
    });
  }
}
