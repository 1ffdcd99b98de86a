/**
 * POSITION ENGINE
 *
 * Open / close / add-collateral / liquidate over (user, pairId) positions.
 * Absent → Active → Absent; a partial close shrinks the position in place.
 *
 * Every step that moves value is awaited in order and any failure
 * propagates; the orchestrator undoes the whole call.
 */

import { Buffer } from 'node:buffer';
import { LEVERAGE_CONFIG } from '../leverage.config.js';
import { ProtocolError } from '../leverage.errors.js';
import { validateValidatorKey } from '../params/protocol.params.js';
import { PRECISION, add, applyRate, minOf, mulDiv, sub } from '../math/fixed-point.js';
import { accruedBorrowingFee, isLiquidatable } from '../risk/risk.model.js';
import { positionKey, userAccount } from '../state/protocol.state.js';
import type { ProtocolContext } from '../leverage.context.js';
import type { FeeAccounting } from '../fees/fee.accounting.js';
import type { LiquidityPool } from '../liquidity/liquidity.pool.js';
import type {
  Address,
  Amount,
  ClosePositionRequest,
  FixedPoint,
  LiquidationRequest,
  OpenPositionRequest,
  Pair,
  PairId,
  Position,
} from '../leverage.types.js';

export interface OpenResult {
  position: Position;
  tradingFee: Amount;
  tokensReceived: Amount;
}

export interface CloseResult {
  tokensClosed: Amount;
  proceeds: Amount;
  borrowedRepaid: Amount;
  collateralReturned: Amount;
  feesPaid: Amount;
  tradingFee: Amount;
  netReturn: Amount;
  pnl: bigint;
  fullyClosed: boolean;
}

export interface LiquidationResult {
  positionValue: Amount;
  totalDebt: Amount;
  proceeds: Amount;
  debtRepayment: Amount;
  badDebt: Amount;
  liquidationFee: Amount;
  liquidatorPayout: Amount;
  protocolShare: Amount;
  userReturn: Amount;
}

const CONTENT_HASH_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const ZERO_HASH_PATTERN = /^0x0{64}$/;

export class PositionEngine {
  constructor(
    private readonly ctx: ProtocolContext,
    private readonly fees: FeeAccounting,
    private readonly pool: LiquidityPool,
  ) {}

  // ═══════════════════════════════════════════════════════════════
  // OPEN
  // ═══════════════════════════════════════════════════════════════

  async open(user: Address, req: OpenPositionRequest): Promise<OpenResult> {
    const { state, staking } = this.ctx;
    const params = state.params;
    const key = positionKey(user, req.pairId);

    const pair = this.activePair(req.pairId);
    if (state.positions.get(key)?.isActive) {
      throw new ProtocolError('POSITION_EXISTS', 'an active position already exists for this pair', {
        user,
        pairId: req.pairId,
      });
    }
    if (req.collateral === 0n) throw new ProtocolError('AMOUNT_ZERO', 'collateral is zero');
    if (req.collateral < params.minPositionCollateral) {
      throw new ProtocolError('AMOUNT_BELOW_MINIMUM', 'collateral below minimum', {
        collateral: req.collateral,
        minimum: params.minPositionCollateral,
      });
    }
    validateSlippage(req.maxSlippage);

    const validatorKey = req.validatorKey ?? params.protocolValidatorHotkey;
    validateValidatorKey(validatorKey);

    const tier = await this.fees.userTier(user);
    const maxAllowed = minOf(tier.maxLeverage, pair.maxLeverage);
    if (req.leverage < PRECISION || req.leverage > maxAllowed) {
      throw new ProtocolError('LEVERAGE_OUT_OF_RANGE', 'leverage outside the allowed range', {
        leverage: req.leverage,
        maxAllowed,
        tier: tier.tier,
      });
    }

    const borrowed = mulDiv(req.collateral, sub(req.leverage, PRECISION), PRECISION);
    this.ensureBorrowable(borrowed);

    this.ctx.ledger.receive(req.collateral);

    const grossNotional = add(req.collateral, borrowed);
    const tradingFee = await this.fees.discountedFee(user, applyRate(grossNotional, params.tradingFeeRate));
    const net = sub(grossNotional, tradingFee);
    if (net === 0n) throw new ProtocolError('AMOUNT_ZERO', 'nothing left to stake after fees');
    this.fees.distributeTradingFee(tradingFee);

    const expected = await staking.quoteBuy(req.pairId, net);
    const minAcceptable = withSlippage(expected, req.maxSlippage);
    const { tokensReceived, spent } = await staking.stake(validatorKey, req.pairId, net);
    if (tokensReceived < minAcceptable) {
      throw new ProtocolError('SLIPPAGE_TOO_HIGH', 'stake returned fewer tokens than the slippage bound', {
        expected,
        minAcceptable,
        received: tokensReceived,
      });
    }
    if (tokensReceived === 0n) {
      throw new ProtocolError('STAKE_FAILED', 'stake returned no tokens', { pairId: req.pairId });
    }
    this.ctx.ledger.spend(spent);

    const entryPrice = await staking.currentPrice(req.pairId);
    const block = this.ctx.block;
    const position: Position = {
      user,
      pairId: req.pairId,
      collateral: req.collateral,
      borrowed,
      tokenAmount: tokensReceived,
      leverage: req.leverage,
      entryPrice,
      openedAtBlock: block,
      lastUpdateBlock: block,
      accruedFees: 0n,
      isActive: true,
      validatorKey,
    };
    state.positions.set(key, position);

    const totals = state.totals;
    pair.totalCollateral = add(pair.totalCollateral, req.collateral);
    pair.totalBorrowed = add(pair.totalBorrowed, borrowed);
    totals.totalCollateral = add(totals.totalCollateral, req.collateral);
    totals.totalBorrowed = add(totals.totalBorrowed, borrowed);
    totals.totalVolume = add(totals.totalVolume, grossNotional);
    totals.totalTrades += 1;

    const account = userAccount(state, user);
    account.totalCollateral = add(account.totalCollateral, req.collateral);
    account.totalBorrowed = add(account.totalBorrowed, borrowed);
    account.totalVolume = add(account.totalVolume, grossNotional);

    this.repriceBorrowing();

    this.ctx.events.emit('PositionOpened', { ...position, tradingFee, grossNotional });
    return { position: { ...position }, tradingFee, tokensReceived };
  }

  // ═══════════════════════════════════════════════════════════════
  // CLOSE
  // ═══════════════════════════════════════════════════════════════

  async close(user: Address, req: ClosePositionRequest): Promise<CloseResult> {
    const { state, staking } = this.ctx;
    const params = state.params;
    const position = this.activePosition(user, req.pairId);
    const pair = this.pairOf(req.pairId);
    validateSlippage(req.maxSlippage);

    this.accrueInterest(position, pair);

    const tokensClosed = req.tokenAmount === 0n ? position.tokenAmount : req.tokenAmount;
    if (tokensClosed > position.tokenAmount) {
      throw new ProtocolError('AMOUNT_EXCEEDS_POSITION', 'close amount exceeds position tokens', {
        requested: tokensClosed,
        held: position.tokenAmount,
      });
    }
    const fullyClosed = tokensClosed === position.tokenAmount;
    const portion = (value: Amount) => (fullyClosed ? value : mulDiv(value, tokensClosed, position.tokenAmount));

    const borrowedRepaid = portion(position.borrowed);
    const collateralReturned = portion(position.collateral);
    const feesPaid = portion(position.accruedFees);

    const expected = await staking.quoteSell(req.pairId, tokensClosed);
    const minAcceptable = withSlippage(expected, req.maxSlippage);
    const proceeds = await staking.unstake(position.validatorKey, req.pairId, tokensClosed);
    this.ctx.ledger.receive(proceeds);
    if (proceeds < minAcceptable) {
      throw new ProtocolError('SLIPPAGE_TOO_HIGH', 'unstake returned less than the slippage bound', {
        expected,
        minAcceptable,
        received: proceeds,
      });
    }

    const tradingFee = await this.fees.discountedFee(user, applyRate(proceeds, params.tradingFeeRate));
    const totalCosts = add(add(borrowedRepaid, feesPaid), tradingFee);
    if (proceeds < totalCosts) {
      throw new ProtocolError('INSUFFICIENT_PROCEEDS', 'proceeds do not cover debt and fees', {
        proceeds,
        totalCosts,
      });
    }
    const netReturn = sub(proceeds, totalCosts);
    const pnl = proceeds - (borrowedRepaid + feesPaid) - collateralReturned;

    if (fullyClosed) {
      zeroPosition(position);
    } else {
      position.tokenAmount = sub(position.tokenAmount, tokensClosed);
      position.borrowed = sub(position.borrowed, borrowedRepaid);
      position.collateral = sub(position.collateral, collateralReturned);
      position.accruedFees = sub(position.accruedFees, feesPaid);
    }
    this.releaseExposure(user, pair, collateralReturned, borrowedRepaid);

    const totals = state.totals;
    totals.totalVolume = add(totals.totalVolume, proceeds);
    totals.totalTrades += 1;
    const account = userAccount(state, user);
    account.totalVolume = add(account.totalVolume, proceeds);

    this.repriceBorrowing();
    this.fees.distributeTradingFee(tradingFee);
    this.fees.distributeBorrowingFee(feesPaid);

    await this.ctx.ledger.pay(user, netReturn);

    const result: CloseResult = {
      tokensClosed,
      proceeds,
      borrowedRepaid,
      collateralReturned,
      feesPaid,
      tradingFee,
      netReturn,
      pnl,
      fullyClosed,
    };
    this.ctx.events.emit('PositionClosed', { user, pairId: req.pairId, ...result });
    return result;
  }

  // ═══════════════════════════════════════════════════════════════
  // ADD COLLATERAL
  // ═══════════════════════════════════════════════════════════════

  addCollateral(user: Address, pairId: PairId, amount: Amount): Position {
    const { state } = this.ctx;
    const position = this.activePosition(user, pairId);
    const pair = this.pairOf(pairId);
    if (amount === 0n) throw new ProtocolError('AMOUNT_ZERO', 'collateral amount is zero');

    // interest up to now is booked at the old rate before the position changes
    this.accrueInterest(position, pair);

    this.ctx.ledger.receive(amount);
    position.collateral = add(position.collateral, amount);
    pair.totalCollateral = add(pair.totalCollateral, amount);
    state.totals.totalCollateral = add(state.totals.totalCollateral, amount);
    const account = userAccount(state, user);
    account.totalCollateral = add(account.totalCollateral, amount);

    this.ctx.events.emit('CollateralAdded', { user, pairId, amount, collateral: position.collateral });
    return { ...position };
  }

  // ═══════════════════════════════════════════════════════════════
  // LIQUIDATE
  // ═══════════════════════════════════════════════════════════════

  async liquidate(liquidator: Address, req: LiquidationRequest): Promise<LiquidationResult> {
    const { state, staking } = this.ctx;
    const params = state.params;

    const justificationBytes = Buffer.byteLength(req.justification, 'utf8');
    if (justificationBytes === 0 || justificationBytes > params.maxJustificationLength) {
      throw new ProtocolError('INVALID_JUSTIFICATION', 'justification size out of range', {
        bytes: justificationBytes,
        max: params.maxJustificationLength,
      });
    }
    if (!CONTENT_HASH_PATTERN.test(req.contentHash) || ZERO_HASH_PATTERN.test(req.contentHash)) {
      throw new ProtocolError('INVALID_CONTENT_HASH', 'content hash must be a nonzero 32-byte hex string');
    }

    const position = this.activePosition(req.user, req.pairId);
    const pair = this.pairOf(req.pairId);

    const liveFees = add(position.accruedFees, this.pendingInterest(position, pair));
    const positionValue = await staking.quoteSell(req.pairId, position.tokenAmount);
    if (positionValue === 0n) {
      throw new ProtocolError('ZERO_VALUE', 'position has no quoted value', { pairId: req.pairId });
    }
    const totalDebt = add(position.borrowed, liveFees);
    if (!isLiquidatable(positionValue, totalDebt, params.liquidationThreshold)) {
      throw new ProtocolError('NOT_LIQUIDATABLE', 'position health is at or above the threshold', {
        positionValue,
        totalDebt,
      });
    }

    const proceeds = await staking.unstake(position.validatorKey, req.pairId, position.tokenAmount);
    if (proceeds === 0n) {
      throw new ProtocolError('ZERO_PROCEEDS', 'unstake returned nothing', { pairId: req.pairId });
    }
    this.ctx.ledger.receive(proceeds);

    const debtRepayment = minOf(proceeds, totalDebt);
    const principalRepaid = minOf(debtRepayment, position.borrowed);
    const interestRepaid = sub(debtRepayment, principalRepaid);
    const badDebt = sub(totalDebt, debtRepayment);

    const remaining = sub(proceeds, debtRepayment);
    const liquidationFee = applyRate(remaining, params.liquidationFeeRate);
    const split = this.fees.distributeLiquidationFee(liquidationFee);
    const userReturn = sub(remaining, liquidationFee);

    this.fees.distributeBorrowingFee(interestRepaid);

    const collateral = position.collateral;
    const borrowed = position.borrowed;
    zeroPosition(position);
    this.releaseExposure(req.user, pair, collateral, borrowed);
    state.totals.totalBadDebt = add(state.totals.totalBadDebt, badDebt);

    this.fees.addLiquidatorScore(liquidator, positionValue);
    this.repriceBorrowing();

    await this.ctx.ledger.pay(liquidator, split.liquidator);
    await this.ctx.ledger.pay(req.user, userReturn);

    const result: LiquidationResult = {
      positionValue,
      totalDebt,
      proceeds,
      debtRepayment,
      badDebt,
      liquidationFee,
      liquidatorPayout: split.liquidator,
      protocolShare: split.protocol,
      userReturn,
    };
    this.ctx.events.emit('PositionLiquidated', {
      user: req.user,
      pairId: req.pairId,
      liquidator,
      justification: req.justification,
      contentHash: req.contentHash,
      ...result,
    });
    return result;
  }

  // ═══════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════

  /**
   * Books interest on every active position at its pair's snapshotted
   * rate, then re-snapshots utilization and rate on every pair. Called
   * after anything that moves utilization or the rate curve.
   */
  repriceBorrowing(): void {
    const { state } = this.ctx;
    for (const position of state.positions.values()) {
      if (position.isActive) this.accrueInterest(position, this.pairOf(position.pairId));
    }
    for (const pair of state.pairs.values()) this.pool.refreshPairRate(pair);
  }

  /** Borrowing fee accrued since lastUpdateBlock at the pair's snapshotted rate */
  pendingInterest(position: Position, pair: Pair): Amount {
    return accruedBorrowingFee(position.borrowed, pair.borrowingRate, this.ctx.block - position.lastUpdateBlock);
  }

  private accrueInterest(position: Position, pair: Pair): void {
    position.accruedFees = add(position.accruedFees, this.pendingInterest(position, pair));
    position.lastUpdateBlock = this.ctx.block;
  }

  private ensureBorrowable(borrowed: Amount): void {
    const { state } = this.ctx;
    const params = state.params;

    const required = mulDiv(borrowed, add(PRECISION, params.liquidityBufferRatio), PRECISION);
    const available = this.pool.availableLiquidity();
    if (available < required) {
      throw new ProtocolError('INSUFFICIENT_LIQUIDITY', 'not enough pooled liquidity for this borrow', {
        borrowed,
        required,
        available,
      });
    }

    const stakes = state.totals.totalLpStakes;
    const borrowedAfter = add(state.totals.totalBorrowed, borrowed);
    if (borrowed > 0n && mulDiv(borrowedAfter, PRECISION, stakes) > params.maxUtilizationRate) {
      throw new ProtocolError('UTILIZATION_EXCEEDED', 'borrow would push utilization over the cap', {
        borrowedAfter,
        totalLpStakes: stakes,
      });
    }
  }

  private releaseExposure(user: Address, pair: Pair, collateral: Amount, borrowed: Amount): void {
    const { state } = this.ctx;
    pair.totalCollateral = sub(pair.totalCollateral, collateral);
    pair.totalBorrowed = sub(pair.totalBorrowed, borrowed);
    state.totals.totalCollateral = sub(state.totals.totalCollateral, collateral);
    state.totals.totalBorrowed = sub(state.totals.totalBorrowed, borrowed);
    const account = userAccount(state, user);
    account.totalCollateral = sub(account.totalCollateral, collateral);
    account.totalBorrowed = sub(account.totalBorrowed, borrowed);
  }

  private activePair(pairId: PairId): Pair {
    const pair = this.pairOf(pairId);
    if (!pair.isActive) throw new ProtocolError('PAIR_INACTIVE', `pair ${pairId} is not active`);
    return pair;
  }

  private pairOf(pairId: PairId): Pair {
    const pair = this.ctx.state.pairs.get(pairId);
    if (!pair) throw new ProtocolError('PAIR_NOT_FOUND', `pair ${pairId} is not registered`);
    return pair;
  }

  private activePosition(user: Address, pairId: PairId): Position {
    const position = this.ctx.state.positions.get(positionKey(user, pairId));
    if (!position || !position.isActive || position.tokenAmount === 0n) {
      throw new ProtocolError('POSITION_NOT_FOUND', 'no active position', { user, pairId });
    }
    return position;
  }
}

function validateSlippage(maxSlippage: FixedPoint): void {
  if (maxSlippage < 0n || maxSlippage > LEVERAGE_CONFIG.maxSlippage) {
    throw new ProtocolError('INVALID_SLIPPAGE', 'maxSlippage must be between 0 and 10%', { maxSlippage });
  }
}

function withSlippage(expected: Amount, maxSlippage: FixedPoint): Amount {
  return mulDiv(expected, sub(PRECISION, maxSlippage), PRECISION);
}

function zeroPosition(position: Position): void {
  position.collateral = 0n;
  position.borrowed = 0n;
  position.tokenAmount = 0n;
  position.accruedFees = 0n;
  position.isActive = false;
}
