/**
 * SIMULATED STAKING GATEWAY
 *
 * In-process stand-in for the chain's staking precompile. Constant-price
 * pools (price per pair, 1:1 by default) with an optional execution
 * slippage applied to real stake/unstake calls but not to the quotes.
 * Used by the dev server and by every test.
 */

import { PRECISION, mulDiv } from '../math/fixed-point.js';
import type { Address, Amount, FixedPoint, PairId, ValidatorKey } from '../leverage.types.js';
import type { StakingGateway, ValueTransfer } from './staking.gateway.js';

type GatewayOp = 'stake' | 'unstake' | 'simulateBuy' | 'simulateSell' | 'currentPrice' | 'stakeBalance' | 'transferStake';

export interface StakeCall {
  validatorKey: ValidatorKey;
  pairId: PairId;
  amount: Amount;
}

export interface SimulatedGatewayOptions {
  /** owner under which protocol-held stake is booked */
  protocolAccount?: Address;
  prices?: Record<number, FixedPoint>;
}

export class SimulatedStakingGateway implements StakingGateway {
  readonly protocolAccount: Address;

  private readonly prices = new Map<PairId, FixedPoint>();
  private readonly slippage = new Map<PairId, FixedPoint>();
  private readonly balances = new Map<string, Amount>();
  private readonly failures = new Map<GatewayOp, string>();

  /** awaited after a stake executes, before it returns */
  onStake?: (call: StakeCall) => Promise<void>;
  /** awaited after an unstake executes, before it returns */
  onUnstake?: (call: StakeCall) => Promise<void>;

  constructor(options: SimulatedGatewayOptions = {}) {
    this.protocolAccount = options.protocolAccount ?? 'protocol';
    for (const [pairId, price] of Object.entries(options.prices ?? {})) {
      this.prices.set(Number(pairId), price);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // KNOBS
  // ═══════════════════════════════════════════════════════════════

  setPrice(pairId: PairId, price: FixedPoint): void {
    if (price <= 0n) throw new Error('price must be positive');
    this.prices.set(pairId, price);
  }

  /** fraction lost on execution relative to the quote */
  setExecutionSlippage(pairId: PairId, fraction: FixedPoint): void {
    this.slippage.set(pairId, fraction);
  }

  failNext(op: GatewayOp, reason = `${op} rejected`): void {
    this.failures.set(op, reason);
  }

  setStakeBalance(validatorKey: ValidatorKey, owner: Address, pairId: PairId, amount: Amount): void {
    this.balances.set(balanceKey(validatorKey, owner, pairId), amount);
  }

  // ═══════════════════════════════════════════════════════════════
  // STAKING GATEWAY
  // ═══════════════════════════════════════════════════════════════

  async stake(validatorKey: ValidatorKey, pairId: PairId, amountMicro: Amount): Promise<Amount> {
    this.maybeFail('stake');
    const tokens = this.afterSlippage(pairId, this.buy(pairId, amountMicro));
    this.credit(validatorKey, this.protocolAccount, pairId, tokens);
    await this.onStake?.({ validatorKey, pairId, amount: amountMicro });
    return tokens;
  }

  async unstake(validatorKey: ValidatorKey, pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    this.maybeFail('unstake');
    this.debit(validatorKey, this.protocolAccount, pairId, tokenAmount);
    const proceeds = this.afterSlippage(pairId, this.sell(pairId, tokenAmount));
    await this.onUnstake?.({ validatorKey, pairId, amount: tokenAmount });
    return proceeds;
  }

  async simulateBuy(pairId: PairId, amountMicro: Amount): Promise<Amount> {
    this.maybeFail('simulateBuy');
    return this.buy(pairId, amountMicro);
  }

  async simulateSell(pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    this.maybeFail('simulateSell');
    return this.sell(pairId, tokenAmount);
  }

  async currentPrice(pairId: PairId): Promise<FixedPoint> {
    this.maybeFail('currentPrice');
    return this.priceOf(pairId);
  }

  async stakeBalance(validatorKey: ValidatorKey, owner: Address, pairId: PairId): Promise<Amount> {
    this.maybeFail('stakeBalance');
    return this.balances.get(balanceKey(validatorKey, owner, pairId)) ?? 0n;
  }

  async transferStake(validatorKey: ValidatorKey, destination: Address, pairId: PairId, tokenAmount: Amount): Promise<void> {
    this.maybeFail('transferStake');
    this.debit(validatorKey, this.protocolAccount, pairId, tokenAmount);
    this.credit(validatorKey, destination, pairId, tokenAmount);
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private priceOf(pairId: PairId): FixedPoint {
    return this.prices.get(pairId) ?? PRECISION;
  }

  private buy(pairId: PairId, amountMicro: Amount): Amount {
    return mulDiv(amountMicro, PRECISION, this.priceOf(pairId));
  }

  private sell(pairId: PairId, tokenAmount: Amount): Amount {
    return mulDiv(tokenAmount, this.priceOf(pairId), PRECISION);
  }

  private afterSlippage(pairId: PairId, amount: Amount): Amount {
    const fraction = this.slippage.get(pairId) ?? 0n;
    return mulDiv(amount, PRECISION - fraction, PRECISION);
  }

  private credit(validatorKey: ValidatorKey, owner: Address, pairId: PairId, amount: Amount): void {
    const key = balanceKey(validatorKey, owner, pairId);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(validatorKey: ValidatorKey, owner: Address, pairId: PairId, amount: Amount): void {
    const key = balanceKey(validatorKey, owner, pairId);
    const held = this.balances.get(key) ?? 0n;
    if (held < amount) {
      throw new Error(`insufficient stake: holds ${held}, needs ${amount}`);
    }
    this.balances.set(key, held - amount);
  }

  private maybeFail(op: GatewayOp): void {
    const reason = this.failures.get(op);
    if (reason !== undefined) {
      this.failures.delete(op);
      throw new Error(reason);
    }
  }
}

function balanceKey(validatorKey: ValidatorKey, owner: Address, pairId: PairId): string {
  return `${validatorKey}|${owner}|${pairId}`;
}

// ═══════════════════════════════════════════════════════════════
// RECORDING VALUE TRANSFER
// ═══════════════════════════════════════════════════════════════

export interface TransferRecord {
  to: Address;
  amount: Amount;
}

/** Keeps every outgoing transfer; dev server and tests */
export class RecordingValueTransfer implements ValueTransfer {
  readonly transfers: TransferRecord[] = [];
  private failure?: string;

  failNext(reason = 'transfer rejected'): void {
    this.failure = reason;
  }

  async transfer(to: Address, amount: Amount): Promise<void> {
    if (this.failure !== undefined) {
      const reason = this.failure;
      this.failure = undefined;
      throw new Error(reason);
    }
    this.transfers.push({ to, amount });
  }

  totalTo(address: Address): Amount {
    return this.transfers.filter((t) => t.to === address).reduce((sum, t) => sum + t.amount, 0n);
  }
}
