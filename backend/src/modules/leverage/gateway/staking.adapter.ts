/**
 * STAKING ADAPTER
 *
 * The only place that converts between the protocol's macro unit and
 * the gateway's micro unit, and the only place that turns a gateway
 * failure into a typed ProtocolError.
 */

import { ProtocolError, isProtocolError, type ProtocolErrorCode } from '../leverage.errors.js';
import { toMacro, toMicro } from '../math/fixed-point.js';
import type { Address, Amount, FixedPoint, PairId, ValidatorKey } from '../leverage.types.js';
import type { StakingGateway } from './staking.gateway.js';

export interface StakeOutcome {
  /** micro-unit tokens actually received */
  tokensReceived: Amount;
  /** macro amount that left the protocol (input minus sub-micro dust) */
  spent: Amount;
}

export class StakingAdapter {
  constructor(private readonly gateway: StakingGateway) {}

  async stake(validatorKey: ValidatorKey, pairId: PairId, amount: Amount): Promise<StakeOutcome> {
    const micro = toMicro(amount);
    if (micro === 0n) {
      throw new ProtocolError('AMOUNT_ZERO', 'stake amount is below one micro unit', { amount });
    }
    const received = await this.call('STAKE_FAILED', 'stake', () => this.gateway.stake(validatorKey, pairId, micro));
    if (received < 0n) {
      throw new ProtocolError('STAKE_FAILED', 'gateway reported a negative stake result', { pairId });
    }
    return { tokensReceived: received, spent: toMacro(micro) };
  }

  /** Returns the macro amount actually received */
  async unstake(validatorKey: ValidatorKey, pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    const received = await this.call('UNSTAKE_FAILED', 'unstake', () =>
      this.gateway.unstake(validatorKey, pairId, tokenAmount),
    );
    if (received < 0n) {
      throw new ProtocolError('UNSTAKE_FAILED', 'gateway reported a negative unstake result', { pairId });
    }
    return toMacro(received);
  }

  /** Expected tokens for a macro input */
  async quoteBuy(pairId: PairId, amount: Amount): Promise<Amount> {
    return this.call('PRICE_UNAVAILABLE', 'simulateBuy', () => this.gateway.simulateBuy(pairId, toMicro(amount)));
  }

  /** Expected macro output for a token input */
  async quoteSell(pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    const micro = await this.call('PRICE_UNAVAILABLE', 'simulateSell', () =>
      this.gateway.simulateSell(pairId, tokenAmount),
    );
    return toMacro(micro);
  }

  async currentPrice(pairId: PairId): Promise<FixedPoint> {
    return this.call('PRICE_UNAVAILABLE', 'currentPrice', () => this.gateway.currentPrice(pairId));
  }

  /** Externally held stake, converted to macro for tier comparison */
  async stakeBalance(validatorKey: ValidatorKey, owner: Address, pairId: PairId): Promise<Amount> {
    const micro = await this.call('PRICE_UNAVAILABLE', 'stakeBalance', () =>
      this.gateway.stakeBalance(validatorKey, owner, pairId),
    );
    return toMacro(micro);
  }

  async transferStake(validatorKey: ValidatorKey, destination: Address, pairId: PairId, tokenAmount: Amount): Promise<void> {
    await this.call('TRANSFER_FAILED', 'transferStake', () =>
      this.gateway.transferStake(validatorKey, destination, pairId, tokenAmount),
    );
  }

  private async call<T>(code: ProtocolErrorCode, op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isProtocolError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProtocolError(code, `gateway ${op} failed: ${reason}`, { op });
    }
  }
}
