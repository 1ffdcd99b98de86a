/**
 * NATIVE LEDGER
 *
 * Tracks the base asset the protocol holds (collateral, LP deposits,
 * fees, unstake proceeds) and pays out through the value-transfer port.
 */

import { ProtocolError } from '../leverage.errors.js';
import { add, sub } from '../math/fixed-point.js';
import type { Address, Amount } from '../leverage.types.js';
import type { ValueTransfer } from '../gateway/staking.gateway.js';
import type { ProtocolState } from '../state/protocol.state.js';

export class NativeLedger {
  constructor(
    private readonly state: ProtocolState,
    private readonly transfers: ValueTransfer,
  ) {}

  get balance(): Amount {
    return this.state.totals.nativeBalance;
  }

  /** value attached to a call or returned by an unstake */
  receive(amount: Amount): void {
    this.state.totals.nativeBalance = add(this.state.totals.nativeBalance, amount);
  }

  /** value that left through a stake */
  spend(amount: Amount): void {
    this.ensure(amount);
    this.state.totals.nativeBalance = sub(this.state.totals.nativeBalance, amount);
  }

  async pay(to: Address, amount: Amount): Promise<void> {
    if (amount === 0n) return;
    this.ensure(amount);
    this.state.totals.nativeBalance = sub(this.state.totals.nativeBalance, amount);
    try {
      await this.transfers.transfer(to, amount);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProtocolError('TRANSFER_FAILED', `transfer to ${to} failed: ${reason}`, { to, amount });
    }
  }

  private ensure(amount: Amount): void {
    if (amount > this.state.totals.nativeBalance) {
      throw new ProtocolError('INSUFFICIENT_BALANCE', 'protocol balance cannot cover the payment', {
        balance: this.state.totals.nativeBalance,
        amount,
      });
    }
  }
}
