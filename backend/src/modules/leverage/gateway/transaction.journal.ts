/**
 * TRANSACTION JOURNAL
 *
 * Wraps the gateway and the value-transfer port for the duration of one
 * protocol call and records every external side effect. If the call
 * aborts after a stake/unstake already executed (slippage check, a later
 * step failing), `compensate()` replays the inverse calls newest-first.
 *
 * Outgoing transfers and stake transfers cannot be pulled back; the
 * engine issues them as the last step of every call, and any that did
 * run before an abort are reported as uncompensated.
 */

import type { Logger } from '../../../common/logger.js';
import type { Address, Amount, FixedPoint, PairId, ValidatorKey } from '../leverage.types.js';
import type { StakingGateway, ValueTransfer } from './staking.gateway.js';

interface JournalEntry {
  action: string;
  detail: Record<string, unknown>;
  undo?: () => Promise<unknown>;
}

export interface CompensationReport {
  compensated: number;
  failed: Array<{ action: string; error: string }>;
  irreversible: Array<{ action: string; detail: Record<string, unknown> }>;
}

export class TransactionJournal {
  private readonly entries: JournalEntry[] = [];
  readonly gateway: StakingGateway;
  readonly transfers: ValueTransfer;

  constructor(inner: StakingGateway, innerTransfers: ValueTransfer) {
    this.gateway = new JournaledStakingGateway(inner, this);
    this.transfers = {
      transfer: async (to: Address, amount: Amount) => {
        await innerTransfers.transfer(to, amount);
        this.record({ action: 'transfer', detail: { to, amount } });
      },
    };
  }

  record(entry: JournalEntry): void {
    this.entries.push(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  async compensate(logger: Logger): Promise<CompensationReport> {
    const report: CompensationReport = { compensated: 0, failed: [], irreversible: [] };

    for (const entry of [...this.entries].reverse()) {
      if (!entry.undo) {
        report.irreversible.push({ action: entry.action, detail: entry.detail });
        continue;
      }
      try {
        await entry.undo();
        report.compensated += 1;
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        report.failed.push({ action: entry.action, error });
      }
    }

    if (report.failed.length > 0 || report.irreversible.length > 0) {
      logger.error(
        { failed: report.failed, irreversible: report.irreversible.map((e) => e.action) },
        'Rollback left external side effects in place',
      );
    }
    this.entries.length = 0;
    return report;
  }
}

class JournaledStakingGateway implements StakingGateway {
  constructor(
    private readonly inner: StakingGateway,
    private readonly journal: TransactionJournal,
  ) {}

  async stake(validatorKey: ValidatorKey, pairId: PairId, amountMicro: Amount): Promise<Amount> {
    const received = await this.inner.stake(validatorKey, pairId, amountMicro);
    this.journal.record({
      action: 'stake',
      detail: { validatorKey, pairId, amountMicro, received },
      undo: () => this.inner.unstake(validatorKey, pairId, received),
    });
    return received;
  }

  async unstake(validatorKey: ValidatorKey, pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    const received = await this.inner.unstake(validatorKey, pairId, tokenAmount);
    this.journal.record({
      action: 'unstake',
      detail: { validatorKey, pairId, tokenAmount, received },
      undo: () => this.inner.stake(validatorKey, pairId, received),
    });
    return received;
  }

  async transferStake(validatorKey: ValidatorKey, destination: Address, pairId: PairId, tokenAmount: Amount): Promise<void> {
    await this.inner.transferStake(validatorKey, destination, pairId, tokenAmount);
    this.journal.record({ action: 'transferStake', detail: { validatorKey, destination, pairId, tokenAmount } });
  }

  simulateBuy(pairId: PairId, amountMicro: Amount): Promise<Amount> {
    return this.inner.simulateBuy(pairId, amountMicro);
  }

  simulateSell(pairId: PairId, tokenAmount: Amount): Promise<Amount> {
    return this.inner.simulateSell(pairId, tokenAmount);
  }

  currentPrice(pairId: PairId): Promise<FixedPoint> {
    return this.inner.currentPrice(pairId);
  }

  stakeBalance(validatorKey: ValidatorKey, owner: Address, pairId: PairId): Promise<Amount> {
    return this.inner.stakeBalance(validatorKey, owner, pairId);
  }
}
