import { describe, it, expect, beforeEach } from 'vitest';
import { RecordingValueTransfer, SimulatedStakingGateway } from '../gateway/simulated.gateway.js';
import { TransactionJournal } from '../gateway/transaction.journal.js';
import { isProtocolError } from '../leverage.errors.js';
import { SerialExecutor } from '../orchestrator/serial.executor.js';
import { HOTKEY, createMockLogger } from './fixtures.js';

describe('TransactionJournal', () => {
  let gateway: SimulatedStakingGateway;
  let transfers: RecordingValueTransfer;
  let journal: TransactionJournal;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    gateway = new SimulatedStakingGateway();
    transfers = new RecordingValueTransfer();
    journal = new TransactionJournal(gateway, transfers);
    logger = createMockLogger();
  });

  it('undoes stakes newest-first', async () => {
    await journal.gateway.stake(HOTKEY, 1, 1_000n);
    await journal.gateway.stake(HOTKEY, 1, 500n);

    const report = await journal.compensate(logger);

    expect(report).toEqual({ compensated: 2, failed: [], irreversible: [] });
    await expect(gateway.stakeBalance(HOTKEY, 'protocol', 1)).resolves.toBe(0n);
    expect(logger.error).not.toHaveBeenCalled();
    expect(journal.size).toBe(0);
  });

  it('restakes what an unstake returned', async () => {
    gateway.setStakeBalance(HOTKEY, 'protocol', 1, 800n);
    await journal.gateway.unstake(HOTKEY, 1, 800n);

    await journal.compensate(logger);

    await expect(gateway.stakeBalance(HOTKEY, 'protocol', 1)).resolves.toBe(800n);
  });

  it('reports transfers as irreversible', async () => {
    await journal.transfers.transfer('alice', 5n);

    const report = await journal.compensate(logger);

    expect(report.irreversible).toEqual([{ action: 'transfer', detail: { to: 'alice', amount: 5n } }]);
    expect(transfers.transfers).toEqual([{ to: 'alice', amount: 5n }]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('records nothing for a call that failed', async () => {
    gateway.failNext('stake');
    await expect(journal.gateway.stake(HOTKEY, 1, 1_000n)).rejects.toThrow('stake rejected');
    expect(journal.size).toBe(0);
  });
});

describe('SerialExecutor', () => {
  it('runs tasks one at a time in submission order', async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = executor.run('first', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = executor.run('second', async () => {
      order.push('second');
    });

    expect(executor.pending).toBe(2);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(executor.pending).toBe(0);
  });

  it('keeps going after a task fails', async () => {
    const executor = new SerialExecutor();
    await expect(executor.run('boom', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(executor.run('next', async () => 'ok')).resolves.toBe('ok');
  });

  it('rejects a nested run', async () => {
    const executor = new SerialExecutor();
    const nested = await executor.run('outer', () => executor.run('inner', async () => 'never').catch((e: unknown) => e));

    expect(isProtocolError(nested, 'REENTRANT_CALL')).toBe(true);
  });
});
