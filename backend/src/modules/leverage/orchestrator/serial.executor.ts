/**
 * SERIAL EXECUTOR
 *
 * Single-writer queue: every mutating entry point runs to completion
 * before the next one starts. A call issued from inside a running one
 * (a gateway callback re-entering the protocol) would wait on itself,
 * so it is detected through AsyncLocalStorage and rejected instead.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ProtocolError } from '../leverage.errors.js';

interface RunningCall {
  name: string;
}

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private readonly current = new AsyncLocalStorage<RunningCall>();
  private queued = 0;

  get pending(): number {
    return this.queued;
  }

  /** Name of the entry point running in this async context, if any */
  activeCall(): string | undefined {
    return this.current.getStore()?.name;
  }

  run<T>(name: string, task: () => Promise<T>): Promise<T> {
    const active = this.activeCall();
    if (active !== undefined) {
      return Promise.reject(
        new ProtocolError('REENTRANT_CALL', `${name} called while ${active} is in progress`, { name, active }),
      );
    }

    this.queued += 1;
    const result = this.tail.then(() => this.current.run({ name }, task));
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result.finally(() => {
      this.queued -= 1;
    });
  }
}
