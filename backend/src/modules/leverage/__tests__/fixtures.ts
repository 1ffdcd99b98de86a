/**
 * Shared test harness: one ledger, a simulated gateway and the service
 * objects bound to a mutable context.
 */

import { expect, vi } from 'vitest';
import { silentLogger, type Logger } from '../../../common/logger.js';
import { BuybackEngine } from '../buyback/buyback.engine.js';
import { FeeAccounting } from '../fees/fee.accounting.js';
import { RecordingValueTransfer, SimulatedStakingGateway } from '../gateway/simulated.gateway.js';
import { StakingAdapter } from '../gateway/staking.adapter.js';
import { NativeLedger } from '../ledger/native.ledger.js';
import { DEFAULT_PROTOCOL_PARAMETERS } from '../leverage.config.js';
import type { ProtocolContext } from '../leverage.context.js';
import { isProtocolError, type ProtocolErrorCode } from '../leverage.errors.js';
import { LiquidityPool } from '../liquidity/liquidity.pool.js';
import { cloneParameters, type ProtocolParameters } from '../params/protocol.params.js';
import { PositionEngine } from '../positions/position.engine.js';
import { EventBuffer } from '../protocol.events.js';
import { createProtocolState, type ProtocolState } from '../state/protocol.state.js';
import type { FixedPoint, Pair, PairId } from '../leverage.types.js';

export const OWNER = 'owner';
export const HOTKEY = DEFAULT_PROTOCOL_PARAMETERS.protocolValidatorHotkey;
export const OTHER_HOTKEY = `0x${'ab'.repeat(32)}`;
export const CONTENT_HASH = `0x${'cd'.repeat(32)}`;

export function testParams(overrides: Partial<ProtocolParameters> = {}): ProtocolParameters {
  return { ...cloneParameters(DEFAULT_PROTOCOL_PARAMETERS), ...overrides };
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export interface Harness {
  state: ProtocolState;
  gateway: SimulatedStakingGateway;
  transfers: RecordingValueTransfer;
  events: EventBuffer;
  ctx: ProtocolContext;
  fees: FeeAccounting;
  pool: LiquidityPool;
  positions: PositionEngine;
  buyback: BuybackEngine;
}

/** Services wired straight to the gateway, no orchestrator around them */
export function createHarness(params: ProtocolParameters = testParams(), block = 100): Harness {
  const state = createProtocolState(OWNER, params, 0);
  const gateway = new SimulatedStakingGateway();
  const transfers = new RecordingValueTransfer();
  const events = new EventBuffer(block);
  const ctx: ProtocolContext = {
    state,
    staking: new StakingAdapter(gateway),
    ledger: new NativeLedger(state, transfers),
    events,
    logger: silentLogger,
    block,
  };
  const fees = new FeeAccounting(ctx);
  const pool = new LiquidityPool(ctx, fees);
  return {
    state,
    gateway,
    transfers,
    events,
    ctx,
    fees,
    pool,
    positions: new PositionEngine(ctx, fees, pool),
    buyback: new BuybackEngine(ctx),
  };
}

export function addPair(state: ProtocolState, pairId: PairId, maxLeverage: FixedPoint): Pair {
  const pair: Pair = {
    pairId,
    totalCollateral: 0n,
    totalBorrowed: 0n,
    utilizationRate: 0n,
    borrowingRate: state.params.borrowingFeeRate,
    maxLeverage,
    isActive: true,
  };
  state.pairs.set(pairId, pair);
  return pair;
}

export async function expectProtocolError(
  promise: Promise<unknown>,
  code: ProtocolErrorCode,
): Promise<void> {
  const err: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(isProtocolError(err) ? err.code : err).toBe(code);
}

export function expectThrowsCode(fn: () => unknown, code: ProtocolErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isProtocolError(caught) ? caught.code : caught).toBe(code);
}
