/**
 * PROTOCOL EVENTS
 *
 * Structured events buffered during a call and published only when the
 * call commits. A rolled-back call publishes nothing.
 */

import { v4 as uuidv4 } from 'uuid';
import type { BlockHeight } from './leverage.types.js';

export type ProtocolEventType =
  | 'PositionOpened'
  | 'PositionClosed'
  | 'CollateralAdded'
  | 'PositionLiquidated'
  | 'LiquidityAdded'
  | 'LiquidityRemoved'
  | 'FeesDistributed'
  | 'LpRewardsClaimed'
  | 'LiquidatorRewardsClaimed'
  | 'BuybackExecuted'
  | 'VestingScheduleCreated'
  | 'VestedTokensClaimed'
  | 'VestingScheduleRevoked'
  | 'CircuitBreakerChanged'
  | 'EmergencyPauseToggled'
  | 'ParametersUpdated'
  | 'PairRegistered'
  | 'PairUpdated';

export interface ProtocolEvent {
  id: string;
  type: ProtocolEventType;
  block: BlockHeight;
  data: Record<string, unknown>;
}

export interface EventSink {
  emit(type: ProtocolEventType, data: Record<string, unknown>): void;
}

export class EventBuffer implements EventSink {
  private readonly pending: ProtocolEvent[] = [];

  constructor(private readonly block: BlockHeight) {}

  emit(type: ProtocolEventType, data: Record<string, unknown>): void {
    this.pending.push({ id: uuidv4(), type, block: this.block, data });
  }

  drain(): ProtocolEvent[] {
    return this.pending.splice(0, this.pending.length);
  }
}
