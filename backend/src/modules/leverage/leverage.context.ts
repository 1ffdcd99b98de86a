/**
 * Per-call context handed to the service objects.
 * The orchestrator builds one for every entry point.
 */

import type { Logger } from '../../common/logger.js';
import type { StakingAdapter } from './gateway/staking.adapter.js';
import type { NativeLedger } from './ledger/native.ledger.js';
import type { BlockHeight } from './leverage.types.js';
import type { EventSink } from './protocol.events.js';
import type { ProtocolState } from './state/protocol.state.js';

export interface ProtocolContext {
  state: ProtocolState;
  staking: StakingAdapter;
  ledger: NativeLedger;
  events: EventSink;
  logger: Logger;
  /** block height the call executes at */
  block: BlockHeight;
}
