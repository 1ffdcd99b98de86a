/**
 * LEVERAGE MODULE
 *
 * Public surface of the leverage protocol plus the boot helper the
 * server uses to pick a store and restore the ledger.
 */

import type { Logger } from '../../common/logger.js';
import { isMongoConnected } from '../../db/mongoose.js';
import type { BlockClock, StakingGateway, ValueTransfer } from './gateway/staking.gateway.js';
import { LeverageProtocol } from './orchestrator/protocol.orchestrator.js';
import type { ProtocolParameters } from './params/protocol.params.js';
import { InMemoryProtocolStore, MongoProtocolStore, type ProtocolStore } from './storage/protocol.store.js';
import type { Address } from './leverage.types.js';

export { LeverageProtocol } from './orchestrator/protocol.orchestrator.js';
export { ProtocolError, isProtocolError } from './leverage.errors.js';
export type { ProtocolErrorCode, ProtocolErrorKind } from './leverage.errors.js';
export { DEFAULT_PROTOCOL_PARAMETERS, LEVERAGE_CONFIG } from './leverage.config.js';
export { resolveBootParameters, type ProtocolParameters } from './params/protocol.params.js';
export { ManualBlockClock, WallClockBlocks } from './gateway/staking.gateway.js';
export type { BlockClock, StakingGateway, ValueTransfer } from './gateway/staking.gateway.js';
export { SimulatedStakingGateway, RecordingValueTransfer } from './gateway/simulated.gateway.js';
export { InMemoryProtocolStore, MongoProtocolStore, type ProtocolStore } from './storage/protocol.store.js';
export { registerLeverageRoutes } from './api/leverage.routes.js';
export type * from './leverage.types.js';

export interface LeverageModuleOptions {
  owner: Address;
  params: ProtocolParameters;
  gateway: StakingGateway;
  transfers: ValueTransfer;
  clock: BlockClock;
  logger: Logger;
  /** defaults to Mongo when connected, memory otherwise */
  store?: ProtocolStore;
}

export async function createLeverageModule(options: LeverageModuleOptions): Promise<LeverageProtocol> {
  const store = options.store ?? (isMongoConnected() ? new MongoProtocolStore(options.logger) : new InMemoryProtocolStore());
  if (store.kind === 'memory') {
    options.logger.warn({ store: store.kind }, 'MongoDB not available, protocol state kept in memory');
  }
  return LeverageProtocol.create({ ...options, store });
}
