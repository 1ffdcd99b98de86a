/**
 * PROTOCOL STATE
 *
 * The one shared ledger. Service objects receive it per call and mutate
 * it in place; only the orchestrator swaps it (rollback / restore).
 */

import { cloneParameters, type ProtocolParameters } from '../params/protocol.params.js';
import type {
  Address,
  Amount,
  BlockHeight,
  LiquidatorAccount,
  LiquidityProvider,
  Pair,
  PairId,
  Position,
  ProtocolTotals,
  UserAccount,
  ValidatorKey,
  VestingSchedule,
} from '../leverage.types.js';

export interface ProtocolState {
  owner: Address;
  params: ProtocolParameters;
  paused: boolean;
  liquidityCircuitBreaker: boolean;
  permittedCallers: Set<Address>;

  totals: ProtocolTotals;

  pairs: Map<PairId, Pair>;
  /** keyed by positionKey(user, pairId) */
  positions: Map<string, Position>;
  liquidityProviders: Map<Address, LiquidityProvider>;
  liquidators: Map<Address, LiquidatorAccount>;
  users: Map<Address, UserAccount>;

  lpClaimable: Map<Address, Amount>;
  liquidatorClaimable: Map<Address, Amount>;

  vestingSchedules: Map<Address, VestingSchedule[]>;
  /** active LPs per validator key */
  hotkeyLpCount: Map<ValidatorKey, number>;
}

export function positionKey(user: Address, pairId: PairId): string {
  return `${user}:${pairId}`;
}

export function emptyTotals(lastBuybackBlock: BlockHeight): ProtocolTotals {
  return {
    totalLpStakes: 0n,
    totalLpShares: 0n,
    totalBorrowed: 0n,
    totalCollateral: 0n,
    accLpFeesPerShare: 0n,
    accLiquidatorFeesPerScore: 0n,
    totalLiquidatorScore: 0n,
    buybackPool: 0n,
    protocolFees: 0n,
    lastBuybackBlock,
    nativeBalance: 0n,
    totalVolume: 0n,
    totalTrades: 0,
    totalFeesCollected: 0n,
    totalLpFees: 0n,
    totalLiquidatorFees: 0n,
    totalTaoUsedForBuybacks: 0n,
    totalTokensBought: 0n,
    totalBadDebt: 0n,
    orphanedFees: 0n,
  };
}

export function createProtocolState(owner: Address, params: ProtocolParameters, genesisBlock: BlockHeight): ProtocolState {
  return {
    owner,
    params: cloneParameters(params),
    paused: false,
    liquidityCircuitBreaker: false,
    permittedCallers: new Set(),
    totals: emptyTotals(genesisBlock),
    pairs: new Map(),
    positions: new Map(),
    liquidityProviders: new Map(),
    liquidators: new Map(),
    users: new Map(),
    lpClaimable: new Map(),
    liquidatorClaimable: new Map(),
    vestingSchedules: new Map(),
    hotkeyLpCount: new Map(),
  };
}

export function cloneState(state: ProtocolState): ProtocolState {
  return structuredClone(state);
}

export function userAccount(state: ProtocolState, user: Address): UserAccount {
  let account = state.users.get(user);
  if (!account) {
    account = { totalCollateral: 0n, totalBorrowed: 0n, totalVolume: 0n };
    state.users.set(user, account);
  }
  return account;
}
