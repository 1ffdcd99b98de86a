/**
 * EXTERNAL COLLABORATORS — Contracts
 *
 * The leverage core never talks to the chain directly. Everything that
 * moves value or reads a price goes through these ports, injected at
 * construction (same pattern as host deps elsewhere in the backend).
 */

import type { Address, Amount, BlockHeight, FixedPoint, PairId, ValidatorKey } from '../leverage.types.js';

// ═══════════════════════════════════════════════════════════════
// STAKING GATEWAY (micro units)
// ═══════════════════════════════════════════════════════════════

/**
 * Validator-keyed staking ledger. Every amount here is in the micro
 * unit: base-asset amounts (stake input, unstake output) as well as
 * subnet token amounts.
 *
 * `stake` returns the tokens actually received and `unstake` the base
 * asset actually received; those, not the requested amounts, flow into
 * the accounting.
 */
export interface StakingGateway {
  stake(validatorKey: ValidatorKey, pairId: PairId, amountMicro: Amount): Promise<Amount>;
  unstake(validatorKey: ValidatorKey, pairId: PairId, tokenAmount: Amount): Promise<Amount>;

  simulateBuy(pairId: PairId, amountMicro: Amount): Promise<Amount>;
  simulateSell(pairId: PairId, tokenAmount: Amount): Promise<Amount>;

  /** base asset per whole token, PRECISION-scaled */
  currentPrice(pairId: PairId): Promise<FixedPoint>;

  /** tokens held under (validatorKey, owner) on a pair */
  stakeBalance(validatorKey: ValidatorKey, owner: Address, pairId: PairId): Promise<Amount>;

  /** moves protocol-held stake to another owner */
  transferStake(validatorKey: ValidatorKey, destination: Address, pairId: PairId, tokenAmount: Amount): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// VALUE TRANSFER (macro units)
// ═══════════════════════════════════════════════════════════════

export interface ValueTransfer {
  transfer(to: Address, amount: Amount): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// BLOCK CLOCK
// ═══════════════════════════════════════════════════════════════

export interface BlockClock {
  currentBlock(): BlockHeight;
}

export class ManualBlockClock implements BlockClock {
  constructor(private block: BlockHeight = 1) {}

  currentBlock(): BlockHeight {
    return this.block;
  }

  advance(blocks: number): BlockHeight {
    this.block += blocks;
    return this.block;
  }

  set(block: BlockHeight): void {
    this.block = block;
  }
}

/** Block height derived from wall clock: floor((now - genesis) / blockTime) */
export class WallClockBlocks implements BlockClock {
  constructor(
    private readonly genesisTs: number,
    private readonly blockTimeMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  currentBlock(): BlockHeight {
    return Math.max(0, Math.floor((this.now() - this.genesisTs) / this.blockTimeMs));
  }
}
