/**
 * PROTOCOL STATE CODEC
 *
 * JSON-safe encoding of ProtocolState for snapshots and HTTP responses:
 * bigint → decimal string, Map → entry list, Set → array.
 * Decoding goes through zod so a corrupted snapshot fails loudly.
 */

import { z } from 'zod';
import { ProtocolError } from '../leverage.errors.js';
import { protocolParametersSchema, uintString } from '../params/protocol.params.js';
import type { ProtocolState } from './protocol.state.js';

export type Plain = string | number | boolean | null | Plain[] | { [key: string]: Plain };

export function toPlain(value: unknown): Plain {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value === null || value === undefined) return null;
  if (value instanceof Map) return [...value.entries()].map(([k, v]) => [toPlain(k), toPlain(v)]);
  if (value instanceof Set) return [...value].map(toPlain);
  if (Array.isArray(value)) return value.map(toPlain);
  if (typeof value === 'object') {
    const out: { [key: string]: Plain } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) out[k] = toPlain(v);
    }
    return out;
  }
  return String(value);
}

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const block = z.number().int().nonnegative();

function mapOf<K extends z.ZodTypeAny, V extends z.ZodTypeAny>(key: K, value: V) {
  return z.array(z.tuple([key, value])).transform((entries) => new Map<z.output<K>, z.output<V>>(entries));
}

const positionSchema = z.object({
  user: z.string(),
  pairId: z.number().int(),
  collateral: uintString,
  borrowed: uintString,
  tokenAmount: uintString,
  leverage: uintString,
  entryPrice: uintString,
  openedAtBlock: block,
  lastUpdateBlock: block,
  accruedFees: uintString,
  isActive: z.boolean(),
  validatorKey: z.string(),
});

const pairSchema = z.object({
  pairId: z.number().int(),
  totalCollateral: uintString,
  totalBorrowed: uintString,
  utilizationRate: uintString,
  borrowingRate: uintString,
  maxLeverage: uintString,
  isActive: z.boolean(),
});

const liquidityProviderSchema = z.object({
  address: z.string(),
  stake: uintString,
  shares: uintString,
  rewardDebt: uintString,
  lastRewardBlock: block,
  isActive: z.boolean(),
  validatorKey: z.string(),
});

const liquidatorSchema = z.object({ score: uintString, rewardDebt: uintString });

const userSchema = z.object({
  totalCollateral: uintString,
  totalBorrowed: uintString,
  totalVolume: uintString,
  lastPositionActionBlock: block.optional(),
  lastLpActionBlock: block.optional(),
});

const vestingSchema = z.object({
  totalAmount: uintString,
  claimedAmount: uintString,
  startBlock: block,
  cliffBlock: block,
  endBlock: block,
  revoked: z.boolean(),
});

const totalsSchema = z.object({
  totalLpStakes: uintString,
  totalLpShares: uintString,
  totalBorrowed: uintString,
  totalCollateral: uintString,
  accLpFeesPerShare: uintString,
  accLiquidatorFeesPerScore: uintString,
  totalLiquidatorScore: uintString,
  buybackPool: uintString,
  protocolFees: uintString,
  lastBuybackBlock: block,
  nativeBalance: uintString,
  totalVolume: uintString,
  totalTrades: z.number().int().nonnegative(),
  totalFeesCollected: uintString,
  totalLpFees: uintString,
  totalLiquidatorFees: uintString,
  totalTaoUsedForBuybacks: uintString,
  totalTokensBought: uintString,
  totalBadDebt: uintString,
  orphanedFees: uintString,
});

const stateSchema = z.object({
  owner: z.string().min(1),
  params: protocolParametersSchema,
  paused: z.boolean(),
  liquidityCircuitBreaker: z.boolean(),
  permittedCallers: z.array(z.string()).transform((callers) => new Set(callers)),
  totals: totalsSchema,
  pairs: mapOf(z.number().int(), pairSchema),
  positions: mapOf(z.string(), positionSchema),
  liquidityProviders: mapOf(z.string(), liquidityProviderSchema),
  liquidators: mapOf(z.string(), liquidatorSchema),
  users: mapOf(z.string(), userSchema),
  lpClaimable: mapOf(z.string(), uintString),
  liquidatorClaimable: mapOf(z.string(), uintString),
  vestingSchedules: mapOf(z.string(), z.array(vestingSchema)),
  hotkeyLpCount: mapOf(z.string(), z.number().int().nonnegative()),
});

// ═══════════════════════════════════════════════════════════════
// ENCODE / DECODE
// ═══════════════════════════════════════════════════════════════

export function encodeState(state: ProtocolState): Plain {
  return toPlain(state);
}

export function decodeState(raw: unknown): ProtocolState {
  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ProtocolError('INVALID_PARAMETER', `Corrupted protocol snapshot: ${issues}`);
  }
  return parsed.data;
}
