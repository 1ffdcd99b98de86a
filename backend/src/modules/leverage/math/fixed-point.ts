/**
 * FIXED-POINT MATH
 *
 * Checked uint256 arithmetic over bigint. Ratios, rates and leverage are
 * scaled by PRECISION (1e9). Amounts live in the macro unit (1e18) inside
 * the protocol and in the micro unit (1e9) at the staking gateway.
 */

import { ProtocolError } from '../leverage.errors.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const PRECISION = 1_000_000_000n;
export const ACC_PRECISION = 1_000_000_000_000_000_000n;
export const MICRO_PER_MACRO = 1_000_000_000n;
export const MAX_UINT256 = (1n << 256n) - 1n;

function assertUint(value: bigint, op: string): void {
  if (value < 0n) {
    throw new ProtocolError('UNDERFLOW', `${op}: negative operand ${value}`);
  }
  if (value > MAX_UINT256) {
    throw new ProtocolError('OVERFLOW', `${op}: operand exceeds uint256`);
  }
}

// ═══════════════════════════════════════════════════════════════
// CHECKED OPERATIONS
// ═══════════════════════════════════════════════════════════════

export function add(a: bigint, b: bigint): bigint {
  assertUint(a, 'add');
  assertUint(b, 'add');
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new ProtocolError('OVERFLOW', 'add: result exceeds uint256');
  }
  return result;
}

export function sub(a: bigint, b: bigint): bigint {
  assertUint(a, 'sub');
  assertUint(b, 'sub');
  if (b > a) {
    throw new ProtocolError('UNDERFLOW', `sub: ${b} > ${a}`);
  }
  return a - b;
}

export function mul(a: bigint, b: bigint): bigint {
  assertUint(a, 'mul');
  assertUint(b, 'mul');
  const result = a * b;
  if (result > MAX_UINT256) {
    throw new ProtocolError('OVERFLOW', 'mul: result exceeds uint256');
  }
  return result;
}

export function div(a: bigint, b: bigint): bigint {
  assertUint(a, 'div');
  assertUint(b, 'div');
  if (b === 0n) {
    throw new ProtocolError('DIVISION_BY_ZERO', 'div: divisor is zero');
  }
  return a / b;
}

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return div(mul(a, b), denominator);
}

/** amount × rate / PRECISION */
export function applyRate(amount: bigint, rate: bigint): bigint {
  return mulDiv(amount, rate, PRECISION);
}

export function subOrZero(a: bigint, b: bigint): bigint {
  return a > b ? sub(a, b) : 0n;
}

export function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ═══════════════════════════════════════════════════════════════
// UNIT CONVERSION
// ═══════════════════════════════════════════════════════════════

/** macro (1e18) → micro (1e9); truncates sub-micro dust */
export function toMicro(macro: bigint): bigint {
  return div(macro, MICRO_PER_MACRO);
}

/** micro (1e9) → macro (1e18) */
export function toMacro(micro: bigint): bigint {
  return mul(micro, MICRO_PER_MACRO);
}

// ═══════════════════════════════════════════════════════════════
// PARSING / FORMATTING
// ═══════════════════════════════════════════════════════════════

/**
 * Parses a decimal string ("1.5") into a scaled integer.
 * Used for config files and tests; digits beyond `decimals` are rejected.
 */
export function parseUnits(value: string, decimals: number): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new ProtocolError('INVALID_PARAMETER', `Not a decimal amount: "${value}"`);
  }
  const whole = match[1];
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new ProtocolError('INVALID_PARAMETER', `Too many decimals in "${value}" (max ${decimals})`);
  }
  return BigInt(whole + fraction.padEnd(decimals, '0'));
}

/** "1.5" → 1.5e18 */
export function macro(value: string): bigint {
  return parseUnits(value, 18);
}

/** "0.9" → 0.9e9 */
export function fixed(value: string): bigint {
  return parseUnits(value, 9);
}

export function formatUnits(value: bigint, decimals: number): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  const body = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}
