/**
 * LEVERAGE PROTOCOL — ERRORS
 *
 * Every failure of a protocol call is a ProtocolError carrying a stable
 * code and the kind it belongs to, so callers can tell a retryable
 * resource/slippage failure from a rejected input.
 */

import { AppError } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// TAXONOMY
// ═══════════════════════════════════════════════════════════════

export type ProtocolErrorKind =
  | 'Validation'
  | 'Admission'
  | 'ResourceExhaustion'
  | 'ExternalCallFailure'
  | 'SlippageViolation'
  | 'InvariantBreach'
  | 'Arithmetic';

const ERROR_KINDS = {
  // Validation
  AMOUNT_ZERO: 'Validation',
  AMOUNT_BELOW_MINIMUM: 'Validation',
  AMOUNT_EXCEEDS_POSITION: 'Validation',
  INSUFFICIENT_STAKE: 'Validation',
  LEVERAGE_OUT_OF_RANGE: 'Validation',
  INVALID_SLIPPAGE: 'Validation',
  INVALID_PARAMETER: 'Validation',
  DISTRIBUTION_SUM_MISMATCH: 'Validation',
  INVALID_JUSTIFICATION: 'Validation',
  INVALID_CONTENT_HASH: 'Validation',
  INVALID_VALIDATOR_KEY: 'Validation',
  POSITION_EXISTS: 'Validation',
  POSITION_NOT_FOUND: 'Validation',
  PAIR_NOT_FOUND: 'Validation',
  PAIR_EXISTS: 'Validation',
  PAIR_INACTIVE: 'Validation',
  LP_NOT_FOUND: 'Validation',
  NOT_LIQUIDATABLE: 'Validation',
  NO_REWARDS: 'Validation',
  NO_VESTING_SCHEDULES: 'Validation',
  VESTING_SCHEDULE_NOT_FOUND: 'Validation',
  BUYBACK_NOT_READY: 'Validation',
  HOTKEY_LP_LIMIT: 'Validation',

  // Admission
  PAUSED: 'Admission',
  CIRCUIT_BREAKER_ACTIVE: 'Admission',
  COOLDOWN_ACTIVE: 'Admission',
  UNAUTHORIZED: 'Admission',
  FUNCTION_RESTRICTED: 'Admission',
  REENTRANT_CALL: 'Admission',

  // ResourceExhaustion
  INSUFFICIENT_LIQUIDITY: 'ResourceExhaustion',
  UTILIZATION_EXCEEDED: 'ResourceExhaustion',
  INSUFFICIENT_BALANCE: 'ResourceExhaustion',

  // ExternalCallFailure
  STAKE_FAILED: 'ExternalCallFailure',
  UNSTAKE_FAILED: 'ExternalCallFailure',
  TRANSFER_FAILED: 'ExternalCallFailure',
  PRICE_UNAVAILABLE: 'ExternalCallFailure',
  ZERO_VALUE: 'ExternalCallFailure',
  ZERO_PROCEEDS: 'ExternalCallFailure',

  // SlippageViolation
  SLIPPAGE_TOO_HIGH: 'SlippageViolation',

  // InvariantBreach
  INSUFFICIENT_PROCEEDS: 'InvariantBreach',

  // Arithmetic
  OVERFLOW: 'Arithmetic',
  UNDERFLOW: 'Arithmetic',
  DIVISION_BY_ZERO: 'Arithmetic',
} as const satisfies Record<string, ProtocolErrorKind>;

export type ProtocolErrorCode = keyof typeof ERROR_KINDS;

const STATUS_BY_KIND: Record<ProtocolErrorKind, number> = {
  Validation: 400,
  Admission: 403,
  ResourceExhaustion: 409,
  SlippageViolation: 409,
  InvariantBreach: 422,
  Arithmetic: 422,
  ExternalCallFailure: 502,
};

// Kinds an off-chain caller may retry without changing its input
const RETRYABLE_KINDS: ReadonlySet<ProtocolErrorKind> = new Set([
  'ResourceExhaustion',
  'SlippageViolation',
  'InvariantBreach',
]);

export function kindOf(code: ProtocolErrorCode): ProtocolErrorKind {
  return ERROR_KINDS[code];
}

// ═══════════════════════════════════════════════════════════════
// ERROR CLASS
// ═══════════════════════════════════════════════════════════════

export class ProtocolError extends AppError {
  readonly kind: ProtocolErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: ProtocolErrorCode, message: string, details?: Record<string, unknown>) {
    const kind = kindOf(code);
    super(code, message, code === 'COOLDOWN_ACTIVE' ? 429 : STATUS_BY_KIND[kind]);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.details = details;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind) || this.code === 'COOLDOWN_ACTIVE';
  }
}

export function isProtocolError(err: unknown, code?: ProtocolErrorCode): err is ProtocolError {
  return err instanceof ProtocolError && (code === undefined || err.code === code);
}
