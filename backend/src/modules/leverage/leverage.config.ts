/**
 * LEVERAGE PROTOCOL — CONFIG
 *
 * Deployment defaults (mainnet values) and module-level constants.
 * Governance can change every ProtocolParameters field at runtime
 * through the admin setters; these only seed a fresh ledger.
 */

import { fixed, macro } from './math/fixed-point.js';
import type { ProtocolParameters } from './params/protocol.params.js';

export const LEVERAGE_CONFIG = {
  apiPrefix: '/api/leverage',

  collections: {
    snapshots: 'leverage_protocol_snapshots',
    events: 'leverage_protocol_events',
  },

  /** borrowing rates are quoted per this many blocks */
  rateWindowBlocks: 360,

  /** buyback ramp: +10% of the base rate per missed interval, at most +50% */
  buybackRampStep: fixed('0.1'),
  buybackRampCap: fixed('0.5'),

  /** open/close slippage tolerance ceiling */
  maxSlippage: fixed('0.1'),

  /** in-memory event tail kept for GET /events */
  eventTailSize: 1000,
} as const;

export const DEFAULT_PROTOCOL_PARAMETERS: ProtocolParameters = {
  maxLeverage: fixed('10'),
  liquidationThreshold: fixed('1.1'),

  minLiquidityThreshold: macro('1000'),
  maxUtilizationRate: fixed('0.9'),
  liquidityBufferRatio: fixed('0.2'),

  userActionCooldownBlocks: 1,
  lpActionCooldownBlocks: 360,

  buybackRate: fixed('0.5'),
  buybackIntervalBlocks: 7200,
  buybackExecutionThreshold: macro('1'),
  vestingDurationBlocks: 2_628_000,
  cliffDurationBlocks: 648_000,

  tradingFeeRate: fixed('0.003'),
  borrowingFeeRate: fixed('0.00005'),
  liquidationFeeRate: fixed('0.02'),

  tradingFeeDistribution: { lpShare: fixed('0.3'), liquidatorShare: 0n, protocolShare: fixed('0.7') },
  borrowingFeeDistribution: { lpShare: fixed('0.35'), liquidatorShare: 0n, protocolShare: fixed('0.65') },
  liquidationFeeDistribution: { lpShare: 0n, liquidatorShare: fixed('0.4'), protocolShare: fixed('0.6') },

  tierThresholds: [macro('100'), macro('1000'), macro('5000'), macro('20000'), macro('100000')],
  tierFeeDiscounts: [0n, fixed('0.1'), fixed('0.2'), fixed('0.3'), fixed('0.4'), fixed('0.5')],
  tierMaxLeverages: [fixed('2'), fixed('3'), fixed('4'), fixed('5'), fixed('7'), fixed('10')],

  rateCurve: {
    kink: fixed('0.8'),
    slope1: fixed('0.00005'),
    slope2: fixed('0.00045'),
  },

  minPositionCollateral: macro('0.1'),
  minLiquidityDeposit: macro('0.1'),
  maxJustificationLength: 1024,

  protocolValidatorHotkey: '0x4492d90ca4f56368e7a06ceeaea3859d312f12280df357d790637674b928df67',
  buybackPairId: 67,
  treasury: 'treasury',

  functionPermissions: {
    openPosition: false,
    closePosition: false,
    liquidatePosition: false,
  },

  maxLiquidityProvidersPerHotkey: 5,
};
