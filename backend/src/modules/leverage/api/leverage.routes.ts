/**
 * Leverage API Routes
 *
 * Thin HTTP layer over LeverageProtocol. The caller is taken from the
 * `x-caller-address` header; ProtocolErrors bubble to the global error
 * handler, which renders `{ ok: false, error, kind, message }`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { parseWith } from '../../../plugins/zod.js';
import { LEVERAGE_CONFIG } from '../leverage.config.js';
import { ProtocolError } from '../leverage.errors.js';
import type { LeverageProtocol } from '../orchestrator/protocol.orchestrator.js';
import { toPlain } from '../state/protocol.codec.js';
import type { Address } from '../leverage.types.js';
import {
  ActionCooldownsBody,
  AddCollateralBody,
  AddLiquidityBody,
  AddressParams,
  BeneficiaryParams,
  BuybackParametersBody,
  CircuitBreakerBody,
  ClaimVestedBody,
  ClosePositionBody,
  EventsQuery,
  FeeDistributionsBody,
  FeeParametersBody,
  FunctionPermissionsBody,
  HotkeyBody,
  LiquidateBody,
  LiquidityGuardrailsBody,
  LpLimitBody,
  OpenPositionBody,
  PermittedCallerBody,
  PositionParams,
  RateModelBody,
  RegisterPairBody,
  RemoveLiquidityBody,
  RevokeVestingBody,
  RiskParametersBody,
  TierParametersBody,
  TreasuryBody,
  UpdatePairBody,
  VestingParametersBody,
} from './leverage.schemas.js';

export const CALLER_HEADER = 'x-caller-address';

function callerOf(req: FastifyRequest): Address {
  const header = req.headers[CALLER_HEADER];
  const caller = Array.isArray(header) ? header[0] : header;
  if (!caller) {
    throw new ProtocolError('UNAUTHORIZED', `${CALLER_HEADER} header is required`);
  }
  return caller;
}

function ok(data: unknown) {
  return { ok: true, data: toPlain(data) };
}

export async function registerLeverageRoutes(app: FastifyInstance, protocol: LeverageProtocol): Promise<void> {
  const prefix = LEVERAGE_CONFIG.apiPrefix;

  // ═══════════════════════════════════════════════════════════════
  // POSITIONS
  // ═══════════════════════════════════════════════════════════════

  /**
   * POST /api/leverage/positions/open
   * Body: { pairId, collateral, leverage, maxSlippage, validatorKey? }
   */
  app.post(`${prefix}/positions/open`, async (req) => {
    const body = parseWith(OpenPositionBody, req.body, 'body');
    return ok(await protocol.openPosition(callerOf(req), body));
  });

  /**
   * POST /api/leverage/positions/close
   * Body: { pairId, tokenAmount? ("0" = all), maxSlippage }
   */
  app.post(`${prefix}/positions/close`, async (req) => {
    const body = parseWith(ClosePositionBody, req.body, 'body');
    return ok(await protocol.closePosition(callerOf(req), body));
  });

  app.post(`${prefix}/positions/add-collateral`, async (req) => {
    const body = parseWith(AddCollateralBody, req.body, 'body');
    return ok(await protocol.addCollateral(callerOf(req), body.pairId, body.amount));
  });

  /**
   * POST /api/leverage/positions/liquidate
   * Body: { user, pairId, justification, contentHash }
   */
  app.post(`${prefix}/positions/liquidate`, async (req) => {
    const body = parseWith(LiquidateBody, req.body, 'body');
    return ok(await protocol.liquidatePosition(callerOf(req), body));
  });

  app.get(`${prefix}/positions/:user/:pairId`, async (req, reply) => {
    const params = parseWith(PositionParams, req.params, 'params');
    const view = await protocol.getPosition(params.user, params.pairId);
    if (!view) {
      return reply.status(404).send({ ok: false, error: 'POSITION_NOT_FOUND', message: 'No such position' });
    }
    return ok(view);
  });

  // ═══════════════════════════════════════════════════════════════
  // LIQUIDITY & REWARDS
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/liquidity/add`, async (req) => {
    const body = parseWith(AddLiquidityBody, req.body, 'body');
    return ok(await protocol.addLiquidity(callerOf(req), body.amount, body.validatorKey));
  });

  app.post(`${prefix}/liquidity/remove`, async (req) => {
    const body = parseWith(RemoveLiquidityBody, req.body, 'body');
    return ok(await protocol.removeLiquidity(callerOf(req), body.amount));
  });

  app.post(`${prefix}/rewards/lp/claim`, async (req) => {
    return ok({ claimed: await protocol.claimLpRewards(callerOf(req)) });
  });

  app.post(`${prefix}/rewards/liquidator/claim`, async (req) => {
    return ok({ claimed: await protocol.claimLiquidatorRewards(callerOf(req)) });
  });

  app.get(`${prefix}/lp/:address`, async (req) => {
    const params = parseWith(AddressParams, req.params, 'params');
    return ok(protocol.calculateLpValue(params.address));
  });

  // ═══════════════════════════════════════════════════════════════
  // BUYBACK & VESTING
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/buyback/execute`, async (req) => {
    return ok(await protocol.executeBuyback(callerOf(req)));
  });

  app.get(`${prefix}/buyback/plan`, async () => ok(protocol.getBuybackPlan()));

  app.post(`${prefix}/vesting/claim`, async (req) => {
    const body = parseWith(ClaimVestedBody, req.body ?? {}, 'body');
    return ok({ claimed: await protocol.claimVested(callerOf(req), body.destination) });
  });

  app.get(`${prefix}/vesting/:beneficiary`, async (req) => {
    const params = parseWith(BeneficiaryParams, req.params, 'params');
    return ok(protocol.getVestingSchedules(params.beneficiary));
  });

  // ═══════════════════════════════════════════════════════════════
  // STATS
  // ═══════════════════════════════════════════════════════════════

  app.get(`${prefix}/stats/protocol`, async () => ok(protocol.getProtocolStats()));

  app.get(`${prefix}/stats/liquidity`, async () => ok(protocol.getLiquidityStats()));

  app.get(`${prefix}/stats/user/:address`, async (req) => {
    const params = parseWith(AddressParams, req.params, 'params');
    return ok(await protocol.getUserStats(params.address));
  });

  app.get(`${prefix}/parameters`, async () => ok(protocol.getParameters()));

  app.get(`${prefix}/events`, async (req) => {
    const query = parseWith(EventsQuery, req.query, 'query');
    return ok(protocol.getRecentEvents(query.limit));
  });

  // ═══════════════════════════════════════════════════════════════
  // ADMIN
  // ═══════════════════════════════════════════════════════════════

  function admin<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    handler: (caller: Address, body: T) => Promise<unknown>,
  ): void {
    app.post(`${prefix}/admin/${path}`, async (req) => {
      const body = parseWith(schema, req.body, 'body');
      const result = await handler(callerOf(req), body);
      return ok(result ?? { updated: true });
    });
  }

  admin('risk-parameters', RiskParametersBody, (caller, b) =>
    protocol.updateRiskParameters(caller, b.maxLeverage, b.liquidationThreshold),
  );
  admin('liquidity-guardrails', LiquidityGuardrailsBody, (caller, b) =>
    protocol.updateLiquidityGuardrails(caller, b.minLiquidityThreshold, b.maxUtilizationRate, b.liquidityBufferRatio),
  );
  admin('action-cooldowns', ActionCooldownsBody, (caller, b) =>
    protocol.updateActionCooldowns(caller, b.userBlocks, b.lpBlocks),
  );
  admin('buyback-parameters', BuybackParametersBody, (caller, b) =>
    protocol.updateBuybackParameters(caller, b.rate, b.intervalBlocks, b.threshold),
  );
  admin('vesting-parameters', VestingParametersBody, (caller, b) =>
    protocol.updateVestingParameters(caller, b.durationBlocks, b.cliffBlocks),
  );
  admin('fee-parameters', FeeParametersBody, (caller, b) =>
    protocol.updateFeeParameters(caller, b.trading, b.borrowing, b.liquidation),
  );
  admin('fee-distributions', FeeDistributionsBody, (caller, b) => protocol.updateFeeDistributions(caller, b));
  admin('tier-parameters', TierParametersBody, (caller, b) => protocol.updateTierParameters(caller, b));
  admin('rate-model', RateModelBody, (caller, b) => protocol.updateRateModel(caller, b));
  admin('validator-hotkey', HotkeyBody, (caller, b) => protocol.updateProtocolValidatorHotkey(caller, b.hotkey));
  admin('treasury', TreasuryBody, (caller, b) => protocol.updateTreasury(caller, b.treasury));
  admin('function-permissions', FunctionPermissionsBody, (caller, b) =>
    protocol.updateFunctionPermissions(caller, b),
  );
  admin('permitted-caller', PermittedCallerBody, (caller, b) =>
    protocol.setPermittedCaller(caller, b.account, b.allowed),
  );
  admin('lp-limit', LpLimitBody, (caller, b) => protocol.setMaxLiquidityProvidersPerHotkey(caller, b.limit));
  admin('pairs/register', RegisterPairBody, (caller, b) => protocol.registerPair(caller, b.pairId, b.maxLeverage));
  admin('pairs/update', UpdatePairBody, (caller, b) =>
    protocol.updatePair(caller, b.pairId, { isActive: b.isActive, maxLeverage: b.maxLeverage }),
  );
  admin('circuit-breaker', CircuitBreakerBody, (caller, b) =>
    protocol.resetLiquidityCircuitBreaker(caller, b.active),
  );
  admin('vesting/revoke', RevokeVestingBody, (caller, b) =>
    protocol.revokeVestingSchedule(caller, b.beneficiary, b.index),
  );

  app.post(`${prefix}/admin/pause`, async (req) => {
    return ok({ paused: await protocol.emergencyPause(callerOf(req)) });
  });

  console.log(`[Leverage] Routes registered at ${prefix}/*`);
}
