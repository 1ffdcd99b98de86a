import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { AppError, ValidationError } from './common/errors.js';
import { ProtocolError } from './modules/leverage/leverage.errors.js';
import { registerLeverageRoutes } from './modules/leverage/api/leverage.routes.js';
import type { LeverageProtocol } from './modules/leverage/orchestrator/protocol.orchestrator.js';

export interface BuildAppOptions {
  protocol: LeverageProtocol;
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string;
  /** hides internal error messages */
  production?: boolean;
}

/**
 * Build Fastify Application
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
    trustProxy: true,
  });

  // CORS
  const origins = options.corsOrigins ?? '*';
  await app.register(cors, {
    origin: origins === '*' ? true : origins.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ProtocolError) {
      app.log.warn({ code: err.code, kind: err.kind }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        kind: err.kind,
        message: err.message,
        retryable: err.retryable,
      });
    }

    if (err instanceof ValidationError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        issues: err.issues,
      });
    }

    if (err instanceof AppError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation / body parsing errors
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: options.production ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    paused: options.protocol.isPaused(),
    timestamp: new Date().toISOString(),
  }));

  await registerLeverageRoutes(app, options.protocol);

  return app;
}
