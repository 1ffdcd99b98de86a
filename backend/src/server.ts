/**
 * Leverage Backend — Entrypoint
 *
 * Boot order: env → MongoDB (optional) → protocol (restore or fresh)
 * → Fastify → listen.
 *
 * Run: npx tsx backend/src/server.ts
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import {
  DEFAULT_PROTOCOL_PARAMETERS,
  RecordingValueTransfer,
  SimulatedStakingGateway,
  WallClockBlocks,
  createLeverageModule,
  resolveBootParameters,
} from './modules/leverage/index.js';
import { createConsoleLogger } from './common/logger.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  SUBNET LEVERAGE — Protocol Backend');
  console.log('═══════════════════════════════════════════════════════════════');

  const logger = createConsoleLogger('Leverage');

  if (env.MONGO_ENABLED) {
    try {
      await connectMongo(env.MONGO_URL, env.MONGO_DB);
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'MongoDB connection failed');
    }
  }

  const params = resolveBootParameters(
    { paramsPath: env.PROTOCOL_PARAMS_PATH, treasury: env.PROTOCOL_TREASURY },
    DEFAULT_PROTOCOL_PARAMETERS,
  );

  // No chain connection in this service: the simulated gateway books stake in process
  const gateway = new SimulatedStakingGateway({ protocolAccount: 'protocol' });
  const protocol = await createLeverageModule({
    owner: env.PROTOCOL_OWNER,
    params,
    gateway,
    transfers: new RecordingValueTransfer(),
    clock: new WallClockBlocks(env.GENESIS_TS, env.BLOCK_TIME_MS),
    logger,
  });

  const app = await buildApp({
    protocol,
    logger: { level: env.LOG_LEVEL },
    corsOrigins: env.CORS_ORIGINS,
    production: env.NODE_ENV === 'production',
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Leverage] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Leverage] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Leverage] ✅ Backend started on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[Leverage] Fatal boot error:', err);
  process.exit(1);
});
