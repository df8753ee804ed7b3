/**
 * Shop Analytics ETL Worker — Entry Point
 *
 * Ensures the warehouse schema, starts the BullMQ worker, registers the
 * recurring schedule, and handles graceful shutdown on SIGTERM / SIGINT.
 */

import { requireEnv } from './config';
import { createEtlWorker } from './processing/etl.worker';
import { closeQueues } from './queues';
import { registerSchedules } from './schedulers/schedules';
import { logger } from './utils/logger';
import { DrizzleWarehouse } from './warehouse/drizzle';

const warehouse = DrizzleWarehouse.connect(requireEnv('DATABASE_URL'));
const worker = createEtlWorker(warehouse);

// ── Startup ──────────────────────────────────────────────────────────────

async function main() {
  logger.info('Shop analytics ETL worker starting');

  await warehouse.ensureSchema();
  logger.info('Warehouse schema ensured');

  await registerSchedules();

  logger.info('Worker running. Waiting for jobs…');
}

// ── Graceful Shutdown ────────────────────────────────────────────────────

async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutdown signal received, draining worker');

  // Let an in-progress run finish before closing connections
  const results = await Promise.allSettled([worker.close()]);
  results.push(...(await Promise.allSettled([closeQueues(), warehouse.close()])));

  for (const result of results) {
    if (result.status === 'rejected') {
      logger.error({ err: result.reason }, 'Error during shutdown');
    }
  }

  logger.info('Worker, queue and database closed. Exiting.');
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, shutting down');
  process.exit(1);
});

// ── Go ───────────────────────────────────────────────────────────────────

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start worker');
  process.exit(1);
});
