/**
 * Shop analytics ETL run.
 *
 * STARTED → stage (prepare all, then merge) → intermediate joins →
 * post-join checks → marts → processing stats → COMPLETED.
 * Any failure after STARTED writes a single FAILED entry and ends the run;
 * stages already committed stay committed. There are no retries. Audit-sink
 * failures on STARTED or FAILED propagate.
 */

import { ETL_PROCEDURE_NAME } from '../config';
import { workerLogger, type Logger } from '../utils/logger';
import type { Warehouse } from '../warehouse/types';
import { AuditTrail } from './audit';
import { toPipelineError, type PipelineError } from './errors';
import { buildIntermediates, buildMarts, checkIntermediates, recordProcessingStats } from './model-steps';
import { STAGING_STEPS, type PreparedBatch, type StepContext } from './staging-steps';

export interface EtlOptions {
  /** Written to every audit entry. Defaults to ETL_PROCEDURE_NAME. */
  procedureName?: string;
  clock?: () => Date;
  logger?: Logger;
}

export type EtlResult =
  | { status: 'success'; startedAt: Date; completedAt: Date }
  | { status: 'failed'; error: PipelineError };

export async function runEtl(warehouse: Warehouse, options: EtlOptions = {}): Promise<EtlResult> {
  const clock = options.clock ?? (() => new Date());
  const log = options.logger ?? workerLogger('pipeline');
  const audit = new AuditTrail(warehouse.audit, options.procedureName ?? ETL_PROCEDURE_NAME, clock);
  const ctx: StepContext = { warehouse, clock, log };
  const batches: PreparedBatch[] = [];

  // A run whose STARTED entry was never written has no trail to close.
  const startedAt = await audit.started();
  log.info('Shop analytics ETL started');

  try {

    // Extract and validate every source before the first write.
    for (const step of STAGING_STEPS) {
      batches.push(await step(ctx));
    }

    for (const batch of batches) {
      const result = await batch.commit(clock());
      log.info({ table: batch.target, ...result }, 'Staging table merged');
      await audit.info(`Processed ${result.inserted + result.updated} ${batch.label} records`);
    }

    await buildIntermediates(ctx, audit);
    await checkIntermediates(ctx);
    await buildMarts(ctx, audit);
    await recordProcessingStats(ctx);

    const completedAt = await audit.completed();
    log.info(
      { durationMs: completedAt.getTime() - startedAt.getTime() },
      'Shop analytics ETL completed',
    );
    return { status: 'success', startedAt, completedAt };
  } catch (err) {
    const error = toPipelineError(err);
    log.error({ err: error, kind: error.kind }, 'Shop analytics ETL failed');
    await audit.failed(error.message);
    return { status: 'failed', error };
  } finally {
    // Prepared batches hold every staged row; drop them with the run.
    batches.length = 0;
  }
}

/** One-line outcome, as printed by the CLI. */
export function formatRunResult(result: EtlResult): string {
  if (result.status === 'success') {
    return `SUCCESS: Shop analytics ETL completed successfully at ${result.completedAt.toISOString()}`;
  }
  return `ERROR: ${result.error.message}`;
}
