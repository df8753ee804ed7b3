/**
 * etl.worker.ts — runs the shop analytics ETL for each job on `shop-etl`.
 *
 * Concurrency is 1 so runs never overlap. A failed run fails the job; the
 * queue's single attempt means it is not retried.
 */

import { Worker, type Job } from 'bullmq';
import { WORKER_CONCURRENCY } from '../config';
import { formatRunResult, runEtl } from '../pipeline/run-etl';
import { ETL_QUEUE_NAME, getRedis, type EtlJobData } from '../queues';
import { workerLogger, type Logger } from '../utils/logger';
import type { Warehouse } from '../warehouse/types';

const log = workerLogger('etl');

export interface EtlRunOptions {
  procedureName?: string;
  logger?: Logger;
}

/** Run once for a job; resolves with the result line, throws if the run failed. */
export async function processEtlRun(
  job: Pick<Job<EtlJobData>, 'id' | 'data'>,
  warehouse: Warehouse,
  options: EtlRunOptions = {},
): Promise<string> {
  const jobLog = (options.logger ?? log).child({ jobId: job.id, trigger: job.data.trigger });
  jobLog.info('Starting shop analytics ETL job');

  const result = await runEtl(warehouse, { procedureName: options.procedureName, logger: jobLog });
  const summary = formatRunResult(result);

  if (result.status === 'failed') {
    throw result.error;
  }

  jobLog.info({ summary }, 'Shop analytics ETL job complete');
  return summary;
}

export function createEtlWorker(warehouse: Warehouse): Worker<EtlJobData, string> {
  const worker = new Worker<EtlJobData, string>(
    ETL_QUEUE_NAME,
    (job) => processEtlRun(job, warehouse),
    {
      connection: getRedis(),
      concurrency: WORKER_CONCURRENCY,
    },
  );

  worker.on('failed', (job, err) => {
    log.error({ jobId: job?.id, err }, 'Shop analytics ETL job failed');
  });

  return worker;
}
