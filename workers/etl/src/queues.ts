import { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { requireEnv } from './config';
import { workerLogger } from './utils/logger';

export const ETL_QUEUE_NAME = 'shop-etl';

export interface EtlJobData {
  /** What asked for the run: 'schedule', 'cli', ... */
  trigger: string;
}

const log = workerLogger('redis');

let connection: IORedis | null = null;

/** Shared BullMQ connection, opened on first use. */
export function getRedis(): IORedis {
  if (!connection) {
    connection = new IORedis(requireEnv('REDIS_URL'), {
      maxRetriesPerRequest: null, // required by BullMQ
      enableReadyCheck: false,
    });
    connection.on('error', (err) => {
      log.error({ err }, 'Redis connection error');
    });
  }
  return connection;
}

let etlQueue: Queue<EtlJobData> | null = null;

export function getEtlQueue(): Queue<EtlJobData> {
  if (!etlQueue) {
    etlQueue = new Queue<EtlJobData>(ETL_QUEUE_NAME, {
      connection: getRedis(),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 500 },
      },
    });
  }
  return etlQueue;
}

/** Close the queue and the Redis connection, if they were opened. */
export async function closeQueues(): Promise<void> {
  await etlQueue?.close();
  etlQueue = null;
  await connection?.quit();
  connection = null;
}
