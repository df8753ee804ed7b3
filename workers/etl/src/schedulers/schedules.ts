/**
 * schedules.ts — recurring ETL runs via BullMQ job schedulers.
 */

import { ETL_SCHEDULE } from '../config';
import { getEtlQueue } from '../queues';
import { workerLogger } from '../utils/logger';

const log = workerLogger('scheduler');

export const ETL_SCHEDULER_ID = 'shop-analytics-etl';

/**
 * Register the recurring run. Idempotent: re-registering replaces the
 * previous pattern. Call once at startup from index.ts.
 */
export async function registerSchedules(pattern: string = ETL_SCHEDULE): Promise<void> {
  log.info({ pattern }, 'Registering recurring ETL schedule');

  await getEtlQueue().upsertJobScheduler(
    ETL_SCHEDULER_ID,
    { pattern },
    {
      name: 'shop-etl',
      data: { trigger: 'schedule' },
      opts: { attempts: 1 },
    },
  );

  log.info('Recurring ETL schedule registered');
}
