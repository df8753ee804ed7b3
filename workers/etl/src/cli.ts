/**
 * Command-line entry point.
 *
 * Prints the single result line of a run and exits 0 on success, 1 on
 * failure. `--fixture` runs against an in-memory warehouse seeded from a
 * JSON dataset, so no database is needed.
 */

import { ETL_PROCEDURE_NAME, requireEnv } from './config';
import { parseCliArgs, USAGE, type CliCommand } from './cli-args';
import { formatRunResult, runEtl } from './pipeline/run-etl';
import { closeQueues, getEtlQueue } from './queues';
import { workerLogger } from './utils/logger';
import { DrizzleWarehouse } from './warehouse/drizzle';
import { loadDataset } from './warehouse/fixtures';
import { MemoryWarehouse } from './warehouse/memory';
import type { Warehouse } from './warehouse/types';

const log = workerLogger('cli');

async function openWarehouse(fixture: string | null): Promise<Warehouse> {
  if (fixture) {
    log.info({ fixture }, 'Dry run on in-memory warehouse');
    return new MemoryWarehouse(await loadDataset(fixture));
  }
  return DrizzleWarehouse.connect(requireEnv('DATABASE_URL'));
}

async function execute(cli: CliCommand): Promise<number> {
  if (cli.command === 'enqueue') {
    try {
      const job = await getEtlQueue().add('shop-etl', { trigger: 'cli' });
      console.log(`Queued shop analytics ETL run (job ${job.id ?? 'unknown'})`);
      return 0;
    } finally {
      await closeQueues();
    }
  }

  const warehouse = await openWarehouse(cli.fixture);
  try {
    await warehouse.ensureSchema();
    const result = await runEtl(warehouse, { procedureName: ETL_PROCEDURE_NAME });
    console.log(formatRunResult(result));
    return result.status === 'success' ? 0 : 1;
  } finally {
    await warehouse.close();
  }
}

async function main() {
  let cli: CliCommand;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exit(2);
  }
  process.exitCode = await execute(cli);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'ETL command failed');
  console.log(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
