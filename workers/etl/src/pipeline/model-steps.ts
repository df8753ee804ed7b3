import {
  buildCrossBusinessCustomers,
  buildCustomerDimension,
  buildCustomerLifetimeValue,
  buildDailyRevenue,
  coffeeOrderChecks,
  flowerOrderChecks,
  joinCoffeeOrders,
  joinFlowerOrders,
  runChecks,
  toCustomerOrders,
  toIsoDate,
} from '@petalbrew/business-rules';
import {
  INTERMEDIATE_TABLES,
  STAGING_TABLES,
  type MartTableName,
  type MartTables,
  type ProcessingStat,
} from '@petalbrew/shared';
import type { MartStore } from '../warehouse/types';
import type { AuditTrail } from './audit';
import { recordIssues, type StepContext } from './staging-steps';

// =============================================================================
// Intermediate joins (read from persisted staging)
// =============================================================================

export async function buildIntermediates(ctx: StepContext, audit: AuditTrail): Promise<void> {
  const { staging, intermediate } = ctx.warehouse;

  const flowerOrders = joinFlowerOrders(
    await staging.stg_flower_shop__flower_orders.read(),
    await staging.stg_flower_shop__flower_arrangements.read(),
    await staging.stg_flower_shop__delivery_info.read(),
  );
  const flowerResult = await intermediate.int_flower_shop__orders_joined.upsert(flowerOrders, ctx.clock());
  ctx.log.info({ table: 'int_flower_shop__orders_joined', ...flowerResult }, 'Intermediate table merged');
  await audit.info(`Processed ${flowerResult.inserted + flowerResult.updated} joined order records`);

  const coffeeOrders = joinCoffeeOrders(
    await staging.stg_jaffle__orders.read(),
    await staging.stg_jaffle__customers.read(),
    await staging.stg_jaffle__stores.read(),
    await staging.stg_jaffle__items.read(),
    await staging.stg_jaffle__products.read(),
  );
  const coffeeResult = await intermediate.int_jaffle__orders_joined.upsert(coffeeOrders, ctx.clock());
  ctx.log.info({ table: 'int_jaffle__orders_joined', ...coffeeResult }, 'Intermediate table merged');
  await audit.info(`Processed ${coffeeResult.inserted + coffeeResult.updated} joined coffee order records`);
}

/** Business-rule checks over the persisted intermediate tables. */
export async function checkIntermediates(ctx: StepContext): Promise<void> {
  const { intermediate, audit } = ctx.warehouse;
  const detectedAt = ctx.clock();

  await recordIssues(
    audit,
    [
      ...runChecks(
        await intermediate.int_flower_shop__orders_joined.read(),
        flowerOrderChecks(toIsoDate(detectedAt)),
        detectedAt,
      ),
      ...runChecks(await intermediate.int_jaffle__orders_joined.read(), coffeeOrderChecks(), detectedAt),
    ],
    ctx.log,
  );
}

// =============================================================================
// Marts (full replace)
// =============================================================================

async function replaceMart<T extends MartTableName>(
  ctx: StepContext,
  audit: AuditTrail,
  table: T,
  store: MartStore<MartTables[T]>,
  rows: readonly MartTables[T][],
): Promise<void> {
  await store.replace(rows);
  ctx.log.info({ table, count: rows.length }, 'Mart rebuilt');
  await audit.info(`Rebuilt ${table} with ${rows.length} records`);
}

export async function buildMarts(ctx: StepContext, audit: AuditTrail): Promise<void> {
  const { intermediate, marts } = ctx.warehouse;
  const orders = toCustomerOrders(
    await intermediate.int_flower_shop__orders_joined.read(),
    await intermediate.int_jaffle__orders_joined.read(),
  );

  await replaceMart(
    ctx,
    audit,
    'fct_customer_lifetime_value',
    marts.fct_customer_lifetime_value,
    buildCustomerLifetimeValue(orders),
  );
  await replaceMart(ctx, audit, 'agg_daily_revenue', marts.agg_daily_revenue, buildDailyRevenue(orders));
  await replaceMart(
    ctx,
    audit,
    'fct_cross_business_customers',
    marts.fct_cross_business_customers,
    buildCrossBusinessCustomers(orders),
  );
  await replaceMart(ctx, audit, 'dim_customers', marts.dim_customers, buildCustomerDimension(orders));
}

// =============================================================================
// Processing statistics
// =============================================================================

export async function recordProcessingStats(ctx: StepContext): Promise<ProcessingStat[]> {
  const { staging, intermediate, audit } = ctx.warehouse;
  const processingDate = toIsoDate(ctx.clock());
  const stats: ProcessingStat[] = [];

  for (const tableName of STAGING_TABLES) {
    stats.push({ tableName, recordCount: await staging[tableName].count(), processingDate });
  }
  for (const tableName of INTERMEDIATE_TABLES) {
    stats.push({ tableName, recordCount: await intermediate[tableName].count(), processingDate });
  }

  await audit.recordStats(stats);
  return stats;
}
