/**
 * PostgreSQL warehouse via Drizzle.
 *
 * Model tables upsert with `INSERT … ON CONFLICT (key) DO UPDATE` inside one
 * transaction per batch; `xmax = 0` on the returned rows tells inserts from
 * updates. Marts are deleted and re-inserted in one transaction.
 */

import { count, getTableColumns, sql, type SQL } from 'drizzle-orm';
import type { PgDatabase, PgTable } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import { createDatabase, ensureSchema, schema, type Database, type DatabaseConnection } from '@petalbrew/db';
import type {
  CrossBusinessCustomer,
  CustomerLifetimeValue,
  DailyRevenue,
  DimCustomer,
  IntermediateTableName,
  IntermediateTables,
  Stamped,
  StagingTableName,
  StagingTables,
} from '@petalbrew/shared';
import type {
  AuditSink,
  IntermediateStores,
  MartStore,
  MartStores,
  ModelStore,
  RawSources,
  StagingStores,
  Warehouse,
} from './types';

type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

/** Rows per INSERT; keeps every statement under the bind-parameter limit. */
const INSERT_CHUNK_SIZE = 500;

export function chunk<T>(rows: readonly T[], size = INSERT_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

/** `SET column = excluded.column` for every column not listed in `keep`. */
export function excludedColumns(table: PgTable, keep: readonly string[]): Record<string, SQL> {
  return Object.fromEntries(
    Object.entries(getTableColumns(table))
      .filter(([property]) => !keep.includes(property))
      .map(([property, column]) => [property, sql.raw(`excluded."${column.name}"`)]),
  );
}

const insertedFlag = { inserted: sql<boolean>`(xmax = 0)` };

// =============================================================================
// Store factories
// =============================================================================

/** A built statement: awaitable, and renderable without running it. */
export interface Statement<R> extends PromiseLike<R> {
  toSQL(): { sql: string; params: unknown[] };
}

export interface ModelTableOps<T> {
  table: PgTable;
  read(db: Executor): PromiseLike<Stamped<T>[]>;
  /** Upsert a chunk, returning one flag per affected row. */
  write(db: Executor, rows: Stamped<T>[]): Statement<{ inserted: boolean }[]>;
}

function modelStore<T>(db: Database, ops: ModelTableOps<T>): ModelStore<T> {
  return {
    async read() {
      return ops.read(db);
    },

    async upsert(rows, now) {
      if (rows.length === 0) return { inserted: 0, updated: 0 };
      const stamped = rows.map((row) => ({ ...row, createdAt: now, updatedAt: now }));

      const flags = await db.transaction(async (tx) => {
        const affected: { inserted: boolean }[] = [];
        for (const part of chunk(stamped)) {
          affected.push(...(await ops.write(tx, part)));
        }
        return affected;
      });

      const inserted = flags.filter((flag) => flag.inserted).length;
      return { inserted, updated: flags.length - inserted };
    },

    async count() {
      const [row] = await db.select({ value: count() }).from(ops.table);
      return row?.value ?? 0;
    },
  };
}

interface MartTableOps<T> {
  table: PgTable;
  read(db: Executor): PromiseLike<T[]>;
  write(db: Executor, rows: T[]): PromiseLike<unknown>;
}

function martStore<T>(db: Database, ops: MartTableOps<T>): MartStore<T> {
  return {
    async read() {
      return ops.read(db);
    },

    async replace(rows) {
      await db.transaction(async (tx) => {
        await tx.delete(ops.table);
        for (const part of chunk(rows)) {
          await ops.write(tx, part);
        }
      });
    },
  };
}

// =============================================================================
// Relations
// =============================================================================

function rawSources(db: Database): RawSources {
  return {
    raw_flowers: { read: async () => db.select().from(schema.rawFlowers) },
    raw_flower_arrangements: { read: async () => db.select().from(schema.rawFlowerArrangements) },
    raw_flower_orders: { read: async () => db.select().from(schema.rawFlowerOrders) },
    raw_delivery_info: { read: async () => db.select().from(schema.rawDeliveryInfo) },
    raw_supplies: { read: async () => db.select().from(schema.rawSupplies) },
    raw_customers: { read: async () => db.select().from(schema.rawCustomers) },
    raw_stores: { read: async () => db.select().from(schema.rawStores) },
    raw_products: { read: async () => db.select().from(schema.rawProducts) },
    raw_orders: { read: async () => db.select().from(schema.rawOrders) },
    raw_items: { read: async () => db.select().from(schema.rawItems) },
  };
}

const { stgFlowers, stgFlowerArrangements, stgFlowerOrders, stgDeliveryInfo, stgSupplies } = schema;
const { stgCustomers, stgStores, stgProducts, stgOrders, stgItems } = schema;
const { intFlowerOrdersJoined, intCoffeeOrdersJoined } = schema;

type StagingOps = { [T in StagingTableName]: ModelTableOps<StagingTables[T]> };
type IntermediateOps = { [T in IntermediateTableName]: ModelTableOps<IntermediateTables[T]> };

/** Keyed upserts: every column but the key and `createdAt` is overwritten. */
export const STAGING_OPS: StagingOps = {
  stg_flower_shop__flowers: {
    table: stgFlowers,
    read: (tx) => tx.select().from(stgFlowers),
    write: (tx, rows) =>
      tx.insert(stgFlowers).values(rows).onConflictDoUpdate({
        target: stgFlowers.flowerId,
        set: excludedColumns(stgFlowers, ['flowerId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_flower_shop__flower_arrangements: {
    table: stgFlowerArrangements,
    read: (tx) => tx.select().from(stgFlowerArrangements),
    write: (tx, rows) =>
      tx.insert(stgFlowerArrangements).values(rows).onConflictDoUpdate({
        target: stgFlowerArrangements.arrangementId,
        set: excludedColumns(stgFlowerArrangements, ['arrangementId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_flower_shop__flower_orders: {
    table: stgFlowerOrders,
    read: (tx) => tx.select().from(stgFlowerOrders),
    write: (tx, rows) =>
      tx.insert(stgFlowerOrders).values(rows).onConflictDoUpdate({
        target: stgFlowerOrders.flowerOrderId,
        set: excludedColumns(stgFlowerOrders, ['flowerOrderId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_flower_shop__delivery_info: {
    table: stgDeliveryInfo,
    read: (tx) => tx.select().from(stgDeliveryInfo),
    write: (tx, rows) =>
      tx.insert(stgDeliveryInfo).values(rows).onConflictDoUpdate({
        target: stgDeliveryInfo.deliveryId,
        set: excludedColumns(stgDeliveryInfo, ['deliveryId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_flower_shop__supplies: {
    table: stgSupplies,
    read: (tx) => tx.select().from(stgSupplies),
    write: (tx, rows) =>
      tx.insert(stgSupplies).values(rows).onConflictDoUpdate({
        target: stgSupplies.supplyId,
        set: excludedColumns(stgSupplies, ['supplyId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_jaffle__customers: {
    table: stgCustomers,
    read: (tx) => tx.select().from(stgCustomers),
    write: (tx, rows) =>
      tx.insert(stgCustomers).values(rows).onConflictDoUpdate({
        target: stgCustomers.customerId,
        set: excludedColumns(stgCustomers, ['customerId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_jaffle__stores: {
    table: stgStores,
    read: (tx) => tx.select().from(stgStores),
    write: (tx, rows) =>
      tx.insert(stgStores).values(rows).onConflictDoUpdate({
        target: stgStores.storeId,
        set: excludedColumns(stgStores, ['storeId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_jaffle__products: {
    table: stgProducts,
    read: (tx) => tx.select().from(stgProducts),
    write: (tx, rows) =>
      tx.insert(stgProducts).values(rows).onConflictDoUpdate({
        target: stgProducts.productSku,
        set: excludedColumns(stgProducts, ['productSku', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_jaffle__orders: {
    table: stgOrders,
    read: (tx) => tx.select().from(stgOrders),
    write: (tx, rows) =>
      tx.insert(stgOrders).values(rows).onConflictDoUpdate({
        target: stgOrders.orderId,
        set: excludedColumns(stgOrders, ['orderId', 'createdAt']),
      }).returning(insertedFlag),
  },
  stg_jaffle__items: {
    table: stgItems,
    read: (tx) => tx.select().from(stgItems),
    write: (tx, rows) =>
      tx.insert(stgItems).values(rows).onConflictDoUpdate({
        target: stgItems.itemId,
        set: excludedColumns(stgItems, ['itemId', 'createdAt']),
      }).returning(insertedFlag),
  },
};

export const INTERMEDIATE_OPS: IntermediateOps = {
  int_flower_shop__orders_joined: {
    table: intFlowerOrdersJoined,
    read: (tx) => tx.select().from(intFlowerOrdersJoined),
    write: (tx, rows) =>
      tx.insert(intFlowerOrdersJoined).values(rows).onConflictDoUpdate({
        target: intFlowerOrdersJoined.flowerOrderId,
        set: excludedColumns(intFlowerOrdersJoined, ['flowerOrderId', 'createdAt']),
      }).returning(insertedFlag),
  },
  int_jaffle__orders_joined: {
    table: intCoffeeOrdersJoined,
    read: (tx) => tx.select().from(intCoffeeOrdersJoined),
    write: (tx, rows) =>
      tx.insert(intCoffeeOrdersJoined).values(rows).onConflictDoUpdate({
        target: intCoffeeOrdersJoined.orderId,
        set: excludedColumns(intCoffeeOrdersJoined, ['orderId', 'createdAt']),
      }).returning(insertedFlag),
  },
};

function stagingStores(db: Database): StagingStores {
  return {
    stg_flower_shop__flowers: modelStore(db, STAGING_OPS.stg_flower_shop__flowers),
    stg_flower_shop__flower_arrangements: modelStore(db, STAGING_OPS.stg_flower_shop__flower_arrangements),
    stg_flower_shop__flower_orders: modelStore(db, STAGING_OPS.stg_flower_shop__flower_orders),
    stg_flower_shop__delivery_info: modelStore(db, STAGING_OPS.stg_flower_shop__delivery_info),
    stg_flower_shop__supplies: modelStore(db, STAGING_OPS.stg_flower_shop__supplies),
    stg_jaffle__customers: modelStore(db, STAGING_OPS.stg_jaffle__customers),
    stg_jaffle__stores: modelStore(db, STAGING_OPS.stg_jaffle__stores),
    stg_jaffle__products: modelStore(db, STAGING_OPS.stg_jaffle__products),
    stg_jaffle__orders: modelStore(db, STAGING_OPS.stg_jaffle__orders),
    stg_jaffle__items: modelStore(db, STAGING_OPS.stg_jaffle__items),
  };
}

function intermediateStores(db: Database): IntermediateStores {
  return {
    int_flower_shop__orders_joined: modelStore(db, INTERMEDIATE_OPS.int_flower_shop__orders_joined),
    int_jaffle__orders_joined: modelStore(db, INTERMEDIATE_OPS.int_jaffle__orders_joined),
  };
}

function martStores(db: Database): MartStores {
  const { fctCustomerLifetimeValue, aggDailyRevenue, fctCrossBusinessCustomers, dimCustomers } = schema;

  return {
    fct_customer_lifetime_value: martStore<CustomerLifetimeValue>(db, {
      table: fctCustomerLifetimeValue,
      read: (tx) => tx.select().from(fctCustomerLifetimeValue),
      write: (tx, rows) => tx.insert(fctCustomerLifetimeValue).values(rows),
    }),
    agg_daily_revenue: martStore<DailyRevenue>(db, {
      table: aggDailyRevenue,
      read: (tx) => tx.select().from(aggDailyRevenue),
      write: (tx, rows) => tx.insert(aggDailyRevenue).values(rows),
    }),
    fct_cross_business_customers: martStore<CrossBusinessCustomer>(db, {
      table: fctCrossBusinessCustomers,
      read: (tx) => tx.select().from(fctCrossBusinessCustomers),
      write: (tx, rows) => tx.insert(fctCrossBusinessCustomers).values(rows),
    }),
    dim_customers: martStore<DimCustomer>(db, {
      table: dimCustomers,
      read: (tx) => tx.select().from(dimCustomers),
      write: (tx, rows) => tx.insert(dimCustomers).values(rows),
    }),
  };
}

function auditSink(db: Database): AuditSink {
  return {
    async record(entry) {
      await db.insert(schema.etlAuditLog).values(entry);
    },
    async recordIssues(issues) {
      if (issues.length === 0) return;
      await db.insert(schema.dataQualityIssues).values([...issues]);
    },
    async recordStats(stats) {
      if (stats.length === 0) return;
      await db.insert(schema.processingStats).values([...stats]);
    },
  };
}

// =============================================================================
// Warehouse
// =============================================================================

export class DrizzleWarehouse implements Warehouse {
  readonly raw: RawSources;
  readonly staging: StagingStores;
  readonly intermediate: IntermediateStores;
  readonly marts: MartStores;
  readonly audit: AuditSink;

  constructor(private readonly connection: DatabaseConnection) {
    const { db } = connection;
    this.raw = rawSources(db);
    this.staging = stagingStores(db);
    this.intermediate = intermediateStores(db);
    this.marts = martStores(db);
    this.audit = auditSink(db);
  }

  static connect(databaseUrl: string): DrizzleWarehouse {
    return new DrizzleWarehouse(createDatabase(databaseUrl));
  }

  async ensureSchema(): Promise<void> {
    await ensureSchema(this.connection.client);
  }

  async close(): Promise<void> {
    await this.connection.client.end();
  }
}
