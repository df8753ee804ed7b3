/**
 * In-process warehouse: raw relations seeded from a dataset, every other
 * relation held in keyed maps. Used by dry runs and tests.
 */

import { MODEL_KEYS, mergeByKey } from '@petalbrew/business-rules';
import {
  rawDatasetSchema,
  type AuditLogEntry,
  type ModelTableName,
  type ProcessingStat,
  type QualityIssue,
  type RawDataset,
  type RawDatasetInput,
  type Stamped,
} from '@petalbrew/shared';
import type {
  AuditSink,
  MartStore,
  MartStores,
  IntermediateStores,
  ModelStore,
  RawSource,
  RawSources,
  StagingStores,
  UpsertResult,
  Warehouse,
} from './types';

class MemoryRawSource<T> implements RawSource<T> {
  constructor(private readonly rows: readonly T[]) {}

  async read(): Promise<T[]> {
    return [...this.rows];
  }
}

export class MemoryModelStore<T> implements ModelStore<T> {
  private rows = new Map<string, Stamped<T>>();

  constructor(private readonly keyOf: (row: T) => string) {}

  /** Copies: editing a returned row never changes what is stored. */
  async read(): Promise<Stamped<T>[]> {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async upsert(rows: readonly T[], now: Date): Promise<UpsertResult> {
    const result = mergeByKey(this.rows, rows, this.keyOf, now);
    this.rows = result.rows;
    return { inserted: result.inserted, updated: result.updated };
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

export class MemoryMartStore<T> implements MartStore<T> {
  private rows: T[] = [];

  async read(): Promise<T[]> {
    return this.rows.map((row) => ({ ...row }));
  }

  async replace(rows: readonly T[]): Promise<void> {
    this.rows = [...rows];
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditLogEntry[] = [];
  readonly issues: QualityIssue[] = [];
  readonly stats: ProcessingStat[] = [];

  async record(entry: AuditLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async recordIssues(issues: readonly QualityIssue[]): Promise<void> {
    this.issues.push(...issues);
  }

  async recordStats(stats: readonly ProcessingStat[]): Promise<void> {
    this.stats.push(...stats);
  }
}

function modelStore<T extends ModelTableName>(table: T) {
  return new MemoryModelStore(MODEL_KEYS[table]);
}

function rawSources(dataset: RawDataset): RawSources {
  return {
    raw_flowers: new MemoryRawSource(dataset.raw_flowers),
    raw_flower_arrangements: new MemoryRawSource(dataset.raw_flower_arrangements),
    raw_flower_orders: new MemoryRawSource(dataset.raw_flower_orders),
    raw_delivery_info: new MemoryRawSource(dataset.raw_delivery_info),
    raw_supplies: new MemoryRawSource(dataset.raw_supplies),
    raw_customers: new MemoryRawSource(dataset.raw_customers),
    raw_stores: new MemoryRawSource(dataset.raw_stores),
    raw_products: new MemoryRawSource(dataset.raw_products),
    raw_orders: new MemoryRawSource(dataset.raw_orders),
    raw_items: new MemoryRawSource(dataset.raw_items),
  };
}

export class MemoryWarehouse implements Warehouse {
  raw: RawSources;
  readonly audit = new MemoryAuditSink();

  readonly staging: StagingStores = {
    stg_flower_shop__flowers: modelStore('stg_flower_shop__flowers'),
    stg_flower_shop__flower_arrangements: modelStore('stg_flower_shop__flower_arrangements'),
    stg_flower_shop__flower_orders: modelStore('stg_flower_shop__flower_orders'),
    stg_flower_shop__delivery_info: modelStore('stg_flower_shop__delivery_info'),
    stg_flower_shop__supplies: modelStore('stg_flower_shop__supplies'),
    stg_jaffle__customers: modelStore('stg_jaffle__customers'),
    stg_jaffle__stores: modelStore('stg_jaffle__stores'),
    stg_jaffle__products: modelStore('stg_jaffle__products'),
    stg_jaffle__orders: modelStore('stg_jaffle__orders'),
    stg_jaffle__items: modelStore('stg_jaffle__items'),
  };

  readonly intermediate: IntermediateStores = {
    int_flower_shop__orders_joined: modelStore('int_flower_shop__orders_joined'),
    int_jaffle__orders_joined: modelStore('int_jaffle__orders_joined'),
  };

  readonly marts: MartStores = {
    fct_customer_lifetime_value: new MemoryMartStore(),
    agg_daily_revenue: new MemoryMartStore(),
    fct_cross_business_customers: new MemoryMartStore(),
    dim_customers: new MemoryMartStore(),
  };

  /** @param dataset - raw rows by table; missing tables start empty */
  constructor(dataset: RawDatasetInput = {}) {
    this.raw = rawSources(rawDatasetSchema.parse(dataset));
  }

  /** Replace the raw snapshot; tables missing from `dataset` become empty. */
  seed(dataset: RawDatasetInput): void {
    this.raw = rawSources(rawDatasetSchema.parse(dataset));
  }

  async ensureSchema(): Promise<void> {}

  async close(): Promise<void> {}
}
