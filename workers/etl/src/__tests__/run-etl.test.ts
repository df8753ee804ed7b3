import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi } from 'vitest';
import type { RawDatasetInput } from '@petalbrew/shared';
import { formatRunResult, runEtl } from '../pipeline/run-etl';
import { loadDataset } from '../warehouse/fixtures';
import { MemoryWarehouse } from '../warehouse/memory';

const NOW = new Date('2024-06-01T12:00:00Z');
const clock = () => NOW;

function shopDataset(overrides: RawDatasetInput = {}): RawDatasetInput {
  return {
    raw_flowers: [{ flowerId: 'F1', flowerName: 'Rose', pricePerStem: 3.5 }],
    raw_flower_arrangements: [{ arrangementId: 'A1', arrangementName: 'Spring Mix', basePrice: 45 }],
    raw_flower_orders: [
      {
        flowerOrderId: 'FO1',
        customerName: 'Ava Stone',
        customerEmail: 'ava@example.com',
        arrangementId: 'A1',
        quantity: 1,
        totalAmount: 55,
        deliveryId: 'D1',
        discountAmount: 5,
        orderDate: '2024-03-01',
        orderStatus: 'delivered',
      },
    ],
    raw_delivery_info: [
      {
        deliveryId: 'D1',
        deliveryAddress: '12 Elm St',
        deliveryCity: 'Portland',
        deliveryState: 'OR',
        deliveryStatus: 'delivered',
        deliveryFee: 10,
      },
    ],
    ...overrides,
  };
}

describe('runEtl', () => {
  it('writes STARTED, one INFO per step and COMPLETED', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());

    const result = await runEtl(warehouse, { procedureName: 'test_etl', clock });

    expect(result.status).toBe('success');
    expect(formatRunResult(result)).toBe(
      'SUCCESS: Shop analytics ETL completed successfully at 2024-06-01T12:00:00.000Z',
    );
    expect(warehouse.audit.entries.map((e) => [e.status, e.message])).toEqual([
      ['STARTED', 'Beginning shop analytics ETL process'],
      ['INFO', 'Processed 1 flower records'],
      ['INFO', 'Processed 1 arrangement records'],
      ['INFO', 'Processed 1 order records'],
      ['INFO', 'Processed 1 delivery records'],
      ['INFO', 'Processed 0 supply records'],
      ['INFO', 'Processed 0 customer records'],
      ['INFO', 'Processed 0 store records'],
      ['INFO', 'Processed 0 product records'],
      ['INFO', 'Processed 0 coffee order records'],
      ['INFO', 'Processed 0 item records'],
      ['INFO', 'Processed 1 joined order records'],
      ['INFO', 'Processed 0 joined coffee order records'],
      ['INFO', 'Rebuilt fct_customer_lifetime_value with 1 records'],
      ['INFO', 'Rebuilt agg_daily_revenue with 1 records'],
      ['INFO', 'Rebuilt fct_cross_business_customers with 0 records'],
      ['INFO', 'Rebuilt dim_customers with 1 records'],
      ['COMPLETED', 'Shop analytics ETL completed successfully in 0 seconds'],
    ]);
    expect(warehouse.audit.entries.every((e) => e.procedureName === 'test_etl')).toBe(true);
    expect(warehouse.audit.issues).toEqual([]);
  });

  it('stamps the closing entry with the run start and end', async () => {
    const times = [new Date('2024-06-01T12:00:00Z')];
    const ticking = () => {
      const last = times[times.length - 1] ?? NOW;
      const next = new Date(last.getTime() + 1000);
      times.push(next);
      return last;
    };
    const warehouse = new MemoryWarehouse(shopDataset());

    const result = await runEtl(warehouse, { clock: ticking });

    const started = warehouse.audit.entries[0];
    const completed = warehouse.audit.entries[warehouse.audit.entries.length - 1];
    expect(started?.endTime).toBeNull();
    expect(completed?.status).toBe('COMPLETED');
    expect(completed?.startTime).toEqual(started?.startTime);
    expect(result.status === 'success' && result.completedAt).toEqual(completed?.endTime);
  });

  it('builds the joined order and the marts from persisted staging', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());

    await runEtl(warehouse, { clock });

    const [order] = await warehouse.intermediate.int_flower_shop__orders_joined.read();
    expect(order).toMatchObject({
      flowerOrderId: 'FO1',
      arrangementName: 'Spring Mix',
      deliveryCity: 'Portland',
      netProductAmount: 40,
      pricingTier: 'DISCOUNTED',
      overallStatus: 'COMPLETED',
    });
    expect(await warehouse.marts.agg_daily_revenue.read()).toEqual([
      {
        orderDate: '2024-03-01',
        business: 'flower',
        revenue: 60,
        orderCount: 1,
        customerCount: 1,
        avgOrderValue: 60,
        revenuePerCustomer: 60,
      },
    ]);
  });

  it('records staging and intermediate row counts for the run date', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());

    await runEtl(warehouse, { clock });

    expect(warehouse.audit.stats).toHaveLength(12);
    expect(warehouse.audit.stats[0]).toEqual({
      tableName: 'stg_flower_shop__flowers',
      recordCount: 1,
      processingDate: '2024-06-01',
    });
    expect(warehouse.audit.stats.find((s) => s.tableName === 'int_jaffle__orders_joined')).toEqual({
      tableName: 'int_jaffle__orders_joined',
      recordCount: 0,
      processingDate: '2024-06-01',
    });
  });

  it('leaves model and mart contents unchanged on a second run', async () => {
    const firstRun = new Date('2024-06-01T12:00:00Z');
    const secondRun = new Date('2024-06-02T12:00:00Z');
    const warehouse = new MemoryWarehouse(shopDataset());

    await runEtl(warehouse, { clock: () => firstRun });
    const orders = await warehouse.staging.stg_flower_shop__flower_orders.read();
    const ltv = await warehouse.marts.fct_customer_lifetime_value.read();

    const result = await runEtl(warehouse, { clock: () => secondRun });

    expect(result.status).toBe('success');
    const rerun = await warehouse.staging.stg_flower_shop__flower_orders.read();
    expect(rerun).toHaveLength(1);
    expect(rerun[0]).toEqual({ ...orders[0], createdAt: firstRun, updatedAt: secondRun });
    expect(await warehouse.marts.fct_customer_lifetime_value.read()).toEqual(ltv);
    expect(await warehouse.intermediate.int_flower_shop__orders_joined.count()).toBe(1);
  });

  it('fails before any write when no flower is valid', async () => {
    const warehouse = new MemoryWarehouse(
      shopDataset({ raw_flowers: [{ flowerId: 'F1', flowerName: 'Rose', pricePerStem: -2 }] }),
    );

    const result = await runEtl(warehouse, { clock });

    expect(result.status).toBe('failed');
    expect(result.status === 'failed' && result.error.kind).toBe('validation');
    expect(formatRunResult(result)).toBe('ERROR: No valid flower records found in raw_flowers table');
    expect(warehouse.audit.entries.map((e) => e.status)).toEqual(['STARTED', 'FAILED']);
    expect(warehouse.audit.entries[1]).toEqual({
      procedureName: 'shop_analytics_etl',
      startTime: NOW,
      endTime: NOW,
      status: 'FAILED',
      message: 'No valid flower records found in raw_flowers table',
    });
    expect(warehouse.audit.issues).toEqual([]);
    expect(await warehouse.staging.stg_flower_shop__flowers.count()).toBe(0);
  });

  it('writes nothing to staging when a later mandatory source is empty', async () => {
    const warehouse = new MemoryWarehouse(shopDataset({ raw_delivery_info: [] }));

    const result = await runEtl(warehouse, { clock });

    expect(formatRunResult(result)).toBe('ERROR: No valid delivery records found in raw_delivery_info table');
    expect(await warehouse.staging.stg_flower_shop__flowers.count()).toBe(0);
    expect(await warehouse.staging.stg_flower_shop__flower_orders.count()).toBe(0);
    expect(warehouse.audit.stats).toEqual([]);
  });

  it('records an unexpected failure when a raw source throws', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());
    warehouse.raw.raw_orders = {
      read: async () => {
        throw new Error('boom');
      },
    };

    const result = await runEtl(warehouse, { clock });

    expect(result.status === 'failed' && result.error.kind).toBe('unexpected');
    expect(warehouse.audit.entries.map((e) => [e.status, e.message])).toEqual([
      ['STARTED', 'Beginning shop analytics ETL process'],
      ['FAILED', 'boom'],
    ]);
  });

  it('rejects without a FAILED entry when STARTED cannot be written', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());
    vi.spyOn(warehouse.audit, 'record').mockRejectedValueOnce(new Error('db down'));

    await expect(runEtl(warehouse, { clock })).rejects.toThrow('db down');

    expect(warehouse.audit.entries).toEqual([]);
    expect(await warehouse.staging.stg_flower_shop__flowers.count()).toBe(0);
  });

  it('keeps batches committed before a storage failure', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());
    vi.spyOn(warehouse.staging.stg_flower_shop__delivery_info, 'upsert').mockRejectedValue(
      new Error('disk full'),
    );

    const result = await runEtl(warehouse, { clock });

    expect(formatRunResult(result)).toBe('ERROR: disk full');
    expect(await warehouse.staging.stg_flower_shop__flower_orders.count()).toBe(1);
    expect(await warehouse.staging.stg_flower_shop__delivery_info.count()).toBe(0);
    expect(warehouse.audit.entries.map((e) => e.status)).toEqual([
      'STARTED',
      'INFO',
      'INFO',
      'INFO',
      'FAILED',
    ]);
  });

  it('reports negative prices and still stages the valid flowers', async () => {
    const flowers = Array.from({ length: 10 }, (_, i) => ({
      flowerId: `F${i + 1}`,
      flowerName: 'Rose',
      pricePerStem: i === 0 ? 3.5 : -1,
    }));
    const warehouse = new MemoryWarehouse(shopDataset({ raw_flowers: flowers }));

    const result = await runEtl(warehouse, { clock });

    expect(result.status).toBe('success');
    expect(warehouse.audit.issues).toEqual([
      { tableName: 'raw_flowers', issueType: 'NEGATIVE_PRICE', issueCount: 9, detectedAt: NOW },
    ]);
    expect(warehouse.audit.entries[1]?.message).toBe('Processed 1 flower records');
  });

  it('drops the one negatively priced flower out of ten', async () => {
    const flowers = Array.from({ length: 10 }, (_, i) => ({
      flowerId: `F${i + 1}`,
      flowerName: 'Tulip',
      pricePerStem: i === 4 ? -1 : 2,
    }));
    const warehouse = new MemoryWarehouse(shopDataset({ raw_flowers: flowers }));

    await runEtl(warehouse, { clock });

    expect(await warehouse.staging.stg_flower_shop__flowers.count()).toBe(9);
    expect(warehouse.audit.issues).toEqual([
      { tableName: 'raw_flowers', issueType: 'NEGATIVE_PRICE', issueCount: 1, detectedAt: NOW },
    ]);
  });

  it('stages orders with a malformed email and reports them', async () => {
    const warehouse = new MemoryWarehouse(shopDataset());
    const dataset = shopDataset();
    warehouse.seed({
      ...dataset,
      raw_flower_orders: [
        ...(dataset.raw_flower_orders ?? []),
        { flowerOrderId: 'FO2', customerEmail: 'not-an-email', quantity: 1, totalAmount: 20, arrangementId: 'A1' },
      ],
    });

    await runEtl(warehouse, { clock });

    expect(await warehouse.staging.stg_flower_shop__flower_orders.count()).toBe(2);
    expect(warehouse.audit.issues).toEqual([
      { tableName: 'raw_flower_orders', issueType: 'INVALID_EMAIL', issueCount: 1, detectedAt: NOW },
    ]);
  });

  it('keeps an order whose delivery matched nothing', async () => {
    const dataset = shopDataset();
    const warehouse = new MemoryWarehouse({
      ...dataset,
      raw_flower_orders: [
        {
          flowerOrderId: 'FO1',
          customerEmail: 'ava@example.com',
          arrangementId: 'A1',
          quantity: 1,
          totalAmount: 30,
          deliveryId: 'D9',
          orderDate: '2024-03-01',
          orderStatus: 'confirmed',
        },
      ],
    });

    await runEtl(warehouse, { clock });

    const [order] = await warehouse.intermediate.int_flower_shop__orders_joined.read();
    expect(order).toMatchObject({
      flowerOrderId: 'FO1',
      deliveryId: 'D9',
      deliveryCity: null,
      deliveryFee: null,
      netProductAmount: 30,
      overallStatus: 'PENDING',
    });
    expect(warehouse.audit.issues).toEqual([]);
  });

  it('marks an unmatched delivery OTHER when the order status says nothing', async () => {
    const warehouse = new MemoryWarehouse(
      shopDataset({
        raw_flower_orders: [
          {
            flowerOrderId: 'FO1',
            customerEmail: 'ava@example.com',
            arrangementId: 'A1',
            quantity: 1,
            totalAmount: 30,
            deliveryId: 'D9',
            orderStatus: 'cancelled',
          },
        ],
      }),
    );

    await runEtl(warehouse, { clock });

    const [order] = await warehouse.intermediate.int_flower_shop__orders_joined.read();
    expect(order?.deliveryStatus).toBeNull();
    expect(order?.overallStatus).toBe('OTHER');
  });

  it('runs the sample dataset end to end', async () => {
    const fixture = fileURLToPath(new URL('../../fixtures/sample-shops.json', import.meta.url));
    const warehouse = new MemoryWarehouse(await loadDataset(fixture));

    const result = await runEtl(warehouse, { clock });

    expect(result.status).toBe('success');
    expect(warehouse.audit.issues.map((i) => [i.tableName, i.issueType, i.issueCount])).toEqual([
      ['raw_flowers', 'NEGATIVE_PRICE', 1],
      ['raw_flower_orders', 'INVALID_EMAIL', 1],
      ['int_flower_shop__orders_joined', 'MISSING_ARRANGEMENT', 1],
      ['int_flower_shop__orders_joined', 'NEGATIVE_NET_AMOUNT', 1],
      ['int_flower_shop__orders_joined', 'FUTURE_ORDER_DATE', 1],
      ['int_jaffle__orders_joined', 'MISSING_CUSTOMER', 1],
    ]);
    expect(await warehouse.staging.stg_flower_shop__flower_orders.count()).toBe(5);
    expect(await warehouse.staging.stg_flower_shop__delivery_info.count()).toBe(3);

    const crossBusiness = await warehouse.marts.fct_cross_business_customers.read();
    expect(crossBusiness).toHaveLength(1);
    expect(crossBusiness[0]).toMatchObject({
      customerName: 'AVA STONE',
      jaffleCustomerId: 'J1',
      flowerCustomerEmail: 'ava@example.com',
      firstJaffleOrder: '2024-02-20',
      firstFlowerOrder: '2024-03-01',
      acquisitionSource: 'jaffle_first',
    });
  });
});
