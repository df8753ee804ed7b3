import { describe, it, expect } from 'vitest';
import type { JoinedCoffeeOrder, JoinedFlowerOrder, StgDelivery, StgFlowerOrder } from '@petalbrew/shared';
import { joinFlowerOrder } from '../join';
import {
  acquisitionSource,
  buildCrossBusinessCustomers,
  buildCustomerDimension,
  buildCustomerLifetimeValue,
  buildDailyRevenue,
  flowerOrderRevenue,
  surrogateKey,
  toCustomerOrders,
  type CustomerOrder,
} from '../marts';

function flowerOrder(overrides: Partial<StgFlowerOrder>, delivery?: StgDelivery): JoinedFlowerOrder {
  return joinFlowerOrder(
    {
      flowerOrderId: 'FO1',
      customerName: 'Ava Stone',
      customerEmail: 'ava@example.com',
      customerPhone: null,
      arrangementId: null,
      quantity: 1,
      totalAmount: 0,
      deliveryId: null,
      occasion: null,
      promoCode: null,
      discountAmount: null,
      orderDate: null,
      orderStatus: null,
      ...overrides,
    },
    undefined,
    delivery,
  );
}

function coffeeOrder(overrides: Partial<JoinedCoffeeOrder>): JoinedCoffeeOrder {
  return {
    orderId: 'O1',
    customerId: 'J1',
    customerName: null,
    orderedAt: null,
    orderDate: null,
    storeId: null,
    storeName: null,
    storeTaxRate: null,
    subtotal: null,
    taxPaid: null,
    orderTotal: 0,
    itemCount: 0,
    itemsTotal: 0,
    ...overrides,
  };
}

const fiveDollarDelivery: StgDelivery = {
  deliveryId: 'D1',
  deliveryAddress: '12 Elm St',
  deliveryCity: 'Portland',
  deliveryState: 'OR',
  deliveryZipcode: null,
  deliveryDate: null,
  deliveryTime: null,
  deliveryInstructions: null,
  deliveryStatus: 'delivered',
  deliveryFee: 5,
  recipientName: null,
  recipientPhone: null,
};

const flowers = [
  flowerOrder(
    { flowerOrderId: 'FO1', totalAmount: 60, discountAmount: 10, deliveryId: 'D1', orderDate: '2024-03-01' },
    fiveDollarDelivery,
  ),
  flowerOrder({ flowerOrderId: 'FO2', totalAmount: 40, orderDate: '2024-03-05' }),
  flowerOrder({
    flowerOrderId: 'FO3',
    customerName: 'Ben Ray',
    customerEmail: 'ben@example.com',
    totalAmount: 30,
    orderDate: '2024-03-01',
  }),
];

const coffee = [
  coffeeOrder({ orderId: 'O1', customerId: 'J1', customerName: 'AVA STONE', orderTotal: 12, orderDate: '2024-02-20' }),
  coffeeOrder({ orderId: 'O2', customerId: 'J1', customerName: 'AVA STONE', orderTotal: 8, orderDate: '2024-03-01' }),
  coffeeOrder({ orderId: 'O3', customerId: 'J2', customerName: 'Cara Lin', orderTotal: 5, orderDate: '2024-03-01' }),
];

const orders = toCustomerOrders(flowers, coffee);

describe('surrogateKey', () => {
  it('is a stable md5 hex digest', () => {
    const key = surrogateKey(['ava@example.com', 'flower']);
    expect(key).toMatch(/^[0-9a-f]{32}$/);
    expect(surrogateKey(['ava@example.com', 'flower'])).toBe(key);
    expect(surrogateKey(['ava@example.com', 'jaffle'])).not.toBe(key);
  });

  it('replaces nulls with the sentinel', () => {
    expect(surrogateKey([null, 'x'])).toBe(surrogateKey(['_dbt_utils_surrogate_key_null_', 'x']));
    expect(surrogateKey([null, 'x'])).not.toBe(surrogateKey(['null', 'x']));
  });
});

describe('flowerOrderRevenue', () => {
  it('adds the delivery fee and subtracts the discount', () => {
    const [discounted] = flowers;
    expect(discounted && flowerOrderRevenue(discounted)).toBe(55);
  });
});

describe('buildCustomerLifetimeValue', () => {
  it('aggregates per customer and source', () => {
    const rows = buildCustomerLifetimeValue(orders);

    expect(rows.map(({ customerKey: _key, ...rest }) => rest)).toEqual([
      {
        customerId: 'ava@example.com',
        customerName: 'Ava Stone',
        source: 'flower',
        totalRevenue: 95,
        orderCount: 2,
        avgOrderValue: 47.5,
        firstOrderDate: '2024-03-01',
        lastOrderDate: '2024-03-05',
        customerTenureDays: 4,
      },
      {
        customerId: 'ben@example.com',
        customerName: 'Ben Ray',
        source: 'flower',
        totalRevenue: 30,
        orderCount: 1,
        avgOrderValue: 30,
        firstOrderDate: '2024-03-01',
        lastOrderDate: '2024-03-01',
        customerTenureDays: 0,
      },
      {
        customerId: 'J1',
        customerName: 'AVA STONE',
        source: 'jaffle',
        totalRevenue: 20,
        orderCount: 2,
        avgOrderValue: 10,
        firstOrderDate: '2024-02-20',
        lastOrderDate: '2024-03-01',
        customerTenureDays: 10,
      },
      {
        customerId: 'J2',
        customerName: 'Cara Lin',
        source: 'jaffle',
        totalRevenue: 5,
        orderCount: 1,
        avgOrderValue: 5,
        firstOrderDate: '2024-03-01',
        lastOrderDate: '2024-03-01',
        customerTenureDays: 0,
      },
    ]);
    expect(rows[0]?.customerKey).toBe(surrogateKey(['ava@example.com', 'flower']));
  });
});

describe('buildDailyRevenue', () => {
  it('sums revenue per day and business', () => {
    expect(buildDailyRevenue(orders)).toEqual([
      { orderDate: '2024-02-20', business: 'jaffle', revenue: 12, orderCount: 1, customerCount: 1, avgOrderValue: 12, revenuePerCustomer: 12 },
      { orderDate: '2024-03-01', business: 'flower', revenue: 85, orderCount: 2, customerCount: 2, avgOrderValue: 42.5, revenuePerCustomer: 42.5 },
      { orderDate: '2024-03-01', business: 'jaffle', revenue: 13, orderCount: 2, customerCount: 2, avgOrderValue: 6.5, revenuePerCustomer: 6.5 },
      { orderDate: '2024-03-05', business: 'flower', revenue: 40, orderCount: 1, customerCount: 1, avgOrderValue: 40, revenuePerCustomer: 40 },
    ]);
  });

  it('leaves out undated orders', () => {
    const undated = toCustomerOrders([], [coffeeOrder({ orderTotal: 3 })]);
    expect(buildDailyRevenue(undated)).toEqual([]);
  });
});

describe('buildCrossBusinessCustomers', () => {
  it('matches customers by case- and space-insensitive name', () => {
    expect(buildCrossBusinessCustomers(orders)).toEqual([
      {
        crossBusinessKey: surrogateKey(['J1', 'ava@example.com']),
        customerName: 'AVA STONE',
        jaffleCustomerId: 'J1',
        flowerCustomerEmail: 'ava@example.com',
        firstJaffleOrder: '2024-02-20',
        firstFlowerOrder: '2024-03-01',
        acquisitionSource: 'jaffle_first',
      },
    ]);
  });
});

describe('acquisitionSource', () => {
  it('compares first order dates', () => {
    expect(acquisitionSource('2024-01-01', '2024-02-01')).toBe('jaffle_first');
    expect(acquisitionSource('2024-02-01', '2024-01-01')).toBe('flower_first');
    expect(acquisitionSource('2024-01-01', '2024-01-01')).toBe('same_day');
    expect(acquisitionSource(null, '2024-01-01')).toBe('same_day');
  });
});

describe('buildCustomerDimension', () => {
  it('lists each customer once per business', () => {
    expect(buildCustomerDimension(orders).map((row) => [row.source, row.customerId, row.customerName])).toEqual([
      ['flower', 'ava@example.com', 'Ava Stone'],
      ['flower', 'ben@example.com', 'Ben Ray'],
      ['jaffle', 'J1', 'AVA STONE'],
      ['jaffle', 'J2', 'Cara Lin'],
    ]);
  });
});

describe('customer grouping', () => {
  it('keeps customers apart when a name or id contains the key separator', () => {
    const order = (overrides: Partial<CustomerOrder>): CustomerOrder => ({
      source: 'jaffle',
      orderId: 'O1',
      customerId: 'J1',
      customerName: null,
      orderDate: null,
      revenue: 0,
      ...overrides,
    });
    const orders = [
      order({ orderId: 'O1', customerId: 'y', customerName: 'ava|x', orderDate: '2024-01-01' }),
      order({ orderId: 'O2', customerId: 'x|y', customerName: 'Ava', orderDate: '2024-01-02' }),
      order({
        source: 'flower',
        orderId: 'FO1',
        customerId: 'ava@example.com',
        customerName: 'Ava',
        orderDate: '2024-01-03',
      }),
    ];

    const rows = buildCrossBusinessCustomers(orders);

    expect(rows.map((r) => [r.jaffleCustomerId, r.flowerCustomerEmail, r.acquisitionSource])).toEqual([
      ['x|y', 'ava@example.com', 'jaffle_first'],
    ]);
    expect(buildCustomerLifetimeValue(orders).map((r) => [r.source, r.customerId])).toEqual([
      ['flower', 'ava@example.com'],
      ['jaffle', 'x|y'],
      ['jaffle', 'y'],
    ]);
  });
});
