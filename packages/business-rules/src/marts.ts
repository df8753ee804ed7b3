/**
 * Cross-business marts, rebuilt in full from the intermediate tables.
 *
 * Flower customers are identified by email, coffee customers by id.
 * Flower revenue per order is total + delivery fee − discount.
 */

import { createHash } from 'node:crypto';
import type {
  AcquisitionSource,
  Business,
  CrossBusinessCustomer,
  CustomerLifetimeValue,
  DailyRevenue,
  DimCustomer,
  JoinedCoffeeOrder,
  JoinedFlowerOrder,
} from '@petalbrew/shared';
import { daysBetween } from './dates';
import { orZero, roundMoney } from './money';

const SURROGATE_NULL = '_dbt_utils_surrogate_key_null_';

/** md5 over the parts joined with "-", nulls replaced by a sentinel. */
export function surrogateKey(parts: readonly (string | null)[]): string {
  const joined = parts.map((part) => part ?? SURROGATE_NULL).join('-');
  return createHash('md5').update(joined).digest('hex');
}

export function flowerOrderRevenue(order: JoinedFlowerOrder): number {
  return roundMoney(order.totalAmount + orZero(order.deliveryFee) - orZero(order.discountAmount));
}

/** One order from either business, reduced to what the marts aggregate. */
export interface CustomerOrder {
  source: Business;
  orderId: string;
  customerId: string;
  customerName: string | null;
  orderDate: string | null;
  revenue: number;
}

export function toCustomerOrders(
  flowerOrders: readonly JoinedFlowerOrder[],
  coffeeOrders: readonly JoinedCoffeeOrder[],
): CustomerOrder[] {
  return [
    ...coffeeOrders.map((order): CustomerOrder => ({
      source: 'jaffle',
      orderId: order.orderId,
      customerId: order.customerId,
      customerName: order.customerName,
      orderDate: order.orderDate,
      revenue: order.orderTotal,
    })),
    ...flowerOrders.map((order): CustomerOrder => ({
      source: 'flower',
      orderId: order.flowerOrderId,
      customerId: order.customerEmail,
      customerName: order.customerName,
      orderDate: order.orderDate,
      revenue: flowerOrderRevenue(order),
    })),
  ];
}

/** Orders sorted by date, undated orders last; stable for ties. */
function chronological(orders: readonly CustomerOrder[]): CustomerOrder[] {
  return [...orders].sort((a, b) => {
    if (a.orderDate === b.orderDate) return 0;
    if (a.orderDate === null) return 1;
    if (b.orderDate === null) return -1;
    return a.orderDate < b.orderDate ? -1 : 1;
  });
}

function groupBy<T>(rows: readonly T[], keyOf: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) group.push(row);
    else groups.set(key, [row]);
  }
  return groups;
}

/** Group by a two-part key; the parts are never joined into one string. */
function groupByPair<T>(
  rows: readonly T[],
  outerKey: (row: T) => string,
  innerKey: (row: T) => string,
): T[][] {
  const groups = new Map<string, Map<string, T[]>>();
  for (const row of rows) {
    const outer = outerKey(row);
    let inner = groups.get(outer);
    if (!inner) {
      inner = new Map();
      groups.set(outer, inner);
    }
    const group = inner.get(innerKey(row));
    if (group) group.push(row);
    else inner.set(innerKey(row), [row]);
  }
  return [...groups.values()].flatMap((inner) => [...inner.values()]);
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : roundMoney(numerator / denominator);
}

const bySourceThenId = (a: { source: Business; customerId: string }, b: { source: Business; customerId: string }) =>
  a.source.localeCompare(b.source) || a.customerId.localeCompare(b.customerId);

// =============================================================================
// fct_customer_lifetime_value
// =============================================================================

export function buildCustomerLifetimeValue(orders: readonly CustomerOrder[]): CustomerLifetimeValue[] {
  const groups = groupByPair(chronological(orders), (o) => o.source, (o) => o.customerId);
  const rows: CustomerLifetimeValue[] = [];

  for (const group of groups) {
    const [first] = group;
    if (!first) continue;

    const dated = group.filter((o) => o.orderDate !== null);
    const firstOrderDate = dated[0]?.orderDate ?? null;
    const lastOrderDate = dated[dated.length - 1]?.orderDate ?? null;
    const totalRevenue = roundMoney(group.reduce((sum, o) => sum + o.revenue, 0));
    const orderCount = new Set(group.map((o) => o.orderId)).size;

    rows.push({
      customerKey: surrogateKey([first.customerId, first.source]),
      customerId: first.customerId,
      customerName: first.customerName,
      source: first.source,
      totalRevenue,
      orderCount,
      avgOrderValue: ratio(totalRevenue, orderCount),
      firstOrderDate,
      lastOrderDate,
      customerTenureDays:
        firstOrderDate !== null && lastOrderDate !== null
          ? daysBetween(firstOrderDate, lastOrderDate)
          : null,
    });
  }

  return rows.sort(bySourceThenId);
}

// =============================================================================
// agg_daily_revenue
// =============================================================================

/** Undated orders are left out: they belong to no day. */
export function buildDailyRevenue(orders: readonly CustomerOrder[]): DailyRevenue[] {
  const dated = orders.filter((o): o is CustomerOrder & { orderDate: string } => o.orderDate !== null);
  const groups = groupByPair(dated, (o) => o.orderDate, (o) => o.source);
  const rows: DailyRevenue[] = [];

  for (const group of groups) {
    const [first] = group;
    if (!first) continue;

    const revenue = roundMoney(group.reduce((sum, o) => sum + o.revenue, 0));
    const orderCount = new Set(group.map((o) => o.orderId)).size;
    const customerCount = new Set(group.map((o) => o.customerId)).size;

    rows.push({
      orderDate: first.orderDate,
      business: first.source,
      revenue,
      orderCount,
      customerCount,
      avgOrderValue: ratio(revenue, orderCount),
      revenuePerCustomer: ratio(revenue, customerCount),
    });
  }

  return rows.sort((a, b) => a.orderDate.localeCompare(b.orderDate) || a.business.localeCompare(b.business));
}

// =============================================================================
// fct_cross_business_customers
// =============================================================================

export function normalizeCustomerName(name: string): string {
  return name.trim().toLowerCase();
}

interface FirstOrder {
  normalizedName: string;
  customerId: string;
  customerName: string;
  firstOrderDate: string | null;
}

function firstOrdersBySource(orders: readonly CustomerOrder[], source: Business): FirstOrder[] {
  const named = chronological(orders).filter(
    (o): o is CustomerOrder & { customerName: string } => o.source === source && o.customerName !== null,
  );
  // normalized name → customer id → first order
  const firsts = new Map<string, Map<string, FirstOrder>>();

  for (const order of named) {
    const normalizedName = normalizeCustomerName(order.customerName);
    let byId = firsts.get(normalizedName);
    if (!byId) {
      byId = new Map();
      firsts.set(normalizedName, byId);
    }
    if (!byId.has(order.customerId)) {
      byId.set(order.customerId, {
        normalizedName,
        customerId: order.customerId,
        customerName: order.customerName,
        firstOrderDate: order.orderDate,
      });
    }
  }

  return [...firsts.values()].flatMap((byId) => [...byId.values()]);
}

/** Missing dates on either side count as a same-day acquisition. */
export function acquisitionSource(firstJaffle: string | null, firstFlower: string | null): AcquisitionSource {
  if (firstJaffle !== null && firstFlower !== null) {
    if (firstJaffle < firstFlower) return 'jaffle_first';
    if (firstFlower < firstJaffle) return 'flower_first';
  }
  return 'same_day';
}

export function buildCrossBusinessCustomers(orders: readonly CustomerOrder[]): CrossBusinessCustomer[] {
  const flowerByName = groupBy(firstOrdersBySource(orders, 'flower'), (c) => c.normalizedName);
  const rows: CrossBusinessCustomer[] = [];

  for (const jaffle of firstOrdersBySource(orders, 'jaffle')) {
    for (const flower of flowerByName.get(jaffle.normalizedName) ?? []) {
      rows.push({
        crossBusinessKey: surrogateKey([jaffle.customerId, flower.customerId]),
        customerName: jaffle.customerName,
        jaffleCustomerId: jaffle.customerId,
        flowerCustomerEmail: flower.customerId,
        firstJaffleOrder: jaffle.firstOrderDate,
        firstFlowerOrder: flower.firstOrderDate,
        acquisitionSource: acquisitionSource(jaffle.firstOrderDate, flower.firstOrderDate),
      });
    }
  }

  return rows.sort(
    (a, b) =>
      a.jaffleCustomerId.localeCompare(b.jaffleCustomerId) ||
      a.flowerCustomerEmail.localeCompare(b.flowerCustomerEmail),
  );
}

// =============================================================================
// dim_customers
// =============================================================================

/** One row per (customer, source); the name comes from the earliest order. */
export function buildCustomerDimension(orders: readonly CustomerOrder[]): DimCustomer[] {
  const customers = new Map<string, DimCustomer>();

  for (const order of chronological(orders)) {
    const customerKey = surrogateKey([order.customerId, order.source]);
    if (customers.has(customerKey)) continue;
    customers.set(customerKey, {
      customerKey,
      customerId: order.customerId,
      customerName: order.customerName,
      source: order.source,
    });
  }

  return [...customers.values()].sort(bySourceThenId);
}
