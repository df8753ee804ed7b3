/**
 * Intermediate Joins & Derived Fields
 *
 * Orders are the driving relation: every staged order yields exactly one
 * joined row. A side with no match contributes nulls (an "orphaned" order)
 * rather than dropping the order.
 */

import {
  DELIVERY_STATUS,
  ORDER_STATUS,
  type JoinedCoffeeOrder,
  type JoinedFlowerOrder,
  type OverallStatus,
  type PricingTier,
  type StgArrangement,
  type StgCoffeeOrder,
  type StgCustomer,
  type StgDelivery,
  type StgFlowerOrder,
  type StgItem,
  type StgProduct,
  type StgStore,
} from '@petalbrew/shared';
import { datePart } from './dates';
import { orZero, roundMoney } from './money';

export function netProductAmount(
  totalAmount: number,
  discountAmount: number | null,
  deliveryFee: number | null,
): number {
  return roundMoney(totalAmount - orZero(discountAmount) - orZero(deliveryFee));
}

export function pricingTier(discountAmount: number | null): PricingTier {
  return discountAmount !== null && discountAmount > 0 ? 'DISCOUNTED' : 'FULL_PRICE';
}

/**
 * Combined order/delivery status. Conditions are evaluated in a fixed order
 * (delivered → in progress → pending → other); the first match wins even when
 * the two sides disagree.
 */
export function overallStatus(deliveryStatus: string | null, orderStatus: string | null): OverallStatus {
  if (deliveryStatus === DELIVERY_STATUS.DELIVERED && orderStatus === ORDER_STATUS.DELIVERED) {
    return 'COMPLETED';
  }
  if (deliveryStatus === DELIVERY_STATUS.IN_TRANSIT || orderStatus === ORDER_STATUS.PREPARING) {
    return 'IN_PROGRESS';
  }
  if (deliveryStatus === DELIVERY_STATUS.PENDING || orderStatus === ORDER_STATUS.CONFIRMED) {
    return 'PENDING';
  }
  return 'OTHER';
}

function indexBy<T>(rows: readonly T[], keyOf: (row: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const row of rows) index.set(keyOf(row), row);
  return index;
}

function lookup<T>(index: ReadonlyMap<string, T>, key: string | null): T | undefined {
  return key === null ? undefined : index.get(key);
}

// =============================================================================
// Flower shop
// =============================================================================

export function joinFlowerOrder(
  order: StgFlowerOrder,
  arrangement: StgArrangement | undefined,
  delivery: StgDelivery | undefined,
): JoinedFlowerOrder {
  const deliveryFee = delivery?.deliveryFee ?? null;
  const deliveryStatus = delivery?.deliveryStatus ?? null;

  return {
    flowerOrderId: order.flowerOrderId,
    customerName: order.customerName,
    customerEmail: order.customerEmail,
    customerPhone: order.customerPhone,
    arrangementId: order.arrangementId,
    arrangementName: arrangement?.arrangementName ?? null,
    arrangementDescription: arrangement?.description ?? null,
    arrangementBasePrice: arrangement?.basePrice ?? null,
    flowerIds: arrangement?.flowerIds ?? null,
    flowerQuantities: arrangement?.flowerQuantities ?? null,
    sizeCategory: arrangement?.sizeCategory ?? null,
    occasionType: arrangement?.occasionType ?? null,
    isCustom: arrangement?.isCustom ?? null,
    quantity: order.quantity,
    totalAmount: order.totalAmount,
    deliveryId: order.deliveryId,
    deliveryAddress: delivery?.deliveryAddress ?? null,
    deliveryCity: delivery?.deliveryCity ?? null,
    deliveryState: delivery?.deliveryState ?? null,
    deliveryZipcode: delivery?.deliveryZipcode ?? null,
    deliveryDate: delivery?.deliveryDate ?? null,
    deliveryTime: delivery?.deliveryTime ?? null,
    deliveryInstructions: delivery?.deliveryInstructions ?? null,
    deliveryStatus,
    deliveryFee,
    recipientName: delivery?.recipientName ?? null,
    recipientPhone: delivery?.recipientPhone ?? null,
    occasion: order.occasion,
    promoCode: order.promoCode,
    discountAmount: order.discountAmount,
    orderDate: order.orderDate,
    orderStatus: order.orderStatus,
    netProductAmount: netProductAmount(order.totalAmount, order.discountAmount, deliveryFee),
    pricingTier: pricingTier(order.discountAmount),
    overallStatus: overallStatus(deliveryStatus, order.orderStatus),
  };
}

export function joinFlowerOrders(
  orders: readonly StgFlowerOrder[],
  arrangements: readonly StgArrangement[],
  deliveries: readonly StgDelivery[],
): JoinedFlowerOrder[] {
  const arrangementsById = indexBy(arrangements, (a) => a.arrangementId);
  const deliveriesById = indexBy(deliveries, (d) => d.deliveryId);

  return orders.map((order) =>
    joinFlowerOrder(
      order,
      lookup(arrangementsById, order.arrangementId),
      lookup(deliveriesById, order.deliveryId),
    ),
  );
}

// =============================================================================
// Coffee shop
// =============================================================================

export function joinCoffeeOrders(
  orders: readonly StgCoffeeOrder[],
  customers: readonly StgCustomer[],
  stores: readonly StgStore[],
  items: readonly StgItem[],
  products: readonly StgProduct[],
): JoinedCoffeeOrder[] {
  const customersById = indexBy(customers, (c) => c.customerId);
  const storesById = indexBy(stores, (s) => s.storeId);
  const productsBySku = indexBy(products, (p) => p.productSku);

  const itemsByOrder = new Map<string, StgItem[]>();
  for (const item of items) {
    const bucket = itemsByOrder.get(item.orderId);
    if (bucket) bucket.push(item);
    else itemsByOrder.set(item.orderId, [item]);
  }

  return orders.map((order) => {
    const customer = customersById.get(order.customerId);
    const store = lookup(storesById, order.storeId);
    const orderItems = itemsByOrder.get(order.orderId) ?? [];
    const itemsTotal = orderItems.reduce(
      (sum, item) => sum + orZero(lookup(productsBySku, item.productSku)?.price),
      0,
    );

    return {
      orderId: order.orderId,
      customerId: order.customerId,
      customerName: customer?.customerName ?? null,
      orderedAt: order.orderedAt,
      orderDate: datePart(order.orderedAt),
      storeId: order.storeId,
      storeName: store?.storeName ?? null,
      storeTaxRate: store?.taxRate ?? null,
      subtotal: order.subtotal,
      taxPaid: order.taxPaid,
      orderTotal: order.orderTotal,
      itemCount: orderItems.length,
      itemsTotal: roundMoney(itemsTotal),
    };
  });
}
