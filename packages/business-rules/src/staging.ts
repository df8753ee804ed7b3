/**
 * Staging Normalization
 *
 * One model per raw relation: a validity predicate folded into `toStaging`
 * (invalid rows map to null), a natural key, and the quality checks that run
 * against the raw rows and the staged batch.
 */

import {
  ISSUE_TYPES,
  type RawTableName,
  type RawTables,
  type StagingTableName,
  type StagingTables,
} from '@petalbrew/shared';
import { isValidEmail, type RowCheck } from './quality';

export interface StagingModel<R extends RawTableName, S extends StagingTableName> {
  source: R;
  target: S;
  /** Noun used in audit messages, e.g. "Processed 9 flower records". */
  label: string;
  /** A mandatory table with no valid rows fails the run. */
  mandatory: boolean;
  toStaging(raw: RawTables[R]): StagingTables[S] | null;
  keyOf(row: StagingTables[S]): string;
  rawChecks?: RowCheck<RawTables[R]>[];
  stagedChecks?: RowCheck<StagingTables[S]>[];
}

/** Non-null and not blank. */
function present(value: string | null): value is string {
  return value !== null && value.trim().length > 0;
}

function trimToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Apply a model to a raw batch, keeping only rows that pass its predicate. */
export function stageRecords<R extends RawTableName, S extends StagingTableName>(
  model: StagingModel<R, S>,
  rows: readonly RawTables[R][],
): StagingTables[S][] {
  const staged: StagingTables[S][] = [];
  for (const raw of rows) {
    const row = model.toStaging(raw);
    if (row !== null) staged.push(row);
  }
  return staged;
}

// =============================================================================
// Flower shop
// =============================================================================

export const flowersModel: StagingModel<'raw_flowers', 'stg_flower_shop__flowers'> = {
  source: 'raw_flowers',
  target: 'stg_flower_shop__flowers',
  label: 'flower',
  mandatory: true,
  toStaging(raw) {
    if (!present(raw.flowerId) || !present(raw.flowerName)) return null;
    if (raw.pricePerStem === null || raw.pricePerStem <= 0) return null;
    return {
      flowerId: raw.flowerId,
      flowerName: raw.flowerName,
      color: raw.color,
      pricePerStem: raw.pricePerStem,
      supplierId: raw.supplierId,
      seasonalAvailability: raw.seasonalAvailability,
      careDifficulty: raw.careDifficulty,
      lifespanDays: raw.lifespanDays,
    };
  },
  keyOf: (row) => row.flowerId,
  rawChecks: [
    {
      issueType: ISSUE_TYPES.NEGATIVE_PRICE,
      tableName: 'raw_flowers',
      matches: (raw) => raw.flowerId !== null && raw.pricePerStem !== null && raw.pricePerStem <= 0,
    },
  ],
};

export const arrangementsModel: StagingModel<
  'raw_flower_arrangements',
  'stg_flower_shop__flower_arrangements'
> = {
  source: 'raw_flower_arrangements',
  target: 'stg_flower_shop__flower_arrangements',
  label: 'arrangement',
  mandatory: true,
  toStaging(raw) {
    if (!present(raw.arrangementId) || !present(raw.arrangementName)) return null;
    if (raw.basePrice === null || raw.basePrice <= 0) return null;
    return {
      arrangementId: raw.arrangementId,
      arrangementName: raw.arrangementName,
      description: raw.description,
      basePrice: raw.basePrice,
      flowerIds: raw.flowerIds,
      flowerQuantities: raw.flowerQuantities,
      sizeCategory: raw.size,
      occasionType: raw.occasionType,
      isCustom: raw.isCustom,
    };
  },
  keyOf: (row) => row.arrangementId,
};

export const flowerOrdersModel: StagingModel<'raw_flower_orders', 'stg_flower_shop__flower_orders'> = {
  source: 'raw_flower_orders',
  target: 'stg_flower_shop__flower_orders',
  label: 'order',
  mandatory: true,
  toStaging(raw) {
    if (!present(raw.flowerOrderId) || !present(raw.customerEmail)) return null;
    if (raw.totalAmount === null || raw.totalAmount < 0) return null;
    if (raw.quantity === null || raw.quantity <= 0) return null;
    return {
      flowerOrderId: raw.flowerOrderId,
      customerName: trimToNull(raw.customerName),
      customerEmail: raw.customerEmail,
      customerPhone: raw.customerPhone,
      arrangementId: raw.arrangementId,
      quantity: raw.quantity,
      totalAmount: raw.totalAmount,
      deliveryId: raw.deliveryId,
      occasion: raw.occasion,
      promoCode: raw.promoCode,
      discountAmount: raw.discountAmount,
      orderDate: raw.orderDate,
      orderStatus: raw.orderStatus,
    };
  },
  keyOf: (row) => row.flowerOrderId,
  // Format is reported, not enforced: a malformed address is still staged.
  stagedChecks: [
    {
      issueType: ISSUE_TYPES.INVALID_EMAIL,
      tableName: 'raw_flower_orders',
      matches: (row) => !isValidEmail(row.customerEmail),
    },
  ],
};

export const deliveryModel: StagingModel<'raw_delivery_info', 'stg_flower_shop__delivery_info'> = {
  source: 'raw_delivery_info',
  target: 'stg_flower_shop__delivery_info',
  label: 'delivery',
  mandatory: true,
  toStaging(raw) {
    if (
      !present(raw.deliveryId) ||
      !present(raw.deliveryAddress) ||
      !present(raw.deliveryCity) ||
      !present(raw.deliveryState)
    ) {
      return null;
    }
    return {
      deliveryId: raw.deliveryId,
      deliveryAddress: raw.deliveryAddress,
      deliveryCity: raw.deliveryCity,
      deliveryState: raw.deliveryState,
      deliveryZipcode: raw.deliveryZip,
      deliveryDate: raw.deliveryDate,
      deliveryTime: raw.deliveryTimeSlot,
      deliveryInstructions: raw.specialInstructions,
      deliveryStatus: raw.deliveryStatus,
      deliveryFee: raw.deliveryFee,
      recipientName: raw.recipientName,
      recipientPhone: raw.recipientPhone,
    };
  },
  keyOf: (row) => row.deliveryId,
};

export const suppliesModel: StagingModel<'raw_supplies', 'stg_flower_shop__supplies'> = {
  source: 'raw_supplies',
  target: 'stg_flower_shop__supplies',
  label: 'supply',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.id) || !present(raw.name)) return null;
    if (raw.cost === null || raw.cost < 0) return null;
    return {
      supplyId: raw.id,
      supplyName: raw.name,
      cost: raw.cost,
      perishable: raw.perishable,
      sku: raw.sku,
    };
  },
  keyOf: (row) => row.supplyId,
};

// =============================================================================
// Coffee shop
// =============================================================================

export const customersModel: StagingModel<'raw_customers', 'stg_jaffle__customers'> = {
  source: 'raw_customers',
  target: 'stg_jaffle__customers',
  label: 'customer',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.id) || !present(raw.name)) return null;
    return { customerId: raw.id, customerName: raw.name.trim() };
  },
  keyOf: (row) => row.customerId,
};

export const storesModel: StagingModel<'raw_stores', 'stg_jaffle__stores'> = {
  source: 'raw_stores',
  target: 'stg_jaffle__stores',
  label: 'store',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.id) || !present(raw.name)) return null;
    return {
      storeId: raw.id,
      storeName: raw.name,
      openedAt: raw.openedAt,
      taxRate: raw.taxRate,
    };
  },
  keyOf: (row) => row.storeId,
};

export const productsModel: StagingModel<'raw_products', 'stg_jaffle__products'> = {
  source: 'raw_products',
  target: 'stg_jaffle__products',
  label: 'product',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.sku) || !present(raw.name)) return null;
    if (raw.price === null || raw.price < 0) return null;
    return {
      productSku: raw.sku,
      productName: raw.name,
      productType: raw.type,
      price: raw.price,
      description: raw.description,
    };
  },
  keyOf: (row) => row.productSku,
};

export const coffeeOrdersModel: StagingModel<'raw_orders', 'stg_jaffle__orders'> = {
  source: 'raw_orders',
  target: 'stg_jaffle__orders',
  label: 'coffee order',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.id) || !present(raw.customer)) return null;
    if (raw.orderTotal === null || raw.orderTotal < 0) return null;
    return {
      orderId: raw.id,
      customerId: raw.customer,
      orderedAt: raw.orderedAt,
      storeId: raw.storeId,
      subtotal: raw.subtotal,
      taxPaid: raw.taxPaid,
      orderTotal: raw.orderTotal,
    };
  },
  keyOf: (row) => row.orderId,
};

export const itemsModel: StagingModel<'raw_items', 'stg_jaffle__items'> = {
  source: 'raw_items',
  target: 'stg_jaffle__items',
  label: 'item',
  mandatory: false,
  toStaging(raw) {
    if (!present(raw.id) || !present(raw.orderId)) return null;
    return { itemId: raw.id, orderId: raw.orderId, productSku: raw.sku };
  },
  keyOf: (row) => row.itemId,
};
