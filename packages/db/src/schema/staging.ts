import {
  pgTable, text, integer, doublePrecision, boolean, timestamp,
} from 'drizzle-orm/pg-core';

// Staging relations are keyed by the source's natural id and upserted on
// every run; rows are never deleted. Date columns stay as the source wrote
// them (YYYY-MM-DD text).

const stamps = () => ({
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// =============================================================================
// Flower shop
// =============================================================================

export const stgFlowers = pgTable('stg_flower_shop__flowers', {
  flowerId: text('flower_id').primaryKey(),
  flowerName: text('flower_name').notNull(),
  color: text('color'),
  pricePerStem: doublePrecision('price_per_stem').notNull(),
  supplierId: text('supplier_id'),
  seasonalAvailability: text('seasonal_availability'),
  careDifficulty: text('care_difficulty'),
  lifespanDays: integer('lifespan_days'),
  ...stamps(),
});

export const stgFlowerArrangements = pgTable('stg_flower_shop__flower_arrangements', {
  arrangementId: text('arrangement_id').primaryKey(),
  arrangementName: text('arrangement_name').notNull(),
  description: text('description'),
  basePrice: doublePrecision('base_price').notNull(),
  flowerIds: text('flower_ids'),
  flowerQuantities: text('flower_quantities'),
  sizeCategory: text('size_category'),
  occasionType: text('occasion_type'),
  isCustom: boolean('is_custom'),
  ...stamps(),
});

export const stgFlowerOrders = pgTable('stg_flower_shop__flower_orders', {
  flowerOrderId: text('flower_order_id').primaryKey(),
  customerName: text('customer_name'),
  customerEmail: text('customer_email').notNull(),
  customerPhone: text('customer_phone'),
  arrangementId: text('arrangement_id'),
  quantity: integer('quantity').notNull(),
  totalAmount: doublePrecision('total_amount').notNull(),
  deliveryId: text('delivery_id'),
  occasion: text('occasion'),
  promoCode: text('promo_code'),
  discountAmount: doublePrecision('discount_amount'),
  orderDate: text('order_date'),
  orderStatus: text('order_status'),
  ...stamps(),
});

export const stgDeliveryInfo = pgTable('stg_flower_shop__delivery_info', {
  deliveryId: text('delivery_id').primaryKey(),
  deliveryAddress: text('delivery_address').notNull(),
  deliveryCity: text('delivery_city').notNull(),
  deliveryState: text('delivery_state').notNull(),
  deliveryZipcode: text('delivery_zipcode'),
  deliveryDate: text('delivery_date'),
  deliveryTime: text('delivery_time'),
  deliveryInstructions: text('delivery_instructions'),
  deliveryStatus: text('delivery_status'),
  deliveryFee: doublePrecision('delivery_fee'),
  recipientName: text('recipient_name'),
  recipientPhone: text('recipient_phone'),
  ...stamps(),
});

export const stgSupplies = pgTable('stg_flower_shop__supplies', {
  supplyId: text('supply_id').primaryKey(),
  supplyName: text('supply_name').notNull(),
  cost: doublePrecision('cost').notNull(),
  perishable: boolean('perishable'),
  sku: text('sku'),
  ...stamps(),
});

// =============================================================================
// Coffee shop
// =============================================================================

export const stgCustomers = pgTable('stg_jaffle__customers', {
  customerId: text('customer_id').primaryKey(),
  customerName: text('customer_name').notNull(),
  ...stamps(),
});

export const stgStores = pgTable('stg_jaffle__stores', {
  storeId: text('store_id').primaryKey(),
  storeName: text('store_name').notNull(),
  openedAt: text('opened_at'),
  taxRate: doublePrecision('tax_rate'),
  ...stamps(),
});

export const stgProducts = pgTable('stg_jaffle__products', {
  productSku: text('product_sku').primaryKey(),
  productName: text('product_name').notNull(),
  productType: text('product_type'),
  price: doublePrecision('price').notNull(),
  description: text('description'),
  ...stamps(),
});

export const stgOrders = pgTable('stg_jaffle__orders', {
  orderId: text('order_id').primaryKey(),
  customerId: text('customer_id').notNull(),
  orderedAt: text('ordered_at'),
  storeId: text('store_id'),
  subtotal: doublePrecision('subtotal'),
  taxPaid: doublePrecision('tax_paid'),
  orderTotal: doublePrecision('order_total').notNull(),
  ...stamps(),
});

export const stgItems = pgTable('stg_jaffle__items', {
  itemId: text('item_id').primaryKey(),
  orderId: text('order_id').notNull(),
  productSku: text('product_sku'),
  ...stamps(),
});
