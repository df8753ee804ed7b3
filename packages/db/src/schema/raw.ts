import {
  pgTable, text, integer, doublePrecision, boolean,
} from 'drizzle-orm/pg-core';

// Raw relations are seeded upstream and only ever read by the ETL run.
// Every column is nullable: validity is decided in staging.

// =============================================================================
// Flower shop
// =============================================================================

export const rawFlowers = pgTable('raw_flowers', {
  flowerId: text('flower_id'),
  flowerName: text('flower_name'),
  color: text('color'),
  pricePerStem: doublePrecision('price_per_stem'),
  supplierId: text('supplier_id'),
  seasonalAvailability: text('seasonal_availability'),
  careDifficulty: text('care_difficulty'),
  lifespanDays: integer('lifespan_days'),
});

export const rawFlowerArrangements = pgTable('raw_flower_arrangements', {
  arrangementId: text('arrangement_id'),
  arrangementName: text('arrangement_name'),
  description: text('description'),
  basePrice: doublePrecision('base_price'),
  flowerIds: text('flower_ids'),
  flowerQuantities: text('flower_quantities'),
  size: text('size'),
  occasionType: text('occasion_type'),
  isCustom: boolean('is_custom'),
});

export const rawFlowerOrders = pgTable('raw_flower_orders', {
  flowerOrderId: text('flower_order_id'),
  customerName: text('customer_name'),
  customerEmail: text('customer_email'),
  customerPhone: text('customer_phone'),
  arrangementId: text('arrangement_id'),
  quantity: integer('quantity'),
  totalAmount: doublePrecision('total_amount'),
  deliveryId: text('delivery_id'),
  occasion: text('occasion'),
  promoCode: text('promo_code'),
  discountAmount: doublePrecision('discount_amount'),
  orderDate: text('order_date'),
  orderStatus: text('order_status'),
});

export const rawDeliveryInfo = pgTable('raw_delivery_info', {
  deliveryId: text('delivery_id'),
  deliveryAddress: text('delivery_address'),
  deliveryCity: text('delivery_city'),
  deliveryState: text('delivery_state'),
  deliveryZip: text('delivery_zip'),
  deliveryDate: text('delivery_date'),
  deliveryTimeSlot: text('delivery_time_slot'),
  specialInstructions: text('special_instructions'),
  deliveryStatus: text('delivery_status'),
  deliveryFee: doublePrecision('delivery_fee'),
  recipientName: text('recipient_name'),
  recipientPhone: text('recipient_phone'),
});

export const rawSupplies = pgTable('raw_supplies', {
  id: text('id'),
  name: text('name'),
  cost: doublePrecision('cost'),
  perishable: boolean('perishable'),
  sku: text('sku'),
});

// =============================================================================
// Coffee shop
// =============================================================================

export const rawCustomers = pgTable('raw_customers', {
  id: text('id'),
  name: text('name'),
});

export const rawStores = pgTable('raw_stores', {
  id: text('id'),
  name: text('name'),
  openedAt: text('opened_at'),
  taxRate: doublePrecision('tax_rate'),
});

export const rawProducts = pgTable('raw_products', {
  sku: text('sku'),
  name: text('name'),
  type: text('type'),
  price: doublePrecision('price'),
  description: text('description'),
});

export const rawOrders = pgTable('raw_orders', {
  id: text('id'),
  customer: text('customer'),
  orderedAt: text('ordered_at'),
  storeId: text('store_id'),
  subtotal: doublePrecision('subtotal'),
  taxPaid: doublePrecision('tax_paid'),
  orderTotal: doublePrecision('order_total'),
});

export const rawItems = pgTable('raw_items', {
  id: text('id'),
  orderId: text('order_id'),
  sku: text('sku'),
});
