import {
  pgTable, text, integer, doublePrecision, boolean, timestamp, index,
} from 'drizzle-orm/pg-core';
import { OVERALL_STATUSES, PRICING_TIERS } from '@petalbrew/shared';

// =============================================================================
// Flower orders joined with arrangement and delivery
// =============================================================================

export const intFlowerOrdersJoined = pgTable(
  'int_flower_shop__orders_joined',
  {
    flowerOrderId: text('flower_order_id').primaryKey(),
    customerName: text('customer_name'),
    customerEmail: text('customer_email').notNull(),
    customerPhone: text('customer_phone'),
    arrangementId: text('arrangement_id'),
    arrangementName: text('arrangement_name'),
    arrangementDescription: text('arrangement_description'),
    arrangementBasePrice: doublePrecision('arrangement_base_price'),
    flowerIds: text('flower_ids'),
    flowerQuantities: text('flower_quantities'),
    sizeCategory: text('size_category'),
    occasionType: text('occasion_type'),
    isCustom: boolean('is_custom'),
    quantity: integer('quantity').notNull(),
    totalAmount: doublePrecision('total_amount').notNull(),
    deliveryId: text('delivery_id'),
    deliveryAddress: text('delivery_address'),
    deliveryCity: text('delivery_city'),
    deliveryState: text('delivery_state'),
    deliveryZipcode: text('delivery_zipcode'),
    deliveryDate: text('delivery_date'),
    deliveryTime: text('delivery_time'),
    deliveryInstructions: text('delivery_instructions'),
    deliveryStatus: text('delivery_status'),
    deliveryFee: doublePrecision('delivery_fee'),
    recipientName: text('recipient_name'),
    recipientPhone: text('recipient_phone'),
    occasion: text('occasion'),
    promoCode: text('promo_code'),
    discountAmount: doublePrecision('discount_amount'),
    orderDate: text('order_date'),
    orderStatus: text('order_status'),
    netProductAmount: doublePrecision('net_product_amount').notNull(),
    pricingTier: text('pricing_tier', { enum: PRICING_TIERS }).notNull(),
    overallStatus: text('overall_status', { enum: OVERALL_STATUSES }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_int_flower_orders_email').on(table.customerEmail),
    index('idx_int_flower_orders_date').on(table.orderDate),
  ],
);

// =============================================================================
// Coffee orders joined with customer, store and item totals
// =============================================================================

export const intCoffeeOrdersJoined = pgTable(
  'int_jaffle__orders_joined',
  {
    orderId: text('order_id').primaryKey(),
    customerId: text('customer_id').notNull(),
    customerName: text('customer_name'),
    orderedAt: text('ordered_at'),
    orderDate: text('order_date'),
    storeId: text('store_id'),
    storeName: text('store_name'),
    storeTaxRate: doublePrecision('store_tax_rate'),
    subtotal: doublePrecision('subtotal'),
    taxPaid: doublePrecision('tax_paid'),
    orderTotal: doublePrecision('order_total').notNull(),
    itemCount: integer('item_count').notNull(),
    itemsTotal: doublePrecision('items_total').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_int_coffee_orders_customer').on(table.customerId),
    index('idx_int_coffee_orders_date').on(table.orderDate),
  ],
);
