import {
  pgTable, text, integer, doublePrecision, primaryKey,
} from 'drizzle-orm/pg-core';
import { ACQUISITION_SOURCES, BUSINESSES } from '@petalbrew/shared';

// Marts are replaced in full on every successful run.

export const fctCustomerLifetimeValue = pgTable('fct_customer_lifetime_value', {
  customerKey: text('customer_key').primaryKey(),
  customerId: text('customer_id').notNull(),
  customerName: text('customer_name'),
  source: text('source', { enum: BUSINESSES }).notNull(),
  totalRevenue: doublePrecision('total_revenue').notNull(),
  orderCount: integer('order_count').notNull(),
  avgOrderValue: doublePrecision('avg_order_value').notNull(),
  firstOrderDate: text('first_order_date'),
  lastOrderDate: text('last_order_date'),
  customerTenureDays: integer('customer_tenure_days'),
});

export const aggDailyRevenue = pgTable(
  'agg_daily_revenue',
  {
    orderDate: text('order_date').notNull(),
    business: text('business', { enum: BUSINESSES }).notNull(),
    revenue: doublePrecision('revenue').notNull(),
    orderCount: integer('order_count').notNull(),
    customerCount: integer('customer_count').notNull(),
    avgOrderValue: doublePrecision('avg_order_value').notNull(),
    revenuePerCustomer: doublePrecision('revenue_per_customer').notNull(),
  },
  (table) => [primaryKey({ columns: [table.orderDate, table.business] })],
);

export const fctCrossBusinessCustomers = pgTable('fct_cross_business_customers', {
  crossBusinessKey: text('cross_business_key').primaryKey(),
  customerName: text('customer_name').notNull(),
  jaffleCustomerId: text('jaffle_customer_id').notNull(),
  flowerCustomerEmail: text('flower_customer_email').notNull(),
  firstJaffleOrder: text('first_jaffle_order'),
  firstFlowerOrder: text('first_flower_order'),
  acquisitionSource: text('acquisition_source', { enum: ACQUISITION_SOURCES }).notNull(),
});

export const dimCustomers = pgTable('dim_customers', {
  customerKey: text('customer_key').primaryKey(),
  customerId: text('customer_id').notNull(),
  customerName: text('customer_name'),
  source: text('source', { enum: BUSINESSES }).notNull(),
});
