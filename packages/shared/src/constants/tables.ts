/**
 * Warehouse relation names.
 * Raw tables are written by the seeding process; everything else is
 * owned by the ETL run.
 */

export const RAW_TABLES = [
  'raw_flowers',
  'raw_flower_arrangements',
  'raw_flower_orders',
  'raw_delivery_info',
  'raw_supplies',
  'raw_customers',
  'raw_stores',
  'raw_products',
  'raw_orders',
  'raw_items',
] as const;

export type RawTableName = (typeof RAW_TABLES)[number];

export const STAGING_TABLES = [
  'stg_flower_shop__flowers',
  'stg_flower_shop__flower_arrangements',
  'stg_flower_shop__flower_orders',
  'stg_flower_shop__delivery_info',
  'stg_flower_shop__supplies',
  'stg_jaffle__customers',
  'stg_jaffle__stores',
  'stg_jaffle__products',
  'stg_jaffle__orders',
  'stg_jaffle__items',
] as const;

export type StagingTableName = (typeof STAGING_TABLES)[number];

export const INTERMEDIATE_TABLES = [
  'int_flower_shop__orders_joined',
  'int_jaffle__orders_joined',
] as const;

export type IntermediateTableName = (typeof INTERMEDIATE_TABLES)[number];

export type ModelTableName = StagingTableName | IntermediateTableName;

export const MART_TABLES = [
  'fct_customer_lifetime_value',
  'agg_daily_revenue',
  'fct_cross_business_customers',
  'dim_customers',
] as const;

export type MartTableName = (typeof MART_TABLES)[number];
