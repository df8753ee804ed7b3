import { z } from 'zod';
import {
  rawArrangementSchema,
  rawCoffeeOrderSchema,
  rawCustomerSchema,
  rawDeliverySchema,
  rawFlowerOrderSchema,
  rawFlowerSchema,
  rawItemSchema,
  rawProductSchema,
  rawStoreSchema,
  rawSupplySchema,
} from './raw';

/**
 * A full raw snapshot keyed by raw table name.
 * Used to seed the in-memory warehouse for dry runs; absent tables are empty.
 */
export const rawDatasetSchema = z.object({
  raw_flowers: z.array(rawFlowerSchema).default([]),
  raw_flower_arrangements: z.array(rawArrangementSchema).default([]),
  raw_flower_orders: z.array(rawFlowerOrderSchema).default([]),
  raw_delivery_info: z.array(rawDeliverySchema).default([]),
  raw_supplies: z.array(rawSupplySchema).default([]),
  raw_customers: z.array(rawCustomerSchema).default([]),
  raw_stores: z.array(rawStoreSchema).default([]),
  raw_products: z.array(rawProductSchema).default([]),
  raw_orders: z.array(rawCoffeeOrderSchema).default([]),
  raw_items: z.array(rawItemSchema).default([]),
});

export type RawDataset = z.infer<typeof rawDatasetSchema>;

/** Dataset as written in a fixture: tables and columns may be left out. */
export type RawDatasetInput = z.input<typeof rawDatasetSchema>;
