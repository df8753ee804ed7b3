import { z } from 'zod';

// Raw columns arrive unvalidated: every field may be missing or null.
const text = () => z.string().nullable().default(null);
const num = () => z.number().nullable().default(null);
const int = () => z.number().int().nullable().default(null);
const bool = () => z.boolean().nullable().default(null);

// =============================================================================
// Flower shop
// =============================================================================

export const rawFlowerSchema = z.object({
  flowerId: text(),
  flowerName: text(),
  color: text(),
  pricePerStem: num(),
  supplierId: text(),
  seasonalAvailability: text(),
  careDifficulty: text(),
  lifespanDays: int(),
});
export type RawFlower = z.infer<typeof rawFlowerSchema>;

export const rawArrangementSchema = z.object({
  arrangementId: text(),
  arrangementName: text(),
  description: text(),
  basePrice: num(),
  flowerIds: text(),
  flowerQuantities: text(),
  size: text(),
  occasionType: text(),
  isCustom: bool(),
});
export type RawArrangement = z.infer<typeof rawArrangementSchema>;

export const rawFlowerOrderSchema = z.object({
  flowerOrderId: text(),
  customerName: text(),
  customerEmail: text(),
  customerPhone: text(),
  arrangementId: text(),
  quantity: int(),
  totalAmount: num(),
  deliveryId: text(),
  occasion: text(),
  promoCode: text(),
  discountAmount: num(),
  orderDate: text(), // YYYY-MM-DD
  orderStatus: text(),
});
export type RawFlowerOrder = z.infer<typeof rawFlowerOrderSchema>;

export const rawDeliverySchema = z.object({
  deliveryId: text(),
  deliveryAddress: text(),
  deliveryCity: text(),
  deliveryState: text(),
  deliveryZip: text(),
  deliveryDate: text(),
  deliveryTimeSlot: text(),
  specialInstructions: text(),
  deliveryStatus: text(),
  deliveryFee: num(),
  recipientName: text(),
  recipientPhone: text(),
});
export type RawDelivery = z.infer<typeof rawDeliverySchema>;

export const rawSupplySchema = z.object({
  id: text(),
  name: text(),
  cost: num(),
  perishable: bool(),
  sku: text(),
});
export type RawSupply = z.infer<typeof rawSupplySchema>;

// =============================================================================
// Coffee shop
// =============================================================================

export const rawCustomerSchema = z.object({
  id: text(),
  name: text(),
});
export type RawCustomer = z.infer<typeof rawCustomerSchema>;

export const rawStoreSchema = z.object({
  id: text(),
  name: text(),
  openedAt: text(),
  taxRate: num(),
});
export type RawStore = z.infer<typeof rawStoreSchema>;

export const rawProductSchema = z.object({
  sku: text(),
  name: text(),
  type: text(),
  price: num(),
  description: text(),
});
export type RawProduct = z.infer<typeof rawProductSchema>;

export const rawCoffeeOrderSchema = z.object({
  id: text(),
  customer: text(),
  orderedAt: text(), // ISO timestamp
  storeId: text(),
  subtotal: num(),
  taxPaid: num(),
  orderTotal: num(),
});
export type RawCoffeeOrder = z.infer<typeof rawCoffeeOrderSchema>;

export const rawItemSchema = z.object({
  id: text(),
  orderId: text(),
  sku: text(),
});
export type RawItem = z.infer<typeof rawItemSchema>;
