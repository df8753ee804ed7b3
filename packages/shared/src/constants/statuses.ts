// --- Audit log ---
export const AUDIT_STATUSES = {
  STARTED: 'STARTED',
  INFO: 'INFO',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type AuditStatus = (typeof AUDIT_STATUSES)[keyof typeof AUDIT_STATUSES];

// --- Flower orders ---
// Raw status values as the shop systems write them (lower snake case).
export const DELIVERY_STATUS = {
  DELIVERED: 'delivered',
  IN_TRANSIT: 'in_transit',
  PENDING: 'pending',
} as const;

export const ORDER_STATUS = {
  DELIVERED: 'delivered',
  PREPARING: 'preparing',
  CONFIRMED: 'confirmed',
} as const;

export const OVERALL_STATUSES = ['COMPLETED', 'IN_PROGRESS', 'PENDING', 'OTHER'] as const;
export type OverallStatus = (typeof OVERALL_STATUSES)[number];

export const PRICING_TIERS = ['DISCOUNTED', 'FULL_PRICE'] as const;
export type PricingTier = (typeof PRICING_TIERS)[number];

// --- Marts ---
export const BUSINESSES = ['jaffle', 'flower'] as const;
export type Business = (typeof BUSINESSES)[number];

export const ACQUISITION_SOURCES = ['jaffle_first', 'flower_first', 'same_day'] as const;
export type AcquisitionSource = (typeof ACQUISITION_SOURCES)[number];
