import type { RawDataset } from '../schemas/dataset';
import type { IssueType } from '../constants/quality-issues';
import type {
  AcquisitionSource,
  AuditStatus,
  Business,
  OverallStatus,
  PricingTier,
} from '../constants/statuses';

/** Row type of each raw table. */
export type RawTables = { [T in keyof RawDataset]: RawDataset[T][number] };

// =============================================================================
// Staging records
// =============================================================================

export interface StgFlower {
  flowerId: string;
  flowerName: string;
  color: string | null;
  pricePerStem: number;
  supplierId: string | null;
  seasonalAvailability: string | null;
  careDifficulty: string | null;
  lifespanDays: number | null;
}

export interface StgArrangement {
  arrangementId: string;
  arrangementName: string;
  description: string | null;
  basePrice: number;
  flowerIds: string | null;
  flowerQuantities: string | null;
  sizeCategory: string | null;
  occasionType: string | null;
  isCustom: boolean | null;
}

export interface StgFlowerOrder {
  flowerOrderId: string;
  customerName: string | null;
  customerEmail: string;
  customerPhone: string | null;
  arrangementId: string | null;
  quantity: number;
  totalAmount: number;
  deliveryId: string | null;
  occasion: string | null;
  promoCode: string | null;
  discountAmount: number | null;
  orderDate: string | null;
  orderStatus: string | null;
}

export interface StgDelivery {
  deliveryId: string;
  deliveryAddress: string;
  deliveryCity: string;
  deliveryState: string;
  deliveryZipcode: string | null;
  deliveryDate: string | null;
  deliveryTime: string | null;
  deliveryInstructions: string | null;
  deliveryStatus: string | null;
  deliveryFee: number | null;
  recipientName: string | null;
  recipientPhone: string | null;
}

export interface StgSupply {
  supplyId: string;
  supplyName: string;
  cost: number;
  perishable: boolean | null;
  sku: string | null;
}

export interface StgCustomer {
  customerId: string;
  customerName: string;
}

export interface StgStore {
  storeId: string;
  storeName: string;
  openedAt: string | null;
  taxRate: number | null;
}

export interface StgProduct {
  productSku: string;
  productName: string;
  productType: string | null;
  price: number;
  description: string | null;
}

export interface StgCoffeeOrder {
  orderId: string;
  customerId: string;
  orderedAt: string | null;
  storeId: string | null;
  subtotal: number | null;
  taxPaid: number | null;
  orderTotal: number;
}

export interface StgItem {
  itemId: string;
  orderId: string;
  productSku: string | null;
}

// =============================================================================
// Intermediate records
// =============================================================================

export interface JoinedFlowerOrder {
  flowerOrderId: string;
  customerName: string | null;
  customerEmail: string;
  customerPhone: string | null;
  arrangementId: string | null;
  arrangementName: string | null;
  arrangementDescription: string | null;
  arrangementBasePrice: number | null;
  flowerIds: string | null;
  flowerQuantities: string | null;
  sizeCategory: string | null;
  occasionType: string | null;
  isCustom: boolean | null;
  quantity: number;
  totalAmount: number;
  deliveryId: string | null;
  deliveryAddress: string | null;
  deliveryCity: string | null;
  deliveryState: string | null;
  deliveryZipcode: string | null;
  deliveryDate: string | null;
  deliveryTime: string | null;
  deliveryInstructions: string | null;
  deliveryStatus: string | null;
  deliveryFee: number | null;
  recipientName: string | null;
  recipientPhone: string | null;
  occasion: string | null;
  promoCode: string | null;
  discountAmount: number | null;
  orderDate: string | null;
  orderStatus: string | null;
  netProductAmount: number;
  pricingTier: PricingTier;
  overallStatus: OverallStatus;
}

export interface JoinedCoffeeOrder {
  orderId: string;
  customerId: string;
  customerName: string | null;
  orderedAt: string | null;
  orderDate: string | null;
  storeId: string | null;
  storeName: string | null;
  storeTaxRate: number | null;
  subtotal: number | null;
  taxPaid: number | null;
  orderTotal: number;
  itemCount: number;
  itemsTotal: number;
}

// =============================================================================
// Marts
// =============================================================================

export interface CustomerLifetimeValue {
  customerKey: string;
  customerId: string;
  customerName: string | null;
  source: Business;
  totalRevenue: number;
  orderCount: number;
  avgOrderValue: number;
  firstOrderDate: string | null;
  lastOrderDate: string | null;
  customerTenureDays: number | null;
}

export interface DailyRevenue {
  orderDate: string;
  business: Business;
  revenue: number;
  orderCount: number;
  customerCount: number;
  avgOrderValue: number;
  revenuePerCustomer: number;
}

export interface CrossBusinessCustomer {
  crossBusinessKey: string;
  customerName: string;
  jaffleCustomerId: string;
  flowerCustomerEmail: string;
  firstJaffleOrder: string | null;
  firstFlowerOrder: string | null;
  acquisitionSource: AcquisitionSource;
}

export interface DimCustomer {
  customerKey: string;
  customerId: string;
  customerName: string | null;
  source: Business;
}

// =============================================================================
// Table registries
// =============================================================================

export interface StagingTables {
  stg_flower_shop__flowers: StgFlower;
  stg_flower_shop__flower_arrangements: StgArrangement;
  stg_flower_shop__flower_orders: StgFlowerOrder;
  stg_flower_shop__delivery_info: StgDelivery;
  stg_flower_shop__supplies: StgSupply;
  stg_jaffle__customers: StgCustomer;
  stg_jaffle__stores: StgStore;
  stg_jaffle__products: StgProduct;
  stg_jaffle__orders: StgCoffeeOrder;
  stg_jaffle__items: StgItem;
}

export interface IntermediateTables {
  int_flower_shop__orders_joined: JoinedFlowerOrder;
  int_jaffle__orders_joined: JoinedCoffeeOrder;
}

export type ModelTables = StagingTables & IntermediateTables;

export interface MartTables {
  fct_customer_lifetime_value: CustomerLifetimeValue;
  agg_daily_revenue: DailyRevenue;
  fct_cross_business_customers: CrossBusinessCustomer;
  dim_customers: DimCustomer;
}

/** A model row as persisted, with its merge timestamps. */
export type Stamped<T> = T & { createdAt: Date; updatedAt: Date };

// =============================================================================
// Audit & quality
// =============================================================================

export interface QualityIssue {
  tableName: string;
  issueType: IssueType;
  issueCount: number;
  detectedAt: Date;
}

export interface AuditLogEntry {
  procedureName: string;
  startTime: Date;
  endTime: Date | null;
  status: AuditStatus;
  message: string;
}

export interface ProcessingStat {
  tableName: string;
  recordCount: number;
  processingDate: string; // YYYY-MM-DD
}
