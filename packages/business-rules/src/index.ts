export {
  stageRecords,
  flowersModel,
  arrangementsModel,
  flowerOrdersModel,
  deliveryModel,
  suppliesModel,
  customersModel,
  storesModel,
  productsModel,
  coffeeOrdersModel,
  itemsModel,
} from './staging';
export type { StagingModel } from './staging';

export { mergeByKey, dedupeByKey } from './upsert';
export { MODEL_KEYS } from './keys';
export type { ModelKeys } from './keys';
export type { MergeResult } from './upsert';

export {
  isValidEmail,
  countMatches,
  runChecks,
  flowerOrderChecks,
  coffeeOrderChecks,
  missingArrangementCheck,
  negativeNetAmountCheck,
  futureOrderDateCheck,
  missingCustomerCheck,
} from './quality';
export type { RowCheck } from './quality';

export { netProductAmount, pricingTier, overallStatus, joinFlowerOrder, joinFlowerOrders, joinCoffeeOrders } from './join';

export {
  surrogateKey,
  flowerOrderRevenue,
  toCustomerOrders,
  buildCustomerLifetimeValue,
  buildDailyRevenue,
  buildCrossBusinessCustomers,
  buildCustomerDimension,
  normalizeCustomerName,
  acquisitionSource,
} from './marts';
export type { CustomerOrder } from './marts';

export { roundMoney, orZero } from './money';
export { toIsoDate, datePart, daysBetween } from './dates';
