import type { ModelTableName, ModelTables } from '@petalbrew/shared';
import {
  arrangementsModel,
  coffeeOrdersModel,
  customersModel,
  deliveryModel,
  flowerOrdersModel,
  flowersModel,
  itemsModel,
  productsModel,
  storesModel,
  suppliesModel,
} from './staging';

export type ModelKeys = { [T in ModelTableName]: (row: ModelTables[T]) => string };

/** Natural key of every staging and intermediate relation. */
export const MODEL_KEYS: ModelKeys = {
  stg_flower_shop__flowers: flowersModel.keyOf,
  stg_flower_shop__flower_arrangements: arrangementsModel.keyOf,
  stg_flower_shop__flower_orders: flowerOrdersModel.keyOf,
  stg_flower_shop__delivery_info: deliveryModel.keyOf,
  stg_flower_shop__supplies: suppliesModel.keyOf,
  stg_jaffle__customers: customersModel.keyOf,
  stg_jaffle__stores: storesModel.keyOf,
  stg_jaffle__products: productsModel.keyOf,
  stg_jaffle__orders: coffeeOrdersModel.keyOf,
  stg_jaffle__items: itemsModel.keyOf,
  int_flower_shop__orders_joined: (row) => row.flowerOrderId,
  int_jaffle__orders_joined: (row) => row.orderId,
};
