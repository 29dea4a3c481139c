import { StockLedger } from './interface/inventory.interface';

export const INVENTORY = 'INVENTORY';
export const INITIAL_STOCK = 'INITIAL_STOCK';

export const DEFAULT_STOCK: Readonly<StockLedger> = {
  'MONITOR-27': 10,
  'WASHER-7KG': 2,
  'LAPTOP-15': 5,
  'SMARTPHONE-X': 8,
  'TABLET-10': 3,
};
