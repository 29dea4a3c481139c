export type StockLedger = Record<string, number>;

export interface Inventory {
  check(productCode: string, quantity: number): boolean;
  reserve(productCode: string, quantity: number): boolean;
  release(productCode: string, quantity: number): boolean;
  getCurrentStock(productCode: string): number;
  listProducts(): StockLedger;
}
