import { Inject, Injectable, Logger } from '@nestjs/common';
import { INITIAL_STOCK } from './inventory.constants';
import { Inventory, StockLedger } from './interface/inventory.interface';

const isValidQuantity = (quantity: number): boolean =>
  Number.isInteger(quantity) && quantity > 0;

/**
 * Stock ledger for a single process. Each instance owns its own copy of the
 * initial stock, so two services never observe each other's reservations.
 */
@Injectable()
export class InventoryService implements Inventory {
  private readonly logger = new Logger(InventoryService.name);
  private readonly stock: Map<string, number>;

  constructor(@Inject(INITIAL_STOCK) initialStock: StockLedger) {
    this.stock = new Map(Object.entries(initialStock));
  }

  check(productCode: string, quantity: number): boolean {
    if (!isValidQuantity(quantity)) {
      return false;
    }
    return this.getCurrentStock(productCode) >= quantity;
  }

  reserve(productCode: string, quantity: number): boolean {
    if (!this.check(productCode, quantity)) {
      this.logger.warn(
        `Unable to reserve ${quantity} units of ${productCode}. Available stock: ${this.getCurrentStock(productCode)}`,
      );
      return false;
    }

    const remaining = this.getCurrentStock(productCode) - quantity;
    this.stock.set(productCode, remaining);
    this.logger.log(
      `Reserved ${quantity} units of ${productCode}. Remaining stock: ${remaining}`,
    );
    return true;
  }

  /**
   * Returns previously reserved units to the ledger. Unknown product codes
   * are rejected rather than created, so a stray release cannot mint stock.
   */
  release(productCode: string, quantity: number): boolean {
    const current = this.stock.get(productCode);
    if (current === undefined) {
      this.logger.warn(`Ignored release for unknown product ${productCode}`);
      return false;
    }
    if (!isValidQuantity(quantity)) {
      this.logger.warn(
        `Ignored release of invalid quantity ${quantity} for ${productCode}`,
      );
      return false;
    }

    this.stock.set(productCode, current + quantity);
    this.logger.log(
      `Released ${quantity} units of ${productCode}. Current stock: ${current + quantity}`,
    );
    return true;
  }

  getCurrentStock(productCode: string): number {
    return this.stock.get(productCode) ?? 0;
  }

  listProducts(): StockLedger {
    return Object.fromEntries(this.stock);
  }
}
