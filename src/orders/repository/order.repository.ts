import { Injectable } from '@nestjs/common';
import { OrderStatus } from '../enums/order.enums';
import { FailedOrderRecord, OrderRecord } from '../interface/order.interface';

/**
 * Order history held in memory by one instance. Records are copied on the
 * way in and out, so callers cannot mutate stored history.
 */
@Injectable()
export class OrderRepository {
  private readonly orders = new Map<string, OrderRecord>();
  private readonly failures: FailedOrderRecord[] = [];

  createOrder(record: OrderRecord): OrderRecord {
    this.orders.set(record.orderId, { ...record });
    return { ...record };
  }

  recordFailure(record: FailedOrderRecord): void {
    this.failures.push({ ...record });
  }

  findOrderById(orderId: string): OrderRecord | null {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  findOrdersByCustomer(customerId: string): OrderRecord[] {
    return [...this.orders.values()]
      .filter((order) => order.customerId === customerId)
      .map((order) => ({ ...order }));
  }

  updateOrderStatus(orderId: string, status: OrderStatus): OrderRecord | null {
    const order = this.orders.get(orderId);
    if (!order) {
      return null;
    }
    order.status = status;
    return { ...order };
  }

  countOrders(): number {
    return this.orders.size;
  }

  countFailures(): number {
    return this.failures.length;
  }
}
