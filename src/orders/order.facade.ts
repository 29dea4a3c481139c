import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { INVENTORY } from '../inventory/inventory.constants';
import { Inventory } from '../inventory/interface/inventory.interface';
import {
  NotificationChannel,
  OrderNotificationType,
} from '../notifications/enums/notification.enums';
import {
  NotificationDispatch,
  Notifications,
} from '../notifications/interface/notification.interface';
import { NOTIFICATIONS } from '../notifications/notifications.constants';
import { PaymentProcessor } from '../payments/interface/payment.interface';
import { PAYMENT_GATEWAY } from '../payments/payments.constants';
import { Shipping } from '../shipping/interface/shipping.interface';
import { SHIPPING } from '../shipping/shipping.constants';
import {
  CancellationFailureReason,
  OrderAuditEvent,
  OrderFailureReason,
  OrderStatus,
} from './enums/order.enums';
import {
  CancellationResult,
  OrderRecord,
  OrderResult,
  OrderStatusView,
  PlaceOrderRequest,
  SystemStats,
} from './interface/order.interface';
import {
  ElasticsearchLoggerService,
} from './logging/elasticsearch-logger.service';
import { OrderRepository } from './repository/order.repository';

const toCents = (amount: number): number => Math.round(amount * 100) / 100;

const describeError = (error: unknown): string =>
  error instanceof Error ? (error.stack ?? error.message) : String(error);

/**
 * Single entry point for placing and managing orders. Each collaborator is
 * resolved through its injection token, so any of them can be replaced
 * without touching the sequence below.
 */
@Injectable()
export class OrderFacade {
  private readonly logger = new Logger(OrderFacade.name);

  constructor(
    @Inject(INVENTORY) private readonly inventory: Inventory,
    @Inject(PAYMENT_GATEWAY) private readonly payments: PaymentProcessor,
    @Inject(SHIPPING) private readonly shipping: Shipping,
    @Inject(NOTIFICATIONS) private readonly notifications: Notifications,
    private readonly orderRepository: OrderRepository,
    private readonly auditLogger: ElasticsearchLoggerService,
  ) {}

  /**
   * Reserves stock, charges the customer, books the shipment and sends the
   * confirmations. Business failures come back in `reason`; this method does
   * not reject.
   *
   * Not idempotent: repeating a call reserves and charges again.
   */
  async placeOrder(request: PlaceOrderRequest): Promise<OrderResult> {
    const { customerId, productCode, quantity, payment, unitPrice } = request;
    const orderId = uuidv4();
    let reserved = false;

    this.logger.log(
      `Processing order ${orderId} for ${customerId}: ` +
        `${productCode} x ${quantity} at ${unitPrice}`,
    );

    try {
      if (!this.inventory.check(productCode, quantity)) {
        return await this.rejectOrder(
          orderId,
          customerId,
          OrderFailureReason.INSUFFICIENT_STOCK,
        );
      }
      if (!this.inventory.reserve(productCode, quantity)) {
        return await this.rejectOrder(
          orderId,
          customerId,
          OrderFailureReason.RESERVATION_FAILED,
        );
      }
      reserved = true;

      const totalAmount = toCents(quantity * unitPrice);
      const receipt = this.payments.charge(payment, totalAmount);
      if (!receipt.success) {
        reserved = false;
        this.inventory.release(productCode, quantity);
        this.sendBestEffort(() =>
          this.notifications.sendOrderNotification(
            customerId,
            OrderNotificationType.PAYMENT_FAILED,
            { orderId, reason: receipt.message },
          ),
        );
        return await this.rejectOrder(
          orderId,
          customerId,
          `Payment failed: ${receipt.message}`,
        );
      }

      const shipment = this.shipping.createShipment(customerId, [
        { productCode, quantity },
      ]);
      if (!shipment.success) {
        reserved = false;
        this.inventory.release(productCode, quantity);
        return await this.rejectOrder(
          orderId,
          customerId,
          `Shipping failed: ${shipment.message}`,
          receipt.transactionId,
        );
      }
      // Stock, charge and shipment are committed from here on.
      reserved = false;

      const notificationData = {
        orderId,
        amount: totalAmount,
        transactionId: receipt.transactionId,
        trackingNumber: shipment.trackingNumber,
        eta: shipment.estimatedDelivery,
      };
      this.sendBestEffort(() =>
        this.notifications.sendOrderNotification(
          customerId,
          OrderNotificationType.ORDER_CONFIRMED,
          notificationData,
          [NotificationChannel.EMAIL, NotificationChannel.SMS],
        ),
      );
      this.sendBestEffort(() =>
        this.notifications.sendOrderNotification(
          customerId,
          OrderNotificationType.ORDER_SHIPPED,
          notificationData,
        ),
      );

      const record: OrderRecord = {
        orderId,
        customerId,
        productCode,
        quantity,
        unitPrice,
        totalAmount,
        transactionId: receipt.transactionId,
        shipmentId: shipment.shipmentId,
        trackingNumber: shipment.trackingNumber,
        estimatedDelivery: shipment.estimatedDelivery,
        status: OrderStatus.COMPLETED,
        createdAt: new Date().toISOString(),
      };
      this.storeCompletedOrder(record);
      await this.audit(OrderAuditEvent.ORDER_PLACED, record);

      return {
        success: true,
        orderId,
        transactionId: receipt.transactionId,
        shipmentId: shipment.shipmentId,
        trackingNumber: shipment.trackingNumber,
        totalAmount,
        estimatedDelivery: shipment.estimatedDelivery,
      };
    } catch (error) {
      this.logger.error(
        `Unexpected error while processing order ${orderId}`,
        describeError(error),
      );

      if (reserved) {
        try {
          this.inventory.release(productCode, quantity);
        } catch (releaseError) {
          this.logger.error(
            `Failed to release ${quantity} units of ${productCode} ` +
              `for order ${orderId}`,
            describeError(releaseError),
          );
        }
      }

      return this.rejectOrder(
        orderId,
        customerId,
        OrderFailureReason.INTERNAL_ERROR,
      );
    }
  }

  /**
   * Reverses a completed order: cancels the shipment, refunds the charge
   * and returns the units to stock. Only the owning customer may cancel.
   */
  async cancelOrder(
    orderId: string,
    customerId: string,
  ): Promise<CancellationResult> {
    const order = this.orderRepository.findOrderById(orderId);
    if (!order) {
      return this.rejectCancellation(
        orderId,
        CancellationFailureReason.NOT_FOUND,
      );
    }
    if (order.customerId !== customerId) {
      return this.rejectCancellation(
        orderId,
        CancellationFailureReason.WRONG_CUSTOMER,
      );
    }
    if (order.status === OrderStatus.CANCELLED) {
      return this.rejectCancellation(
        orderId,
        CancellationFailureReason.ALREADY_CANCELLED,
      );
    }

    try {
      if (order.shipmentId) {
        this.shipping.cancelShipment(order.shipmentId);
      }

      let refundTransactionId: string | undefined;
      if (order.transactionId) {
        const refund = this.payments.refund(
          order.transactionId,
          order.totalAmount,
        );
        refundTransactionId = refund.success ? refund.transactionId : undefined;
      }

      this.inventory.release(order.productCode, order.quantity);
      const cancelled = this.orderRepository.updateOrderStatus(
        orderId,
        OrderStatus.CANCELLED,
      );

      this.sendBestEffort(() =>
        this.notifications.sendOrderNotification(
          customerId,
          OrderNotificationType.ORDER_CANCELLED,
          { orderId },
        ),
      );
      await this.audit(OrderAuditEvent.ORDER_CANCELLED, cancelled);

      return { success: true, orderId, refundTransactionId };
    } catch (error) {
      this.logger.error(
        `Unexpected error while cancelling order ${orderId}`,
        describeError(error),
      );
      return this.rejectCancellation(
        orderId,
        CancellationFailureReason.INTERNAL_ERROR,
      );
    }
  }

  getOrderStatus(orderId: string): OrderStatusView | null {
    const order = this.orderRepository.findOrderById(orderId);
    if (!order) {
      return null;
    }

    return {
      ...order,
      shippingStatus: order.trackingNumber
        ? this.shipping.trackShipment(order.trackingNumber)
        : null,
    };
  }

  getOrderHistory(customerId: string): OrderRecord[] {
    return this.orderRepository.findOrdersByCustomer(customerId);
  }

  getSystemStats(): SystemStats {
    const totalSuccessfulOrders = this.orderRepository.countOrders();
    const totalFailedOrders = this.orderRepository.countFailures();
    const attempts = totalSuccessfulOrders + totalFailedOrders;

    return {
      totalSuccessfulOrders,
      totalFailedOrders,
      successRatePercentage:
        attempts > 0
          ? Math.round((totalSuccessfulOrders / attempts) * 10000) / 100
          : 0,
      inventoryStatus: this.inventory.listProducts(),
      notificationStats: this.notifications.getNotificationStats(),
    };
  }

  private async rejectOrder(
    orderId: string,
    customerId: string,
    reason: string,
    transactionId?: string,
  ): Promise<OrderResult> {
    try {
      this.orderRepository.recordFailure({
        orderId,
        customerId,
        reason,
        createdAt: new Date().toISOString(),
      });
    } catch (error) {
      this.logger.error(
        `Failed to record failure of order ${orderId}`,
        describeError(error),
      );
    }
    await this.audit(OrderAuditEvent.ORDER_FAILED, {
      orderId,
      customerId,
      reason,
    });

    return { success: false, orderId, reason, transactionId };
  }

  private async rejectCancellation(
    orderId: string,
    reason: CancellationFailureReason,
  ): Promise<CancellationResult> {
    await this.audit(OrderAuditEvent.CANCELLATION_REJECTED, {
      orderId,
      reason,
    });
    return { success: false, orderId, reason };
  }

  // The order is already charged and shipped; a lost record is logged only.
  private storeCompletedOrder(record: OrderRecord): void {
    try {
      this.orderRepository.createOrder(record);
    } catch (error) {
      this.logger.error(
        `Failed to store completed order ${record.orderId}`,
        describeError(error),
      );
    }
  }

  private async audit(
    eventType: OrderAuditEvent,
    data: unknown,
  ): Promise<void> {
    try {
      await this.auditLogger.logOrderEvent(eventType, data);
    } catch (error) {
      this.logger.error(
        `Failed to audit "${eventType}"`,
        describeError(error),
      );
    }
  }

  // Notifications never decide the outcome of an order.
  private sendBestEffort(send: () => NotificationDispatch): void {
    try {
      const dispatch = send();
      if (!dispatch.ok) {
        this.logger.warn(`Notification not sent: ${dispatch.error}`);
      }
    } catch (error) {
      this.logger.warn(`Notification failed: ${describeError(error)}`);
    }
  }
}
