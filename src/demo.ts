import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  NotificationChannel,
  OrderNotificationType,
} from './notifications/enums/notification.enums';
import {
  Notifications,
} from './notifications/interface/notification.interface';
import { NOTIFICATIONS } from './notifications/notifications.constants';
import { OrderResult } from './orders/interface/order.interface';
import { OrderFacade } from './orders/order.facade';
import { PaymentDetails } from './payments/interface/payment.interface';

const logger = new Logger('Demo');

const VISA: PaymentDetails = {
  cardNumber: '4000123412341234',
  cvv: '123',
  expiry: '12/27',
  cardholder: 'Demo Customer',
};
const MASTERCARD: PaymentDetails = {
  cardNumber: '5000123412341234',
  cvv: '456',
  expiry: '08/26',
};
const DECLINED: PaymentDetails = {
  cardNumber: '3000123412341234',
  cvv: '1234',
};

function report(scenario: string, result: OrderResult): void {
  if (result.success) {
    logger.log(
      `${scenario}: placed ${result.orderId} (tx ${result.transactionId}, tracking ${result.trackingNumber}, total ${result.totalAmount?.toFixed(2)}, delivery ${result.estimatedDelivery})`,
    );
  } else {
    logger.warn(`${scenario}: failed ${result.orderId} - ${result.reason}`);
  }
}

async function placeSuccessfulOrders(
  facade: OrderFacade,
): Promise<OrderResult[]> {
  const standard = await facade.placeOrder({
    customerId: 'customer-001',
    productCode: 'MONITOR-27',
    quantity: 1,
    payment: VISA,
    unitPrice: 299.99,
  });
  report('Monitor with Visa', standard);

  const laptop = await facade.placeOrder({
    customerId: 'customer-002',
    productCode: 'LAPTOP-15',
    quantity: 1,
    payment: MASTERCARD,
    unitPrice: 899.99,
  });
  report('Laptop with MasterCard', laptop);

  const phones = await facade.placeOrder({
    customerId: 'customer-003',
    productCode: 'SMARTPHONE-X',
    quantity: 2,
    payment: VISA,
    unitPrice: 649.99,
  });
  report('Two smartphones', phones);

  return [standard, laptop, phones];
}

async function placeFailingOrders(facade: OrderFacade): Promise<void> {
  report(
    'Insufficient stock',
    await facade.placeOrder({
      customerId: 'customer-004',
      productCode: 'WASHER-7KG',
      quantity: 5,
      payment: VISA,
      unitPrice: 499.99,
    }),
  );
  report(
    'Declined card',
    await facade.placeOrder({
      customerId: 'customer-005',
      productCode: 'TABLET-10',
      quantity: 1,
      payment: DECLINED,
      unitPrice: 299.99,
    }),
  );
  report(
    'Unknown product',
    await facade.placeOrder({
      customerId: 'customer-006',
      productCode: 'NONEXISTENT-PRODUCT',
      quantity: 1,
      payment: VISA,
      unitPrice: 99.99,
    }),
  );
}

async function manageFirstOrder(
  facade: OrderFacade,
  order: OrderResult | undefined,
): Promise<void> {
  if (!order?.success) {
    return;
  }

  const status = facade.getOrderStatus(order.orderId);
  logger.log(
    `Order ${order.orderId} is ${status?.status}, shipment ${status?.shippingStatus?.status ?? 'unknown'}`,
  );

  const cancellation = await facade.cancelOrder(order.orderId, 'customer-001');
  logger.log(
    cancellation.success
      ? `Order ${order.orderId} cancelled, refund ${cancellation.refundTransactionId}`
      : `Order ${order.orderId} not cancelled: ${cancellation.reason}`,
  );
}

function showHistoryAndStats(facade: OrderFacade): void {
  for (const customerId of ['customer-001', 'customer-002']) {
    const history = facade.getOrderHistory(customerId);
    logger.log(`${customerId} has ${history.length} order(s)`);
    for (const order of history) {
      logger.log(
        `  ${order.orderId} ${order.productCode} x ${order.quantity} ${order.totalAmount.toFixed(2)} ${order.status}`,
      );
    }
  }

  const stats = facade.getSystemStats();
  logger.log(
    `Successful: ${stats.totalSuccessfulOrders}, failed: ${stats.totalFailedOrders}, success rate: ${stats.successRatePercentage}%`,
  );
  for (const [productCode, quantity] of Object.entries(stats.inventoryStatus)) {
    const lowStock = quantity <= 2 ? ' (low stock)' : '';
    logger.log(`  ${productCode}: ${quantity}${lowStock}`);
  }
  logger.log(`Notifications sent: ${stats.notificationStats.total}`);
}

function announceDelivery(
  notifications: Notifications,
  customerId: string,
  order: OrderResult | undefined,
): void {
  if (!order?.success) {
    return;
  }

  const dispatch = notifications.sendOrderNotification(
    customerId,
    OrderNotificationType.ORDER_DELIVERED,
    { orderId: order.orderId },
  );
  logger.log(
    dispatch.ok
      ? `Delivery notice for ${order.orderId} sent`
      : `Delivery notice for ${order.orderId} not sent: ${dispatch.error}`,
  );
}

function configureNotifications(notifications: Notifications): void {
  notifications.setCustomerPreferences('customer-001', [
    NotificationChannel.EMAIL,
    NotificationChannel.SMS,
  ]);
  notifications.setCustomerPreferences('customer-002', [
    NotificationChannel.EMAIL,
    NotificationChannel.PUSH,
  ]);

  const bulk = notifications.sendBulkNotification(
    ['customer-001', 'customer-002', 'customer-003'],
    'Special offer: 20% off all electronics.',
  );
  logger.log(`Bulk notification sent: ${bulk.sent}, failed: ${bulk.failed}`);
}

async function run(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const facade = app.get(OrderFacade);
    const placed = await placeSuccessfulOrders(facade);
    await placeFailingOrders(facade);
    await manageFirstOrder(facade, placed[0]);
    const notifications = app.get<Notifications>(NOTIFICATIONS);
    announceDelivery(notifications, 'customer-002', placed[1]);
    configureNotifications(notifications);
    showHistoryAndStats(facade);
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  logger.error(
    'Demo failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
