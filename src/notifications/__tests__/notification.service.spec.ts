import { NotificationService } from '../notification.service';
import {
  NotificationChannel,
  OrderNotificationType,
} from '../enums/notification.enums';

describe('NotificationService', () => {
  let notifications: NotificationService;

  beforeEach(() => {
    notifications = new NotificationService();
  });

  describe('notify', () => {
    it('should record the message on the email channel by default', () => {
      expect(notifications.notify('customer-123', 'Test message')).toBe(true);

      expect(notifications.getNotificationHistory('customer-123')).toEqual([
        {
          customerId: 'customer-123',
          message: 'Test message',
          channel: NotificationChannel.EMAIL,
          timestamp: expect.any(String),
          status: 'sent',
        },
      ]);
    });
  });

  describe('sendOrderNotification', () => {
    it('should render the template and send it to the preferred channels', () => {
      const dispatch = notifications.sendOrderNotification(
        'customer-123',
        OrderNotificationType.ORDER_CONFIRMED,
        { orderId: 'order-123', amount: 100, transactionId: 'tx-123' },
      );

      expect(dispatch).toEqual({ ok: true, channels: { email: 'success' } });
      const [sent] = notifications.getNotificationHistory('customer-123');
      expect(sent.message).toBe(
        'Order confirmed - #order-123\n\nYour order #order-123 has been confirmed. Total: 100.00. Transaction id: tx-123',
      );
    });

    it('should report missing template fields without sending', () => {
      const dispatch = notifications.sendOrderNotification(
        'customer-123',
        OrderNotificationType.ORDER_SHIPPED,
        { orderId: 'order-123' },
      );

      expect(dispatch).toEqual({
        ok: false,
        error: 'Missing required field: trackingNumber',
      });
      expect(
        notifications.getNotificationHistory('customer-123'),
      ).toHaveLength(0);
    });

    it('should use the customer preferences when no channel is given', () => {
      notifications.setCustomerPreferences('customer-123', [
        NotificationChannel.SMS,
        NotificationChannel.PUSH,
      ]);

      const dispatch = notifications.sendOrderNotification(
        'customer-123',
        OrderNotificationType.ORDER_CANCELLED,
        { orderId: 'order-123' },
      );

      expect(dispatch).toEqual({
        ok: true,
        channels: { sms: 'success', push: 'success' },
      });
    });

    it('should prefer explicitly requested channels', () => {
      notifications.setCustomerPreferences('customer-123', [
        NotificationChannel.PUSH,
      ]);

      const dispatch = notifications.sendOrderNotification(
        'customer-123',
        OrderNotificationType.PAYMENT_FAILED,
        { orderId: 'order-123', reason: 'Card blocked' },
        [NotificationChannel.IN_APP],
      );

      expect(dispatch).toEqual({ ok: true, channels: { in_app: 'success' } });
      const [sent] = notifications.getNotificationHistory('customer-123');
      expect(sent.message).toBe(
        'Payment failed - #order-123\n\nWe could not process the payment for order #order-123. Reason: Card blocked',
      );
    });
  });

  describe('getNotificationHistory', () => {
    it('should only return the messages of the given customer', () => {
      notifications.notify('customer-123', 'Message 1');
      notifications.notify('customer-123', 'Message 2');
      notifications.notify('customer-456', 'Message 3');

      expect(
        notifications
          .getNotificationHistory('customer-123')
          .map((entry) => entry.message),
      ).toEqual(['Message 1', 'Message 2']);
    });
  });

  describe('sendBulkNotification', () => {
    it('should send the message to every customer', () => {
      const result = notifications.sendBulkNotification(
        ['customer-1', 'customer-2', 'customer-3'],
        'Special offer',
        NotificationChannel.SMS,
      );

      expect(result).toEqual({
        sent: 3,
        failed: 0,
        details: [
          { customerId: 'customer-1', status: 'sent' },
          { customerId: 'customer-2', status: 'sent' },
          { customerId: 'customer-3', status: 'sent' },
        ],
      });
      const [sent] = notifications.getNotificationHistory('customer-2');
      expect(sent.channel).toBe(NotificationChannel.SMS);
    });
  });

  describe('getNotificationStats', () => {
    it('should be empty before anything is sent', () => {
      expect(notifications.getNotificationStats()).toEqual({
        total: 0,
        byChannel: {},
        byCustomer: {},
      });
    });

    it('should count messages by channel and customer', () => {
      notifications.notify('customer-1', 'a');
      notifications.notify('customer-1', 'b', NotificationChannel.SMS);
      notifications.notify('customer-2', 'c');

      expect(notifications.getNotificationStats()).toEqual({
        total: 3,
        byChannel: { email: 2, sms: 1 },
        byCustomer: { 'customer-1': 2, 'customer-2': 1 },
      });
    });
  });
});
