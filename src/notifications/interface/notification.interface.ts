import {
  NotificationChannel,
  OrderNotificationType,
} from '../enums/notification.enums';

export type NotificationField =
  | 'orderId'
  | 'amount'
  | 'transactionId'
  | 'trackingNumber'
  | 'eta'
  | 'reason';

export type OrderNotificationData = Partial<
  Record<NotificationField, string | number>
>;

export interface SentNotification {
  customerId: string;
  message: string;
  channel: NotificationChannel;
  timestamp: string;
  status: 'sent';
}

export type ChannelOutcome = 'success' | 'failed';

export type NotificationDispatch =
  | { ok: true; channels: Partial<Record<NotificationChannel, ChannelOutcome>> }
  | { ok: false; error: string };

export interface BulkNotificationResult {
  sent: number;
  failed: number;
  details: Array<{ customerId: string; status: 'sent' | 'failed' }>;
}

export interface NotificationStats {
  total: number;
  byChannel: Record<string, number>;
  byCustomer: Record<string, number>;
}

export interface Notifications {
  notify(
    customerId: string,
    message: string,
    channel?: NotificationChannel,
  ): boolean;
  sendOrderNotification(
    customerId: string,
    type: OrderNotificationType,
    data: OrderNotificationData,
    channels?: NotificationChannel[],
  ): NotificationDispatch;
  setCustomerPreferences(
    customerId: string,
    channels: NotificationChannel[],
  ): void;
  getNotificationHistory(customerId: string): SentNotification[];
  sendBulkNotification(
    customerIds: string[],
    message: string,
    channel?: NotificationChannel,
  ): BulkNotificationResult;
  getNotificationStats(): NotificationStats;
}
