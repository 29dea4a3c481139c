import { OrderNotificationType } from './enums/notification.enums';
import { OrderNotificationData } from './interface/notification.interface';

export interface NotificationTemplate {
  subject: string;
  message: string;
}

export const NOTIFICATION_TEMPLATES: Readonly<
  Record<OrderNotificationType, NotificationTemplate>
> = {
  [OrderNotificationType.ORDER_CONFIRMED]: {
    subject: 'Order confirmed - #{orderId}',
    message:
      'Your order #{orderId} has been confirmed. Total: {amount}. Transaction id: {transactionId}',
  },
  [OrderNotificationType.ORDER_SHIPPED]: {
    subject: 'Order shipped - #{orderId}',
    message:
      'Your order #{orderId} has shipped. Tracking number: {trackingNumber}. Estimated delivery: {eta}',
  },
  [OrderNotificationType.ORDER_DELIVERED]: {
    subject: 'Order delivered - #{orderId}',
    message:
      'Your order #{orderId} has been delivered. Thank you for your purchase!',
  },
  [OrderNotificationType.PAYMENT_FAILED]: {
    subject: 'Payment failed - #{orderId}',
    message:
      'We could not process the payment for order #{orderId}. Reason: {reason}',
  },
  [OrderNotificationType.ORDER_CANCELLED]: {
    subject: 'Order cancelled - #{orderId}',
    message:
      'Your order #{orderId} has been cancelled. The refund will be processed in 3-5 business days.',
  },
};

const PLACEHOLDER = /\{(\w+)\}/g;

export type RenderResult =
  | { ok: true; text: string }
  | { ok: false; missing: string };

/**
 * Fills `{field}` placeholders from the order data. Numbers are rendered
 * with two decimals.
 */
export function renderTemplate(
  template: string,
  data: OrderNotificationData,
): RenderResult {
  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    values.set(key, typeof value === 'number' ? value.toFixed(2) : value);
  }

  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!values.has(match[1])) {
      return { ok: false, missing: match[1] };
    }
  }

  return {
    ok: true,
    text: template.replace(
      PLACEHOLDER,
      (_placeholder, key: string) => values.get(key) ?? '',
    ),
  };
}
