import { OrderNotificationType } from '../enums/notification.enums';
import {
  NOTIFICATION_TEMPLATES,
  renderTemplate,
} from '../notification.templates';

describe('renderTemplate', () => {
  it('should replace every placeholder', () => {
    expect(
      renderTemplate('Order #{orderId} ships with {trackingNumber}', {
        orderId: 'order-1',
        trackingNumber: 'TRK1',
      }),
    ).toEqual({ ok: true, text: 'Order #order-1 ships with TRK1' });
  });

  it('should format numbers with two decimals', () => {
    expect(renderTemplate('Total: {amount}', { amount: 59.9 })).toEqual({
      ok: true,
      text: 'Total: 59.90',
    });
  });

  it('should report the first missing field', () => {
    expect(
      renderTemplate('{orderId} {eta} {reason}', {
        orderId: 'order-1',
        eta: undefined,
      }),
    ).toEqual({ ok: false, missing: 'eta' });
  });

  it('should leave text without placeholders unchanged', () => {
    expect(renderTemplate('Thank you!', {})).toEqual({
      ok: true,
      text: 'Thank you!',
    });
  });

  it('should render the delivery notice from the order id alone', () => {
    const { subject, message } =
      NOTIFICATION_TEMPLATES[OrderNotificationType.ORDER_DELIVERED];

    expect(renderTemplate(subject, { orderId: 'order-1' })).toEqual({
      ok: true,
      text: 'Order delivered - #order-1',
    });
    expect(renderTemplate(message, { orderId: 'order-1' })).toEqual({
      ok: true,
      text:
        'Your order #order-1 has been delivered. Thank you for your purchase!',
    });
  });
});
