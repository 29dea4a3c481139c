import { Injectable, Logger } from '@nestjs/common';
import {
  NotificationChannel,
  OrderNotificationType,
} from './enums/notification.enums';
import {
  BulkNotificationResult,
  ChannelOutcome,
  NotificationDispatch,
  Notifications,
  NotificationStats,
  OrderNotificationData,
  SentNotification,
} from './interface/notification.interface';
import {
  NOTIFICATION_TEMPLATES,
  renderTemplate,
} from './notification.templates';
import { CHANNEL_LABELS, DEFAULT_CHANNELS } from './notifications.constants';

/**
 * Customer messaging stand-in. Messages are written to the log and kept in
 * memory; nothing is delivered outside the process.
 */
@Injectable()
export class NotificationService implements Notifications {
  private readonly logger = new Logger(NotificationService.name);
  private readonly sent: SentNotification[] = [];
  private readonly preferences = new Map<string, NotificationChannel[]>();

  notify(
    customerId: string,
    message: string,
    channel: NotificationChannel = NotificationChannel.EMAIL,
  ): boolean {
    this.sent.push({
      customerId,
      message,
      channel,
      timestamp: new Date().toISOString(),
      status: 'sent',
    });
    this.logger.log(
      `[${CHANNEL_LABELS[channel]}] to ${customerId}: ${message}`,
    );
    return true;
  }

  sendOrderNotification(
    customerId: string,
    type: OrderNotificationType,
    data: OrderNotificationData,
    channels?: NotificationChannel[],
  ): NotificationDispatch {
    const template = NOTIFICATION_TEMPLATES[type];
    if (!template) {
      return { ok: false, error: `Unknown notification type '${type}'` };
    }

    const subject = renderTemplate(template.subject, data);
    if (!subject.ok) {
      return { ok: false, error: `Missing required field: ${subject.missing}` };
    }
    const body = renderTemplate(template.message, data);
    if (!body.ok) {
      return { ok: false, error: `Missing required field: ${body.missing}` };
    }

    const outcomes: Partial<Record<NotificationChannel, ChannelOutcome>> = {};
    for (const channel of channels ?? this.getPreferredChannels(customerId)) {
      const delivered = this.notify(
        customerId,
        `${subject.text}\n\n${body.text}`,
        channel,
      );
      outcomes[channel] = delivered ? 'success' : 'failed';
    }

    return { ok: true, channels: outcomes };
  }

  setCustomerPreferences(
    customerId: string,
    channels: NotificationChannel[],
  ): void {
    this.preferences.set(customerId, [...channels]);
    this.logger.log(
      `Notification preferences for ${customerId}: ${channels.join(', ')}`,
    );
  }

  getNotificationHistory(customerId: string): SentNotification[] {
    return this.sent.filter((entry) => entry.customerId === customerId);
  }

  sendBulkNotification(
    customerIds: string[],
    message: string,
    channel: NotificationChannel = NotificationChannel.EMAIL,
  ): BulkNotificationResult {
    const result: BulkNotificationResult = { sent: 0, failed: 0, details: [] };

    for (const customerId of customerIds) {
      const delivered = this.notify(customerId, message, channel);
      if (delivered) {
        result.sent += 1;
      } else {
        result.failed += 1;
      }
      result.details.push({
        customerId,
        status: delivered ? 'sent' : 'failed',
      });
    }

    this.logger.log(
      `Bulk notification finished. Sent: ${result.sent}, failed: ${result.failed}`,
    );
    return result;
  }

  getNotificationStats(): NotificationStats {
    const stats: NotificationStats = {
      total: this.sent.length,
      byChannel: {},
      byCustomer: {},
    };

    for (const { channel, customerId } of this.sent) {
      stats.byChannel[channel] = (stats.byChannel[channel] ?? 0) + 1;
      stats.byCustomer[customerId] = (stats.byCustomer[customerId] ?? 0) + 1;
    }

    return stats;
  }

  private getPreferredChannels(
    customerId: string,
  ): readonly NotificationChannel[] {
    return this.preferences.get(customerId) ?? DEFAULT_CHANNELS;
  }
}
