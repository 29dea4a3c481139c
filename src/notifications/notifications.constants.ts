import { NotificationChannel } from './enums/notification.enums';

export const NOTIFICATIONS = 'NOTIFICATIONS';

export const DEFAULT_CHANNELS: readonly NotificationChannel[] = [
  NotificationChannel.EMAIL,
];

export const CHANNEL_LABELS: Readonly<Record<NotificationChannel, string>> = {
  [NotificationChannel.EMAIL]: 'Email',
  [NotificationChannel.SMS]: 'SMS',
  [NotificationChannel.PUSH]: 'Push',
  [NotificationChannel.IN_APP]: 'In-App',
};
