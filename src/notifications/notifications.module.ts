import { Module } from '@nestjs/common';
import { NotificationService } from './notification.service';
import { NOTIFICATIONS } from './notifications.constants';

@Module({
  providers: [
    {
      provide: NOTIFICATIONS,
      useClass: NotificationService,
    },
  ],
  exports: [NOTIFICATIONS],
})
export class NotificationsModule {}
