import { Module } from '@nestjs/common';
import { InventoryModule } from '../inventory/inventory.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { PaymentsModule } from '../payments/payments.module';
import { ShippingModule } from '../shipping/shipping.module';
import { OrderController } from './order.controller';
import { OrderFacade } from './order.facade';
import { OrderRepository } from './repository/order.repository';
import {
  ElasticsearchLoggerService,
} from './logging/elasticsearch-logger.service';

@Module({
  imports: [
    InventoryModule,
    PaymentsModule,
    ShippingModule,
    NotificationsModule,
  ],
  controllers: [OrderController],
  providers: [OrderFacade, OrderRepository, ElasticsearchLoggerService],
  exports: [OrderFacade],
})
export class OrderModule {}
