import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { OrderModule } from './orders/order.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), OrderModule],
})
export class AppModule {}
