import { Module } from '@nestjs/common';
import { ShippingService } from './shipping.service';
import { SHIPPING } from './shipping.constants';

@Module({
  providers: [
    {
      provide: SHIPPING,
      useClass: ShippingService,
    },
  ],
  exports: [SHIPPING],
})
export class ShippingModule {}
