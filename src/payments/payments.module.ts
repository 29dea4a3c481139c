import { Module } from '@nestjs/common';
import { PaymentGateway } from './payment.gateway';
import { PAYMENT_GATEWAY } from './payments.constants';

@Module({
  providers: [
    {
      provide: PAYMENT_GATEWAY,
      useClass: PaymentGateway,
    },
  ],
  exports: [PAYMENT_GATEWAY],
})
export class PaymentsModule {}
