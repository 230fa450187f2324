import { Module } from '@nestjs/common';
import { SettlementService } from './services/settlement.service';
import { PaymentService } from './services/payment.service';
import { MockPaymentGateway, PAYMENT_GATEWAY } from './services/payment-gateway';
import { PaymentController } from './controllers/payment.controller';
import { SettlementController } from './controllers/settlement.controller';

@Module({
  controllers: [PaymentController, SettlementController],
  providers: [
    SettlementService,
    PaymentService,
    { provide: PAYMENT_GATEWAY, useClass: MockPaymentGateway },
  ],
  exports: [SettlementService],
})
export class PaymentsModule {}
