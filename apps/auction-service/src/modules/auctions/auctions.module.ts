import { Module } from '@nestjs/common';
import { PaymentsModule } from '../payments/payments.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { SessionService } from './services/session.service';
import { BidService } from './services/bid.service';
import { EnrollmentService } from './services/enrollment.service';
import { SessionController } from './controllers/session.controller';
import { LotController } from './controllers/lot.controller';
import { EnrollmentController } from './controllers/enrollment.controller';
import { MyBidsController } from './controllers/my-bids.controller';

@Module({
  imports: [PaymentsModule, NotificationsModule],
  controllers: [SessionController, LotController, EnrollmentController, MyBidsController],
  providers: [SessionService, BidService, EnrollmentService],
})
export class AuctionsModule {}
