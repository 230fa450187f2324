import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { SellRequestService } from './services/sell-request.service';
import { JewelryService } from './services/jewelry.service';
import { SellRequestController } from './controllers/sell-request.controller';
import { JewelryController } from './controllers/jewelry.controller';

@Module({
  imports: [NotificationsModule],
  controllers: [SellRequestController, JewelryController],
  providers: [SellRequestService, JewelryService],
})
export class ConsignmentModule {}
