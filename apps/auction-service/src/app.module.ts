import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule } from '@nestjs/throttler';
import { CorrelationMiddleware } from '@gemhouse/shared';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { DomainExceptionFilter } from './common/filters/domain-exception.filter';
import { AuthModule } from './modules/auth/auth.module';
import { ConsignmentModule } from './modules/consignment/consignment.module';
import { AuctionsModule } from './modules/auctions/auctions.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { NotificationsModule } from './modules/notifications/notifications.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { User } from './modules/auth/entities/user.entity';
import { JewelryItem } from './modules/consignment/entities/jewelry-item.entity';
import { SellRequest } from './modules/consignment/entities/sell-request.entity';
import { AuctionSession } from './modules/auctions/entities/auction-session.entity';
import { SessionItem } from './modules/auctions/entities/session-item.entity';
import { Enrollment } from './modules/auctions/entities/enrollment.entity';
import { Bid } from './modules/auctions/entities/bid.entity';
import { FeeSchedule } from './modules/payments/entities/fee-schedule.entity';
import { TransactionFee } from './modules/payments/entities/transaction-fee.entity';
import { Payment } from './modules/payments/entities/payment.entity';
import { Payout } from './modules/payments/entities/payout.entity';
import { Refund } from './modules/payments/entities/refund.entity';
import { Notification } from './modules/notifications/entities/notification.entity';

const ENTITIES = [
  User,
  JewelryItem,
  SellRequest,
  AuctionSession,
  SessionItem,
  Enrollment,
  Bid,
  FeeSchedule,
  TransactionFee,
  Payment,
  Payout,
  Refund,
  Notification,
];

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres' as const,
        url: config.getOrThrow<string>('DATABASE_URL'),
        entities: ENTITIES,
        synchronize: false,
        logging: config.get('NODE_ENV') !== 'production' ? true : ['error', 'warn'],
      }),
    }),
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 100 }]),
    DatabaseModule,
    HealthModule,
    MetricsModule,
    AuthModule,
    ConsignmentModule,
    AuctionsModule,
    PaymentsModule,
    NotificationsModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: DomainExceptionFilter }],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationMiddleware).forRoutes('*');
  }
}
