import { Global, Module } from '@nestjs/common';
import { AUCTION_STORE } from './auction-store';
import { TypeOrmAuctionStore } from './typeorm-auction-store';

@Global()
@Module({
  providers: [{ provide: AUCTION_STORE, useClass: TypeOrmAuctionStore }],
  exports: [AUCTION_STORE],
})
export class DatabaseModule {}
