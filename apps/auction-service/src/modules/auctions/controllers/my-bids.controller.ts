import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { PageQueryDto } from '../../../common/dto/page-query.dto';
import { BidService } from '../services/bid.service';

@Controller('me/bids')
@UseGuards(JwtAuthGuard)
export class MyBidsController {
  constructor(private readonly bids: BidService) {}

  @Get()
  async list(@CurrentUser() actor: Actor, @Query() query: PageQueryDto) {
    return this.bids.listUserBids(actor, query);
  }
}
