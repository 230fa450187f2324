import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { PageQueryDto } from '../../../common/dto/page-query.dto';
import { BidService } from '../services/bid.service';
import { SessionService } from '../services/session.service';
import { PlaceBidDto } from '../dto/place-bid.dto';

@Controller('lots')
export class LotController {
  constructor(
    private readonly bids: BidService,
    private readonly sessions: SessionService,
  ) {}

  @Get(':id/bids')
  async listBids(@Param('id', ParseUUIDPipe) id: string, @Query() query: PageQueryDto) {
    return this.bids.listBids(id, query);
  }

  @Get(':id/winner')
  async winner(@Param('id', ParseUUIDPipe) id: string) {
    const [bid, amount] = await Promise.all([this.bids.getCurrentWinner(id), this.bids.getHighestAmount(id)]);
    return { bid, amount };
  }

  /** The body key wins over the Idempotency-Key header when both are sent. */
  @Post(':id/bids')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async placeBid(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PlaceBidDto,
    @Headers('idempotency-key') headerKey?: string,
  ) {
    return this.bids.placeBid(actor, id, dto.amount, dto.idempotencyKey ?? headerKey);
  }

  @Post(':id/close')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async close(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.bids.closeItem(actor, id);
  }

  @Post(':id/withdraw')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async withdraw(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sessions.withdrawItem(actor, id);
  }
}
