import {
  Body,
  Controller,
  Get,
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
import { SellRequestService } from '../services/sell-request.service';
import { SubmitSellRequestDto } from '../dto/submit-sell-request.dto';
import {
  FinalAppraisalDto,
  NotesDto,
  PreliminaryAppraisalDto,
  RejectSellRequestDto,
} from '../dto/appraisal.dto';
import { ListSellRequestsQueryDto } from '../dto/list-sell-requests-query.dto';

@Controller('sell-requests')
@UseGuards(JwtAuthGuard)
export class SellRequestController {
  constructor(private readonly sellRequests: SellRequestService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async submit(@CurrentUser() actor: Actor, @Body() dto: SubmitSellRequestDto) {
    return this.sellRequests.submit(actor, dto);
  }

  @Get()
  async list(@CurrentUser() actor: Actor, @Query() query: ListSellRequestsQueryDto) {
    return this.sellRequests.list(actor, { status: query.status, sellerId: query.sellerId }, query);
  }

  @Get(':id')
  async findById(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.sellRequests.findById(actor, id);
  }

  @Post(':id/preliminary-appraisal')
  @HttpCode(HttpStatus.OK)
  async preliminaryAppraise(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PreliminaryAppraisalDto,
  ) {
    return this.sellRequests.preliminaryAppraise(actor, id, dto);
  }

  @Post(':id/receive')
  @HttpCode(HttpStatus.OK)
  async markReceived(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string, @Body() dto: NotesDto) {
    return this.sellRequests.markReceived(actor, id, dto);
  }

  @Post(':id/final-appraisal')
  @HttpCode(HttpStatus.OK)
  async finalAppraise(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: FinalAppraisalDto,
  ) {
    return this.sellRequests.finalAppraise(actor, id, dto);
  }

  @Post(':id/approve')
  @HttpCode(HttpStatus.OK)
  async approve(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string, @Body() dto: NotesDto) {
    return this.sellRequests.managerApprove(actor, id, dto);
  }

  @Post(':id/accept')
  @HttpCode(HttpStatus.OK)
  async accept(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string, @Body() dto: NotesDto) {
    return this.sellRequests.sellerAccept(actor, id, dto);
  }

  @Post(':id/reject')
  @HttpCode(HttpStatus.OK)
  async reject(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RejectSellRequestDto,
  ) {
    return this.sellRequests.reject(actor, id, dto);
  }
}
