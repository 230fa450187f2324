import { Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { SettlementService } from '../services/settlement.service';

@Controller('settlement')
@UseGuards(JwtAuthGuard)
export class SettlementController {
  constructor(private readonly settlement: SettlementService) {}

  @Post('lots/:id')
  @HttpCode(HttpStatus.OK)
  async settleLot(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.settlement.settle(actor, id);
  }

  @Post('sessions/:id')
  @HttpCode(HttpStatus.OK)
  async settleSession(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.settlement.settleSession(actor, id);
  }

  @Get('sessions/:id/summary')
  async summary(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.settlement.getSummary(actor, id);
  }
}
