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
import { PaymentService } from '../services/payment.service';
import { ProcessPaymentDto } from '../dto/process-payment.dto';
import { RequestRefundDto } from '../dto/request-refund.dto';
import { ListPaymentsQueryDto } from '../dto/list-payments-query.dto';

@Controller()
@UseGuards(JwtAuthGuard)
export class PaymentController {
  constructor(private readonly payments: PaymentService) {}

  @Get('payments')
  async listPayments(@CurrentUser() actor: Actor, @Query() query: ListPaymentsQueryDto) {
    return this.payments.listPayments(actor, query, query.userId);
  }

  @Post('payments/:id/process')
  @HttpCode(HttpStatus.OK)
  async process(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ProcessPaymentDto,
  ) {
    return this.payments.processPayment(actor, id, dto.method, dto.details);
  }

  @Get('payments/:id/verify')
  async verify(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.payments.verifyPayment(actor, id);
  }

  @Post('payments/:id/refunds')
  @HttpCode(HttpStatus.CREATED)
  async requestRefund(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RequestRefundDto,
  ) {
    return this.payments.requestRefund(actor, id, dto.reason, dto.amount);
  }

  @Post('refunds/:id/process')
  @HttpCode(HttpStatus.OK)
  async processRefund(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.payments.processRefund(actor, id);
  }

  @Get('payouts')
  async listPayouts(@CurrentUser() actor: Actor, @Query() query: ListPaymentsQueryDto) {
    return this.payments.listPayouts(actor, query, query.userId);
  }

  @Post('payouts/:id/process')
  @HttpCode(HttpStatus.OK)
  async processPayout(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.payments.processPayout(actor, id);
  }
}
