import { Controller, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { EnrollmentService } from '../services/enrollment.service';

@Controller('enrollments')
@UseGuards(JwtAuthGuard)
export class EnrollmentController {
  constructor(private readonly enrollments: EnrollmentService) {}

  @Post(':id/approve')
  @HttpCode(HttpStatus.OK)
  async approve(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.enrollments.approve(actor, id);
  }

  @Post(':id/reject')
  @HttpCode(HttpStatus.OK)
  async reject(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.enrollments.reject(actor, id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    return this.enrollments.cancel(actor, id);
  }
}
