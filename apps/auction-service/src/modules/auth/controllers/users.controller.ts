import { Body, Controller, Param, ParseUUIDPipe, Patch, Post, UseGuards } from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { JwtAuthGuard } from '../../../common/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { AuthService, PublicUser } from '../auth.service';
import { ChangeRoleDto } from '../dto/change-role.dto';

@Controller('users')
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private readonly authService: AuthService) {}

  @Patch(':id/role')
  async changeRole(
    @CurrentUser() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ChangeRoleDto,
  ): Promise<PublicUser> {
    return this.authService.changeRole(actor, id, dto.role);
  }

  @Post(':id/deactivate')
  async deactivate(@CurrentUser() actor: Actor, @Param('id', ParseUUIDPipe) id: string): Promise<PublicUser> {
    return this.authService.deactivate(actor, id);
  }
}
