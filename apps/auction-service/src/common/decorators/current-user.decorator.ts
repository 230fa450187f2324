import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Actor } from '@gemhouse/shared';
import { AuthenticatedRequest } from '../guards/authenticated-request';

/** The actor resolved by JwtAuthGuard. */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): Actor => {
  const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!req.user) {
    throw new UnauthorizedException('Authenticated user is required');
  }
  return { userId: req.user.userId, role: req.user.role };
});
