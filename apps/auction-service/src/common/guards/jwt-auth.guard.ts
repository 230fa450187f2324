import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as jwt from 'jsonwebtoken';
import { isUserRole, RequestContext } from '@gemhouse/shared';
import { AuthenticatedRequest } from './authenticated-request';

/**
 * Verifies the bearer token (HS256, issuer, audience) and attaches the
 * resolved actor to `req.user`. Role checks happen in the services.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);
  private readonly verifyOptions: jwt.VerifyOptions & { complete?: false };

  constructor(private readonly config: ConfigService) {
    this.verifyOptions = {
      algorithms: ['HS256'],
      issuer: this.config.getOrThrow<string>('JWT_ISSUER'),
      audience: this.config.getOrThrow<string>('JWT_AUDIENCE'),
    };
  }

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid Authorization header');
    }

    const token = authHeader.slice(7);
    const secret = this.config.getOrThrow<string>('JWT_SECRET');

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, secret, this.verifyOptions);
    } catch (err) {
      this.logger.warn(
        `JWT verification failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      throw new UnauthorizedException('Invalid or expired token');
    }

    if (
      typeof payload === 'string' ||
      typeof payload.sub !== 'string' ||
      typeof payload.email !== 'string' ||
      !isUserRole(payload.role)
    ) {
      throw new UnauthorizedException('Malformed token payload');
    }

    req.user = { userId: payload.sub, email: payload.email, role: payload.role };
    RequestContext.set({ userId: payload.sub });
    return true;
  }
}
