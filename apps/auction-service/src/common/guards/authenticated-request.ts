import { Request } from 'express';
import { Actor } from '@gemhouse/shared';

export interface AuthenticatedRequest extends Request {
  user?: Actor & { email: string };
}
