import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
} from '@nestjs/common';
import { AuthenticatedRequest } from '../../modules/auth/interfaces/jwt-payload.interface';

/**
 * Lets through API-key callers and JWT users with the admin role.
 * Runs after CombinedAuthGuard, which sets `authType` and `user`.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (request.authType === 'apikey') {
      return true;
    }

    if (request.user?.role === 'admin') {
      return true;
    }

    throw new ForbiddenException('The user does not have administrative privileges');
  }
}
