import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedRequest, AuthenticatedUser } from '../../modules/auth/interfaces/jwt-payload.interface';

/**
 * Injects the JWT user attached by CombinedAuthGuard, or null.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthenticatedUser | null => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.user ?? null;
  },
);

/**
 * Like CurrentUser, but rejects callers without a user token
 * (anonymous or API key).
 */
export const AuthUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthenticatedUser => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException('A user token is required');
    }
    return request.user;
  },
);
