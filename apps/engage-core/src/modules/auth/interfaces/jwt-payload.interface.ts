import { Request } from 'express';

export type UserRoleClaim = 'admin' | 'user';

export interface JwtPayload {
  sub: string; // user id
  email: string;
  role: UserRoleClaim;
  type: 'access';
  iat?: number;
  exp?: number;
}

export interface TokenResponse {
  accessToken: string;
  expiresIn: number;
}

export interface AuthenticatedUser {
  id: string;
  email: string;
  role: UserRoleClaim;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
  authType?: 'jwt' | 'apikey';
}
