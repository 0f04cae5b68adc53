import { registerAs } from '@nestjs/config';

export interface AuthConfig {
  jwtSecret: string;
  jwtAccessExpiration: string;
  accessTokenTtlSeconds: number;
  bcryptRounds: number;
}

export default registerAs('auth', (): AuthConfig => {
  const accessExpiration = process.env.JWT_ACCESS_EXPIRATION || '30m';

  return {
    jwtSecret: process.env.JWT_SECRET || 'development-secret-change-in-production',
    jwtAccessExpiration: accessExpiration,
    accessTokenTtlSeconds: parseExpiration(accessExpiration),
    bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),
  };
});

export function parseExpiration(exp: string): number {
  const match = exp.match(/^(\d+)([smhd])$/);
  if (!match) {
    return 1800; // default 30 minutes
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case 's':
      return value;
    case 'm':
      return value * 60;
    case 'h':
      return value * 60 * 60;
    case 'd':
      return value * 60 * 60 * 24;
    default:
      return 1800;
  }
}
