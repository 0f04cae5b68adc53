import { registerAs } from '@nestjs/config';
import { API_PREFIX } from '@engage/shared';

export interface AppConfig {
  port: number;
  apiPrefix: string;
  apiKey: string | undefined;
  corsOrigins: string[];
}

export default registerAs('app', (): AppConfig => ({
  port: parseInt(process.env.PORT || '3000', 10),
  apiPrefix: process.env.API_PREFIX || API_PREFIX,
  apiKey: process.env.API_KEY,
  corsOrigins: process.env.CORS_ORIGINS?.split(',') || ['http://localhost:5173'],
}));
