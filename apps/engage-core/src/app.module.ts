import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { JwtModule } from '@nestjs/jwt';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';

import {
  appConfig,
  authConfig,
  databaseConfig,
  llmConfig,
  messagingConfig,
  schedulerConfig,
} from './common/config';
import { AuthConfig } from './common/config/auth.config';
import { CombinedAuthGuard } from './common/guards/combined-auth.guard';

// Domain modules
import { AuthModule } from './modules/auth/auth.module';
import { UserModule } from './modules/user/user.module';
import { EventModule } from './modules/event/event.module';
import { RegistrationModule } from './modules/registration/registration.module';
import { SchedulerModule } from './modules/scheduler/scheduler.module';
import { ChatModule } from './modules/chat/chat.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, authConfig, databaseConfig, llmConfig, messagingConfig, schedulerConfig],
      envFilePath: ['.env.local', '.env'],
    }),

    // Database (TypeORM + PostgreSQL)
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => ({
        ...configService.get<TypeOrmModuleOptions>('database'),
      }),
    }),

    // JWT signing and verification, shared by AuthService and CombinedAuthGuard
    JwtModule.registerAsync({
      global: true,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const auth = configService.get<AuthConfig>('auth');
        return {
          secret: auth?.jwtSecret,
          signOptions: { expiresIn: auth?.accessTokenTtlSeconds ?? 1800 },
        };
      },
    }),

    // Rate limiting
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 1 minute
        limit: 100, // 100 requests per minute
      },
    ]),

    AuthModule,
    UserModule,
    EventModule,
    RegistrationModule,
    SchedulerModule,
    ChatModule,
    HealthModule,
  ],
  providers: [
    // Global Combined Auth Guard - supports JWT and API Key
    // Use @Public() decorator to exclude specific routes (e.g., health checks, auth endpoints)
    {
      provide: APP_GUARD,
      useClass: CombinedAuthGuard,
    },
    // Global Throttler Guard for rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
