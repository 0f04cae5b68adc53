import { registerAs } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ALL_ENTITIES } from '../../database/entities';

export default registerAs('database', (): TypeOrmModuleOptions => {
  const isRemoteDb = process.env.DB_HOST && process.env.DB_HOST !== 'localhost';

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'engage',
    password: process.env.DB_PASSWORD || 'engage_password',
    database: process.env.DB_DATABASE || 'engage',

    // SSL - enabled by default for remote connections (DB_SSL !== 'false')
    ssl:
      process.env.DB_SSL === 'false'
        ? false
        : isRemoteDb
          ? { rejectUnauthorized: process.env.DB_SSL_VERIFY !== 'false' }
          : false,

    entities: [...ALL_ENTITIES],

    // Synchronize only for tests (creates tables automatically)
    // NEVER use synchronize in production!
    synchronize: process.env.NODE_ENV === 'test',

    retryAttempts: isRemoteDb ? 10 : 3,
    retryDelay: 3000,

    logging: process.env.NODE_ENV === 'development',
    autoLoadEntities: false,
  };
});
