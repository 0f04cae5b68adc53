import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import * as dotenv from 'dotenv';
import * as path from 'path';

// Single source of truth for entities
import { ALL_ENTITIES } from './entities';

// Load .env file for CLI commands
dotenv.config();

const getEnvVar = (key: string, fallback?: string): string => {
  const value = process.env[key] || fallback;
  if (!value) {
    throw new Error(`Environment variable ${key} is required`);
  }
  return value;
};

export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: getEnvVar('DB_HOST', 'localhost'),
  port: parseInt(getEnvVar('DB_PORT', '5432'), 10),
  username: getEnvVar('DB_USERNAME', 'engage'),
  password: getEnvVar('DB_PASSWORD', 'engage_password'),
  database: getEnvVar('DB_DATABASE', 'engage'),

  ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,

  entities: [...ALL_ENTITIES],

  migrations: [path.join(__dirname, 'migrations', '*{.ts,.js}')],

  // NEVER use synchronize in production!
  synchronize: false,

  logging: process.env.NODE_ENV === 'development' ? ['query', 'error'] : ['error'],

  migrationsRun: false,
  migrationsTableName: 'typeorm_migrations',
};

// DataSource instance for CLI
const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
