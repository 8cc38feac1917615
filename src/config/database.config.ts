import { DataSourceOptions } from 'typeorm';
import { ENTITIES } from '../entities';

type Env = Record<string, string | undefined>;

function flag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function buildDataSourceOptions(env: Env = process.env): DataSourceOptions {
  return {
    type: 'postgres',
    url: env.DATABASE_URL,
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '5432', 10),
    username: env.DB_USERNAME || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
    database: env.DB_NAME || 'clinic',
    entities: ENTITIES,
    migrations: [__dirname + '/../migration/*.{ts,js}'],
    synchronize: false, // Use migrations only
    logging: flag(env.DB_LOGGING),
    ssl: flag(env.DB_SSL) ? { rejectUnauthorized: false } : false,
  };
}
