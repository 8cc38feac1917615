import 'reflect-metadata';
import 'dotenv/config';
import { DataSource } from 'typeorm';
import { buildDataSourceOptions } from './config/database.config';

// Used by the TypeORM CLI: npm run migration:run
export const AppDataSource = new DataSource(buildDataSourceOptions());
