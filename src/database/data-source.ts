// src/database/data-source.ts
// Used by the TypeORM CLI: npm run migration:run
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { LEDGER_ENTITIES } from './entities';

const config = new ConfigService();

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: config.getOrDefault('DB_HOST', 'localhost'),
  port: config.getNumber('DB_PORT', 5432),
  username: config.getOrDefault('DB_USERNAME', 'postgres'),
  password: config.getOrDefault('DB_PASSWORD', 'postgres'),
  database: config.getOrDefault('DB_DATABASE', 'school_billing'),
  entities: LEDGER_ENTITIES,
  migrations: [__dirname + '/../migrations/*{.ts,.js}'],
  synchronize: false,
  logging: config.getOrDefault('NODE_ENV', 'development') === 'development',
});
