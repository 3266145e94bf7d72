import 'reflect-metadata';
import { DataSource } from 'typeorm';

export const AppDataSource = new DataSource({
  type: 'postgres',
  schema: 'public',
  synchronize: false,
  extra: {
    max: 20,
    idleTimeoutMillis: 120000,
  },
  logging: false,
  entities: [`${__dirname}/entity/**/*.{js,ts}`],
  migrations: [`${__dirname}/migration/**/*.{js,ts}`],
  host: process.env.TYPEORM_HOST || 'localhost',
  port: parseInt(process.env.TYPEORM_PORT || '5432', 10),
  username: process.env.TYPEORM_USER || 'postgres',
  password: process.env.TYPEORM_PASSWORD || '12345',
  database:
    process.env.TYPEORM_DATABASE ||
    (process.env.NODE_ENV === 'test' ? 'snippets_test' : 'snippets'),
});
