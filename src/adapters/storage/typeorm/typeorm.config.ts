import { DataSource } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { MANDATE_ENTITIES } from './entities';

/**
 * Connection overrides; the store is always PostgreSQL
 */
export type TypeORMConfigOverrides = Partial<Omit<PostgresConnectionOptions, 'type'>>;

/**
 * TypeORM configuration for the authorization store
 */
export const createTypeORMConfig = (
  options: TypeORMConfigOverrides = {},
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'mandate',
    password: process.env.DB_PASSWORD || 'mandate',
    database: process.env.DB_NAME || 'mandate',
    entities: MANDATE_ENTITIES,
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    subscribers: [],
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options?: TypeORMConfigOverrides): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
