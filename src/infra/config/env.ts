/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Food store (SQLite file)
  FOOD_DATABASE_PATH: Type.String({ minLength: 1, default: './food.db' }),
  FOOD_DATABASE_CREATE_SCHEMA: Type.Boolean({ default: false }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseBoolean = (value: string | undefined): boolean | string => {
  if (value === undefined || value === '') {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  // Left as a string so schema validation reports it
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    FOOD_DATABASE_PATH: env['FOOD_DATABASE_PATH'] ?? './food.db',
    FOOD_DATABASE_CREATE_SCHEMA: parseBoolean(env['FOOD_DATABASE_CREATE_SCHEMA']),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    /** Path of the SQLite file, or ':memory:' */
    path: env.FOOD_DATABASE_PATH,
    /** Create missing tables on startup */
    createSchema: env.FOOD_DATABASE_CREATE_SCHEMA,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
