/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Marker contained in every per-station result file name */
export const DEFAULT_SOURCE_FILE_MARKER = '各投開票所';

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

  DATABASE_URL: Type.String({ minLength: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Ingestion sources
  SOURCE_DIR: Type.String({ default: './data' }),
  SOURCE_FILE_MARKER: Type.String({ default: DEFAULT_SOURCE_FILE_MARKER, minLength: 1 }),
  SOURCE_CANDIDATE_COLUMNS: Type.Optional(Type.Integer({ minimum: 1 })),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (value: string | undefined): number | undefined =>
  value != null && value !== '' ? Number(value) : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    SOURCE_DIR: env['SOURCE_DIR'] ?? './data',
    SOURCE_FILE_MARKER: env['SOURCE_FILE_MARKER'] ?? DEFAULT_SOURCE_FILE_MARKER,
    SOURCE_CANDIDATE_COLUMNS: parseOptionalInt(env['SOURCE_CANDIDATE_COLUMNS']),
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
    url: env.DATABASE_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  sources: {
    /** Directory holding one CSV export per county */
    rootDir: env.SOURCE_DIR,
    fileMarker: env.SOURCE_FILE_MARKER,
    /** Candidate columns to read; unset means the leading run of `(N)` header cells */
    candidateColumns: env.SOURCE_CANDIDATE_COLUMNS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
