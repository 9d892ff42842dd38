export type ServerConfig = {
  port: number;
  jsonBodyLimit: string;
  nodeEnv: string;
};

export type DatabaseConfig = {
  connectionString: string;
  poolMax: number;
};

type ConfigOptions = {
  env?: NodeJS.ProcessEnv;
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolveServerConfig(options: ConfigOptions = {}): ServerConfig {
  const env = options.env ?? process.env;
  return {
    port: parsePositiveInt(env.PORT, 3000),
    jsonBodyLimit: env.JSON_BODY_LIMIT?.trim() || '1mb',
    nodeEnv: env.NODE_ENV ?? 'development'
  };
}

export function resolveDatabaseConfig(options: ConfigOptions = {}): DatabaseConfig {
  const env = options.env ?? process.env;
  const connectionString = env.DATABASE_URL?.trim();
  if (!connectionString) {
    throw new Error('DATABASE_URL must be set before starting the API');
  }
  return {
    connectionString,
    poolMax: parsePositiveInt(env.DB_POOL_MAX, 10)
  };
}
