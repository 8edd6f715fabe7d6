// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
}

export interface DatabaseConfigOptions {
  path: string;
}

export interface StreamingConfig {
  keepAliveMs: number;
}

export interface CacheConfig {
  ttlMs: number;
  maxSize: number;
  enabled: boolean;
}

export interface LoggingConfig {
  toolAuditLog: boolean;
  logDirectory: string;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfigOptions;
  streaming: StreamingConfig;
  cache: CacheConfig;
  logging: LoggingConfig;
}

const NODE_ENVS: ReadonlyArray<ServerConfig['nodeEnv']> = ['development', 'production', 'test'];

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  const found = NODE_ENVS.find((env) => env === value);
  return found ?? 'development';
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    corsOrigins: parseList(env.CORS_ORIGINS, ['http://localhost:3000', 'http://127.0.0.1:3000']),
  };
}

export function buildDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfigOptions {
  return {
    path: env.DB_PATH || './data/campaigns.json',
  };
}

export function buildStreamingConfig(env: NodeJS.ProcessEnv = process.env): StreamingConfig {
  return {
    keepAliveMs: parseInt(env.SSE_KEEPALIVE_MS || '30000', 10),
  };
}

export function buildCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  return {
    ttlMs: parseInt(env.CACHE_TTL_MS || '300000', 10),
    maxSize: parseInt(env.CACHE_MAX_SIZE || '200', 10),
    enabled: env.CACHE_ENABLED !== '0',
  };
}

export function buildLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    toolAuditLog: env.TOOL_AUDIT_LOG === '1',
    logDirectory: env.LOG_DIR || './logs',
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    database: buildDatabaseConfig(env),
    streaming: buildStreamingConfig(env),
    cache: buildCacheConfig(env),
    logging: buildLoggingConfig(env),
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!config.database.path) {
    errors.push('Database path is required (DB_PATH)');
  }

  if (!Number.isInteger(config.streaming.keepAliveMs) || config.streaming.keepAliveMs < 1000) {
    errors.push('SSE keep-alive interval must be at least 1000ms (SSE_KEEPALIVE_MS)');
  }

  if (!Number.isInteger(config.cache.maxSize) || config.cache.maxSize < 1) {
    errors.push('Cache size must be a positive integer (CACHE_MAX_SIZE)');
  }

  if (!Number.isInteger(config.cache.ttlMs) || config.cache.ttlMs < 0) {
    errors.push('Cache TTL must be zero or more milliseconds (CACHE_TTL_MS)');
  }

  return errors;
}
