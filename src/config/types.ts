export type StorageBackend = 'postgres' | 'memory';
export type SessionBackend = 'redis' | 'memory';
export type ScheduleParserEngine = 'markup' | 'regex';

export interface Config {
  // Server
  HOST: string;
  NODE_ENV: string;
  PORT: number;
  SERVICE_NAME: string;

  // Logging
  LOG_LEVEL: string;

  // Storage selection
  STORAGE_BACKEND: StorageBackend;
  SESSION_BACKEND: SessionBackend;

  // Database
  DATABASE_HOST: string;
  DATABASE_PORT: number;
  DATABASE_NAME: string;
  DATABASE_USER: string;
  DATABASE_PASSWORD: string;
  DATABASE_POOL_MIN: number;
  DATABASE_POOL_MAX: number;
  DATABASE_IDLE_TIMEOUT_MS: number;
  DATABASE_CONNECTION_TIMEOUT_MS: number;
  DATABASE_STATEMENT_TIMEOUT_MS: number;
  DATABASE_QUERY_TIMEOUT_MS: number;

  // Redis
  REDIS_URL: string;
  REDIS_PASSWORD?: string;
  REDIS_MAX_RECONNECT_ATTEMPTS: number;
  REDIS_RECONNECT_BASE_DELAY_MS: number;
  REDIS_RECONNECT_MAX_DELAY_MS: number;

  // Cache Configuration
  CACHE_LRU_MAX_TTL_SECONDS: number;
  CACHE_TTL_PROFILE_SEC: number;
  CACHE_TTL_SEMESTERS_SEC: number;
  CACHE_TTL_GRADES_SEC: number;
  CACHE_TTL_SCHEDULE_SEC: number;

  // Portal
  PORTAL_BASE_URL: string;
  PORTAL_HEALTH_PATH: string;
  PORTAL_LOGIN_PATH: string;
  PORTAL_PROFILE_PATH: string;
  PORTAL_SEMESTERS_PATH: string;
  PORTAL_GRADES_PATH: string;
  PORTAL_SCHEDULE_PATH: string;
  PORTAL_CONNECT_TIMEOUT_MS: number;
  PORTAL_READ_TIMEOUT_MS: number;
  PORTAL_INSECURE_SKIP_VERIFY: boolean;
  PORTAL_USER_AGENT: string;
  SCHEDULE_PARSER: ScheduleParserEngine;

  // Session Configuration
  SESSION_ABSOLUTE_TTL_SEC: number;
  SESSION_IDLE_TTL_SEC: number;

  // Snapshot Retention Job Configuration
  SNAPSHOT_RETENTION_DAYS: number;
  SNAPSHOT_CLEANUP_INTERVAL_MS: number;
  SNAPSHOT_CLEANUP_BATCH_SIZE: number;
  SNAPSHOT_CLEANUP_BATCH_DELAY_MS: number;
  SNAPSHOT_CLEANUP_WARNING_THRESHOLD_MS: number;

  // HTTP Server Timeouts
  CONNECTION_TIMEOUT_MS: number;
  REQUEST_TIMEOUT_MS: number;
  BODY_LIMIT_BYTES: number;
}
