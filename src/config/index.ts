import * as dotenv from 'dotenv';
import { Config, ScheduleParserEngine, SessionBackend, StorageBackend } from './types';

// Load environment variables
dotenv.config();

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${name} is required`);
  }
  return value;
}

function getEnvNumber(name: string, defaultValue?: number): number {
  const value = process.env[name];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${name} is required`);
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${name} must be a number`);
  }
  return num;
}

function getEnvBoolean(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new Error(`Environment variable ${name} must be a boolean`);
}

function getEnvChoice<T extends string>(name: string, choices: readonly T[], defaultValue: T): T {
  const value = getEnvVar(name, defaultValue);
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new Error(`Environment variable ${name} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

const redisPassword = process.env['REDIS_PASSWORD'];

export const config: Config = {
  // Server
  HOST: getEnvVar('HOST', '0.0.0.0'),
  NODE_ENV: getEnvVar('NODE_ENV', 'development'),
  PORT: getEnvNumber('PORT', 3000),
  SERVICE_NAME: getEnvVar('SERVICE_NAME', 'portal-sync-service'),

  // Logging
  LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),

  // Storage selection
  STORAGE_BACKEND: getEnvChoice<StorageBackend>('STORAGE_BACKEND', ['postgres', 'memory'], 'postgres'),
  SESSION_BACKEND: getEnvChoice<SessionBackend>('SESSION_BACKEND', ['redis', 'memory'], 'redis'),

  // Database
  DATABASE_HOST: getEnvVar('DATABASE_HOST', 'localhost'),
  DATABASE_PORT: getEnvNumber('DATABASE_PORT', 5432),
  DATABASE_NAME: getEnvVar('DATABASE_NAME', 'portal_sync'),
  DATABASE_USER: getEnvVar('DATABASE_USER', 'postgres'),
  DATABASE_PASSWORD: getEnvVar('DATABASE_PASSWORD', 'postgres'),
  DATABASE_POOL_MIN: getEnvNumber('DATABASE_POOL_MIN', 2),
  DATABASE_POOL_MAX: getEnvNumber('DATABASE_POOL_MAX', 10),
  DATABASE_IDLE_TIMEOUT_MS: getEnvNumber('DATABASE_IDLE_TIMEOUT_MS', 30000),
  DATABASE_CONNECTION_TIMEOUT_MS: getEnvNumber(
    'DATABASE_CONNECTION_TIMEOUT_MS',
    30000
  ),
  DATABASE_STATEMENT_TIMEOUT_MS: getEnvNumber(
    'DATABASE_STATEMENT_TIMEOUT_MS',
    5000
  ),
  DATABASE_QUERY_TIMEOUT_MS: getEnvNumber('DATABASE_QUERY_TIMEOUT_MS', 10000),

  // Redis
  REDIS_URL: getEnvVar('REDIS_URL', 'redis://localhost:6379'),
  ...(redisPassword ? { REDIS_PASSWORD: redisPassword } : {}),
  REDIS_MAX_RECONNECT_ATTEMPTS: getEnvNumber(
    'REDIS_MAX_RECONNECT_ATTEMPTS',
    10
  ),
  REDIS_RECONNECT_BASE_DELAY_MS: getEnvNumber(
    'REDIS_RECONNECT_BASE_DELAY_MS',
    100
  ),
  REDIS_RECONNECT_MAX_DELAY_MS: getEnvNumber(
    'REDIS_RECONNECT_MAX_DELAY_MS',
    10000
  ),

  // Cache Configuration
  CACHE_LRU_MAX_TTL_SECONDS: getEnvNumber('CACHE_LRU_MAX_TTL_SECONDS', 600), // 10 minutes
  CACHE_TTL_PROFILE_SEC: getEnvNumber('CACHE_TTL_PROFILE_SEC', 24 * 3600),
  CACHE_TTL_SEMESTERS_SEC: getEnvNumber('CACHE_TTL_SEMESTERS_SEC', 12 * 3600),
  CACHE_TTL_GRADES_SEC: getEnvNumber('CACHE_TTL_GRADES_SEC', 6 * 3600),
  CACHE_TTL_SCHEDULE_SEC: getEnvNumber('CACHE_TTL_SCHEDULE_SEC', 6 * 3600),

  // Portal
  PORTAL_BASE_URL: getEnvVar('PORTAL_BASE_URL', 'https://jwxt.example.edu'),
  PORTAL_HEALTH_PATH: getEnvVar('PORTAL_HEALTH_PATH', '/jsxsd/xk/LoginToXk'),
  PORTAL_LOGIN_PATH: getEnvVar('PORTAL_LOGIN_PATH', '/jsxsd/xk/LoginToXk'),
  PORTAL_PROFILE_PATH: getEnvVar('PORTAL_PROFILE_PATH', '/jsxsd/grxx/xsxx'),
  PORTAL_SEMESTERS_PATH: getEnvVar('PORTAL_SEMESTERS_PATH', '/jsxsd/kscj/cjcx_query'),
  PORTAL_GRADES_PATH: getEnvVar('PORTAL_GRADES_PATH', '/jsxsd/kscj/cjcx_list'),
  PORTAL_SCHEDULE_PATH: getEnvVar('PORTAL_SCHEDULE_PATH', '/jsxsd/xskb/xskb_list.do'),
  PORTAL_CONNECT_TIMEOUT_MS: getEnvNumber('PORTAL_CONNECT_TIMEOUT_MS', 10000), // 10 seconds
  PORTAL_READ_TIMEOUT_MS: getEnvNumber('PORTAL_READ_TIMEOUT_MS', 20000), // 20 seconds
  PORTAL_INSECURE_SKIP_VERIFY: getEnvBoolean('PORTAL_INSECURE_SKIP_VERIFY', false),
  PORTAL_USER_AGENT: getEnvVar(
    'PORTAL_USER_AGENT',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36'
  ),
  SCHEDULE_PARSER: getEnvChoice<ScheduleParserEngine>('SCHEDULE_PARSER', ['markup', 'regex'], 'markup'),

  // Session Configuration
  SESSION_ABSOLUTE_TTL_SEC: getEnvNumber('SESSION_ABSOLUTE_TTL_SEC', 8 * 3600), // 8 hours
  SESSION_IDLE_TTL_SEC: getEnvNumber('SESSION_IDLE_TTL_SEC', 3600), // 1 hour

  // Snapshot Retention Job Configuration (0 days disables pruning)
  SNAPSHOT_RETENTION_DAYS: getEnvNumber('SNAPSHOT_RETENTION_DAYS', 0),
  SNAPSHOT_CLEANUP_INTERVAL_MS: getEnvNumber('SNAPSHOT_CLEANUP_INTERVAL_MS', 3600000), // 1 hour
  SNAPSHOT_CLEANUP_BATCH_SIZE: getEnvNumber('SNAPSHOT_CLEANUP_BATCH_SIZE', 1000),
  SNAPSHOT_CLEANUP_BATCH_DELAY_MS: getEnvNumber('SNAPSHOT_CLEANUP_BATCH_DELAY_MS', 100),
  SNAPSHOT_CLEANUP_WARNING_THRESHOLD_MS: getEnvNumber(
    'SNAPSHOT_CLEANUP_WARNING_THRESHOLD_MS',
    30000
  ),

  // HTTP Server Timeouts
  CONNECTION_TIMEOUT_MS: getEnvNumber('CONNECTION_TIMEOUT_MS', 30000), // 30 seconds
  REQUEST_TIMEOUT_MS: getEnvNumber('REQUEST_TIMEOUT_MS', 60000), // 60 seconds
  BODY_LIMIT_BYTES: getEnvNumber('BODY_LIMIT_BYTES', 1048576), // 1 MB
};
