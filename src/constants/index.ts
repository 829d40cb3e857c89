/**
 * Application Constants
 *
 * This file contains internal constants that do not require external configuration.
 * For values that should be configurable via environment variables, use config/index.ts
 */

// ============================================================================
// Time Conversion Constants
// ============================================================================
export const TIME = {
  /** Milliseconds in one second */
  MS_PER_SECOND: 1000,

  /** Milliseconds in one day */
  MS_PER_DAY: 24 * 60 * 60 * 1000,
} as const;

// ============================================================================
// Cache Constants
// ============================================================================
export const CACHE = {
  /** Default max size for LRU cache */
  LRU_DEFAULT_MAX_SIZE: 10000,

  /** Default TTL for LRU cache in milliseconds (5 minutes) */
  LRU_DEFAULT_TTL_MS: 300000,

  /** LRU cache cleanup interval in milliseconds (60 seconds) */
  LRU_CLEANUP_INTERVAL_MS: 60000,

  /** Redis periodic reconnect interval in milliseconds (30 seconds) */
  REDIS_PERIODIC_RECONNECT_INTERVAL_MS: 30000,

  /** Redis fallback cache max size */
  REDIS_FALLBACK_MAX_SIZE: 50000,

  /** Redis connection timeout in milliseconds (5 seconds) */
  REDIS_CONNECTION_TIMEOUT_MS: 5000,

  /** Prefix shared by every hot-cache key */
  KEY_PREFIX: 'portal',
} as const;

// ============================================================================
// Session Constants
// ============================================================================
export const SESSION = {
  /** Session ID length in bytes */
  ID_LENGTH: 16,

  /** Session ID prefix */
  ID_PREFIX: 'S',

  /** Key prefix of session records in the backing store */
  KEY_PREFIX: 'portal-sess:',

  /** Header carrying the session id on HTTP requests */
  HEADER: 'x-portal-session',
} as const;

// ============================================================================
// Portal Constants
// ============================================================================
export const PORTAL = {
  /** Upper bound on HTML kept in diagnostics */
  HTML_SAMPLE_LENGTH: 200,

  /** Header used to correlate upstream calls */
  REQUEST_ID_HEADER: 'X-Request-ID',
} as const;

// ============================================================================
// Schedule Constants
// ============================================================================
export const SCHEDULE = {
  /** (start, end) slot pairs, indexed by data row of the timetable grid */
  SECTION_SLOTS: [
    [1, 2],
    [3, 4],
    [5, 6],
    [7, 8],
    [9, 10],
    [11, 12],
  ] as const,

  /** Days per week in the grid */
  WEEKDAYS: 7,

  /** Weeks assumed when a week label cannot be decoded */
  DEFAULT_WEEK_COUNT: 20,

  /** Highest week number accepted from a week label; tokens beyond it are dropped */
  MAX_WEEK: 60,
} as const;
