/**
 * Centralized Configuration Constants
 *
 * All magic numbers, timeouts, and configuration values
 * extracted to a single source of truth.
 */

// ===== API TIMEOUTS =====

export const TIMEOUTS = {
  /** Standard AI request timeout (2 minutes) */
  AI_REQUEST: 120_000,
} as const;

// ===== RETRY CONFIGURATION =====

/**
 * Retry logic configuration with exponential backoff
 */
export const RETRY = {
  /** Retries after the initial call */
  MAX_ATTEMPTS: 2,

  /** Base delay between retries (ms) */
  BASE_DELAY_MS: 1_000,

  /** Maximum delay cap (prevents exponential explosion) */
  MAX_DELAY_MS: 10_000,
} as const;

// ===== FILE UPLOAD LIMITS =====

export const FILE_UPLOAD = {
  /** Maximum file size in bytes (25 MB) */
  MAX_SIZE_BYTES: 25 * 1024 * 1024,

  /** Form field name for the document */
  FIELD_NAME: 'file',

  ALLOWED_EXTENSIONS: ['pdf', 'csv', 'xls', 'xlsx'],
} as const;

// ===== HTTP STATUS =====

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNSUPPORTED_MEDIA_TYPE: 415,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;
