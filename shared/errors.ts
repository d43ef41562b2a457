/**
 * Shared error types tussen frontend en backend
 */

export interface ApiErrorResponse {
  success: false;
  error: {
    type: string;
    code: string;
    message: string;
    userMessage: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  message?: string;
}

export type ApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

export const ERROR_CODES = {
  // Input validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
  DOCUMENT_UNREADABLE: 'DOCUMENT_UNREADABLE',

  // VPB computation
  NO_VALID_PERIODS: 'NO_VALID_PERIODS',
  COMPUTATION_FAILED: 'COMPUTATION_FAILED',

  // AI errors
  AI_SERVICE_UNAVAILABLE: 'AI_SERVICE_UNAVAILABLE',
  AI_RATE_LIMITED: 'AI_RATE_LIMITED',
  AI_INVALID_RESPONSE: 'AI_INVALID_RESPONSE',
  AI_AUTHENTICATION_FAILED: 'AI_AUTHENTICATION_FAILED',

  // System errors
  NOT_FOUND: 'NOT_FOUND',
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR'
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export function createApiErrorResponse(
  type: string,
  code: ErrorCode,
  message: string,
  userMessage: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    success: false,
    error: {
      type,
      code,
      message,
      userMessage,
      details,
      timestamp: new Date().toISOString()
    }
  };
}

export function createApiSuccessResponse<T>(
  data: T,
  message?: string
): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    message
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// AI PROVIDER ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export type AIErrorCategory =
  | 'rate_limit'
  | 'authentication'
  | 'timeout'
  | 'network'
  | 'invalid_response'
  | 'unknown';

export interface AIErrorOptions {
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  /** Wachttijd in ms die de provider zelf opgeeft */
  retryAfter?: number;
  category?: AIErrorCategory;
}

interface HttpStatusMapping {
  category: AIErrorCategory;
  code: ErrorCode;
  isRetryable: boolean;
  /** Status die wij zelf teruggeven aan de client */
  statusCode: number;
}

/**
 * Vertaalt een HTTP status van de AI provider naar onze eigen classificatie.
 */
export function classifyProviderStatus(status: number): HttpStatusMapping {
  if (status === 429) {
    return { category: 'rate_limit', code: ERROR_CODES.AI_RATE_LIMITED, isRetryable: true, statusCode: 503 };
  }
  if (status === 401 || status === 403) {
    return { category: 'authentication', code: ERROR_CODES.AI_AUTHENTICATION_FAILED, isRetryable: false, statusCode: 502 };
  }
  if (status >= 500) {
    return { category: 'network', code: ERROR_CODES.AI_SERVICE_UNAVAILABLE, isRetryable: true, statusCode: 503 };
  }
  return { category: 'unknown', code: ERROR_CODES.AI_SERVICE_UNAVAILABLE, isRetryable: false, statusCode: 502 };
}

/**
 * Fout van een AI provider. `isRetryable` stuurt de retry loop in BaseAIHandler.
 */
export class AIError extends Error {
  readonly isRetryable: boolean;
  readonly details?: Record<string, unknown>;
  readonly retryAfter?: number;
  readonly category: AIErrorCategory;

  constructor(
    message: string,
    public readonly code: ErrorCode = ERROR_CODES.AI_SERVICE_UNAVAILABLE,
    public readonly statusCode: number = 500,
    options: AIErrorOptions = {}
  ) {
    super(message);
    this.name = 'AIError';
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
    this.category = options.category ?? 'unknown';
  }

  static invalidResponse(provider: string, message: string, details?: Record<string, unknown>): AIError {
    return new AIError(`${provider}: ${message}`, ERROR_CODES.AI_INVALID_RESPONSE, 502, {
      details,
      category: 'invalid_response',
    });
  }

  static networkError(provider: string, cause: Error & { code?: string | null }): AIError {
    return new AIError(`Network error connecting to ${provider}: ${cause.message}`, ERROR_CODES.NETWORK_ERROR, 503, {
      details: { provider, originalError: cause.code ?? undefined },
      isRetryable: true,
      category: 'network',
    });
  }

  static fromHttpError(status: number, provider: string, message?: string, retryAfterMs?: number): AIError {
    const { category, code, isRetryable, statusCode } = classifyProviderStatus(status);
    return new AIError(message || `HTTP ${status} from ${provider}`, code, statusCode, {
      details: { provider, httpStatus: status },
      isRetryable,
      retryAfter: retryAfterMs,
      category,
    });
  }

  static timeout(model: string, timeoutMs?: number): AIError {
    const suffix = timeoutMs ? ` after ${timeoutMs}ms` : '';
    return new AIError(`Request to ${model} timed out${suffix}`, ERROR_CODES.AI_SERVICE_UNAVAILABLE, 504, {
      isRetryable: true,
      category: 'timeout',
    });
  }

  static notConfigured(provider: string): AIError {
    return new AIError(`${provider} API key is not configured`, ERROR_CODES.AI_AUTHENTICATION_FAILED, 503, {
      category: 'authentication',
    });
  }
}

export function isAIError(error: unknown): error is AIError {
  return error instanceof AIError;
}
