import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AIError, createApiErrorResponse, ERROR_CODES, type ErrorCode } from '@shared/errors';
import type { VpbComputationError } from '@shared/schema/vpb';
import { HTTP_STATUS } from '../config/constants';
import { logger } from '../services/logger';

/**
 * Helper to safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error occurred';
}

export function isErrorWithMessage(error: unknown): error is Error {
  return error instanceof Error;
}

export class ServerError extends Error {
  constructor(
    public code: ErrorCode,
    public userMessage: string,
    public statusCode: number = HTTP_STATUS.INTERNAL_SERVER_ERROR,
    public details?: Record<string, unknown>
  ) {
    super(`[${code}] ${userMessage}`);
    this.name = 'ServerError';
  }

  static validation(message: string, userMessage: string, details?: Record<string, unknown>): ServerError {
    return new ServerError(ERROR_CODES.VALIDATION_FAILED, userMessage, HTTP_STATUS.BAD_REQUEST, { reason: message, ...details });
  }

  static unsupportedFile(filename: string): ServerError {
    return new ServerError(
      ERROR_CODES.UNSUPPORTED_FILE_TYPE,
      'Bestandstype niet ondersteund. Gebruik PDF, CSV, XLS of XLSX.',
      HTTP_STATUS.UNSUPPORTED_MEDIA_TYPE,
      { filename }
    );
  }

  static unreadableDocument(reason: string): ServerError {
    return new ServerError(
      ERROR_CODES.DOCUMENT_UNREADABLE,
      'Het document kon niet gelezen worden.',
      HTTP_STATUS.BAD_REQUEST,
      { reason }
    );
  }

  /**
   * Vertaalt een mislukte VPB berekening naar een HTTP fout.
   */
  static fromComputation(error: VpbComputationError): ServerError {
    switch (error.type) {
      case 'NO_VALID_PERIODS':
        return new ServerError(
          ERROR_CODES.NO_VALID_PERIODS,
          'Geen kwartaal met omzet gevonden om te berekenen.',
          HTTP_STATUS.UNPROCESSABLE_ENTITY,
          { reason: error.message }
        );
      case 'COMPUTATION_FAILED':
        return new ServerError(
          ERROR_CODES.COMPUTATION_FAILED,
          'De belastingberekening is mislukt.',
          HTTP_STATUS.INTERNAL_SERVER_ERROR,
          { reason: error.message, cause: error.cause }
        );
    }
  }
}

/**
 * Centraal error handling middleware
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const requestId = req.header('x-request-id') || 'unknown';
  logger.error('errorHandler', `Error in ${req.method} ${req.path}`, {
    errorMessage: getErrorMessage(err),
    requestId
  }, isErrorWithMessage(err) ? err : undefined);

  if (err instanceof ServerError) {
    return res.status(err.statusCode).json(
      createApiErrorResponse('SERVER_ERROR', err.code, err.message, err.userMessage, err.details)
    );
  }

  if (err instanceof AIError) {
    return res.status(err.statusCode).json(
      createApiErrorResponse(
        'AI_ERROR',
        err.code,
        err.message,
        'De AI service kon het document niet verwerken. Probeer het later opnieuw.',
        { category: err.category }
      )
    );
  }

  if (err instanceof ZodError) {
    const details = {
      validationErrors: err.errors.map(error => ({
        path: error.path.join('.'),
        message: error.message,
        code: error.code
      }))
    };

    return res.status(HTTP_STATUS.BAD_REQUEST).json(
      createApiErrorResponse(
        'VALIDATION_ERROR',
        ERROR_CODES.VALIDATION_FAILED,
        'Validation failed',
        err.errors[0]?.message || 'De ingevoerde gegevens zijn niet geldig.',
        details
      )
    );
  }

  // Upload limits (bestandsgrootte, onverwacht veld)
  if (err instanceof multer.MulterError) {
    return res.status(HTTP_STATUS.BAD_REQUEST).json(
      createApiErrorResponse(
        'UPLOAD_ERROR',
        ERROR_CODES.VALIDATION_FAILED,
        err.message,
        'Het bestand kon niet worden geüpload.',
        { multerCode: err.code, field: err.field }
      )
    );
  }

  // Malformed JSON from body-parser
  if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
    return res.status(HTTP_STATUS.BAD_REQUEST).json(
      createApiErrorResponse(
        'VALIDATION_ERROR',
        ERROR_CODES.VALIDATION_FAILED,
        'Malformed JSON body',
        'De request body is geen geldige JSON.'
      )
    );
  }

  // Fallback voor alle andere errors
  const statusCode = (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number')
    ? err.status
    : HTTP_STATUS.INTERNAL_SERVER_ERROR;

  const isClientError = statusCode >= 400 && statusCode < 500;

  return res.status(statusCode).json(
    createApiErrorResponse(
      'UNKNOWN_ERROR',
      ERROR_CODES.INTERNAL_SERVER_ERROR,
      getErrorMessage(err),
      isClientError
        ? 'Er is een fout opgetreden bij het verwerken van uw verzoek.'
        : 'Er is een interne serverfout opgetreden. Probeer het later opnieuw.'
    )
  );
}

/**
 * Middleware voor het afhandelen van async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
