/**
 * Error Handling Middleware
 * Centralized error handling for the application
 */

import type { Request, Response, NextFunction } from 'express';
import { HttpStatus, ErrorMessages } from '../../config/constants.js';
import { logger } from '../../config/logger.js';
import type { ErrorResponse } from '../types/index.js';

// ============================================
// APP ERROR CLASS
// ============================================

/**
 * Custom application error with status code and operational flag
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown> | unknown[];

  constructor(
    message: string,
    statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown> | unknown[]
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Create a 404 Not Found error
   */
  static notFound(message: string = ErrorMessages.NOT_FOUND, code: string = 'NOT_FOUND'): AppError {
    return new AppError(message, HttpStatus.NOT_FOUND, code, true);
  }
}

// ============================================
// ERROR FORMATTING HELPERS
// ============================================

/**
 * Format error response consistently
 */
function formatErrorResponse(
  statusCode: number,
  code: string,
  message: string,
  requestId?: string,
  details?: Record<string, unknown> | unknown[],
  stack?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    timestamp: new Date().toISOString(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  if (details) {
    response.error.details = details;
  }

  // Only include stack trace in development
  if (stack && process.env['NODE_ENV'] === 'development') {
    response.error.stack = stack;
  }

  return response;
}

// ============================================
// BODY PARSER ERRORS
// ============================================

/**
 * Errors raised by express.json() carry a `type` such as 'entity.too.large'
 */
function bodyParserErrorType(err: Error): string | undefined {
  return 'type' in err && typeof err.type === 'string' ? err.type : undefined;
}

/**
 * Map body parser failures onto AppErrors
 */
function handleBodyParserError(err: Error): AppError | undefined {
  const type = bodyParserErrorType(err);

  if (type === 'entity.too.large') {
    return new AppError(
      'Request body exceeds the configured size limit',
      HttpStatus.PAYLOAD_TOO_LARGE,
      'PAYLOAD_TOO_LARGE',
      true
    );
  }

  // Handle syntax errors (malformed JSON)
  if (type === 'entity.parse.failed' || (err instanceof SyntaxError && 'body' in err)) {
    return new AppError('Invalid JSON in request body', HttpStatus.BAD_REQUEST, 'INVALID_JSON', true);
  }

  return undefined;
}

// ============================================
// GLOBAL ERROR HANDLER MIDDLEWARE
// ============================================

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently
 */
export function globalErrorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = err instanceof AppError ? err : handleBodyParserError(err);

  const statusCode = appError?.statusCode ?? HttpStatus.INTERNAL_SERVER_ERROR;
  const code = appError?.code ?? 'INTERNAL_ERROR';
  const message = appError?.message ?? ErrorMessages.INTERNAL_ERROR;
  const isOperational = appError?.isOperational ?? false;

  if (!isOperational) {
    logger.error('Unhandled error:', {
      code,
      error: err.message,
      stack: err.stack,
      requestId: req.requestId,
      path: req.path,
      method: req.method,
    });
  } else {
    logger.warn('Operational error:', {
      code,
      error: err.message,
      requestId: req.requestId,
      path: req.path,
      method: req.method,
    });
  }

  // Format and send response
  const errorResponse = formatErrorResponse(
    statusCode,
    code,
    message,
    req.requestId,
    appError?.details,
    err.stack
  );

  res.status(statusCode).json(errorResponse);
}

// ============================================
// NOT FOUND HANDLER
// ============================================

/**
 * Handle 404 for undefined routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Route ${req.method} ${req.originalUrl} not found`));
}
