/**
 * Response Utilities
 * Helper functions for formatting API responses
 */

import type { ApiResponse, ErrorResponse } from '../types/index.js';

// ============================================
// SUCCESS RESPONSE
// ============================================

/**
 * Format a successful API response
 * @param meta - Optional metadata
 * @param message - Optional success message
 */
export function successResponse<T>(
  data: T,
  meta?: Record<string, unknown>,
  message?: string
): ApiResponse<T> {
  const response: ApiResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };

  if (message) {
    response.message = message;
  }

  if (meta) {
    response.meta = meta;
  }

  return response;
}

/**
 * Format a created response (201)
 */
export function createdResponse<T>(
  data: T,
  message: string = 'Resource created successfully'
): ApiResponse<T> {
  return successResponse(data, undefined, message);
}

// ============================================
// ERROR RESPONSE
// ============================================

/**
 * Format an error API response
 * @param code - Error code
 * @param details - Optional error details
 * @param requestId - Optional request ID for tracking
 */
export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown> | unknown[],
  requestId?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    timestamp: new Date().toISOString(),
  };

  if (details) {
    response.error.details = details;
  }

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}
