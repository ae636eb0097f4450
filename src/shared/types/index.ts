/**
 * Shared TypeScript Types and Interfaces
 * Central location for all shared type definitions
 */

// ============================================
// API RESPONSE TYPES
// ============================================

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T> {
  success: boolean;
  data: T;
  message?: string;
  meta?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown> | unknown[];
    stack?: string;
  };
  requestId?: string;
  timestamp: string;
}

// ============================================
// VALIDATION TYPES
// ============================================

/**
 * One problem with a request field
 */
export interface FieldIssue {
  field: string;
  message: string;
  code?: string;
}

// ============================================
// EXPRESS AUGMENTATION
// ============================================

// Declaration merging to extend Express Request
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}
