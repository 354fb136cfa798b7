/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * A document either yields its full mention list or an error; never a partial list.
 *
 * @module server/errors
 */

import { AnnotationError, type AnnotationErrorCode } from '../services/annotation/errors.js';
import { failureResult } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Annotation engine errors
  | 'ANNOTATION_ENGINE_ERROR'
  | 'ANNOTATION_TIMEOUT'
  | 'ENGINE_NOT_AVAILABLE'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_IS_DIRECTORY'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * AnnotationError is handled in fromUnknown() through its code.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
};

/**
 * Annotation error codes with a more specific category than ANNOTATION_ENGINE_ERROR
 */
const ANNOTATION_CODE_TO_CATEGORY: Partial<Record<AnnotationErrorCode, ErrorCategory>> = {
  WORKER_TIMEOUT: 'ANNOTATION_TIMEOUT',
  ENGINE_NOT_AVAILABLE: 'ENGINE_NOT_AVAILABLE',
  MODEL_NOT_FOUND: 'ENGINE_NOT_AVAILABLE',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    // Annotation errors carry a code that selects a more specific category
    if (error instanceof AnnotationError) {
      const category = ANNOTATION_CODE_TO_CATEGORY[error.code] ?? 'ANNOTATION_ENGINE_ERROR';
      return new MCPError(category, error.message, {
        originalName: error.name,
        code: error.code,
        ...error.details,
        stack: error.stack,
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: MCPError): ErrorResponse {
  return failureResult(error.category, error.message, error.details);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create path not found error
 */
export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

/**
 * Create path is a directory error (a document file was expected)
 */
export function pathIsDirectoryError(path: string): MCPError {
  return new MCPError('PATH_IS_DIRECTORY', `Path is a directory, expected a text file: ${path}`, {
    path,
  });
}
