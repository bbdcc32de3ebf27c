/**
 * MCP Server Error Handling
 *
 * FAIL FAST: Tool failures become a typed MCPError with a category,
 * message and details, and are returned to the caller as a structured
 * error response.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Graph errors
  | 'GRAPH_NOT_LOADED'
  | 'NODE_NOT_FOUND'
  | 'SNAPSHOT_INVALID'

  // Visualization jobs
  | 'JOB_NOT_FOUND'

  // File system errors
  | 'SOURCE_NOT_FOUND'
  | 'PATH_NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR';

/** Error class names mapped to categories by MCPError.fromUnknown */
const CATEGORY_BY_ERROR_NAME: Readonly<Record<string, ErrorCategory>> = {
  ValidationError: 'VALIDATION_ERROR',
  SnapshotFormatError: 'SNAPSHOT_INVALID',
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

    if (error instanceof Error) {
      const category = CATEGORY_BY_ERROR_NAME[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
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
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
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
 * Create graph not loaded error
 */
export function graphNotLoadedError(): MCPError {
  return new MCPError(
    'GRAPH_NOT_LOADED',
    'No grant graph loaded. Use grant_graph_build or grant_graph_load first.'
  );
}

/**
 * Create node not found error
 */
export function nodeNotFoundError(nodeId: string, expectedType?: string): MCPError {
  const label = expectedType ? `${expectedType} "${nodeId}"` : `Node "${nodeId}"`;
  return new MCPError('NODE_NOT_FOUND', `${label} not found`, {
    nodeId,
    expectedType,
  });
}

/**
 * Create visualization job not found error
 */
export function jobNotFoundError(jobId: string): MCPError {
  return new MCPError('JOB_NOT_FOUND', `Visualization job "${jobId}" not found or expired`, {
    jobId,
  });
}

/**
 * Create source table not found error
 */
export function sourceNotFoundError(path: string): MCPError {
  return new MCPError('SOURCE_NOT_FOUND', `Award table does not exist: ${path}`, {
    path,
  });
}

/**
 * Create snapshot invalid error
 */
export function snapshotInvalidError(path: string, reason: string, issues?: string[]): MCPError {
  return new MCPError('SNAPSHOT_INVALID', `Snapshot "${path}" is invalid: ${reason}`, {
    path,
    issues,
  });
}

/**
 * Create path not found error
 */
export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}
