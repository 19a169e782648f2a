/**
 * MCP Server Error Handling
 *
 * Input-shape failures stop the document they belong to and surface as a
 * categorized MCPError. Per-page engine failures never reach this layer:
 * the processor counts them in the statistics instead.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'

  // Input contract errors
  | 'METADATA_NOT_FOUND'
  | 'METADATA_INVALID'
  | 'PAGE_NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Map custom error class names to MCPError categories.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  SyntaxError: 'METADATA_INVALID',
};

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
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
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = readErrorCode(error);
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code !== undefined ? { errorCode: code } : {}),
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
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'chunker_config_get',
    hint: 'Check parameter types; sizes must satisfy min_size <= target_size <= max_size',
  },
  PATH_NOT_FOUND: {
    tool: 'chunker_document_process',
    hint: 'Verify input_dir exists on the filesystem',
  },
  PATH_NOT_DIRECTORY: {
    tool: 'chunker_document_process',
    hint: 'Provide the extraction output directory, not a file path',
  },
  METADATA_NOT_FOUND: {
    tool: 'chunker_document_process',
    hint: 'input_dir must contain metadata.json written by the extraction stage',
  },
  METADATA_INVALID: {
    tool: 'chunker_document_process',
    hint: 'metadata.json needs a pages array of { page_number, file_name }',
  },
  PAGE_NOT_FOUND: {
    tool: 'chunker_document_process',
    hint: 'Every page listed in metadata.json must exist under pages/',
  },
  INTERNAL_ERROR: {
    tool: 'chunker_page_chunk',
    hint: 'Retry on a single page with chunker_page_chunk to isolate the input',
  },
};

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}

export function metadataNotFoundError(path: string): MCPError {
  return new MCPError('METADATA_NOT_FOUND', `metadata.json not found: ${path}`, {
    path,
  });
}

/**
 * Create metadata invalid error (unparseable JSON or wrong shape)
 */
export function metadataInvalidError(path: string, reason: string): MCPError {
  return new MCPError('METADATA_INVALID', `Invalid metadata.json (${path}): ${reason}`, {
    path,
    reason,
  });
}

export function pageNotFoundError(pageNumber: number, path: string): MCPError {
  return new MCPError('PAGE_NOT_FOUND', `Page ${pageNumber} file not found: ${path}`, {
    pageNumber,
    path,
  });
}
