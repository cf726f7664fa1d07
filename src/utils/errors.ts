/**
 * Stratum Error Classes
 *
 * Hierarchical errors with:
 * - Error codes (enum)
 * - User-facing messages at three detail levels
 * - Original cause tracking
 * - Recovery hints and recoverability flags
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Validation errors (3000-3099)
  VALIDATION_REQUIRED_FIELD = 3000,
  VALIDATION_INVALID_FORMAT = 3001,
  VALIDATION_INVALID_PATH = 3002,
  VALIDATION_INVALID_CONFIG = 3003,
  VALIDATION_UNSUPPORTED_FILE = 3004,
  VALIDATION_EMPTY_DOCUMENT = 3005,
  VALIDATION_LENGTH_MISMATCH = 3006,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_NO_SPACE = 4002,
  FS_PATH_TOO_LONG = 4003,
  FS_DIRECTORY_NOT_FOUND = 4004,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_NOT_FOUND = 5000,
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID_VALUE = 5002,

  // Embedding service errors (6000-6099)
  EMBEDDING_NETWORK_ERROR = 6000,
  EMBEDDING_TIMEOUT = 6001,
  EMBEDDING_SERVER_ERROR = 6002,
  EMBEDDING_INVALID_RESPONSE = 6003,
  EMBEDDING_DIMENSION_MISMATCH = 6004,

  // Vector store errors (7000-7099)
  STORE_CONNECTION_FAILED = 7000,
  STORE_INDEX_MISSING = 7001,
  STORE_INVALID_FILTER = 7002,
  STORE_INSERT_FAILED = 7003,
  STORE_QUERY_FAILED = 7004,
  STORE_DELETE_FAILED = 7005,
}

// ============================================================================
// User-facing messages
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
  detailed: string;
}

const ERROR_MESSAGES: Record<ErrorCode, ErrorMessages> = {
  [ErrorCode.UNKNOWN]: {
    minimal: "Something went wrong.",
    medium: "An unexpected error occurred.",
    detailed: "An unexpected error occurred. Run with STRATUM_DEBUG=true for more details.",
  },
  [ErrorCode.INTERNAL]: {
    minimal: "Internal error.",
    medium: "An internal error occurred.",
    detailed: "An internal invariant was violated. This is a bug.",
  },
  [ErrorCode.VALIDATION_REQUIRED_FIELD]: {
    minimal: "Missing value.",
    medium: "A required value is missing.",
    detailed: "A required field was not provided.",
  },
  [ErrorCode.VALIDATION_INVALID_FORMAT]: {
    minimal: "Invalid value.",
    medium: "A value has an invalid format.",
    detailed: "A value did not match the expected format or range.",
  },
  [ErrorCode.VALIDATION_INVALID_PATH]: {
    minimal: "Invalid path.",
    medium: "The given path is not valid.",
    detailed: "The given path is not valid or points outside the allowed location.",
  },
  [ErrorCode.VALIDATION_INVALID_CONFIG]: {
    minimal: "Invalid configuration.",
    medium: "The configuration is not valid.",
    detailed: "The configuration failed validation.",
  },
  [ErrorCode.VALIDATION_UNSUPPORTED_FILE]: {
    minimal: "Unsupported file.",
    medium: "This file type is not supported.",
    detailed: "This file type is not supported. Supported types: .docx, .md, .markdown.",
  },
  [ErrorCode.VALIDATION_EMPTY_DOCUMENT]: {
    minimal: "Empty document.",
    medium: "The document has no indexable content.",
    detailed: "The document produced no chunks besides its root after filtering.",
  },
  [ErrorCode.VALIDATION_LENGTH_MISMATCH]: {
    minimal: "Length mismatch.",
    medium: "The number of vectors does not match the number of chunks.",
    detailed: "The encoder returned a different number of vectors than inputs sent.",
  },
  [ErrorCode.FS_FILE_NOT_FOUND]: {
    minimal: "File not found.",
    medium: "The file could not be found.",
    detailed: "The file could not be found. Check the path and try again.",
  },
  [ErrorCode.FS_PERMISSION_DENIED]: {
    minimal: "Permission denied.",
    medium: "Permission to access the file was denied.",
    detailed: "Permission to access the file was denied by the operating system.",
  },
  [ErrorCode.FS_NO_SPACE]: {
    minimal: "Disk full.",
    medium: "There is not enough disk space.",
    detailed: "There is not enough disk space to complete the operation.",
  },
  [ErrorCode.FS_PATH_TOO_LONG]: {
    minimal: "Path too long.",
    medium: "The file path is too long.",
    detailed: "The file path exceeds the operating system limit.",
  },
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: {
    minimal: "Directory not found.",
    medium: "The directory could not be found.",
    detailed: "The directory could not be found. Check the path and try again.",
  },
  [ErrorCode.FS_READ_ERROR]: {
    minimal: "Read failed.",
    medium: "The file could not be read.",
    detailed: "An I/O error occurred while reading the file.",
  },
  [ErrorCode.FS_WRITE_ERROR]: {
    minimal: "Write failed.",
    medium: "The file could not be written.",
    detailed: "An I/O error occurred while writing the file.",
  },
  [ErrorCode.CONFIG_NOT_FOUND]: {
    minimal: "No configuration.",
    medium: "The configuration file was not found.",
    detailed: "The configuration file was not found. Defaults will be used.",
  },
  [ErrorCode.CONFIG_PARSE_ERROR]: {
    minimal: "Bad configuration.",
    medium: "The configuration file could not be parsed.",
    detailed: "The configuration file is not valid YAML.",
  },
  [ErrorCode.CONFIG_INVALID_VALUE]: {
    minimal: "Bad setting.",
    medium: "A configuration value is not valid.",
    detailed: "A configuration value failed schema validation.",
  },
  [ErrorCode.EMBEDDING_NETWORK_ERROR]: {
    minimal: "Encoder unreachable.",
    medium: "The embedding service could not be reached.",
    detailed: "The embedding service could not be reached over the network.",
  },
  [ErrorCode.EMBEDDING_TIMEOUT]: {
    minimal: "Encoder timed out.",
    medium: "The embedding service did not respond in time.",
    detailed: "The request to the embedding service exceeded the configured timeout.",
  },
  [ErrorCode.EMBEDDING_SERVER_ERROR]: {
    minimal: "Encoder error.",
    medium: "The embedding service returned an error.",
    detailed: "The embedding service responded with a non-success HTTP status.",
  },
  [ErrorCode.EMBEDDING_INVALID_RESPONSE]: {
    minimal: "Bad encoder response.",
    medium: "The embedding service returned an unexpected response.",
    detailed: "The embedding service response did not contain one embedding per input.",
  },
  [ErrorCode.EMBEDDING_DIMENSION_MISMATCH]: {
    minimal: "Dimension mismatch.",
    medium: "The embedding dimension changed.",
    detailed: "A returned vector has a different width than the discovered embedding dimension.",
  },
  [ErrorCode.STORE_CONNECTION_FAILED]: {
    minimal: "Store unavailable.",
    medium: "The vector database could not be opened.",
    detailed: "The vector database could not be opened or connected to.",
  },
  [ErrorCode.STORE_INDEX_MISSING]: {
    minimal: "No index.",
    medium: "The collection has no index yet.",
    detailed: "The collection has no index. Ingest documents before searching.",
  },
  [ErrorCode.STORE_INVALID_FILTER]: {
    minimal: "Invalid filter.",
    medium: "The filter expression is not valid.",
    detailed: "The filter expression was rejected by the vector database.",
  },
  [ErrorCode.STORE_INSERT_FAILED]: {
    minimal: "Insert failed.",
    medium: "Records could not be written to the vector database.",
    detailed: "The vector database rejected the insert.",
  },
  [ErrorCode.STORE_QUERY_FAILED]: {
    minimal: "Query failed.",
    medium: "The vector database query failed.",
    detailed: "The vector database failed to execute the search or query.",
  },
  [ErrorCode.STORE_DELETE_FAILED]: {
    minimal: "Delete failed.",
    medium: "Records could not be deleted.",
    detailed: "The vector database rejected the delete.",
  },
};

const RECOVERY_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.VALIDATION_UNSUPPORTED_FILE]: "Convert the file to .docx or Markdown.",
  [ErrorCode.FS_NO_SPACE]: "Free up disk space and try again.",
  [ErrorCode.FS_PERMISSION_DENIED]: "Check the file permissions.",
  [ErrorCode.CONFIG_PARSE_ERROR]: "Fix the YAML syntax in ~/.stratum/config.yaml.",
  [ErrorCode.EMBEDDING_NETWORK_ERROR]: "Check that the encoder is running and CLIP_SERVER points at it.",
  [ErrorCode.EMBEDDING_TIMEOUT]: "Retry, or raise encoder.timeoutMs in the configuration.",
  [ErrorCode.STORE_INDEX_MISSING]: "Run `stratum ingest` first.",
};

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.EMBEDDING_NETWORK_ERROR,
  ErrorCode.EMBEDDING_TIMEOUT,
  ErrorCode.EMBEDDING_SERVER_ERROR,
  ErrorCode.FS_NO_SPACE,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export interface StratumErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
}

export class StratumError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: StratumErrorOptions) {
    super(message || ERROR_MESSAGES[code].medium);

    this.name = "StratumError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.recoveryHint = options?.recoveryHint ?? RECOVERY_HINTS[code];
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-facing message at specified detail level
   */
  getUserMessage(level: ErrorLevel = "medium"): string {
    return ERROR_MESSAGES[this.code][level] || this.message;
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Input validation errors (bad options, unsupported files, empty documents)
 */
export class ValidationError extends StratumError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: StratumErrorOptions & { field?: string; value?: unknown }
  ) {
    super(code, message, options);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

export type FileOperation = "read" | "write" | "delete" | "access" | "mkdir";

/**
 * File system errors
 */
export class FileSystemError extends StratumError {
  public readonly path?: string;
  public readonly operation?: FileOperation;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: StratumErrorOptions & { path?: string; operation?: FileOperation }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(error: NodeJS.ErrnoException, path?: string, operation?: FileOperation): FileSystemError {
    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(
          operation === "mkdir" ? ErrorCode.FS_DIRECTORY_NOT_FOUND : ErrorCode.FS_FILE_NOT_FOUND,
          undefined,
          { cause: error, path, operation }
        );
      case "ENOTDIR":
        return new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, undefined, { cause: error, path, operation });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, undefined, { cause: error, path, operation });
      case "ENOSPC":
        return new FileSystemError(ErrorCode.FS_NO_SPACE, undefined, { cause: error, path, operation });
      case "ENAMETOOLONG":
        return new FileSystemError(ErrorCode.FS_PATH_TOO_LONG, undefined, { cause: error, path, operation });
      default:
        if (operation === "write") {
          return new FileSystemError(ErrorCode.FS_WRITE_ERROR, error.message, { cause: error, path, operation });
        }
        return new FileSystemError(ErrorCode.FS_READ_ERROR, error.message, { cause: error, path, operation });
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends StratumError {
  public readonly configKey?: string;

  constructor(code: ErrorCode, message?: string, options?: StratumErrorOptions & { configKey?: string }) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

/**
 * Embedding service errors (network, timeout, malformed responses)
 */
export class EmbeddingError extends StratumError {
  public readonly statusCode?: number;

  constructor(code: ErrorCode, message?: string, options?: StratumErrorOptions & { statusCode?: number }) {
    super(code, message, options);
    this.name = "EmbeddingError";
    this.statusCode = options?.statusCode;
  }

  /**
   * Create EmbeddingError from a fetch failure
   */
  static fromError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    const message = error instanceof Error ? error.message : String(error);
    const lowerMessage = message.toLowerCase();
    const name = error instanceof Error ? error.name : "";

    if (name === "TimeoutError" || name === "AbortError" || lowerMessage.includes("timeout") || lowerMessage.includes("etimedout")) {
      return new EmbeddingError(ErrorCode.EMBEDDING_TIMEOUT, undefined, { cause });
    }
    return new EmbeddingError(ErrorCode.EMBEDDING_NETWORK_ERROR, message, { cause });
  }
}

/**
 * Vector database errors
 */
export class VectorStoreError extends StratumError {
  public readonly collection?: string;

  constructor(code: ErrorCode, message?: string, options?: StratumErrorOptions & { collection?: string }) {
    super(code, message, options);
    this.name = "VectorStoreError";
    this.collection = options?.collection;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof StratumError) {
    let message = error.getUserMessage(level);

    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\nHint: ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n\n[Error code: ${error.code}]`;
      if (error.message !== ERROR_MESSAGES[error.code].medium) {
        message += `\n[Message: ${error.message}]`;
      }
      if (error.cause) {
        message += `\n[Cause: ${error.cause.message}]`;
      }
      if (error instanceof FileSystemError && error.path) {
        message += `\n[Path: ${error.path}]`;
      }
      if (error instanceof EmbeddingError && error.statusCode) {
        message += `\n[Status code: ${error.statusCode}]`;
      }
    }

    return message;
  }

  if (error instanceof Error) {
    switch (level) {
      case "minimal":
        return "An error occurred.";
      case "medium":
        return `An error occurred: ${error.message}`;
      case "detailed":
        return `An error occurred: ${error.message}\n\n${error.stack || ""}`;
    }
  }

  return level === "minimal" ? "An error occurred." : `An error occurred: ${String(error)}`;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof StratumError) {
    return error.recoverable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("etimedout") ||
      message.includes("network")
    );
  }

  return false;
}

/**
 * Get recovery hint for an error
 */
export function getRecoveryHint(error: unknown): string | null {
  if (error instanceof StratumError) {
    return error.recoveryHint || null;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("econnrefused") || message.includes("network")) {
      return RECOVERY_HINTS[ErrorCode.EMBEDDING_NETWORK_ERROR] || null;
    }
    if (message.includes("timeout")) {
      return RECOVERY_HINTS[ErrorCode.EMBEDDING_TIMEOUT] || null;
    }
  }

  return null;
}

/**
 * Structural check: fs errors raised in another realm (vm contexts, test
 * sandboxes) fail `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    "message" in error &&
    typeof error.message === "string"
  );
}

/**
 * Convert any error to a StratumError
 */
export function toStratumError(error: unknown): StratumError {
  if (error instanceof StratumError) {
    return error;
  }

  if (isErrnoException(error) && error.code &&
      ["ENOENT", "ENOTDIR", "EACCES", "EPERM", "ENOSPC", "ENAMETOOLONG"].includes(error.code)) {
    return FileSystemError.fromNodeError(error);
  }

  return new StratumError(ErrorCode.UNKNOWN, error instanceof Error ? error.message : String(error), {
    cause: error instanceof Error ? error : undefined,
  });
}
