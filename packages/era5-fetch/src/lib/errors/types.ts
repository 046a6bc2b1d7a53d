/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Configuration errors (fatal, raised before any transfer)
  | "CONFIG_MISSING_ARG"
  | "CONFIG_INVALID_OPTION"
  | "CONFIG_UNKNOWN_VARIABLE"
  | "CONFIG_FILE_INVALID"
  // Authentication errors
  | "AUTH_MISSING"
  // Naming table errors
  | "LOOKUP_UNKNOWN_PARAMETER"
  // Transfer errors
  | "TRANSFER_NETWORK"
  | "TRANSFER_TIMEOUT"
  | "TRANSFER_SERVER"
  | "TRANSFER_CORRUPT_PAYLOAD"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;
  /** HTTP status returned by a remote archive, when there was one */
  readonly status?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      status?: number;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
    this.status = options?.status;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

