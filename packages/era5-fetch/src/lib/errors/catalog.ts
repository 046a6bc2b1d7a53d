import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Configuration Errors
// ============================================================================

export function missingArgument(
  argName: string,
  command: string,
  examples?: string[]
): CLIError {
  return new CLIError("CONFIG_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
    examples: examples?.length ? examples : [`era5-fetch ${command} --help`],
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("CONFIG_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function unknownVariables(unknown: string[], known: string[]): CLIError {
  const label = unknown.length === 1 ? "variable" : "variables";
  return new CLIError(
    "CONFIG_UNKNOWN_VARIABLE",
    `Unknown ${label}: ${unknown.join(", ")}`,
    {
      suggestion: `Known variables: ${known.join(", ")}`,
      example: "era5-fetch variables",
    }
  );
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("CONFIG_FILE_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Authentication Errors
// ============================================================================

export function authMissing(archive: string, sources: string[]): CLIError {
  return new CLIError("AUTH_MISSING", `No ${archive} credentials found`, {
    suggestion: `Checked: ${sources.join(", ")}`,
    example: `era5-fetch auth login --archive ${archive}`,
  });
}

// ============================================================================
// Naming Table Errors
// ============================================================================

export function unknownParameter(code: string): CLIError {
  return new CLIError(
    "LOOKUP_UNKNOWN_PARAMETER",
    `No short name registered for parameter code ${code}`,
    {
      suggestion: "Add the code to the parameter name table before requesting it",
    }
  );
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function networkFailure(details?: string, cause?: Error): CLIError {
  return new CLIError("TRANSFER_NETWORK", "Can't reach the archive", {
    suggestion: "Check your network connection and try again",
    details,
    cause,
  });
}

export function transferTimeout(timeoutMs: number): CLIError {
  return new CLIError("TRANSFER_TIMEOUT", `Transfer timed out after ${Math.round(timeoutMs / 1000)}s`, {
    suggestion: "Raise --timeout or try again later",
  });
}

export function serverError(status: number, statusText: string, details?: string): CLIError {
  return new CLIError("TRANSFER_SERVER", `Archive returned ${status} ${statusText}`.trim(), {
    details,
    status,
  });
}

export function jobFailed(jobId: string, details?: string): CLIError {
  return new CLIError("TRANSFER_SERVER", `Retrieve job ${jobId} failed`, {
    details,
  });
}

export function corruptPayload(sizeBytes: number): CLIError {
  return new CLIError(
    "TRANSFER_CORRUPT_PAYLOAD",
    `Downloaded file looks like an error page (${sizeBytes} bytes)`,
    {
      suggestion: "Check your credentials and that the file exists on the archive",
    }
  );
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

/**
 * Convert an HTTP error response to a CLIError.
 */
export function fromHttpStatus(
  status: number,
  statusText: string,
  payload?: unknown
): CLIError {
  return serverError(status, statusText, extractErrorMessage(payload));
}

/**
 * Extract error message from an archive's error payload.
 */
function extractErrorMessage(payload: unknown): string | undefined {
  if (!payload) return undefined;
  if (typeof payload === "string") return payload.slice(0, 500);
  if (typeof payload === "object") {
    const obj: Record<string, unknown> = { ...payload };
    for (const key of ["detail", "title", "message", "error"]) {
      const value = obj[key];
      if (typeof value === "string") return value;
    }
    return JSON.stringify(payload);
  }
  return undefined;
}
