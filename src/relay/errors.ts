export type ErrorType = "timeout" | "network" | "server" | "command" | "validation" | "unknown";

/** Failures worth another attempt: the transport may recover on its own. */
export const RETRYABLE_ERROR_TYPES: ReadonlyArray<ErrorType> = ["timeout", "network"];

export type ExecutionDetails = Record<string, unknown> | string;

export interface ExecutionSuccess {
  output: string;
  context: Record<string, unknown>;
}

export interface ExecutionFailure {
  error: string;
  error_type: ErrorType;
  details: ExecutionDetails;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export class RelayError extends Error {
  constructor(
    readonly errorType: ErrorType,
    message: string,
    readonly details: ExecutionDetails = {}
  ) {
    super(message);
    this.name = "RelayError";
  }
}

export function isExecutionFailure(result: ExecutionResult): result is ExecutionFailure {
  return "error" in result;
}

export function isRetryable(errorType: ErrorType): boolean {
  return RETRYABLE_ERROR_TYPES.includes(errorType);
}

export function toFailure(error: unknown, fallbackDetails: ExecutionDetails = {}): ExecutionFailure {
  if (error instanceof RelayError) {
    return {
      error: error.message,
      error_type: error.errorType,
      details: error.details
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    error: `Unexpected error: ${message}`,
    error_type: "unknown",
    details: fallbackDetails
  };
}
