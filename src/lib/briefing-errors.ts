/**
 * Error types raised while building a briefing.
 *
 * Only InvalidCodeError reaches the caller; the upstream errors are caught
 * per retrieval and turned into display strings.
 */

export class InvalidCodeError extends Error {
  code: string;

  constructor(code: string, message = `Invalid airport code: "${code}"`) {
    super(message);
    this.code = code;
    this.name = "InvalidCodeError";
  }
}

/**
 * Non-2xx response, timeout or network failure. Status is 0 when no
 * response was received.
 */
export class UpstreamUnavailableError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.status = status;
    this.name = "UpstreamUnavailableError";
  }
}

/**
 * Response body that is not JSON or lacks the expected fields
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

/**
 * Extract a user-facing message from an unknown error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}
