export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class UpstreamTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "UpstreamTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class UpstreamMalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpstreamMalformedResponseError";
  }
}

export class BackendUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackendUnavailableError";
  }
}

export class SqlGuardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SqlGuardError";
  }
}

export class RequestAbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} aborted by caller`);
    this.name = "RequestAbortedError";
  }
}

export const errorMessage = (error: unknown, fallback = "unknown error"): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return fallback;
};
