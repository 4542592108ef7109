export class ApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** The company has no usable directory integration. Not retried; setup must be completed. */
export class ConfigurationError extends ApiError {
  constructor(message = "Entra ID not configured") {
    super(409, "NOT_CONFIGURED", message);
  }
}

export class AuthorizationError extends ApiError {
  constructor(message = "Insufficient permissions") {
    super(403, "FORBIDDEN", message);
  }
}

/** A uniqueness constraint rejected a write; re-running the operation may succeed. */
export class ConflictError extends ApiError {
  constructor(message = "Resource already exists", code = "CONFLICT") {
    super(409, code, message);
  }
}

export class TransportError extends ApiError {
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null = null, code = "DIRECTORY_UNAVAILABLE") {
    super(502, code, message);
    this.upstreamStatus = upstreamStatus;
  }
}

export class TokenAcquisitionError extends TransportError {
  constructor(message: string, upstreamStatus: number | null = null) {
    super(message, upstreamStatus, "DIRECTORY_AUTH_FAILED");
  }
}

export function parseApiError(error: unknown): { status: number; code: string; message: string } {
  if (error instanceof ApiError) {
    return {
      status: error.status,
      code: error.code,
      message: error.message
    };
  }

  return {
    status: 500,
    code: "INTERNAL_SERVER_ERROR",
    message: "Unexpected server error"
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
