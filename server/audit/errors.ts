export type AuditErrorCode =
  | "INVALID_URL"
  | "INVALID_OPTION"
  | "TIMEOUT"
  | "NETWORK_ERROR"
  | "HTTP_STATUS"
  | "TOO_MANY_REDIRECTS"
  | "OUTPUT_WRITE";

const EXIT_CODES: Record<AuditErrorCode, number> = {
  INVALID_URL: 2,
  INVALID_OPTION: 2,
  TIMEOUT: 1,
  NETWORK_ERROR: 1,
  HTTP_STATUS: 1,
  TOO_MANY_REDIRECTS: 1,
  OUTPUT_WRITE: 3,
};

export class AuditError extends Error {
  code: AuditErrorCode;
  details?: string;

  constructor(code: AuditErrorCode, message: string, details?: string) {
    super(message);
    this.name = "AuditError";
    this.code = code;
    this.details = details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  static invalidUrl(url: string, details = "URL must be a valid HTTP or HTTPS URL"): AuditError {
    return new AuditError("INVALID_URL", `Invalid URL: ${url}`, details);
  }

  static invalidOption(option: string, details: string): AuditError {
    return new AuditError("INVALID_OPTION", `Invalid value for ${option}`, details);
  }

  static fromFetchError(error: unknown, url: string, timeoutMs: number): AuditError {
    if (error instanceof Error) {
      if (error.name === "AbortError" || error.name === "TimeoutError") {
        return new AuditError("TIMEOUT", `Request to ${url} timed out after ${timeoutMs}ms`, error.message);
      }
      const cause = error.cause instanceof Error ? error.cause.message : undefined;
      return new AuditError("NETWORK_ERROR", `Network error fetching ${url}`, cause ?? error.message);
    }
    return new AuditError("NETWORK_ERROR", `Network error fetching ${url}`, String(error));
  }

  static httpStatus(url: string, status: number, statusText: string): AuditError {
    const suffix = statusText ? ` ${statusText}` : "";
    return new AuditError("HTTP_STATUS", `${url} responded with HTTP ${status}${suffix}`);
  }

  static tooManyRedirects(url: string, limit: number): AuditError {
    return new AuditError("TOO_MANY_REDIRECTS", `Gave up on ${url} after ${limit} redirects`);
  }

  static outputWrite(path: string, error: unknown): AuditError {
    return new AuditError("OUTPUT_WRITE", `Could not write report to ${path}`, getErrorMessage(error));
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
