export type ErrorKind = "config" | "fetch" | "parse" | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

/** Transport, timeout or non-2xx status while retrieving a range list. */
export class FetchError extends AppError {
  readonly url: string;
  readonly statusCode?: number;
  readonly timedOut: boolean;

  constructor(params: {
    message: string;
    url: string;
    statusCode?: number;
    timedOut?: boolean;
    cause?: unknown;
  }) {
    super("fetch", params.message, params.cause);
    this.url = params.url;
    this.statusCode = params.statusCode;
    this.timedOut = params.timedOut ?? false;
  }
}

export class PrefixParseError extends AppError {
  readonly input: string;

  constructor(input: string, message: string, cause?: unknown) {
    super("parse", message, cause);
    this.input = input;
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
