// ============================================
// Exit Codes
// ============================================
export enum ExitCode {
  Success = 0,
  ConfigError = 1,
  AuthError = 2,
  NetworkError = 3,
  FileSystemError = 4,
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * No usable access token and no way to refresh one.
 * The run cannot continue until the authorization-code flow is repeated.
 */
export class AuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

export type RequestErrorKind =
  | "unauthorized"
  | "rate_limited"
  | "server_error"
  | "timeout"
  | "network_error"
  | "exhausted";

/** Transient kinds the executor retries with backoff */
export type RetryableKind = Exclude<RequestErrorKind, "unauthorized" | "exhausted">;

export class RequestError extends Error {
  readonly kind: RequestErrorKind;
  readonly endpoint: string;
  readonly status?: number;
  readonly lastKind?: RetryableKind;

  constructor(
    kind: RequestErrorKind,
    endpoint: string,
    message: string,
    details: { status?: number; lastKind?: RetryableKind; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "RequestError";
    this.kind = kind;
    this.endpoint = endpoint;
    this.status = details.status;
    this.lastKind = details.lastKind;
  }
}

/** Errors that no fallback endpoint can recover from */
export function isFatal(error: unknown): boolean {
  return error instanceof AuthError || (error instanceof RequestError && error.kind === "unauthorized");
}

export function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  const fsErrorCodes = ["ENOENT", "EACCES", "EPERM", "EROFS", "ENOSPC"];
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    fsErrorCodes.includes(error.code)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
