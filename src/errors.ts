export type FetchFailureReason = "timeout" | "http_error" | "navigation_error";

export type WriteFailureReason =
  | "permission_denied"
  | "disk_full"
  | "invalid_path";

/**
 * Bad input or an unusable environment, detected before any page is fetched.
 */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export class FetchError extends Error {
  override readonly name = "FetchError";
  readonly url: string;
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor(
    url: string,
    reason: FetchFailureReason,
    message: string,
    status?: number
  ) {
    super(message);
    this.url = url;
    this.reason = reason;
    this.status = status;
  }
}

export class WriteError extends Error {
  override readonly name = "WriteError";
  readonly path: string;
  readonly reason: WriteFailureReason;

  constructor(path: string, reason: WriteFailureReason, message: string) {
    super(message);
    this.path = path;
    this.reason = reason;
  }
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);
const DISK_FULL_CODES = new Set(["ENOSPC", "EDQUOT"]);

export function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

export function classifyWriteError(error: unknown): WriteFailureReason {
  const code = errorCode(error);
  if (code && PERMISSION_CODES.has(code)) {
    return "permission_denied";
  }
  if (code && DISK_FULL_CODES.has(code)) {
    return "disk_full";
  }
  return "invalid_path";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
