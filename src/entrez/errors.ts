import axios from "axios";

export type TransientCause = "network" | "timeout" | "http_status";

export type EntrezFailure =
  | { kind: "transient"; cause: TransientCause; status?: number; message: string }
  | { kind: "exhausted_retries"; attempts: number; message: string }
  | { kind: "malformed_record"; message: string };

export type EntrezFailureKind = EntrezFailure["kind"];

export class EntrezQueryError extends Error {
  readonly failure: EntrezFailure;

  constructor(failure: EntrezFailure) {
    super(failure.message);
    this.name = "EntrezQueryError";
    this.failure = failure;
  }

  get kind(): EntrezFailureKind {
    return this.failure.kind;
  }
}

// Axios codes that point at the request setup rather than the network.
const SETUP_ERROR_CODES = new Set([
  "ERR_BAD_OPTION",
  "ERR_BAD_OPTION_VALUE",
  "ERR_DEPRECATED",
  "ERR_INVALID_URL",
  "ERR_NOT_SUPPORT",
  "ERR_CANCELED"
]);

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export function hasFailureKind(error: unknown, kind: EntrezFailureKind): error is EntrezQueryError {
  return error instanceof EntrezQueryError && error.failure.kind === kind;
}

export function isTransientFailure(error: unknown): boolean {
  return hasFailureKind(error, "transient");
}

export function transientStatusError(status: number, url: string): EntrezQueryError {
  return new EntrezQueryError({
    kind: "transient",
    cause: "http_status",
    status,
    message: `E-utilities responded with HTTP ${status} for ${url}`
  });
}

export function malformedRecordError(message: string): EntrezQueryError {
  return new EntrezQueryError({ kind: "malformed_record", message });
}

/**
 * Maps a transport error to a transient failure. Errors that do not come
 * from the transport, or that come from a bad request setup, are returned
 * untouched so they propagate without retry.
 */
export function classifyTransportError(error: unknown): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }
  const code = error.code ?? "";
  if (SETUP_ERROR_CODES.has(code)) {
    return error;
  }
  if (error.response) {
    const url = error.config?.url ?? "unknown url";
    return transientStatusError(error.response.status, url);
  }
  return new EntrezQueryError({
    kind: "transient",
    cause: TIMEOUT_CODES.has(code) ? "timeout" : "network",
    message: `E-utilities request failed: ${error.message}`
  });
}
