export type HttpVersion = "1.1" | "2";

export type ProbeMethod = "HEAD" | "GET";

export interface ProbeRequestOptions {
  method: ProbeMethod;
  headers?: Record<string, string>;
  /** Per-request timeout; overrides the configured default. */
  timeoutMs?: number;
  /** Number of body characters kept for non-2xx GET responses. */
  bodyPreviewLimit?: number;
}

/**
 * Raw transport outcome of one HTTP exchange. Any status code is a
 * response; only transport failures reject.
 */
export interface ProbeResponse {
  statusCode: number;
  contentLength: number | null;
  /** Leading characters of the body, only read for non-2xx GET responses. */
  bodyPreview: string | null;
  httpVersion: HttpVersion;
  elapsedMs: number;
}

/**
 * Error raised when a request exceeds its timeout.
 */
export class ProbeTimeoutError extends Error {
  readonly name = "ProbeTimeoutError";

  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProbeTimeoutError);
    }
  }
}

export function parseContentLength(value: unknown): number | null {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? raw : null;
  }
  if (typeof raw !== "string" || raw.trim().length === 0) {
    return null;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}
