// net.ts - HTTP status and transport error mapping for remote services

import { NetworkError, formatDuration } from "@skycut/contracts";

/**
 * Map a non-2xx HTTP status to a NetworkError.
 *
 *   429  → RATE_LIMITED (retryable)
 *   5xx  → HTTP_ERROR   (retryable)
 *   else → HTTP_ERROR   (not retryable)
 */
export function mapHttpStatus(service: string, status: number): NetworkError {
  if (status === 429) {
    return new NetworkError(service, `${service} rate limited (HTTP 429)`, {
      code: "RATE_LIMITED",
      httpStatus: status,
    });
  }
  if (status >= 500) {
    return new NetworkError(service, `${service} returned HTTP ${status}`, {
      code: "HTTP_ERROR",
      httpStatus: status,
    });
  }
  return new NetworkError(service, `${service} returned HTTP ${status}`, {
    code: "HTTP_ERROR",
    retryable: false,
    httpStatus: status,
  });
}

/** Map a thrown fetch/body-read failure to a retryable NetworkError */
export function mapTransportError(service: string, err: unknown, timeoutMs: number): NetworkError {
  if (err instanceof NetworkError) return err;
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return new NetworkError(service, `${service} timed out after ${formatDuration(timeoutMs)}`, {
      code: "TIMEOUT_ERROR",
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkError(service, `${service} request failed: ${message}`, { cause: err });
}

/**
 * Wrap a remote call so anything it throws surfaces as a NetworkError.
 * NetworkErrors raised inside pass through untouched.
 */
export async function withNetworkErrorMapping<T>(
  service: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw mapTransportError(service, err, timeoutMs);
  }
}
