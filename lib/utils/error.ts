/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// errno-style codes Node's networking stack uses for connectivity failures
const TRANSIENT_ERRNO_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

/**
 * HTTP status carried by an error thrown from an SDK or fetch wrapper, if any.
 */
export function getErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

function getErrnoCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null) return null;
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Whether a failure is worth retrying later: connectivity problems, timeouts,
 * rate limiting and 5xx responses. Walks the `cause` chain because fetch wraps
 * socket errors in a generic TypeError.
 */
export function isTransientError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (typeof current === "object" && current !== null) {
      if ("transient" in current && typeof current.transient === "boolean") {
        return current.transient;
      }
    }

    const status = getErrorStatus(current);
    if (status !== null) {
      return status === 408 || status === 429 || status >= 500;
    }

    const code = getErrnoCode(current);
    if (code && TRANSIENT_ERRNO_CODES.has(code)) return true;

    if (current instanceof TypeError && current.message === "fetch failed") {
      return true;
    }

    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}
