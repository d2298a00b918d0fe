/**
 * Error handling utilities for consistent error message extraction
 */

/**
 * Extract a user-friendly message from an unknown error.
 * Handles Error instances, strings, and unknown types safely.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}

// Guards against self-referencing cause chains
const MAX_CAUSE_DEPTH = 5;

/**
 * Describe an error together with its chain of causes, outermost first.
 *
 * Example: "Airport search failed: fetch failed: getaddrinfo ENOTFOUND"
 */
export function describeError(error: unknown): string {
  const messages: string[] = [];
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined; depth++) {
    const message = getErrorMessage(current);
    if (message && messages[messages.length - 1] !== message) {
      messages.push(message);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return messages.join(": ");
}
