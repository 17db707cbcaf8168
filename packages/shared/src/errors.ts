/**
 * Render any thrown value as a log-friendly message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/**
 * Run `fn`, handing any thrown value to `onError` and returning `fallback`.
 * Used at boundaries that must never throw into the caller.
 */
export function tryOr<T>(fn: () => T, fallback: T, onError?: (message: string) => void): T {
  try {
    return fn();
  } catch (err) {
    onError?.(errorMessage(err));
    return fallback;
  }
}
