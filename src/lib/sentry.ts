/**
 * Sentry Error Tracking Module
 *
 * Reports fatal conversion errors to Sentry. If the `SENTRY_DSN`
 * environment variable is not set, Sentry is disabled (no-op) and the
 * converter runs normally.
 *
 * Usage:
 * - Call `initSentry()` early in the process lifecycle
 * - Use `captureExceptionWithContext()` for fatal errors with run metadata
 * - Call `flushSentry()` before the process exits
 *
 * Environment variables:
 * - `SENTRY_DSN`: Sentry Data Source Name (required to enable tracking)
 * - `NODE_ENV`: Used as the Sentry environment tag
 * - `npm_package_version`: Used as the Sentry release tag
 */

import * as Sentry from "@sentry/node";

/** Whether Sentry has been successfully initialized */
let initialized = false;

/**
 * Initializes the Sentry SDK.
 *
 * If no DSN is given and `SENTRY_DSN` is not set, initialization is
 * skipped silently.
 *
 * @param options - Optional overrides for Sentry configuration
 * @param options.dsn - Sentry DSN (defaults to SENTRY_DSN env var)
 * @param options.environment - Environment name (defaults to NODE_ENV)
 * @param options.release - Release version (defaults to npm_package_version)
 */
export function initSentry(options?: {
  dsn?: string;
  environment?: string;
  release?: string;
}): void {
  const dsn = options?.dsn ?? process.env.SENTRY_DSN;

  if (!dsn) {
    return;
  }

  Sentry.init({
    dsn,
    environment: options?.environment ?? process.env.NODE_ENV ?? "production",
    release: options?.release ?? process.env.npm_package_version ?? "unknown",
  });

  initialized = true;
}

/**
 * Returns whether Sentry has been initialized.
 */
export function isSentryInitialized(): boolean {
  return initialized;
}

/**
 * Captures an exception and sends it to Sentry with conversion context.
 *
 * @param error - The error to report
 * @param context - Additional context to attach to the Sentry event
 * @param context.runId - Conversion run ID, matches the logger binding
 * @param context.errorCode - Code of a known conversion error
 * @param context.metadata - Arbitrary key-value metadata (paths, counts)
 */
export function captureExceptionWithContext(
  error: unknown,
  context?: {
    runId?: string;
    errorCode?: string;
    metadata?: Record<string, unknown>;
  },
): void {
  if (!initialized) {
    return;
  }

  Sentry.withScope((scope) => {
    if (context?.runId) {
      scope.setTag("runId", context.runId);
    }
    if (context?.errorCode) {
      scope.setTag("errorCode", context.errorCode);
    }
    if (context?.metadata) {
      scope.setContext("metadata", context.metadata);
    }
    Sentry.captureException(error);
  });
}

/**
 * Waits for queued events to be sent. Resolves immediately when Sentry
 * is disabled.
 *
 * @param timeoutMs - Maximum time to wait
 * @returns false if the timeout was hit before the queue drained
 */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!initialized) {
    return true;
  }
  return Sentry.flush(timeoutMs);
}
