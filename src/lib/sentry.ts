// src/lib/sentry.ts
// Sentry initialization for error tracking of report runs

import * as Sentry from "@sentry/node";
import { RankingError } from "./rankings/errors.js";

function sentryDsn(): string | undefined {
  return process.env.SENTRY_DSN || undefined;
}

/**
 * Initialize Sentry for error tracking.
 * Call this before the run starts.
 */
export function initSentry() {
  const dsn = sentryDsn();
  if (!dsn) {
    console.log("[Sentry] SENTRY_DSN not set - skipping initialization");
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || "development",
    release: process.env.npm_package_version || "unknown",
  });

  console.log(`[Sentry] Initialized (env: ${process.env.NODE_ENV || "development"})`);
}

/**
 * Capture an exception; ranking errors carry their breed/trait/path context
 */
export function captureException(error: Error | unknown, context?: Record<string, unknown>) {
  if (!sentryDsn()) return;

  Sentry.withScope((scope) => {
    if (error instanceof RankingError) {
      scope.setTag("code", error.code);
      scope.setContext("ranking", {
        breed: error.breed,
        trait: error.trait,
        path: error.path,
      });
    }
    if (context) {
      scope.setContext("additional", context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Flush pending events (call before process exit)
 */
export async function flush(timeout = 2000): Promise<boolean> {
  if (!sentryDsn()) return true;
  return Sentry.flush(timeout);
}
