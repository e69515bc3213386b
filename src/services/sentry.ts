import * as Sentry from "@sentry/node";
import { logger } from "../utils/logger";

let sentryEnabled = false;

export function initSentry(dsn: string | undefined, environment: string): void {
  if (!dsn) {
    logger.warn("SENTRY_DSN not configured, error tracking disabled");
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    beforeSend(event, hint) {
      if (environment === "development") {
        logger.debug("Sentry event (dev mode)", { eventId: event.event_id });
        return null;
      }

      const error = hint.originalException;
      if (error instanceof Error && error.message.includes("ECONNREFUSED")) {
        return null;
      }

      return event;
    },
  });

  Sentry.setTag("environment", environment);
  sentryEnabled = true;
  logger.info("Sentry initialized", { environment });
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.captureException(error, context ? { contexts: { request: context } } : undefined);
}

export async function closeSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.close(timeoutMs);
}
