import * as Sentry from "@sentry/node";
import type { Breadcrumb, NodeOptions } from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger, toErrorPayload } from "../shared/logger";
import { isRecord } from "../shared/validation/landmarks";

const logger = getLogger("sentry", "server");

type SentryErrorEvent = Parameters<NonNullable<NodeOptions["beforeSend"]>>[0];

let isInitialized = false;

const SENSITIVE_KEYS = ["authorization", "cookie", "token", "dsn", "password"];

const buildDefaultBreadcrumb = (message: string): Breadcrumb => ({
  timestamp: Date.now() / 1000,
  level: "info",
  category: "application",
  message,
});

const scrubRecord = (record: Record<string, unknown>) => {
  Object.keys(record).forEach((key) => {
    const lowered = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sensitive) => lowered.includes(sensitive))) {
      record[key] = "[redacted]";
    }
  });
};

// Uploaded photographs never reach Sentry: request bodies are dropped and
// credential-looking headers are masked.
export const scrubEvent = (event: SentryErrorEvent): SentryErrorEvent => {
  if (event.request) {
    delete event.request.data;
    if (event.request.headers) {
      scrubRecord(event.request.headers);
    }
    delete event.request.cookies;
  }
  if (isRecord(event.extra)) {
    scrubRecord(event.extra);
  }
  return event;
};

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!isInitialized || !monitoringConfig.sentry.enabled) {
    return;
  }

  Sentry.captureException(error, {
    contexts: context ? { metadata: context } : undefined,
  });
};

const resolveReasonMessage = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }

  if (typeof reason === "string") {
    return reason;
  }

  try {
    return JSON.stringify(reason);
  } catch (error) {
    logger.debug("Rejection reason is not serialisable", {
      error: toErrorPayload(error),
    });
    return "unknown";
  }
};

let processHandlersInstalled = false;

/**
 * Logs fatal process-level failures and forwards them to Sentry when it is
 * enabled. Safe to call more than once.
 */
export const installProcessHandlers = () => {
  if (processHandlersInstalled) {
    return;
  }
  processHandlersInstalled = true;

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception", { error: toErrorPayload(error) });
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error =
      reason instanceof Error ? reason : new Error(resolveReasonMessage(reason));
    logger.fatal("Unhandled promise rejection", {
      error: toErrorPayload(error),
    });
    captureException(error);
  });
};

export const initSentry = () => {
  if (isInitialized) {
    return;
  }

  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Skipping Sentry initialisation: disabled by configuration");
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
    sendDefaultPii: false,
    beforeSend: scrubEvent,
  });

  Sentry.getCurrentScope().setTag("service", "postural-eval");
  Sentry.addBreadcrumb(buildDefaultBreadcrumb("Sentry initialised"));

  isInitialized = true;
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!isInitialized) {
    return;
  }
  await Sentry.flush(timeoutMs);
};
