import {
  DEFAULT_LOCALES,
  type SupportedLocale,
  isSupportedLocale,
} from "@postural/i18n-tools";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { URL } from "node:url";
import {
  ANALYSIS_ROUTES,
  type ServerConfig,
  UPLOAD_FIELD_NAME,
} from "../shared/config/server";
import {
  type PipelineErrorCode,
  isClientError,
  isPipelineError,
} from "../shared/errors";
import { translate } from "../shared/i18n/config";
import { getLogger, toErrorPayload } from "../shared/logger";
import type { AnalysisErrorResponse } from "../shared/types/analysis";
import type { AnalysisPipeline } from "../worker/engine/pipeline";
import { readUpload } from "./upload";

const logger = getLogger("analysis-http", "server");

export type AnalysisHttpServerOptions = {
  pipeline: Pick<AnalysisPipeline, "analyze">;
  server: ServerConfig;
  maxUploadBytes: number;
  /** Locale used when the request names none we support. */
  defaultLocale: SupportedLocale;
  reportError?: (error: unknown, context?: Record<string, unknown>) => void;
};

export type AnalysisHttpServer = {
  start: () => Promise<AddressInfo>;
  stop: () => Promise<void>;
};

type ErrorKey = PipelineErrorCode | "NOT_FOUND" | "METHOD_NOT_ALLOWED";

const buildHeaders = (): Record<string, string> => ({
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
  "Access-Control-Allow-Headers": "*",
});

const sendJson = (
  res: http.ServerResponse,
  status: number,
  body: unknown,
): void => {
  res.writeHead(status, buildHeaders());
  res.end(JSON.stringify(body));
};

const sendError = (
  res: http.ServerResponse,
  status: number,
  code: ErrorKey,
  locale: SupportedLocale,
): void => {
  const body: AnalysisErrorResponse = {
    status: "error",
    code,
    message: translate(locale, "errors", code),
  };
  sendJson(res, status, body);
};

/**
 * Picks the first supported locale from an Accept-Language header. A bare
 * language such as `ro` matches the first supported region of it.
 */
export const resolveRequestLocale = (
  header: string | undefined,
  fallback: SupportedLocale,
): SupportedLocale => {
  if (!header) {
    return fallback;
  }

  const requested = header
    .split(",")
    .map((part) => part.split(";")[0]?.trim() ?? "")
    .filter((tag) => tag.length > 0);

  for (const tag of requested) {
    if (isSupportedLocale(tag)) {
      return tag;
    }
    const language = tag.split("-")[0]?.toLowerCase();
    const match = DEFAULT_LOCALES.find(
      (locale) => locale.split("-")[0]?.toLowerCase() === language,
    );
    if (match) {
      return match;
    }
  }

  return fallback;
};

export const createAnalysisHttpServer = (
  options: AnalysisHttpServerOptions,
): AnalysisHttpServer => {
  let server: http.Server | null = null;

  const handleAnalyze = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    locale: SupportedLocale,
  ) => {
    try {
      const upload = await readUpload(req, {
        fieldName: UPLOAD_FIELD_NAME,
        maxBytes: options.maxUploadBytes,
      });
      const result = await options.pipeline.analyze({
        bytes: upload.bytes,
        locale,
      });
      sendJson(res, 200, result.response);
    } catch (error) {
      if (isPipelineError(error)) {
        if (isClientError(error.code)) {
          logger.warn("Analysis request rejected", {
            code: error.code,
            error: toErrorPayload(error),
          });
        }
        sendError(res, error.httpStatus, error.code, locale);
        return;
      }

      logger.error("Unexpected analysis failure", {
        error: toErrorPayload(error),
      });
      options.reportError?.(error, { route: ANALYSIS_ROUTES.analyzeImage });
      sendError(res, 500, "INTERNAL", locale);
    }
  };

  const handleRequest = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ) => {
    const locale = resolveRequestLocale(
      req.headers["accept-language"],
      options.defaultLocale,
    );

    if (req.method === "OPTIONS") {
      res.writeHead(204, buildHeaders());
      res.end();
      return;
    }

    let pathname: string;
    try {
      pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    } catch (error) {
      logger.warn("Invalid request URL received", {
        url: req.url,
        error: toErrorPayload(error),
      });
      sendError(res, 404, "NOT_FOUND", locale);
      return;
    }

    if (pathname === ANALYSIS_ROUTES.health) {
      if (req.method !== "GET") {
        sendError(res, 405, "METHOD_NOT_ALLOWED", locale);
        return;
      }
      sendJson(res, 200, { status: "healthy" });
      return;
    }

    if (pathname === ANALYSIS_ROUTES.analyzeImage) {
      if (req.method !== "POST") {
        req.resume();
        sendError(res, 405, "METHOD_NOT_ALLOWED", locale);
        return;
      }
      await handleAnalyze(req, res, locale);
      return;
    }

    req.resume();
    sendError(res, 404, "NOT_FOUND", locale);
  };

  const start = (): Promise<AddressInfo> => {
    if (server) {
      return Promise.reject(new Error("Analysis HTTP server already running"));
    }

    const { host, port } = options.server;
    const instance = http.createServer((req, res) => {
      handleRequest(req, res).catch((error: unknown) => {
        logger.error("Request handler crashed", {
          error: toErrorPayload(error),
        });
        options.reportError?.(error);
        if (!res.headersSent) {
          sendError(res, 500, "INTERNAL", options.defaultLocale);
        } else {
          res.end();
        }
      });
    });
    server = instance;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onStartupError = (error: NodeJS.ErrnoException) => {
        server = null;
        if (error.code === "EADDRINUSE") {
          logger.error("Analysis HTTP server port already in use", {
            host,
            port,
          });
        }
        reject(error);
      };

      instance.once("error", onStartupError);
      instance.listen(port, host, () => {
        instance.off("error", onStartupError);
        instance.on("error", (error) => {
          logger.error(
            "Analysis HTTP server encountered an error",
            toErrorPayload(error),
          );
        });

        const address = instance.address();
        if (!address || typeof address === "string") {
          reject(new Error("Analysis HTTP server has no TCP address"));
          return;
        }

        logger.info("Analysis HTTP server listening", {
          host: address.address,
          port: address.port,
        });
        resolve(address);
      });
    });
  };

  const stop = (): Promise<void> => {
    if (!server) {
      return Promise.resolve();
    }

    const serverToClose = server;
    server = null;

    return new Promise<void>((resolve, reject) => {
      serverToClose.close((error) => {
        if (error) {
          logger.warn(
            "Failed to close analysis HTTP server cleanly",
            toErrorPayload(error),
          );
          reject(error);
          return;
        }
        logger.info("Analysis HTTP server stopped");
        resolve();
      });
      serverToClose.closeIdleConnections();
    });
  };

  return { start, stop };
};
