/**
 * HTTP Server Configuration
 *
 * Shared constants for the analysis HTTP server and the CLI transport.
 */
import { getEnvVar, parseNumericEnv } from "../env";

/**
 * Default port for the analysis HTTP server
 */
export const ANALYSIS_HTTP_DEFAULT_PORT = 8000;

/**
 * Default bind host for the analysis HTTP server
 */
export const ANALYSIS_HTTP_DEFAULT_HOST = "0.0.0.0";

/**
 * Multipart field carrying the photograph
 */
export const UPLOAD_FIELD_NAME = "file";

export const ANALYSIS_ROUTES = {
  analyzeImage: "/analyze-image",
  health: "/health",
} as const;

export type ServerConfig = {
  host: string;
  port: number;
};

export const createServerConfig = (): ServerConfig => {
  const port = parseNumericEnv(getEnvVar("POSTURAL_HTTP_PORT"), {
    min: 0,
    max: 65535,
    integer: true,
  });

  return {
    host: getEnvVar("POSTURAL_HTTP_HOST")?.trim() ?? ANALYSIS_HTTP_DEFAULT_HOST,
    port: port ?? ANALYSIS_HTTP_DEFAULT_PORT,
  };
};
