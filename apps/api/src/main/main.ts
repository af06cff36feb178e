import "./load-env";
import { createAnalysisConfig } from "../shared/config/analysis";
import { createServerConfig } from "../shared/config/server";
import { getLogger, toErrorPayload } from "../shared/logger";
import createDetector from "../worker/detectors";
import { DetectorPool } from "../worker/detectors/detectorPool";
import { AnalysisPipeline } from "../worker/engine/pipeline";
import { createAnalysisHttpServer } from "./analysisHttpServer";
import {
  captureException,
  flushSentry,
  initSentry,
  installProcessHandlers,
} from "./sentry";

const logger = getLogger("main", "server");

const bootstrap = async () => {
  initSentry();
  installProcessHandlers();

  const analysisConfig = createAnalysisConfig();
  const serverConfig = createServerConfig();

  const detectors = new DetectorPool(
    () => createDetector(analysisConfig.detector),
    analysisConfig.detectorPoolSize,
  );
  // Load models before accepting traffic so the first request is not slow.
  await detectors.initialize();

  const pipeline = new AnalysisPipeline({
    config: analysisConfig,
    detectors,
    reportError: captureException,
  });

  const server = createAnalysisHttpServer({
    pipeline,
    server: serverConfig,
    maxUploadBytes: analysisConfig.maxUploadBytes,
    defaultLocale: analysisConfig.locale,
    reportError: captureException,
  });
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    try {
      await server.stop();
      await detectors.dispose();
    } finally {
      await Promise.allSettled([flushSentry(), logger.flush()]);
    }
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown did not complete cleanly", {
        error: toErrorPayload(error),
      });
      process.exitCode = 1;
    });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
};

bootstrap().catch(async (error: unknown) => {
  logger.fatal("Analysis service failed to start", {
    error: toErrorPayload(error),
  });
  captureException(error);
  process.exitCode = 1;
  await Promise.allSettled([flushSentry(), logger.flush()]);
});
