#!/usr/bin/env tsx
import "./load-env";
import chalk from "chalk";
import { createAnalysisConfig } from "../shared/config/analysis";
import { isPipelineError } from "../shared/errors";
import { translate } from "../shared/i18n/config";
import { getLogger, toErrorPayload } from "../shared/logger";
import createDetector from "../worker/detectors";
import { DetectorPool } from "../worker/detectors/detectorPool";
import { AnalysisPipeline } from "../worker/engine/pipeline";
import {
  type CliCommand,
  CliUsageError,
  USAGE,
  parseCliArgs,
  runAnalyzeCommand,
} from "./cliCommands";

const logger = getLogger("cli", "cli");

const print = (line: string) => {
  process.stdout.write(`${line}\n`);
};

const printError = (line: string) => {
  process.stderr.write(`${chalk.red(line)}\n`);
};

const run = async (): Promise<number> => {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      printError(error.message);
      print(USAGE);
      return 2;
    }
    throw error;
  }

  if (command.command === "help") {
    print(USAGE);
    return 0;
  }

  const config = createAnalysisConfig();
  const locale = command.locale ?? config.locale;
  const detectors = new DetectorPool(() => createDetector(config.detector), 1);

  try {
    const pipeline = new AnalysisPipeline({ config, detectors });
    await runAnalyzeCommand(command, { pipeline, print });
    return 0;
  } catch (error) {
    if (isPipelineError(error)) {
      printError(`${translate(locale, "errors", error.code)} (${error.code})`);
      logger.debug("Analysis failed", { error: toErrorPayload(error) });
      return 1;
    }
    throw error;
  } finally {
    await detectors.dispose();
  }
};

run()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal("CLI crashed", { error: toErrorPayload(error) });
    process.exitCode = 1;
  })
  .finally(() => {
    logger.flush().catch((error: unknown) => {
      printError(`Failed to flush logs: ${String(error)}`);
    });
  });
