import {
  DEFAULT_LOCALES,
  type SupportedLocale,
  isSupportedLocale,
} from "@postural/i18n-tools";
import chalk from "chalk";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { PipelineError } from "../shared/errors";
import type { AngleResult } from "../shared/types/analysis";
import type {
  AnalysisPipeline,
  AnalysisResult,
} from "../worker/engine/pipeline";

export const USAGE = `Usage: postural-eval analyze <image> [options]

Options:
  -o, --out <file>      Annotated JPEG output (default: <image>.annotated.jpg)
  -j, --json <file>     Also write the angle map as JSON
  -l, --locale <tag>    Overlay language (${DEFAULT_LOCALES.join(", ")})
  -h, --help            Show this message`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type AnalyzeCommand = {
  command: "analyze";
  input: string;
  output: string;
  jsonOutput?: string;
  locale?: SupportedLocale;
};

export type CliCommand = AnalyzeCommand | { command: "help" };

export const defaultOutputPath = (input: string): string => {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.annotated.jpg`);
};

export const parseCliArgs = (argv: string[]): CliCommand => {
  let parsed: ReturnType<typeof parseCliOptions>;
  try {
    parsed = parseCliOptions(argv);
  } catch (error) {
    throw new CliUsageError(
      error instanceof Error ? error.message : String(error),
    );
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { command: "help" };
  }

  const [command, input, ...extra] = positionals;
  if (command !== "analyze") {
    throw new CliUsageError(
      command ? `Unknown command: ${command}` : "Missing command",
    );
  }
  if (!input) {
    throw new CliUsageError("Missing image path");
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  const analyze: AnalyzeCommand = {
    command: "analyze",
    input,
    output: values.out ?? defaultOutputPath(input),
  };
  if (values.json) {
    analyze.jsonOutput = values.json;
  }
  if (values.locale) {
    if (!isSupportedLocale(values.locale)) {
      throw new CliUsageError(`Unsupported locale: ${values.locale}`);
    }
    analyze.locale = values.locale;
  }
  return analyze;
};

const parseCliOptions = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: "string", short: "o" },
      json: { type: "string", short: "j" },
      locale: { type: "string", short: "l" },
      help: { type: "boolean", short: "h" },
    },
  });

export const formatAngles = (angles: AngleResult): string[] => {
  if ("error" in angles) {
    return [chalk.yellow(angles.error)];
  }

  return Object.entries(angles).map(([label, value]) => {
    return `${chalk.cyan(label.padEnd(10))} ${chalk.bold(`${value.toFixed(1)}°`)}`;
  });
};

export type AnalyzeDependencies = {
  pipeline: Pick<AnalysisPipeline, "analyze">;
  print: (line: string) => void;
};

export const runAnalyzeCommand = async (
  command: AnalyzeCommand,
  { pipeline, print }: AnalyzeDependencies,
): Promise<AnalysisResult> => {
  let bytes: Buffer;
  try {
    bytes = await readFile(command.input);
  } catch (error) {
    throw new PipelineError(
      "MISSING_FILE",
      `Cannot read ${command.input}`,
      { cause: error },
    );
  }

  const result = await pipeline.analyze({ bytes, locale: command.locale });

  await writeFile(command.output, result.jpeg);
  if (command.jsonOutput) {
    await writeFile(
      command.jsonOutput,
      `${JSON.stringify(result.response.angles, null, 2)}\n`,
      "utf8",
    );
  }

  formatAngles(result.response.angles).forEach((line) => print(line));
  print(chalk.dim(`Annotated image written to ${command.output}`));
  if (command.jsonOutput) {
    print(chalk.dim(`Angles written to ${command.jsonOutput}`));
  }

  return result;
};
