import chalk from "chalk";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { AnalysisResult } from "../../worker/engine/pipeline";
import {
  CliUsageError,
  defaultOutputPath,
  formatAngles,
  parseCliArgs,
  runAnalyzeCommand,
} from "../cliCommands";

beforeAll(() => {
  chalk.level = 0;
});

describe("parseCliArgs", () => {
  it("derives the output path from the input image", () => {
    expect(parseCliArgs(["analyze", "photos/standing.png"])).toEqual({
      command: "analyze",
      input: "photos/standing.png",
      output: path.join("photos", "standing.annotated.jpg"),
    });
  });

  it("reads output, json and locale options", () => {
    expect(
      parseCliArgs([
        "analyze",
        "a.jpg",
        "-o",
        "out.jpg",
        "--json",
        "angles.json",
        "--locale",
        "ro-RO",
      ]),
    ).toEqual({
      command: "analyze",
      input: "a.jpg",
      output: "out.jpg",
      jsonOutput: "angles.json",
      locale: "ro-RO",
    });
  });

  it("answers --help without a command", () => {
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
  });

  it.each([
    [[], "Missing command"],
    [["measure", "a.jpg"], "Unknown command: measure"],
    [["analyze"], "Missing image path"],
    [["analyze", "a.jpg", "b.jpg"], "Unexpected arguments: b.jpg"],
    [["analyze", "a.jpg", "--locale", "fr-FR"], "Unsupported locale: fr-FR"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new CliUsageError(message));
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["analyze", "a.jpg", "--verbose"])).toThrow(
      CliUsageError,
    );
  });
});

describe("defaultOutputPath", () => {
  it("keeps the directory and replaces the extension", () => {
    expect(defaultOutputPath(path.join("in", "side.view.jpeg"))).toBe(
      path.join("in", "side.view.annotated.jpg"),
    );
  });
});

describe("formatAngles", () => {
  it("prints one aligned line per segment", () => {
    expect(
      formatAngles({ Shoulders: 8.5, Pelvis: 0, Knees: 12, Ankles: 3.2 }),
    ).toEqual([
      "Shoulders  8.5°",
      "Pelvis     0.0°",
      "Knees      12.0°",
      "Ankles     3.2°",
    ]);
  });

  it("prints the detection error on its own", () => {
    expect(formatAngles({ error: "No pose detected" })).toEqual([
      "No pose detected",
    ]);
  });
});

describe("runAnalyzeCommand", () => {
  let directory: string;

  const fakeResult = {
    response: {
      image: "data:image/jpeg;base64,/9j/",
      angles: { Shoulders: 8.5, Pelvis: 0, Knees: 0, Ankles: 0 },
      status: "success",
    },
    jpeg: Buffer.from([0xff, 0xd8, 0xff, 0xd9]),
    detection: { status: "not-found" },
    signedAngles: { Shoulders: -8.5, Pelvis: 0, Knees: 0, Ankles: 0 },
    width: 100,
    height: 100,
    sourceWidth: 100,
    sourceHeight: 100,
  } satisfies AnalysisResult;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "postural-cli-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes the annotated image and the angle map", async () => {
    const input = path.join(directory, "photo.jpg");
    await writeFile(input, Buffer.from("image bytes"));
    const analyze = vi.fn(() => Promise.resolve(fakeResult));
    const lines: string[] = [];

    await runAnalyzeCommand(
      {
        command: "analyze",
        input,
        output: path.join(directory, "out.jpg"),
        jsonOutput: path.join(directory, "angles.json"),
        locale: "ro-RO",
      },
      { pipeline: { analyze }, print: (line) => lines.push(line) },
    );

    expect(analyze).toHaveBeenCalledWith({
      bytes: Buffer.from("image bytes"),
      locale: "ro-RO",
    });
    await expect(readFile(path.join(directory, "out.jpg"))).resolves.toEqual(
      fakeResult.jpeg,
    );
    await expect(
      readFile(path.join(directory, "angles.json"), "utf8"),
    ).resolves.toBe(
      '{\n  "Shoulders": 8.5,\n  "Pelvis": 0,\n  "Knees": 0,\n  "Ankles": 0\n}\n',
    );
    expect(lines[0]).toBe("Shoulders  8.5°");
    expect(lines.at(-1)).toBe(
      `Angles written to ${path.join(directory, "angles.json")}`,
    );
  });

  it("reports an unreadable input as a missing file", async () => {
    const analyze = vi.fn(() => Promise.resolve(fakeResult));

    await expect(
      runAnalyzeCommand(
        {
          command: "analyze",
          input: path.join(directory, "absent.jpg"),
          output: path.join(directory, "out.jpg"),
        },
        { pipeline: { analyze }, print: () => undefined },
      ),
    ).rejects.toMatchObject({ code: "MISSING_FILE" });
    expect(analyze).not.toHaveBeenCalled();
  });
});
