import { readFile } from "node:fs/promises";
import { getLogger } from "../../shared/logger";
import type { PoseDetection } from "../../shared/types/analysis";
import type {
  DetectorInitPayload,
  PoseDetector,
} from "../../shared/types/detector";
import {
  isRecord,
  parseLandmarkSet,
} from "../../shared/validation/landmarks";

const logger = getLogger("fixture-detector", "pipeline");

/**
 * Answers every image with landmarks read from a JSON file. The file holds
 * either a landmark array, `{ "landmarks": [...] }`, or `null` /
 * `{ "landmarks": null }` to simulate an image with nobody in it.
 */
export class FixtureDetector implements PoseDetector {
  readonly name = "FixtureDetector";

  private detection: PoseDetection | null = null;

  constructor(private readonly payload: DetectorInitPayload) {}

  async initialize(): Promise<void> {
    const { fixturePath } = this.payload;
    if (!fixturePath) {
      throw new Error(
        "FixtureDetector needs POSTURAL_FIXTURE_LANDMARKS_PATH to be set",
      );
    }

    const raw: unknown = JSON.parse(await readFile(fixturePath, "utf8"));

    if (raw === null || (isRecord(raw) && raw.landmarks === null)) {
      this.detection = { status: "not-found", reason: "Fixture is empty" };
    } else {
      const landmarks = parseLandmarkSet(raw);
      if (!landmarks) {
        throw new Error(`Fixture landmarks in ${fixturePath} are malformed`);
      }
      this.detection = { status: "found", landmarks };
    }

    logger.info("Fixture detector loaded", {
      fixturePath,
      status: this.detection.status,
    });
  }

  detect(): Promise<PoseDetection> {
    if (!this.detection) {
      return Promise.reject(new Error("FixtureDetector is not initialised"));
    }
    return Promise.resolve(this.detection);
  }

  reset(): Promise<void> {
    return Promise.resolve();
  }

  dispose(): Promise<void> {
    this.detection = null;
    return Promise.resolve();
  }
}

export const createFixtureDetector = (
  payload: DetectorInitPayload,
): PoseDetector => {
  return new FixtureDetector(payload);
};
