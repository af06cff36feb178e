import sharp from "sharp";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_ANALYSIS_CONFIG,
  cloneAnalysisConfig,
} from "../../../shared/config/analysis";
import { PipelineError } from "../../../shared/errors";
import type { PoseDetection } from "../../../shared/types/analysis";
import type { PoseDetector } from "../../../shared/types/detector";
import type { PoseLandmark } from "../../../shared/types/landmarks";
import type { RasterImage } from "../../../shared/types/raster";
import { DetectorPool } from "../../detectors/detectorPool";
import {
  encodeAnnotatedImage,
  renderAnnotatedImage,
} from "../../overlay/overlay-renderer";
import { AnalysisPipeline, JPEG_DATA_URI_PREFIX } from "../pipeline";

vi.mock("../../../shared/logger", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
  toErrorPayload: (error: unknown) => ({ message: String(error) }),
}));

vi.mock("../../overlay/overlay-renderer", async (importOriginal) => {
  const actual =
    await importOriginal<typeof import("../../overlay/overlay-renderer")>();
  return {
    ...actual,
    renderAnnotatedImage: vi.fn(actual.renderAnnotatedImage),
    encodeAnnotatedImage: vi.fn(actual.encodeAnnotatedImage),
  };
});

const createLandmarks = (
  overrides: Record<number, PoseLandmark>,
): PoseLandmark[] => {
  return Array.from({ length: 33 }, (_, index) => {
    return overrides[index] ?? { x: 0.5, y: 0.5, z: 0 };
  });
};

const tiltedSubject = createLandmarks({
  11: { x: 0.75, y: 0.25, z: 0 },
  12: { x: 0.25, y: 0.35, z: 0 },
  23: { x: 0.625, y: 0.5, z: 0 },
  24: { x: 0.375, y: 0.5, z: 0 },
  25: { x: 0.625, y: 0.7, z: 0 },
  26: { x: 0.375, y: 0.7, z: 0 },
  27: { x: 0.625, y: 0.9, z: 0 },
  28: { x: 0.375, y: 0.9, z: 0 },
});

const createWhiteJpeg = (width: number, height: number) =>
  sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 255, g: 255, b: 255 },
    },
  })
    .jpeg()
    .toBuffer();

const decodeDataUri = (image: string) =>
  Buffer.from(image.slice(JPEG_DATA_URI_PREFIX.length), "base64");

const createFakeDetector = (detection: PoseDetection) => {
  return {
    name: "FakeDetector",
    initialize: vi.fn(() => Promise.resolve()),
    detect: vi.fn((_image: RasterImage) => Promise.resolve(detection)),
    reset: vi.fn(() => Promise.resolve()),
    dispose: vi.fn(() => Promise.resolve()),
  } satisfies PoseDetector;
};

const createPipeline = (
  detector: PoseDetector,
  overrides: { maxUploadBytes?: number } = {},
) => {
  const config = cloneAnalysisConfig(DEFAULT_ANALYSIS_CONFIG);
  config.maxUploadBytes = overrides.maxUploadBytes ?? config.maxUploadBytes;
  const pool = new DetectorPool(() => detector, 1);
  const reportError = vi.fn();
  const pipeline = new AnalysisPipeline({
    config,
    detectors: pool,
    reportError,
  });
  return { pipeline, pool, reportError };
};

describe("AnalysisPipeline", () => {
  beforeEach(() => {
    vi.mocked(renderAnnotatedImage).mockClear();
    vi.mocked(encodeAnnotatedImage).mockClear();
  });

  it("succeeds with the not-found angle map when nobody is in the picture", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline, pool } = createPipeline(detector);

    const result = await pipeline.analyze({
      bytes: await createWhiteJpeg(800, 600),
    });

    expect(result.response.status).toBe("success");
    expect(result.response.angles).toEqual({ error: "No pose detected" });
    expect(result.response.image.startsWith(JPEG_DATA_URI_PREFIX)).toBe(true);

    const metadata = await sharp(decodeDataUri(result.response.image)).metadata();
    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(800);
    expect(metadata.height).toBe(600);
    expect(detector.reset).toHaveBeenCalledTimes(1);
    expect(pool.getStats().idle).toBe(1);
  });

  it("measures all four segments of a detected subject", async () => {
    const detector = createFakeDetector({
      status: "found",
      landmarks: tiltedSubject,
    });
    const { pipeline } = createPipeline(detector);

    const result = await pipeline.analyze({
      bytes: await createWhiteJpeg(800, 600),
    });

    // Shoulders (600, 150) → (200, 210)
    expect(result.response.angles).toEqual({
      Shoulders: 8.5,
      Pelvis: 0,
      Knees: 0,
      Ankles: 0,
    });
    expect(result.signedAngles).toEqual({
      Shoulders: -8.5,
      Pelvis: 0,
      Knees: 0,
      Ankles: 0,
    });
    expect(result.jpeg.equals(decodeDataUri(result.response.image))).toBe(true);
  });

  it("detects and draws on the downscaled image", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline } = createPipeline(detector);

    const result = await pipeline.analyze({
      bytes: await createWhiteJpeg(2000, 500),
    });

    expect(detector.detect.mock.calls[0]?.[0]).toMatchObject({
      width: 1080,
      height: 270,
      channels: 3,
    });
    expect(result.sourceWidth).toBe(2000);
    expect(result.sourceHeight).toBe(500);
    expect(result.width).toBe(1080);
    expect(result.height).toBe(270);

    const metadata = await sharp(result.jpeg).metadata();
    expect(metadata.width).toBe(1080);
    expect(metadata.height).toBe(270);
  });

  it("writes the warning in the requested locale", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline } = createPipeline(detector);

    await pipeline.analyze({
      bytes: await createWhiteJpeg(100, 100),
      locale: "ro-RO",
    });

    const options = vi.mocked(renderAnnotatedImage).mock.calls[0]?.[2];
    expect(options?.warningText).toBe("Nicio postură detectată!");
  });

  it("treats a crashing detector as an image without a subject", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    detector.detect.mockRejectedValueOnce(new Error("tensor shape mismatch"));
    const { pipeline, reportError } = createPipeline(detector);

    const result = await pipeline.analyze({
      bytes: await createWhiteJpeg(100, 100),
    });

    expect(result.response.angles).toEqual({ error: "No pose detected" });
    expect(result.detection).toEqual({
      status: "not-found",
      reason: "tensor shape mismatch",
    });
    expect(reportError).not.toHaveBeenCalled();
  });

  it("rejects oversized uploads before decoding", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline } = createPipeline(detector, { maxUploadBytes: 10 });

    const failure = pipeline.analyze({ bytes: new Uint8Array(11) });

    await expect(failure).rejects.toBeInstanceOf(PipelineError);
    await expect(failure).rejects.toMatchObject({ code: "TOO_LARGE" });
    expect(detector.initialize).not.toHaveBeenCalled();
    expect(detector.detect).not.toHaveBeenCalled();
  });

  it("rejects bytes that are not an image without leasing a detector", async () => {
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline, pool, reportError } = createPipeline(detector);

    await expect(
      pipeline.analyze({ bytes: Buffer.from("definitely not an image") }),
    ).rejects.toMatchObject({ code: "INVALID_INPUT" });

    expect(detector.initialize).not.toHaveBeenCalled();
    expect(detector.detect).not.toHaveBeenCalled();
    expect(pool.getStats().idle).toBe(0);
    expect(reportError).not.toHaveBeenCalled();
  });

  describe("when the detector cannot be initialised", () => {
    const createBrokenDetector = () => {
      const detector = createFakeDetector({ status: "not-found" });
      detector.initialize.mockRejectedValue(new Error("model load failed"));
      return detector;
    };

    it("answers with the not-found angle map and the warning overlay", async () => {
      const detector = createBrokenDetector();
      const { pipeline, reportError } = createPipeline(detector);

      const result = await pipeline.analyze({
        bytes: await createWhiteJpeg(800, 600),
      });

      expect(result.response.status).toBe("success");
      expect(result.response.angles).toEqual({ error: "No pose detected" });
      expect(result.detection).toEqual({
        status: "not-found",
        reason: "model load failed",
      });
      expect(vi.mocked(renderAnnotatedImage).mock.calls[0]?.[2]?.warningText).toBe(
        "No pose detected!",
      );
      expect(detector.detect).not.toHaveBeenCalled();
      expect(reportError).not.toHaveBeenCalled();

      const metadata = await sharp(result.jpeg).metadata();
      expect(metadata.width).toBe(800);
      expect(metadata.height).toBe(600);
    });

    it("still rejects undecodable bytes as INVALID_INPUT", async () => {
      const detector = createBrokenDetector();
      const { pipeline } = createPipeline(detector);

      await expect(
        pipeline.analyze({ bytes: Buffer.from("not an image") }),
      ).rejects.toMatchObject({ code: "INVALID_INPUT" });
      expect(detector.initialize).not.toHaveBeenCalled();
    });
  });

  it("maps encoder failures to ENCODING_FAILURE", async () => {
    vi.mocked(encodeAnnotatedImage).mockRejectedValueOnce(
      new Error("encoder crashed"),
    );
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline, reportError } = createPipeline(detector);

    await expect(
      pipeline.analyze({ bytes: await createWhiteJpeg(100, 100) }),
    ).rejects.toMatchObject({
      code: "ENCODING_FAILURE",
      message: "encoder crashed",
    });
    expect(reportError).toHaveBeenCalledWith(expect.any(PipelineError), {
      stage: "rendered",
    });
  });

  it("hides unexpected failures behind INTERNAL", async () => {
    vi.mocked(renderAnnotatedImage).mockImplementationOnce(() => {
      throw new Error("canvas allocation failed");
    });
    const detector = createFakeDetector({ status: "not-found" });
    const { pipeline, pool, reportError } = createPipeline(detector);

    const failure = pipeline.analyze({ bytes: await createWhiteJpeg(100, 100) });

    await expect(failure).rejects.toMatchObject({ code: "INTERNAL" });
    expect(reportError).toHaveBeenCalledTimes(1);
    expect(reportError.mock.calls[0]?.[1]).toEqual({ stage: "angles-computed" });
    expect(pool.getStats().idle).toBe(1);
  });
});
