import type { SupportedLocale } from "@postural/i18n-tools";
import type { AnalysisConfig } from "../../shared/config/analysis";
import { decodeImage, normalizeImage } from "../../shared/cv/normalize";
import {
  PipelineError,
  isClientError,
  isPipelineError,
} from "../../shared/errors";
import { translate } from "../../shared/i18n/config";
import { getLogger, toErrorPayload } from "../../shared/logger";
import type {
  AngleResult,
  AnalysisResponse,
  PoseDetection,
} from "../../shared/types/analysis";
import type { PoseDetector } from "../../shared/types/detector";
import type { RasterImage } from "../../shared/types/raster";
import {
  computeSegmentAngles,
  computeSignedSegmentAngles,
} from "../metrics/segment-angle";
import {
  type AnnotatedImage,
  encodeAnnotatedImage,
  renderAnnotatedImage,
} from "../overlay/overlay-renderer";

const logger = getLogger("analysis-pipeline", "pipeline");

export type AnalysisStage =
  | "received"
  | "decoded"
  | "normalized"
  | "detected"
  | "angles-computed"
  | "rendered"
  | "encoded"
  | "returned"
  | "failed";

export type DetectorLease = {
  withDetector: <T>(task: (detector: PoseDetector) => Promise<T>) => Promise<T>;
};

export type UnexpectedErrorReporter = (
  error: unknown,
  context: { stage: AnalysisStage },
) => void;

export type AnalysisPipelineOptions = {
  config: AnalysisConfig;
  detectors: DetectorLease;
  /** Called for failures that surface as INTERNAL or ENCODING_FAILURE. */
  reportError?: UnexpectedErrorReporter;
};

export type AnalysisInput = {
  bytes: Uint8Array;
  /** Locale of the overlay warning; defaults to the configured locale. */
  locale?: SupportedLocale;
};

export type AnalysisResult = {
  response: AnalysisResponse;
  jpeg: Buffer;
  detection: PoseDetection;
  signedAngles: AngleResult;
  width: number;
  height: number;
  sourceWidth: number;
  sourceHeight: number;
};

export const JPEG_DATA_URI_PREFIX = "data:image/jpeg;base64,";

type RequestBuffers = {
  decoded: RasterImage | null;
  normalized: RasterImage | null;
  annotated: AnnotatedImage | null;
};

export class AnalysisPipeline {
  private readonly config: AnalysisConfig;

  private readonly detectors: DetectorLease;

  private readonly reportError: UnexpectedErrorReporter | undefined;

  constructor(options: AnalysisPipelineOptions) {
    this.config = options.config;
    this.detectors = options.detectors;
    this.reportError = options.reportError;
  }

  /**
   * Runs one image through decode, normalize, detect, measure, render and
   * encode. A missing subject still succeeds with the not-found angle map;
   * every other failure surfaces as a PipelineError.
   */
  async analyze(input: AnalysisInput): Promise<AnalysisResult> {
    const startedAt = performance.now();
    let stage: AnalysisStage = "received";
    const advance = (next: AnalysisStage) => {
      stage = next;
      logger.debug("Pipeline stage reached", { stage: next });
    };

    const buffers: RequestBuffers = {
      decoded: null,
      normalized: null,
      annotated: null,
    };

    try {
      if (input.bytes.byteLength > this.config.maxUploadBytes) {
        throw new PipelineError(
          "TOO_LARGE",
          `Upload of ${input.bytes.byteLength} bytes exceeds ${this.config.maxUploadBytes}`,
        );
      }

      buffers.decoded = await decodeImage(input.bytes);
      advance("decoded");

      const normalized = await normalizeImage(
        buffers.decoded,
        this.config.bounds,
      );
      buffers.normalized = normalized.image;
      advance("normalized");

      const { width, height } = normalized.image;
      const detection = await this.detectSubject(normalized.image);
      advance("detected");

      const { segments } = this.config;
      const angles = computeSegmentAngles(detection, width, height, segments);
      const signedAngles = computeSignedSegmentAngles(
        detection,
        width,
        height,
        segments,
      );
      advance("angles-computed");

      buffers.annotated = renderAnnotatedImage(normalized.image, detection, {
        style: this.config.overlay,
        segments,
        warningText: translate(
          input.locale ?? this.config.locale,
          "overlay",
          "noPoseDetected",
        ),
      });
      advance("rendered");

      const jpeg = await this.encode(buffers.annotated);
      advance("encoded");

      const result: AnalysisResult = {
        response: {
          image: `${JPEG_DATA_URI_PREFIX}${jpeg.toString("base64")}`,
          angles,
          status: "success",
        },
        jpeg,
        detection,
        signedAngles,
        width,
        height,
        sourceWidth: normalized.sourceWidth,
        sourceHeight: normalized.sourceHeight,
      };

      advance("returned");
      logger.info("Image analysed", {
        subjectDetected: result.detection.status === "found",
        width: result.width,
        height: result.height,
        sourceWidth: result.sourceWidth,
        sourceHeight: result.sourceHeight,
        durationMs: Math.round(performance.now() - startedAt),
      });
      return result;
    } catch (error) {
      const failedAt = stage;
      advance("failed");
      throw this.toPipelineError(error, failedAt);
    } finally {
      buffers.decoded = null;
      buffers.normalized = null;
      buffers.annotated = null;
    }
  }

  /**
   * Leases a detector only for the detection call. A detector that cannot be
   * acquired or initialised counts as no subject, like one that throws.
   */
  private async detectSubject(image: RasterImage): Promise<PoseDetection> {
    try {
      return await this.detectors.withDetector((detector) =>
        this.detect(detector, image),
      );
    } catch (error) {
      logger.warn("No detector available, treating image as having no subject", {
        error: toErrorPayload(error),
      });
      return {
        status: "not-found",
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async detect(
    detector: PoseDetector,
    image: RasterImage,
  ): Promise<PoseDetection> {
    try {
      return await detector.detect(image);
    } catch (error) {
      logger.warn("Detector failed, treating image as having no subject", {
        detector: detector.name,
        error: toErrorPayload(error),
      });
      return {
        status: "not-found",
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async encode(annotated: AnnotatedImage): Promise<Buffer> {
    try {
      return await encodeAnnotatedImage(annotated, this.config.jpegQuality);
    } catch (error) {
      throw new PipelineError(
        "ENCODING_FAILURE",
        error instanceof Error ? error.message : "JPEG encoding failed",
        { cause: error },
      );
    }
  }

  private toPipelineError(error: unknown, stage: AnalysisStage): PipelineError {
    const pipelineError = isPipelineError(error)
      ? error
      : new PipelineError(
          "INTERNAL",
          error instanceof Error ? error.message : String(error),
          { cause: error },
        );

    const metadata = {
      stage,
      code: pipelineError.code,
      error: toErrorPayload(error),
    };

    if (isClientError(pipelineError.code)) {
      logger.warn("Image rejected", metadata);
    } else {
      logger.error("Image analysis failed", metadata);
      this.reportError?.(error, { stage });
    }

    return pipelineError;
  }
}
