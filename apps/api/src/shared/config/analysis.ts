import {
  type SupportedLocale,
  PRIMARY_LOCALE,
  isSupportedLocale,
} from "@postural/i18n-tools";
import { getEnvVar, parseEnumEnv, parseNumericEnv } from "../env";
import type { RgbColor, SegmentPair } from "../types/analysis";
import type {
  BlazePoseModelType,
  DetectorInitPayload,
  DetectorKind,
} from "../types/detector";
import { POSE_LANDMARK_INDEX } from "../types/landmarks";
import type { ImageBounds } from "../types/raster";

export type OverlayStyleConfig = {
  /** Number of cells per axis; lines are drawn on every cell boundary. */
  gridDivisions: number;
  gridColor: RgbColor;
  gridLineWidth: number;
  axisColor: RgbColor;
  axisLineWidth: number;
  referenceColor: RgbColor;
  referenceLineWidth: number;
  measurementLineWidth: number;
  markerRadius: number;
  labelOffsetX: number;
  labelOffsetY: number;
  labelFontSize: number;
  labelFillColor: RgbColor;
  labelStrokeColor: RgbColor;
  labelStrokeWidth: number;
  warningColor: RgbColor;
  warningOffsetX: number;
  warningY: number;
  warningFontSize: number;
  /** Optional TTF/OTF registered for all overlay text. */
  fontPath?: string;
};

export type AnalysisConfig = {
  bounds: ImageBounds;
  jpegQuality: number;
  maxUploadBytes: number;
  segments: readonly SegmentPair[];
  overlay: OverlayStyleConfig;
  detector: DetectorInitPayload;
  detectorPoolSize: number;
  locale: SupportedLocale;
};

export const SEGMENT_PAIRS: readonly SegmentPair[] = [
  {
    label: "Shoulders",
    leftIndex: POSE_LANDMARK_INDEX.leftShoulder,
    rightIndex: POSE_LANDMARK_INDEX.rightShoulder,
    color: [255, 0, 0],
  },
  {
    label: "Pelvis",
    leftIndex: POSE_LANDMARK_INDEX.leftHip,
    rightIndex: POSE_LANDMARK_INDEX.rightHip,
    color: [0, 128, 255],
  },
  {
    label: "Knees",
    leftIndex: POSE_LANDMARK_INDEX.leftKnee,
    rightIndex: POSE_LANDMARK_INDEX.rightKnee,
    color: [0, 255, 128],
  },
  {
    label: "Ankles",
    leftIndex: POSE_LANDMARK_INDEX.leftAnkle,
    rightIndex: POSE_LANDMARK_INDEX.rightAnkle,
    color: [255, 128, 0],
  },
];

export const DEFAULT_OVERLAY_STYLE: OverlayStyleConfig = {
  gridDivisions: 8,
  gridColor: [160, 160, 160],
  gridLineWidth: 2,
  axisColor: [0, 255, 0],
  axisLineWidth: 4,
  referenceColor: [255, 255, 255],
  referenceLineWidth: 2,
  measurementLineWidth: 4,
  markerRadius: 8,
  labelOffsetX: 25,
  labelOffsetY: -22,
  labelFontSize: 32,
  labelFillColor: [0, 0, 0],
  labelStrokeColor: [255, 255, 255],
  labelStrokeWidth: 2,
  warningColor: [255, 0, 0],
  warningOffsetX: -100,
  warningY: 20,
  warningFontSize: 16,
};

const DETECTOR_KINDS: readonly DetectorKind[] = ["blazepose", "fixture"];
const MODEL_TYPES: readonly BlazePoseModelType[] = ["lite", "full", "heavy"];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  bounds: { maxWidth: 1080, maxHeight: 1080 },
  jpegQuality: 85,
  // Uploads above this are rejected before any decoding (10 MiB).
  maxUploadBytes: 10 * 1024 * 1024,
  segments: SEGMENT_PAIRS,
  overlay: DEFAULT_OVERLAY_STYLE,
  detector: {
    kind: "blazepose",
    minPoseScore: 0.5,
    modelType: "full",
  },
  detectorPoolSize: 1,
  locale: PRIMARY_LOCALE,
};

export const cloneAnalysisConfig = (config: AnalysisConfig): AnalysisConfig => {
  return {
    ...config,
    bounds: { ...config.bounds },
    segments: config.segments.map((segment) => ({ ...segment })),
    overlay: { ...config.overlay },
    detector: { ...config.detector },
  };
};

const resolveLocale = (): SupportedLocale | null => {
  const raw = getEnvVar("POSTURAL_LOCALE")?.trim();
  if (!raw) {
    return null;
  }
  return isSupportedLocale(raw) ? raw : null;
};

/**
 * Reads `POSTURAL_*` overrides on top of the defaults. Out-of-range numbers
 * are clamped and unknown enum values fall back to the default.
 */
export const createAnalysisConfig = (
  base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): AnalysisConfig => {
  const config = cloneAnalysisConfig(base);

  const maxWidth = parseNumericEnv(getEnvVar("POSTURAL_MAX_IMAGE_WIDTH"), {
    min: 64,
    max: 8192,
    integer: true,
  });
  const maxHeight = parseNumericEnv(getEnvVar("POSTURAL_MAX_IMAGE_HEIGHT"), {
    min: 64,
    max: 8192,
    integer: true,
  });
  const jpegQuality = parseNumericEnv(getEnvVar("POSTURAL_JPEG_QUALITY"), {
    min: 1,
    max: 100,
    integer: true,
  });
  const maxUploadBytes = parseNumericEnv(
    getEnvVar("POSTURAL_MAX_UPLOAD_BYTES"),
    { min: 1, max: 512 * 1024 * 1024, integer: true },
  );
  const poolSize = parseNumericEnv(getEnvVar("POSTURAL_DETECTOR_POOL_SIZE"), {
    min: 1,
    max: 32,
    integer: true,
  });
  const minPoseScore = parseNumericEnv(getEnvVar("POSTURAL_MIN_POSE_SCORE"), {
    min: 0,
    max: 1,
  });
  const kind = parseEnumEnv(getEnvVar("POSTURAL_DETECTOR"), DETECTOR_KINDS);
  const modelType = parseEnumEnv(
    getEnvVar("POSTURAL_BLAZEPOSE_MODEL_TYPE"),
    MODEL_TYPES,
  );

  if (maxWidth !== null) {
    config.bounds.maxWidth = maxWidth;
  }
  if (maxHeight !== null) {
    config.bounds.maxHeight = maxHeight;
  }
  if (jpegQuality !== null) {
    config.jpegQuality = jpegQuality;
  }
  if (maxUploadBytes !== null) {
    config.maxUploadBytes = maxUploadBytes;
  }
  if (poolSize !== null) {
    config.detectorPoolSize = poolSize;
  }
  if (minPoseScore !== null) {
    config.detector.minPoseScore = minPoseScore;
  }
  if (kind !== null) {
    config.detector.kind = kind;
  }
  if (modelType !== null) {
    config.detector.modelType = modelType;
  }

  const detectorModelUrl = getEnvVar("POSTURAL_BLAZEPOSE_DETECTOR_URL");
  if (detectorModelUrl) {
    config.detector.detectorModelUrl = detectorModelUrl.trim();
  }
  const landmarkModelUrl = getEnvVar("POSTURAL_BLAZEPOSE_LANDMARK_URL");
  if (landmarkModelUrl) {
    config.detector.landmarkModelUrl = landmarkModelUrl.trim();
  }
  const fixturePath = getEnvVar("POSTURAL_FIXTURE_LANDMARKS_PATH");
  if (fixturePath) {
    config.detector.fixturePath = fixturePath.trim();
  }
  const fontPath = getEnvVar("POSTURAL_OVERLAY_FONT_PATH");
  if (fontPath) {
    config.overlay.fontPath = fontPath.trim();
  }

  const locale = resolveLocale();
  if (locale !== null) {
    config.locale = locale;
  }

  return config;
};
