import { getLogger, toErrorPayload } from "../../shared/logger";
import {
  type AngleResult,
  NO_POSE_DETECTED,
  type PoseDetection,
  type SegmentAngles,
  type SegmentPair,
} from "../../shared/types/analysis";
import type {
  LandmarkSet,
  PixelPoint,
  PoseLandmark,
} from "../../shared/types/landmarks";

const logger = getLogger("segment-angle", "pipeline");

export type SegmentPoints = {
  left: PixelPoint;
  right: PixelPoint;
};

const RADIANS_TO_DEGREES = 180 / Math.PI;

// Math.round(-0.04 * 10) / 10 is -0, which would leak into JSON as 0 but
// compare unequal under Object.is.
const roundToTenth = (value: number): number => {
  const rounded = Math.round(value * 10) / 10;
  return rounded === 0 ? 0 : rounded;
};

/**
 * Signed tilt of the segment p1→p2 against the horizontal, in degrees with
 * one decimal. 0 means level, 90 means vertical; positive values mean the
 * point on the right of the image sits lower. Swapping p1 and p2 gives the
 * same value. Never throws: unusable input yields 0.
 */
export const computeSignedSegmentAngle = (
  p1: PixelPoint,
  p2: PixelPoint,
): number => {
  try {
    const { x: x1, y: y1 } = p1;
    const { x: x2, y: y2 } = p2;

    if (![x1, y1, x2, y2].every((value) => Number.isFinite(value))) {
      throw new Error("Segment endpoint is not a finite coordinate");
    }

    let degrees = Math.atan2(y2 - y1, x2 - x1) * RADIANS_TO_DEGREES;
    if (degrees > 180) {
      degrees -= 360;
    }
    if (degrees <= -180) {
      degrees += 360;
    }

    // Fold opposite directions together: a level segment reads 0 whether it
    // runs left-to-right or right-to-left.
    if (degrees > 90) {
      degrees -= 180;
    } else if (degrees <= -90) {
      degrees += 180;
    }

    return roundToTenth(degrees);
  } catch (error) {
    logger.warn("Segment angle fell back to 0", {
      p1,
      p2,
      error: toErrorPayload(error),
    });
    return 0;
  }
};

export const computeSegmentAngle = (p1: PixelPoint, p2: PixelPoint): number => {
  return Math.abs(computeSignedSegmentAngle(p1, p2));
};

export const toPixelPoint = (
  landmark: PoseLandmark | undefined,
  width: number,
  height: number,
): PixelPoint => {
  if (!landmark) {
    throw new Error("Landmark is missing");
  }

  const x = Math.trunc(landmark.x * width);
  const y = Math.trunc(landmark.y * height);

  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new Error("Landmark has non-finite coordinates");
  }

  return { x, y };
};

export const resolveSegmentPoints = (
  landmarks: LandmarkSet,
  segment: SegmentPair,
  width: number,
  height: number,
): SegmentPoints => {
  return {
    left: toPixelPoint(landmarks[segment.leftIndex], width, height),
    right: toPixelPoint(landmarks[segment.rightIndex], width, height),
  };
};

const measureSegments = (
  detection: PoseDetection,
  width: number,
  height: number,
  segments: readonly SegmentPair[],
  measure: (points: SegmentPoints) => number,
): AngleResult => {
  if (detection.status !== "found") {
    return { error: NO_POSE_DETECTED };
  }

  const angles: SegmentAngles = { Shoulders: 0, Pelvis: 0, Knees: 0, Ankles: 0 };

  segments.forEach((segment) => {
    try {
      const points = resolveSegmentPoints(
        detection.landmarks,
        segment,
        width,
        height,
      );
      angles[segment.label] = measure(points);
    } catch (error) {
      logger.error("Failed to compute segment angle", {
        segment: segment.label,
        error: toErrorPayload(error),
      });
      angles[segment.label] = 0;
    }
  });

  return angles;
};

/**
 * Absolute angle per segment, as returned to callers.
 */
export const computeSegmentAngles = (
  detection: PoseDetection,
  width: number,
  height: number,
  segments: readonly SegmentPair[],
): AngleResult => {
  return measureSegments(detection, width, height, segments, ({ left, right }) =>
    computeSegmentAngle(left, right),
  );
};

/**
 * Signed angle per segment, for callers that need the tilt direction.
 */
export const computeSignedSegmentAngles = (
  detection: PoseDetection,
  width: number,
  height: number,
  segments: readonly SegmentPair[],
): AngleResult => {
  return measureSegments(detection, width, height, segments, ({ left, right }) =>
    computeSignedSegmentAngle(left, right),
  );
};
