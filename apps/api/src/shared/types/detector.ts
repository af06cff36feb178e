import type { PoseDetection } from "./analysis";
import type { RasterImage } from "./raster";

export type DetectorKind = "blazepose" | "fixture";

export type BlazePoseModelType = "lite" | "full" | "heavy";

export type DetectorInitPayload = {
  kind: DetectorKind;
  /** Poses scoring below this are reported as not found (0-1 range). */
  minPoseScore: number;
  modelType: BlazePoseModelType;
  detectorModelUrl?: string;
  landmarkModelUrl?: string;
  fixturePath?: string;
};

export type InitializeFn = () => Promise<void>;
export type DetectFn = (image: RasterImage) => Promise<PoseDetection>;
export type ResetFn = () => Promise<void>;
export type DisposeFn = () => Promise<void>;

/**
 * Opaque landmark provider. `detect` sees one normalised image and answers
 * with either the landmarks of a single subject or a not-found outcome.
 */
export interface PoseDetector {
  readonly name: string;
  initialize: InitializeFn;
  detect: DetectFn;
  /** Drops any state carried over from the previous image. */
  reset: ResetFn;
  dispose: DisposeFn;
}

export type DetectorFactory = () => PoseDetector;
