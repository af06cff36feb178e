import type {
  BlazePoseTfjsModelConfig,
  PoseDetector as TfjsPoseDetector,
} from "@tensorflow-models/pose-detection";
import { getLogger } from "../../shared/logger";
import type { PoseDetection } from "../../shared/types/analysis";
import type {
  DetectorInitPayload,
  PoseDetector,
} from "../../shared/types/detector";
import {
  POSE_LANDMARK_COUNT,
  type PoseLandmark,
} from "../../shared/types/landmarks";
import type { RasterImage } from "../../shared/types/raster";

const logger = getLogger("blazepose-detector", "pipeline");

type TfjsCore = typeof import("@tensorflow/tfjs-core");

let backendReady: Promise<TfjsCore> | null = null;

// The CPU backend is the only one that runs under plain Node without native
// bindings. Registration is process-wide, so it happens once.
const ensureBackend = (): Promise<TfjsCore> => {
  backendReady ??= (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-converter");
    await import("@tensorflow/tfjs-backend-cpu");
    await tf.setBackend("cpu");
    await tf.ready();
    logger.info("TensorFlow backend ready", { backend: tf.getBackend() });
    return tf;
  })();
  return backendReady;
};

export class BlazePoseDetector implements PoseDetector {
  readonly name = "BlazePoseDetector";

  private detector: TfjsPoseDetector | null = null;

  private tf: TfjsCore | null = null;

  constructor(private readonly payload: DetectorInitPayload) {}

  async initialize(): Promise<void> {
    if (this.detector) {
      return;
    }

    this.tf = await ensureBackend();
    const poseDetection = await import("@tensorflow-models/pose-detection");

    const modelConfig: BlazePoseTfjsModelConfig = {
      runtime: "tfjs",
      modelType: this.payload.modelType,
      enableSmoothing: false,
      enableSegmentation: false,
    };
    if (this.payload.detectorModelUrl) {
      modelConfig.detectorModelUrl = this.payload.detectorModelUrl;
    }
    if (this.payload.landmarkModelUrl) {
      modelConfig.landmarkModelUrl = this.payload.landmarkModelUrl;
    }

    this.detector = await poseDetection.createDetector(
      poseDetection.SupportedModels.BlazePose,
      modelConfig,
    );
    logger.info("BlazePose detector initialised", {
      modelType: this.payload.modelType,
    });
  }

  async detect(image: RasterImage): Promise<PoseDetection> {
    if (!this.detector || !this.tf) {
      throw new Error("BlazePoseDetector is not initialised");
    }

    const input = this.tf.tensor3d(
      Int32Array.from(image.data),
      [image.height, image.width, image.channels],
      "int32",
    );

    try {
      const poses = await this.detector.estimatePoses(input, {
        maxPoses: 1,
        flipHorizontal: false,
      });

      const pose = poses[0];
      if (!pose) {
        return { status: "not-found" };
      }

      const score = pose.score ?? 0;
      if (score < this.payload.minPoseScore) {
        return {
          status: "not-found",
          reason: `Pose score ${score.toFixed(2)} below threshold`,
        };
      }

      if (pose.keypoints.length < POSE_LANDMARK_COUNT) {
        return {
          status: "not-found",
          reason: `Expected ${POSE_LANDMARK_COUNT} keypoints, got ${pose.keypoints.length}`,
        };
      }

      // Keypoints come back in pixels; the rest of the pipeline expects
      // coordinates relative to the image size.
      const landmarks: PoseLandmark[] = pose.keypoints.map((keypoint) => {
        const landmark: PoseLandmark = {
          x: keypoint.x / image.width,
          y: keypoint.y / image.height,
          z: keypoint.z ?? 0,
        };
        if (keypoint.score !== undefined) {
          landmark.visibility = keypoint.score;
        }
        return landmark;
      });

      return { status: "found", landmarks };
    } finally {
      input.dispose();
    }
  }

  reset(): Promise<void> {
    this.detector?.reset();
    return Promise.resolve();
  }

  dispose(): Promise<void> {
    this.detector?.dispose();
    this.detector = null;
    return Promise.resolve();
  }
}

export const createBlazePoseDetector = (
  payload: DetectorInitPayload,
): PoseDetector => {
  return new BlazePoseDetector(payload);
};
