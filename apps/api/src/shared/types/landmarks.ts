export type Landmark = {
  x: number;
  y: number;
  z: number;
};

export type PoseLandmark = Landmark & {
  visibility?: number;
};

/**
 * Landmarks of one detected subject in normalised image coordinates,
 * indexed by the 33-point BlazePose topology.
 */
export type LandmarkSet = readonly PoseLandmark[];

export const POSE_LANDMARK_COUNT = 33;

export const POSE_LANDMARK_INDEX = {
  leftShoulder: 11,
  rightShoulder: 12,
  leftHip: 23,
  rightHip: 24,
  leftKnee: 25,
  rightKnee: 26,
  leftAnkle: 27,
  rightAnkle: 28,
} as const;

export type PixelPoint = {
  x: number;
  y: number;
};
