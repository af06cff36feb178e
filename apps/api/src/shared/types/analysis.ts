import type { LandmarkSet } from "./landmarks";

export type SegmentLabel = "Shoulders" | "Pelvis" | "Knees" | "Ankles";

export type RgbColor = readonly [red: number, green: number, blue: number];

export type SegmentPair = {
  label: SegmentLabel;
  leftIndex: number;
  rightIndex: number;
  color: RgbColor;
};

export type PoseDetection =
  | { status: "found"; landmarks: LandmarkSet }
  | { status: "not-found"; reason?: string };

export const NO_POSE_DETECTED = "No pose detected";

export type SegmentAngles = Record<SegmentLabel, number>;

export type AngleResult = SegmentAngles | { error: string };

export type AnalysisStatus = "success";

export type AnalysisResponse = {
  image: string;
  angles: AngleResult;
  status: AnalysisStatus;
};

export type AnalysisErrorResponse = {
  status: "error";
  code: string;
  message: string;
};
