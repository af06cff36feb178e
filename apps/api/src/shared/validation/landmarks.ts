import type { LandmarkSet, PoseLandmark } from "../types/landmarks";

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

type PoseLandmarkInput = Omit<PoseLandmark, "z"> & { z?: number };

export const isPoseLandmark = (value: unknown): value is PoseLandmarkInput => {
  if (!isRecord(value)) {
    return false;
  }

  const { x, y, z, visibility } = value;

  if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
    return false;
  }

  if (z !== undefined && !isFiniteNumber(z)) {
    return false;
  }

  return visibility === undefined || isFiniteNumber(visibility);
};

/**
 * Accepts either a bare landmark array or `{ landmarks: [...] }`.
 * Returns null when any entry is malformed.
 */
export const parseLandmarkSet = (value: unknown): LandmarkSet | null => {
  const candidate =
    isRecord(value) && !Array.isArray(value) ? value.landmarks : value;

  if (!Array.isArray(candidate)) {
    return null;
  }

  const landmarks: PoseLandmark[] = [];
  for (const entry of candidate) {
    if (!isPoseLandmark(entry)) {
      return null;
    }
    landmarks.push({
      x: entry.x,
      y: entry.y,
      z: entry.z ?? 0,
      visibility: entry.visibility,
    });
  }

  return landmarks;
};
