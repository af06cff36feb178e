export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return null;
  }
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

/**
 * Returns the trimmed value when it is one of `allowed`, otherwise null.
 */
export const parseEnumEnv = <T extends string>(
  value: string | null | undefined,
  allowed: readonly T[],
): T | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalised) ?? null;
};

export const getEnvVar = (key: string): string | undefined => {
  const value = process.env[key];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value;
};
