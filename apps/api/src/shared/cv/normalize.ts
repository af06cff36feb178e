import sharp from "sharp";
import { PipelineError } from "../errors";
import type { ImageBounds, RasterImage } from "../types/raster";

export type NormalizeResult = {
  image: RasterImage;
  sourceWidth: number;
  sourceHeight: number;
  downscaled: boolean;
};

export const calculateBoundedDimensions = (
  width: number,
  height: number,
  bounds: ImageBounds,
) => {
  if (
    !Number.isFinite(width) ||
    !Number.isFinite(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new Error("Cannot bound an image with zero or invalid dimension");
  }

  if (width <= bounds.maxWidth && height <= bounds.maxHeight) {
    return { width, height, downscaled: false };
  }

  const scale = Math.min(bounds.maxWidth / width, bounds.maxHeight / height);

  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
    downscaled: true,
  } as const;
};

const expandGreyscale = (data: Buffer, pixelCount: number): Buffer => {
  const rgb = Buffer.alloc(pixelCount * 3);
  for (let index = 0; index < pixelCount; index += 1) {
    const value = data[index] ?? 0;
    rgb[index * 3] = value;
    rgb[index * 3 + 1] = value;
    rgb[index * 3 + 2] = value;
  }
  return rgb;
};

/**
 * Decodes any raster format sharp understands into packed RGB. Alpha is
 * dropped and greyscale is expanded to three channels.
 */
export const decodeImage = async (bytes: Uint8Array): Promise<RasterImage> => {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes, { failOn: "error" })
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new PipelineError(
      "INVALID_INPUT",
      error instanceof Error ? error.message : "Unable to decode image",
      { cause: error },
    );
  }

  const { data, info } = decoded;
  if (info.width <= 0 || info.height <= 0) {
    throw new PipelineError("INVALID_INPUT", "Decoded image has no pixels");
  }

  if (info.channels === 3) {
    return { width: info.width, height: info.height, channels: 3, data };
  }

  if (info.channels === 1) {
    return {
      width: info.width,
      height: info.height,
      channels: 3,
      data: expandGreyscale(data, info.width * info.height),
    };
  }

  throw new PipelineError(
    "INVALID_INPUT",
    `Unsupported channel count after decode: ${info.channels}`,
  );
};

/**
 * Bounds the raster to `bounds`, preserving aspect ratio. Rasters already
 * within bounds are returned as-is.
 */
export const normalizeImage = async (
  image: RasterImage,
  bounds: ImageBounds,
): Promise<NormalizeResult> => {
  const dimensions = calculateBoundedDimensions(
    image.width,
    image.height,
    bounds,
  );

  if (!dimensions.downscaled) {
    return {
      image,
      sourceWidth: image.width,
      sourceHeight: image.height,
      downscaled: false,
    };
  }

  const { data, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 3 },
  })
    .resize(dimensions.width, dimensions.height, {
      kernel: sharp.kernel.lanczos3,
      fit: "fill",
    })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    image: { width: info.width, height: info.height, channels: 3, data },
    sourceWidth: image.width,
    sourceHeight: image.height,
    downscaled: true,
  };
};
