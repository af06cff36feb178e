/**
 * Packed 8-bit RGB pixels, row-major, `width * height * 3` bytes.
 */
export type RasterImage = {
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
  readonly data: Buffer;
};

export type ImageBounds = {
  maxWidth: number;
  maxHeight: number;
};
