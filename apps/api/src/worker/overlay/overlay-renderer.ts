import {
  type Canvas,
  GlobalFonts,
  ImageData,
  type SKRSContext2D,
  createCanvas,
} from "@napi-rs/canvas";
import type { OverlayStyleConfig } from "../../shared/config/analysis";
import { getLogger, toErrorPayload } from "../../shared/logger";
import type {
  PoseDetection,
  RgbColor,
  SegmentLabel,
  SegmentPair,
} from "../../shared/types/analysis";
import type { PixelPoint } from "../../shared/types/landmarks";
import type { RasterImage } from "../../shared/types/raster";
import {
  computeSegmentAngle,
  resolveSegmentPoints,
} from "../metrics/segment-angle";

const logger = getLogger("overlay-renderer", "pipeline");

const OVERLAY_FONT_FAMILY = "PosturalOverlay";

export type OverlayOptions = {
  style: OverlayStyleConfig;
  segments: readonly SegmentPair[];
  /** Already localised text shown when no subject was detected. */
  warningText: string;
};

export type OverlayDrawReport = {
  subjectDetected: boolean;
  segmentsDrawn: SegmentLabel[];
  segmentsSkipped: SegmentLabel[];
};

export type AnnotatedImage = {
  canvas: Canvas;
  width: number;
  height: number;
  report: OverlayDrawReport;
};

const registeredFonts = new Map<string, boolean>();

const resolveFontFamily = (fontPath: string | undefined): string => {
  if (!fontPath) {
    return "sans-serif";
  }

  let registered = registeredFonts.get(fontPath);
  if (registered === undefined) {
    registered = GlobalFonts.registerFromPath(fontPath, OVERLAY_FONT_FAMILY);
    registeredFonts.set(fontPath, registered);
    if (!registered) {
      logger.warn("Overlay font could not be registered", { fontPath });
    }
  }

  return registered ? `${OVERLAY_FONT_FAMILY}, sans-serif` : "sans-serif";
};

const toCssColor = ([red, green, blue]: RgbColor): string =>
  `rgb(${red}, ${green}, ${blue})`;

const strokeLine = (
  context: SKRSContext2D,
  from: PixelPoint,
  to: PixelPoint,
  color: RgbColor,
  width: number,
) => {
  context.beginPath();
  context.moveTo(from.x, from.y);
  context.lineTo(to.x, to.y);
  context.strokeStyle = toCssColor(color);
  context.lineWidth = width;
  context.stroke();
};

const fillMarker = (
  context: SKRSContext2D,
  center: PixelPoint,
  radius: number,
  color: RgbColor,
) => {
  context.beginPath();
  context.arc(center.x, center.y, radius, 0, Math.PI * 2);
  context.fillStyle = toCssColor(color);
  context.fill();
};

const drawGrid = (
  context: SKRSContext2D,
  width: number,
  height: number,
  style: OverlayStyleConfig,
) => {
  const divisions = style.gridDivisions;
  for (let index = 0; index <= divisions; index += 1) {
    const x = Math.floor((index * width) / divisions);
    strokeLine(
      context,
      { x, y: 0 },
      { x, y: height },
      style.gridColor,
      style.gridLineWidth,
    );
  }
  for (let index = 0; index <= divisions; index += 1) {
    const y = Math.floor((index * height) / divisions);
    strokeLine(
      context,
      { x: 0, y },
      { x: width, y },
      style.gridColor,
      style.gridLineWidth,
    );
  }
};

const drawOutlinedLabel = (
  context: SKRSContext2D,
  text: string,
  position: PixelPoint,
  style: OverlayStyleConfig,
  fontFamily: string,
) => {
  context.font = `${style.labelFontSize}px ${fontFamily}`;
  context.textBaseline = "top";
  context.lineJoin = "round";
  // The stroke is centred on the glyph edge, so double it to get an outline
  // of labelStrokeWidth outside the fill.
  context.lineWidth = style.labelStrokeWidth * 2;
  context.strokeStyle = toCssColor(style.labelStrokeColor);
  context.strokeText(text, position.x, position.y);
  context.fillStyle = toCssColor(style.labelFillColor);
  context.fillText(text, position.x, position.y);
};

const drawSegment = (
  context: SKRSContext2D,
  segment: SegmentPair,
  detection: Extract<PoseDetection, { status: "found" }>,
  width: number,
  height: number,
  style: OverlayStyleConfig,
  fontFamily: string,
) => {
  const { left, right } = resolveSegmentPoints(
    detection.landmarks,
    segment,
    width,
    height,
  );
  const centerX = Math.floor(width / 2);

  strokeLine(
    context,
    { x: centerX, y: left.y },
    { x: centerX, y: right.y },
    style.referenceColor,
    style.referenceLineWidth,
  );

  strokeLine(context, left, right, segment.color, style.measurementLineWidth);

  fillMarker(context, left, style.markerRadius, segment.color);
  fillMarker(context, right, style.markerRadius, segment.color);

  const angle = computeSegmentAngle(left, right);
  const midY = Math.floor((left.y + right.y) / 2);
  drawOutlinedLabel(
    context,
    `${Math.round(angle)}°`,
    { x: centerX + style.labelOffsetX, y: midY + style.labelOffsetY },
    style,
    fontFamily,
  );
};

/**
 * Draws the measurement overlay in a fixed order: grid, center axis, then
 * either the warning label or the four segments. Drawing only ever adds on
 * top of what is already on the context.
 */
export const drawOverlay = (
  context: SKRSContext2D,
  width: number,
  height: number,
  detection: PoseDetection,
  options: OverlayOptions,
): OverlayDrawReport => {
  const { style, segments } = options;
  const fontFamily = resolveFontFamily(style.fontPath);
  const centerX = Math.floor(width / 2);

  drawGrid(context, width, height, style);
  strokeLine(
    context,
    { x: centerX, y: 0 },
    { x: centerX, y: height },
    style.axisColor,
    style.axisLineWidth,
  );

  if (detection.status !== "found") {
    context.font = `${style.warningFontSize}px ${fontFamily}`;
    context.textBaseline = "top";
    context.fillStyle = toCssColor(style.warningColor);
    context.fillText(
      options.warningText,
      centerX + style.warningOffsetX,
      style.warningY,
    );
    return { subjectDetected: false, segmentsDrawn: [], segmentsSkipped: [] };
  }

  const report: OverlayDrawReport = {
    subjectDetected: true,
    segmentsDrawn: [],
    segmentsSkipped: [],
  };

  segments.forEach((segment) => {
    try {
      drawSegment(context, segment, detection, width, height, style, fontFamily);
      report.segmentsDrawn.push(segment.label);
    } catch (error) {
      logger.error("Failed to draw segment overlay", {
        segment: segment.label,
        error: toErrorPayload(error),
      });
      report.segmentsSkipped.push(segment.label);
    }
  });

  return report;
};

export const rasterToCanvas = (image: RasterImage): Canvas => {
  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext("2d");

  const pixelCount = image.width * image.height;
  const rgba = new Uint8ClampedArray(pixelCount * 4);
  for (let index = 0; index < pixelCount; index += 1) {
    rgba[index * 4] = image.data[index * 3] ?? 0;
    rgba[index * 4 + 1] = image.data[index * 3 + 1] ?? 0;
    rgba[index * 4 + 2] = image.data[index * 3 + 2] ?? 0;
    rgba[index * 4 + 3] = 255;
  }

  context.putImageData(new ImageData(rgba, image.width, image.height), 0, 0);
  return canvas;
};

export const renderAnnotatedImage = (
  image: RasterImage,
  detection: PoseDetection,
  options: OverlayOptions,
): AnnotatedImage => {
  const canvas = rasterToCanvas(image);
  const report = drawOverlay(
    canvas.getContext("2d"),
    image.width,
    image.height,
    detection,
    options,
  );

  return { canvas, width: image.width, height: image.height, report };
};

export const encodeAnnotatedImage = async (
  annotated: AnnotatedImage,
  quality: number,
): Promise<Buffer> => {
  return annotated.canvas.encode("jpeg", quality);
};
