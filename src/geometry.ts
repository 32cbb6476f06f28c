import path from "node:path";
import type { CompressionOptions, Dimensions } from "./types.js";

type ResizeOptions = Pick<CompressionOptions, "resizePercent" | "resizeWidth" | "resizeHeight">;

export function isPercentResize(percent: number): boolean {
  return percent > 0 && percent < 100;
}

function atLeastOne(value: number): number {
  return Math.max(1, Math.floor(value));
}

/**
 * Target pixel dimensions for a source image. First match wins:
 * a percent in (0, 100), then explicit width and/or height, then no resize.
 * Computed axes are floored and never drop below 1px.
 */
export function computeTargetDimensions(source: Dimensions, options: ResizeOptions): Dimensions {
  const { width, height } = source;
  if (!(width > 0) || !(height > 0)) {
    throw new RangeError(`invalid source dimensions: ${width}x${height}`);
  }

  if (isPercentResize(options.resizePercent)) {
    const scale = options.resizePercent / 100;
    return { width: atLeastOne(width * scale), height: atLeastOne(height * scale) };
  }

  const targetWidth = Math.floor(options.resizeWidth);
  const targetHeight = Math.floor(options.resizeHeight);

  if (targetWidth > 0 && targetHeight > 0) {
    return { width: targetWidth, height: targetHeight };
  }
  if (targetWidth > 0) {
    return { width: targetWidth, height: atLeastOne((height * targetWidth) / width) };
  }
  if (targetHeight > 0) {
    return { width: atLeastOne((width * targetHeight) / height), height: targetHeight };
  }

  return { width, height };
}

/** Swaps axes for EXIF orientations 5-8, which rotate the image by 90 degrees. */
export function orientedDimensions(width: number, height: number, orientation?: number): Dimensions {
  if (orientation !== undefined && orientation >= 5 && orientation <= 8) {
    return { width: height, height: width };
  }
  return { width, height };
}

export function generateOutputPath(inputPath: string, options: Pick<CompressionOptions, "outputDir" | "outputSuffix">): string {
  const { dir, name, ext } = path.parse(inputPath);
  const targetDir = options.outputDir !== "" ? options.outputDir : dir;
  return path.join(targetDir, `${name}${options.outputSuffix}${ext}`);
}
