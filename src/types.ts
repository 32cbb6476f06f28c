import type { CompressionError } from "./errors.js";

export type ImageFormat = "jpeg" | "png";

export type ChromaSubsample = "4:4:4" | "4:2:2" | "4:2:0";

export type ColorMode = "grayscale" | "grayscale-alpha" | "rgb" | "rgba" | "cmyk" | "unknown";

/**
 * Settings for one compression run. Fields that only apply to one format are
 * read through {@link JpegSettings} / {@link PngSettings}, never directly by an encoder.
 */
export interface CompressionOptions {
  /** JPEG quality, 1-100. */
  quality: number;
  /** PNG deflate level, 0-9. Quantized to four effort tiers. */
  compressionLevel: number;
  /** Percent of the source dimensions, 0 disables. Takes precedence over width/height. */
  resizePercent: number;
  resizeWidth: number;
  resizeHeight: number;
  stripMetadata: boolean;
  progressive: boolean;
  chromaSubsample: ChromaSubsample;
  interlaced: boolean;
  /** Empty means next to the input file. */
  outputDir: string;
  outputSuffix: string;
}

export interface JpegSettings {
  quality: number;
  progressive: boolean;
  chromaSubsample: ChromaSubsample;
}

export type PngEffort = "none" | "fastest" | "default" | "maximum";

export interface PngSettings {
  effort: PngEffort;
  interlaced: boolean;
}

export interface Dimensions {
  width: number;
  height: number;
}

export interface ImageInfo {
  readonly path: string;
  readonly format: ImageFormat;
  readonly width: number;
  readonly height: number;
  readonly size: number;
  readonly colorMode: ColorMode;
}

interface CompressionOutcome {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly inputSize: number;
  readonly outputSize: number;
  readonly width: number;
  readonly height: number;
  /** Percent saved, negative when the output grew. */
  readonly reduction: number;
}

export type CompressionResult =
  | (CompressionOutcome & { readonly success: true; readonly error?: undefined })
  | (CompressionOutcome & { readonly success: false; readonly error: CompressionError });

export interface BatchResult {
  /** Completion order, not input order. */
  readonly results: readonly CompressionResult[];
  readonly totalInput: number;
  readonly totalOutput: number;
  readonly totalReduction: number;
  readonly successCount: number;
  readonly failCount: number;
  readonly durationMs: number;
}

export type ProgressSink = (result: CompressionResult) => void;

export interface CompressionPreview {
  readonly inputPath: string;
  readonly inputSize: number;
  readonly estimatedSize: number;
  readonly estimatedReduction: number;
  readonly format: ImageFormat;
  readonly width: number;
  readonly height: number;
  readonly newWidth: number;
  readonly newHeight: number;
}
