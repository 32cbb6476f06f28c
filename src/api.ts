import sharp from "sharp";
import type { Metadata } from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import { CompressionError, attempt } from "./errors.js";
import { estimateCompressedSize } from "./estimate.js";
import { failedResult, JpegEncoder, LIMIT_INPUT_PIXELS, PngEncoder } from "./encoder.js";
import type { ImageEncoder } from "./encoder.js";
import { formatFromDecoder, isSupportedImage, resolveFormat } from "./format.js";
import { computeTargetDimensions, orientedDimensions } from "./geometry.js";
import { defaultOptions, normalizeOptions } from "./options.js";
import { runBatch } from "./batch.js";
import { calculateReduction } from "./utils.js";
import type {
  BatchResult,
  ColorMode,
  CompressionOptions,
  CompressionPreview,
  CompressionResult,
  ImageFormat,
  ImageInfo,
  ProgressSink,
} from "./types.js";

function colorModeOf(metadata: Metadata): ColorMode {
  const space: string | undefined = metadata.space;
  const alpha = metadata.hasAlpha === true;

  if (space === "cmyk") return "cmyk";
  if (space === "b-w" || space === "grey16") return alpha ? "grayscale-alpha" : "grayscale";
  if (space === "srgb" || space === "rgb" || space === "rgb16") return alpha ? "rgba" : "rgb";
  return "unknown";
}

/**
 * Entry point for front ends. Every format-specific call is routed through
 * the extension check before it reaches an encoder or the size estimate.
 */
export class ImageAPI {
  private readonly encoders: Readonly<Record<ImageFormat, ImageEncoder>>;

  constructor() {
    this.encoders = {
      jpeg: new JpegEncoder(),
      png: new PngEncoder(),
    };

    sharp.cache({ memory: 512 });
  }

  defaultOptions(): CompressionOptions {
    return defaultOptions();
  }

  async compressImage(inputPath: string, options: Partial<CompressionOptions> = {}): Promise<CompressionResult> {
    let format: ImageFormat;
    try {
      format = resolveFormat(inputPath);
    } catch (err) {
      if (!(err instanceof CompressionError)) throw err;
      return failedResult({ inputPath, outputPath: "", inputSize: 0, outputSize: 0, width: 0, height: 0 }, err);
    }
    return this.encoders[format].compress(inputPath, normalizeOptions(options));
  }

  async getImageInfo(imagePath: string): Promise<ImageInfo> {
    const stats = await attempt("input-unreadable", imagePath, "failed to read file", () => fs.stat(imagePath));
    if (!stats.isFile()) {
      throw new CompressionError("input-unreadable", imagePath, `not a regular file: ${imagePath}`);
    }

    const metadata = await attempt("decode-failed", imagePath, "failed to read image header", () =>
      sharp(imagePath, { limitInputPixels: LIMIT_INPUT_PIXELS }).metadata(),
    );

    const format = isSupportedImage(imagePath) ? resolveFormat(imagePath) : formatFromDecoder(metadata.format);
    if (format === undefined) {
      throw new CompressionError("unsupported-format", imagePath, `unsupported image format: ${metadata.format ?? "unknown"}`);
    }

    const { width, height } = orientedDimensions(metadata.width ?? 0, metadata.height ?? 0, metadata.orientation);

    return {
      path: imagePath,
      format,
      width,
      height,
      size: stats.size,
      colorMode: colorModeOf(metadata),
    };
  }

  async estimateSize(inputPath: string, options: Partial<CompressionOptions> = {}): Promise<number> {
    const format = resolveFormat(inputPath);
    const info = await this.getImageInfo(inputPath);
    return estimateCompressedSize(format, info.size, normalizeOptions(options));
  }

  async preview(inputPath: string, options: Partial<CompressionOptions> = {}): Promise<CompressionPreview> {
    const normalized = normalizeOptions(options);
    const format = resolveFormat(inputPath);
    const info = await this.getImageInfo(inputPath);
    const estimatedSize = estimateCompressedSize(format, info.size, normalized);
    const target = computeTargetDimensions(info, normalized);

    return {
      inputPath,
      inputSize: info.size,
      estimatedSize,
      estimatedReduction: calculateReduction(info.size, estimatedSize),
      format,
      width: info.width,
      height: info.height,
      newWidth: target.width,
      newHeight: target.height,
    };
  }

  async batchCompress(
    inputPaths: readonly string[],
    options: Partial<CompressionOptions> = {},
    onProgress?: ProgressSink,
  ): Promise<BatchResult> {
    const normalized = normalizeOptions(options);
    return runBatch(inputPaths, (inputPath) => this.compressImage(inputPath, normalized), { onProgress });
  }

  /** Supported image files under `dirPath`, sorted. Subdirectories only when `recursive`. */
  async scanDirectory(dirPath: string, recursive = false): Promise<string[]> {
    const entries = await attempt("input-unreadable", dirPath, "failed to scan directory", () =>
      recursive ? fs.readdir(dirPath, { recursive: true }) : fs.readdir(dirPath),
    );

    const candidates = entries.filter((entry) => isSupportedImage(entry)).map((entry) => path.join(dirPath, entry));
    const checked = await Promise.all(
      candidates.map(async (candidate) => {
        try {
          return (await fs.stat(candidate)).isFile() ? candidate : undefined;
        } catch {
          return undefined;
        }
      }),
    );

    return checked.filter((candidate): candidate is string => candidate !== undefined).sort();
  }

  /** Rejects unless the file exists, has a supported extension and its header decodes. */
  async validateImage(imagePath: string): Promise<ImageInfo> {
    try {
      await fs.access(imagePath);
    } catch (err) {
      throw new CompressionError("input-unreadable", imagePath, `file does not exist: ${imagePath}`, { cause: err });
    }

    const format = resolveFormat(imagePath);
    try {
      return await this.getImageInfo(imagePath);
    } catch (err) {
      if (err instanceof CompressionError && err.kind === "decode-failed") {
        throw new CompressionError("decode-failed", imagePath, `invalid ${format} image: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}

export * from "./types.js";
export { CompressionError } from "./errors.js";
export type { CompressionErrorKind, ErrorCategory } from "./errors.js";
export { computeTargetDimensions, generateOutputPath } from "./geometry.js";
export { estimateCompressedSize } from "./estimate.js";
export { resolveFormat, isSupportedImage } from "./format.js";
export { defaultOptions, normalizeOptions } from "./options.js";
export { MAX_CONCURRENT_COMPRESSIONS, runBatch } from "./batch.js";
export { calculateReduction, formatBytes } from "./utils.js";
