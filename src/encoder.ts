import sharp from "sharp";
import type { Sharp } from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { CompressionError, attempt, toCompressionError } from "./errors.js";
import { computeTargetDimensions, generateOutputPath } from "./geometry.js";
import { jpegSettings, pngSettings } from "./options.js";
import { calculateReduction } from "./utils.js";
import type { CompressionOptions, CompressionResult, Dimensions, PngEffort } from "./types.js";

export const LIMIT_INPUT_PIXELS = 268402689; // 16384 x 16384

type Channels = 1 | 2 | 3 | 4;

interface PixelGrid extends Dimensions {
  data: Buffer;
  channels: Channels;
}

interface ResultDraft {
  inputPath: string;
  outputPath: string;
  inputSize: number;
  outputSize: number;
  width: number;
  height: number;
}

function toChannels(count: number): Channels {
  if (count === 1 || count === 2 || count === 3 || count === 4) {
    return count;
  }
  throw new Error(`unsupported channel count: ${count}`);
}

export function failedResult(draft: ResultDraft, error: CompressionError): CompressionResult {
  return { ...draft, reduction: 0, success: false, error };
}

/**
 * Decode, resample and re-encode one file into one format. `compress` never
 * rejects: every failure comes back as a result with `success: false`.
 */
export abstract class ImageEncoder {
  protected abstract encodeAs(pipeline: Sharp, options: CompressionOptions): Sharp;

  async compress(inputPath: string, options: CompressionOptions): Promise<CompressionResult> {
    const draft: ResultDraft = {
      inputPath,
      outputPath: "",
      inputSize: 0,
      outputSize: 0,
      width: 0,
      height: 0,
    };
    let tempOutput: string | undefined;

    try {
      draft.inputSize = await attempt("input-unreadable", inputPath, "input unreadable", async () => {
        const stats = await fs.stat(inputPath);
        if (!stats.isFile()) {
          throw new Error("not a regular file");
        }
        return stats.size;
      });

      const grid = await attempt("decode-failed", inputPath, "invalid or corrupt image", () => this.decode(inputPath));
      const target = computeTargetDimensions(grid, options);
      draft.width = target.width;
      draft.height = target.height;

      const outputPath = generateOutputPath(inputPath, options);
      draft.outputPath = outputPath;
      if (path.resolve(outputPath) === path.resolve(inputPath)) {
        throw new CompressionError("output-conflict", inputPath, "output path is the same as the input; refusing to overwrite the source");
      }

      await attempt("output-dir-failed", inputPath, "failed to create output directory", () =>
        fs.mkdir(path.dirname(outputPath), { recursive: true }),
      );

      const pending = path.join(
        path.dirname(outputPath),
        `.imgshrink-${crypto.randomBytes(8).toString("hex")}${path.extname(outputPath)}`,
      );
      tempOutput = pending;

      await attempt("encode-failed", inputPath, "encode failed", async () => {
        let pipeline = this.resample(this.source(inputPath, grid, options), grid, target);
        if (grid.channels <= 2) {
          // Output defaults to sRGB; grayscale sources stay single-channel.
          pipeline = pipeline.toColourspace("b-w");
        }
        await this.encodeAs(pipeline, options).toFile(pending);
      });

      draft.outputSize = await attempt("write-failed", inputPath, "failed to write output", async () => {
        await refuseSymlink(outputPath);
        await fs.rename(pending, outputPath);
        tempOutput = undefined;
        return (await fs.stat(outputPath)).size;
      });

      return {
        ...draft,
        reduction: calculateReduction(draft.inputSize, draft.outputSize),
        success: true,
      };
    } catch (err) {
      if (tempOutput) {
        try {
          await fs.unlink(tempOutput);
        } catch {
          // ignore cleanup errors
        }
      }
      return failedResult(draft, toCompressionError(err, "encode-failed", inputPath, "compression failed"));
    }
  }

  /** Full decode into raw pixels, with EXIF orientation applied to the pixel order. */
  private async decode(inputPath: string): Promise<PixelGrid> {
    const { data, info } = await sharp(inputPath, {
      failOn: "error",
      limitInputPixels: LIMIT_INPUT_PIXELS,
    })
      .rotate()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height, channels: toChannels(info.channels) };
  }

  // The raw grid carries no metadata, so keeping it means reading the source file again.
  private source(inputPath: string, grid: PixelGrid, options: CompressionOptions): Sharp {
    if (options.stripMetadata) {
      return sharp(grid.data, {
        raw: { width: grid.width, height: grid.height, channels: grid.channels },
      });
    }
    return sharp(inputPath, { failOn: "error", limitInputPixels: LIMIT_INPUT_PIXELS })
      .rotate()
      .keepMetadata();
  }

  private resample(pipeline: Sharp, source: Dimensions, target: Dimensions): Sharp {
    if (source.width === target.width && source.height === target.height) {
      return pipeline;
    }
    return pipeline.resize(target.width, target.height, {
      fit: "fill",
      kernel: sharp.kernel.lanczos3,
    });
  }
}

async function refuseSymlink(outputPath: string): Promise<void> {
  try {
    const outputLstat = await fs.lstat(outputPath);
    if (outputLstat.isSymbolicLink()) {
      throw new Error("output path is a symbolic link, refusing to overwrite");
    }
  } catch (e) {
    if (!isMissing(e)) throw e;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class JpegEncoder extends ImageEncoder {
  protected encodeAs(pipeline: Sharp, options: CompressionOptions): Sharp {
    const settings = jpegSettings(options);
    return pipeline.jpeg({
      quality: settings.quality,
      progressive: settings.progressive,
      // libvips only switches subsampling on or off; 4:2:2 has no encoder setting of its own.
      chromaSubsampling: settings.chromaSubsample === "4:4:4" ? "4:4:4" : "4:2:0",
    });
  }
}

export const PNG_ZLIB_LEVELS: Readonly<Record<PngEffort, number>> = {
  none: 0,
  fastest: 1,
  default: 6,
  maximum: 9,
};

export class PngEncoder extends ImageEncoder {
  protected encodeAs(pipeline: Sharp, options: CompressionOptions): Sharp {
    const settings = pngSettings(options);
    return pipeline.png({
      compressionLevel: PNG_ZLIB_LEVELS[settings.effort],
      progressive: settings.interlaced,
    });
  }
}
