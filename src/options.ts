import { clampInt } from "./utils.js";
import type { ChromaSubsample, CompressionOptions, JpegSettings, PngEffort, PngSettings } from "./types.js";

const CHROMA_MODES: readonly ChromaSubsample[] = ["4:4:4", "4:2:2", "4:2:0"];

export function defaultOptions(): CompressionOptions {
  return {
    quality: 85,
    compressionLevel: 6,
    resizePercent: 0,
    resizeWidth: 0,
    resizeHeight: 0,
    stripMetadata: true,
    progressive: true,
    chromaSubsample: "4:2:0",
    interlaced: false,
    outputDir: "",
    outputSuffix: "_compressed",
  };
}

export function isChromaSubsample(value: string): value is ChromaSubsample {
  return CHROMA_MODES.some((mode) => mode === value);
}

/** Fills a partial options value from the defaults and clamps every number into range. */
export function normalizeOptions(partial: Partial<CompressionOptions> = {}): CompressionOptions {
  const defaults = defaultOptions();
  const percent = partial.resizePercent ?? defaults.resizePercent;
  const chroma = partial.chromaSubsample ?? defaults.chromaSubsample;

  return Object.freeze({
    quality: clampInt(partial.quality ?? defaults.quality, 1, 100, defaults.quality),
    compressionLevel: clampInt(partial.compressionLevel ?? defaults.compressionLevel, 0, 9, defaults.compressionLevel),
    resizePercent: Number.isFinite(percent) ? Math.max(0, Math.min(percent, 100)) : defaults.resizePercent,
    resizeWidth: clampInt(partial.resizeWidth ?? 0, 0, Number.MAX_SAFE_INTEGER, 0),
    resizeHeight: clampInt(partial.resizeHeight ?? 0, 0, Number.MAX_SAFE_INTEGER, 0),
    stripMetadata: partial.stripMetadata ?? defaults.stripMetadata,
    progressive: partial.progressive ?? defaults.progressive,
    chromaSubsample: isChromaSubsample(chroma) ? chroma : defaults.chromaSubsample,
    interlaced: partial.interlaced ?? defaults.interlaced,
    outputDir: partial.outputDir ?? defaults.outputDir,
    outputSuffix: partial.outputSuffix ?? defaults.outputSuffix,
  });
}

export function jpegSettings(options: CompressionOptions): JpegSettings {
  return {
    quality: options.quality,
    progressive: options.progressive,
    chromaSubsample: options.chromaSubsample,
  };
}

/** The codec only offers four effort tiers, so levels 0-9 are bucketed. */
export function pngEffortFor(level: number): PngEffort {
  if (level <= 0) return "none";
  if (level <= 3) return "fastest";
  if (level <= 6) return "default";
  return "maximum";
}

export function pngSettings(options: CompressionOptions): PngSettings {
  return {
    effort: pngEffortFor(options.compressionLevel),
    interlaced: options.interlaced,
  };
}
