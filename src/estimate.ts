import { isPercentResize } from "./geometry.js";
import type { CompressionOptions, ImageFormat } from "./types.js";

function resizeAreaFactor(percent: number): number {
  if (!isPercentResize(percent)) {
    return 1;
  }
  const scale = percent / 100;
  return scale * scale;
}

/**
 * Rough post-compression size in bytes, for previews only. Nothing is encoded;
 * the real size must be measured after compressing.
 *
 * JPEG scales with quality between 10% and 50% of the input. PNG is lossless,
 * so only deflate effort is modelled: 5% less per level.
 */
export function estimateCompressedSize(
  format: ImageFormat,
  inputSize: number,
  options: Pick<CompressionOptions, "quality" | "compressionLevel" | "resizePercent">,
): number {
  const area = resizeAreaFactor(options.resizePercent);

  const ratio = format === "jpeg"
    ? 0.1 + 0.4 * (options.quality / 100)
    : 1 - 0.05 * options.compressionLevel;

  return Math.floor(inputSize * ratio * area);
}
