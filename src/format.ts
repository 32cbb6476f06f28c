import path from "node:path";
import { CompressionError } from "./errors.js";
import type { ImageFormat } from "./types.js";

const EXTENSIONS: Readonly<Record<string, ImageFormat>> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
};

/**
 * Classifies a file by its extension alone. Content is never sniffed here, so a
 * renamed file is caught later when decoding fails.
 */
export function resolveFormat(filePath: string): ImageFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSIONS[ext];
  if (format === undefined) {
    throw new CompressionError("unsupported-format", filePath, `unsupported image format: ${ext || "(no extension)"}`);
  }
  return format;
}

export function isSupportedImage(filePath: string): boolean {
  return EXTENSIONS[path.extname(filePath).toLowerCase()] !== undefined;
}

/** Maps the decoder's format name (as reported by sharp) onto a supported format. */
export function formatFromDecoder(name: string | undefined): ImageFormat | undefined {
  if (name === "jpeg" || name === "jpg") return "jpeg";
  if (name === "png") return "png";
  return undefined;
}
