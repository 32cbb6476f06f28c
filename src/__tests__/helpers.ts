import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export function tmpDir(prefix = "imgshrink-test"): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function createTestImage(
  filePath: string,
  format: "png" | "jpeg" = "png",
  width = 10,
  height = 10,
  channels: 3 | 4 = 3,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const background = channels === 4
    ? { r: 255, g: 0, b: 0, alpha: 0.5 }
    : format === "png" ? { r: 255, g: 0, b: 0 } : { r: 0, g: 255, b: 0 };
  await sharp({
    create: { width, height, channels, background },
  })
    .toFormat(format)
    .toFile(filePath);
}

/** Random pixels, so encoder settings make a measurable difference in size. */
export async function createNoiseImage(
  filePath: string,
  format: "png" | "jpeg",
  width: number,
  height: number,
): Promise<void> {
  const channels = 3;
  const noise = Buffer.alloc(width * height * channels);
  for (let i = 0; i < noise.length; i++) {
    noise[i] = Math.floor(Math.random() * 256);
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp(noise, { raw: { width, height, channels } })
    .toFormat(format)
    .toFile(filePath);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function fileSize(filePath: string): Promise<number> {
  return (await fs.stat(filePath)).size;
}
