export function calculateReduction(inputSize: number, outputSize: number): number {
  if (inputSize === 0) {
    return 0;
  }
  return (1 - outputSize / inputSize) * 100;
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  const sign = bytes < 0 ? "-" : "";
  let size = Math.abs(bytes);
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${sign}${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

export function clampInt(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(Math.trunc(value), max));
}
