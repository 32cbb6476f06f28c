import pLimit from "p-limit";
import { describeError, toCompressionError } from "./errors.js";
import { failedResult } from "./encoder.js";
import { calculateReduction } from "./utils.js";
import type { BatchResult, CompressionResult, ProgressSink } from "./types.js";

/** Caps decoded pixel grids held in memory at once. */
export const MAX_CONCURRENT_COMPRESSIONS = 4;

export type CompressFn = (inputPath: string) => Promise<CompressionResult>;

export interface BatchRunOptions {
  onProgress?: ProgressSink;
  /** Lowers the admission cap; values above {@link MAX_CONCURRENT_COMPRESSIONS} are clamped. */
  concurrency?: number;
}

/**
 * The only mutable state of a batch. `add` is synchronous, so each update runs
 * to completion before another worker's continuation can observe the totals.
 */
export class BatchAccumulator {
  private readonly results: CompressionResult[] = [];
  private totalInput = 0;
  private totalOutput = 0;
  private successCount = 0;
  private failCount = 0;

  add(result: CompressionResult): void {
    this.results.push(result);
    if (result.success) {
      this.successCount++;
      this.totalInput += result.inputSize;
      this.totalOutput += result.outputSize;
    } else {
      this.failCount++;
    }
  }

  finish(durationMs: number): BatchResult {
    return {
      results: [...this.results],
      totalInput: this.totalInput,
      totalOutput: this.totalOutput,
      totalReduction: calculateReduction(this.totalInput, this.totalOutput),
      successCount: this.successCount,
      failCount: this.failCount,
      durationMs,
    };
  }
}

async function settle(inputPath: string, compress: CompressFn): Promise<CompressionResult> {
  try {
    return await compress(inputPath);
  } catch (err) {
    const draft = { inputPath, outputPath: "", inputSize: 0, outputSize: 0, width: 0, height: 0 };
    return failedResult(draft, toCompressionError(err, "encode-failed", inputPath, "compression failed"));
  }
}

function notify(sink: ProgressSink | undefined, result: CompressionResult): void {
  if (!sink) return;
  try {
    sink(result);
  } catch (err) {
    console.warn(`Warning: progress sink failed for ${result.inputPath}: ${describeError(err)}`);
  }
}

/**
 * Compresses every path with at most four files in flight. Each path yields
 * exactly one result, pushed to `onProgress` as it completes; one failure never
 * stops the others.
 */
export async function runBatch(
  paths: readonly string[],
  compress: CompressFn,
  options: BatchRunOptions = {},
): Promise<BatchResult> {
  const startTime = Date.now();
  const concurrency = Math.max(1, Math.min(options.concurrency ?? MAX_CONCURRENT_COMPRESSIONS, MAX_CONCURRENT_COMPRESSIONS));
  const limit = pLimit(concurrency);
  const accumulator = new BatchAccumulator();

  await Promise.all(
    paths.map((inputPath) =>
      limit(async () => {
        const result = await settle(inputPath, compress);
        accumulator.add(result);
        notify(options.onProgress, result);
      }),
    ),
  );

  return accumulator.finish(Date.now() - startTime);
}
