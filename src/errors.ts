export type ErrorCategory = "resolution" | "io" | "codec";

export type CompressionErrorKind =
  | "unsupported-format"
  | "input-unreadable"
  | "output-dir-failed"
  | "output-conflict"
  | "write-failed"
  | "decode-failed"
  | "encode-failed";

const CATEGORIES: Record<CompressionErrorKind, ErrorCategory> = {
  "unsupported-format": "resolution",
  "input-unreadable": "io",
  "output-dir-failed": "io",
  "output-conflict": "io",
  "write-failed": "io",
  "decode-failed": "codec",
  "encode-failed": "codec",
};

export class CompressionError extends Error {
  readonly kind: CompressionErrorKind;
  readonly path: string;

  constructor(kind: CompressionErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompressionError";
    this.kind = kind;
    this.path = path;
  }

  get category(): ErrorCategory {
    return CATEGORIES[this.kind];
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wraps anything thrown by a pipeline step, keeping an existing CompressionError as is. */
export function toCompressionError(err: unknown, kind: CompressionErrorKind, path: string, prefix: string): CompressionError {
  if (err instanceof CompressionError) {
    return err;
  }
  return new CompressionError(kind, path, `${prefix}: ${describeError(err)}`, { cause: err });
}

/** Runs one pipeline step, tagging whatever it throws with the step's error kind. */
export async function attempt<T>(kind: CompressionErrorKind, path: string, prefix: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw toCompressionError(err, kind, path, prefix);
  }
}
