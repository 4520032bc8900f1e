/**
 * Error codes for audio codec errors.
 * Using unique string codes for programmatic identification.
 */
export const CodecErrorCode = {
  UNSUPPORTED_FORMAT: "CODEC_001",
  CORRUPT_FILE: "CODEC_002",
  IO_FAILURE: "CODEC_003",
} as const;

export type CodecErrorCodeType =
  (typeof CodecErrorCode)[keyof typeof CodecErrorCode];

/**
 * Base error class for audio decoding and encoding errors.
 * `path` is set when the error concerns a file on disk.
 */
export class CodecError extends Error {
  readonly code: CodecErrorCodeType;

  constructor(
    code: CodecErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = "CodecError";
  }

  get path(): string | undefined {
    const path = this.context?.["path"];
    return typeof path === "string" ? path : undefined;
  }
}

export class UnsupportedFormatError extends CodecError {
  constructor(reason: string, path?: string) {
    super(
      CodecErrorCode.UNSUPPORTED_FORMAT,
      `Unsupported audio format${path ? ` in ${path}` : ""}: ${reason}`,
      { reason, path }
    );
    this.name = "UnsupportedFormatError";
  }
}

export class CorruptFileError extends CodecError {
  constructor(reason: string, path?: string) {
    super(
      CodecErrorCode.CORRUPT_FILE,
      `Corrupt audio file${path ? ` ${path}` : ""}: ${reason}`,
      { reason, path }
    );
    this.name = "CorruptFileError";
  }
}

export class CodecIoError extends CodecError {
  constructor(operation: "read" | "write", path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      CodecErrorCode.IO_FAILURE,
      `Failed to ${operation} audio file ${path}: ${reason}`,
      { operation, path, reason },
      { cause }
    );
    this.name = "IoFailureError";
  }
}

/**
 * Attaches a file path to a codec error raised while parsing an in-memory buffer.
 */
export function withCodecPath(error: CodecError, path: string): CodecError {
  if (error.path !== undefined) {
    return error;
  }
  const reason = error.context?.["reason"];
  const detail = typeof reason === "string" ? reason : error.message;
  if (error instanceof UnsupportedFormatError) {
    return new UnsupportedFormatError(detail, path);
  }
  if (error instanceof CorruptFileError) {
    return new CorruptFileError(detail, path);
  }
  return error;
}
