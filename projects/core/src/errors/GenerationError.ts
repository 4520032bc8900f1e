/**
 * Error codes for generation errors.
 * Using unique string codes for programmatic identification.
 */
export const GenerationErrorCode = {
  PROFILE_NOT_FOUND: "GEN_001",
  TEXT_TOO_LONG: "GEN_002",
  INVALID_PARAMETER: "GEN_003",
  ENGINE_FAILURE: "GEN_004",
  TIMEOUT: "GEN_005",
  CANCELLED: "GEN_006",
  EMPTY_TEXT: "GEN_007",
  UNSUPPORTED_MODE: "GEN_008",
  PROFILE_INCOMPATIBLE: "GEN_009",
  SCRIPT_READ_FAILED: "GEN_010",
  UNSUPPORTED_LANGUAGE: "GEN_011",
} as const;

export type GenerationErrorCodeType =
  (typeof GenerationErrorCode)[keyof typeof GenerationErrorCode];

/**
 * Base error class for single-request generation failures.
 * Every failure is terminal for its request.
 */
export class GenerationError extends Error {
  readonly code: GenerationErrorCodeType;

  constructor(
    code: GenerationErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = "GenerationError";
  }
}

export class GenerationProfileNotFoundError extends GenerationError {
  constructor(public readonly profileId: string) {
    super(
      GenerationErrorCode.PROFILE_NOT_FOUND,
      `Voice profile not found: ${profileId}`,
      { profileId }
    );
    this.name = "ProfileNotFoundError";
  }
}

/**
 * Error thrown when text exceeds the engine's hard length ceiling.
 * The text is never truncated.
 */
export class TextTooLongError extends GenerationError {
  constructor(
    public readonly actual: number,
    public readonly max: number
  ) {
    super(
      GenerationErrorCode.TEXT_TOO_LONG,
      `Text too long: ${actual} characters (maximum ${max})`,
      { actual, max }
    );
    this.name = "TextTooLongError";
  }
}

export class InvalidParameterError extends GenerationError {
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    public readonly min?: number,
    public readonly max?: number
  ) {
    const range =
      min !== undefined && max !== undefined ? ` (allowed ${min} to ${max})` : "";
    super(
      GenerationErrorCode.INVALID_PARAMETER,
      `Invalid value for ${parameter}: ${String(value)}${range}`,
      { parameter, value, min, max }
    );
    this.name = "InvalidParameterError";
  }
}

/**
 * Error thrown when the engine itself fails. The original error is kept as `cause`.
 */
export class EngineFailureError extends GenerationError {
  constructor(
    public readonly engine: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(
      GenerationErrorCode.ENGINE_FAILURE,
      `Engine ${engine} failed: ${reason}`,
      { engine, reason },
      { cause }
    );
    this.name = "EngineFailureError";
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(
    public readonly engine: string,
    public readonly timeoutMs: number
  ) {
    super(
      GenerationErrorCode.TIMEOUT,
      `Generation on ${engine} timed out after ${timeoutMs}ms`,
      { engine, timeoutMs }
    );
    this.name = "TimeoutError";
  }
}

export class GenerationCancelledError extends GenerationError {
  constructor(public readonly engine: string) {
    super(GenerationErrorCode.CANCELLED, `Generation on ${engine} was cancelled`, {
      engine,
    });
    this.name = "CancelledError";
  }
}

export class EmptyTextError extends GenerationError {
  constructor() {
    super(GenerationErrorCode.EMPTY_TEXT, "Text cannot be empty");
    this.name = "EmptyTextError";
  }
}

export class UnsupportedModeError extends GenerationError {
  constructor(
    public readonly mode: string,
    public readonly supportedModes: readonly string[]
  ) {
    super(
      GenerationErrorCode.UNSUPPORTED_MODE,
      `Unsupported generation mode: ${mode}. Supported modes: ${supportedModes.join(", ")}`,
      { mode, supportedModes }
    );
    this.name = "UnsupportedModeError";
  }
}

export class GenerationUnsupportedLanguageError extends GenerationError {
  constructor(
    public readonly language: string,
    public readonly supportedLanguages: readonly string[]
  ) {
    super(
      GenerationErrorCode.UNSUPPORTED_LANGUAGE,
      `Unsupported language: ${language}. Supported languages: ${supportedLanguages.join(", ")}`,
      { language, supportedLanguages }
    );
    this.name = "UnsupportedLanguageError";
  }
}

/**
 * Error thrown when a profile's samples fall outside the engine's duration bounds.
 */
export class ProfileIncompatibleError extends GenerationError {
  constructor(
    public readonly profileId: string,
    public readonly problems: readonly string[]
  ) {
    super(
      GenerationErrorCode.PROFILE_INCOMPATIBLE,
      `Voice profile ${profileId} is not compatible with this engine: ${problems.join("; ")}`,
      { profileId, problems }
    );
    this.name = "ProfileIncompatibleError";
  }
}

/**
 * Error thrown when a batch script file cannot be read.
 */
export class ScriptReadError extends GenerationError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      GenerationErrorCode.SCRIPT_READ_FAILED,
      `Failed to read script ${path}: ${reason}`,
      { path, reason },
      { cause }
    );
    this.name = "ScriptReadError";
  }
}
