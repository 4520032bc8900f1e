/**
 * Error codes for engine adapter errors.
 * Using unique string codes for programmatic identification.
 */
export const EngineErrorCode = {
  NOT_INITIALIZED: "ENGINE_001",
  SYNTHESIS_FAILED: "ENGINE_002",
  UNSUPPORTED_LANGUAGE: "ENGINE_003",
  SERVER_UNAVAILABLE: "ENGINE_004",
  EMBEDDING_EXTRACTION_FAILED: "ENGINE_005",
  NETWORK_ERROR: "ENGINE_006",
  MODEL_LOAD_FAILED: "ENGINE_007",
  INVALID_RESPONSE: "ENGINE_008",
} as const;

export type EngineErrorCodeType =
  (typeof EngineErrorCode)[keyof typeof EngineErrorCode];

/**
 * Base error class for failures raised inside an engine adapter.
 * The generation layer wraps these into EngineFailureError.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCodeType;

  constructor(
    code: EngineErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = "EngineError";
  }
}

export class EngineNotInitializedError extends EngineError {
  constructor(engineName: string) {
    super(
      EngineErrorCode.NOT_INITIALIZED,
      `${engineName} not initialized. Call initialize() first.`,
      { engineName }
    );
    this.name = "EngineNotInitializedError";
  }
}

export class SynthesisFailedError extends EngineError {
  constructor(reason: string, text?: string) {
    super(EngineErrorCode.SYNTHESIS_FAILED, `Speech synthesis failed: ${reason}`, {
      reason,
      text,
    });
    this.name = "SynthesisFailedError";
  }
}

export class UnsupportedLanguageError extends EngineError {
  constructor(
    public readonly language: string,
    public readonly supportedLanguages: readonly string[]
  ) {
    super(
      EngineErrorCode.UNSUPPORTED_LANGUAGE,
      `Unsupported language: ${language}. Supported languages: ${supportedLanguages.join(", ")}`,
      { language, supportedLanguages }
    );
    this.name = "UnsupportedLanguageError";
  }
}

/**
 * Error thrown when the XTTS server is unavailable.
 */
export class XTTSServerUnavailableError extends EngineError {
  constructor(serverUrl: string, reason?: string) {
    super(
      EngineErrorCode.SERVER_UNAVAILABLE,
      `XTTS server unavailable at ${serverUrl}${reason ? `: ${reason}` : ""}`,
      { serverUrl, reason }
    );
    this.name = "XTTSServerUnavailableError";
  }
}

export class EmbeddingExtractionError extends EngineError {
  constructor(reason: string, cause?: unknown) {
    super(
      EngineErrorCode.EMBEDDING_EXTRACTION_FAILED,
      `Speaker embedding extraction failed: ${reason}`,
      { reason },
      { cause }
    );
    this.name = "EmbeddingExtractionError";
  }
}

export class EngineNetworkError extends EngineError {
  constructor(operation: string, cause?: string) {
    super(
      EngineErrorCode.NETWORK_ERROR,
      `Network error during ${operation}${cause ? `: ${cause}` : ""}`,
      { operation, cause }
    );
    this.name = "EngineNetworkError";
  }
}

export class ModelLoadError extends EngineError {
  constructor(modelId: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      EngineErrorCode.MODEL_LOAD_FAILED,
      `Failed to load model ${modelId}: ${reason}`,
      { modelId, reason },
      { cause }
    );
    this.name = "ModelLoadError";
  }
}

export class InvalidEngineResponseError extends EngineError {
  constructor(endpoint: string, reason: string) {
    super(
      EngineErrorCode.INVALID_RESPONSE,
      `Invalid response from ${endpoint}: ${reason}`,
      { endpoint, reason }
    );
    this.name = "InvalidEngineResponseError";
  }
}
