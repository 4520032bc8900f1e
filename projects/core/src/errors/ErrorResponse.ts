import { CodecError } from "./CodecError.js";
import { ConfigError } from "./ConfigError.js";
import { EngineError } from "./EngineError.js";
import { GenerationError } from "./GenerationError.js";
import { ProfileError } from "./ProfileError.js";

export type ErrorCategory =
  | "profile"
  | "generation"
  | "codec"
  | "engine"
  | "config"
  | "internal";

/**
 * Structured error returned across the API surface and stored in batch manifests.
 * Never carries stack traces.
 */
export interface ErrorResponse {
  readonly category: ErrorCategory;
  /** Variant name, e.g. "TextTooLong" */
  readonly kind: string;
  readonly code: string;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
}

type KnownError =
  | ProfileError
  | GenerationError
  | CodecError
  | EngineError
  | ConfigError;

function categorize(error: KnownError): ErrorCategory {
  if (error instanceof ProfileError) return "profile";
  if (error instanceof GenerationError) return "generation";
  if (error instanceof CodecError) return "codec";
  if (error instanceof EngineError) return "engine";
  return "config";
}

function isKnownError(error: unknown): error is KnownError {
  return (
    error instanceof ProfileError ||
    error instanceof GenerationError ||
    error instanceof CodecError ||
    error instanceof EngineError ||
    error instanceof ConfigError
  );
}

/**
 * Strips nested errors and typed arrays so details stay JSON-friendly.
 */
function sanitizeDetails(
  context: Readonly<Record<string, unknown>> | undefined
): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  if (!context) {
    return details;
  }
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || value instanceof Error || ArrayBuffer.isView(value)) {
      continue;
    }
    details[key] = value;
  }
  return details;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (isKnownError(error)) {
    return {
      category: categorize(error),
      kind: error.name.replace(/Error$/, ""),
      code: error.code,
      message: error.message,
      details: sanitizeDetails(error.context),
    };
  }

  return {
    category: "internal",
    kind: "Internal",
    code: "INTERNAL",
    message: "An unexpected internal error occurred",
    details: {},
  };
}
