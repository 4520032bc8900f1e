/**
 * Construction and checks for engine capability descriptors.
 * Shared by single and batch generation so both apply identical rules.
 */

import {
  InvalidParameterError,
  ProfileIncompatibleError,
  TextTooLongError,
} from "../../errors/GenerationError.js";
import type {
  CapabilityDescriptor,
  GenerationMode,
  ParameterRange,
} from "../../interfaces/IEngine.js";
import type { VoiceProfile } from "../../interfaces/IVoiceProfile.js";
import type { CapabilityOverrides } from "../../config/StudioConfig.js";

export const DEFAULT_TEMPERATURE_RANGE: ParameterRange = { min: 0.5, max: 1.0, default: 0.75 };
export const DEFAULT_SPEED_RANGE: ParameterRange = { min: 0.8, max: 1.2, default: 1.0 };

export interface CapabilityDescriptorInput {
  readonly maxTextLength: number;
  readonly recommendedTextLength: number;
  readonly supportsStreaming?: boolean;
  readonly minSampleDuration?: number;
  readonly maxSampleDuration?: number;
  readonly temperature?: ParameterRange;
  readonly speed?: ParameterRange;
  readonly supportedModes?: readonly GenerationMode[];
  readonly supportedLanguages?: readonly string[];
}

function assertRange(name: string, range: ParameterRange): void {
  if (!(range.min <= range.default && range.default <= range.max)) {
    throw new RangeError(
      `${name} range is inconsistent: min=${range.min}, default=${range.default}, max=${range.max}`
    );
  }
}

/**
 * Builds a frozen descriptor.
 * @throws {RangeError} If the limits contradict each other
 */
export function createCapabilityDescriptor(
  input: Readonly<CapabilityDescriptorInput>
): CapabilityDescriptor {
  const minSampleDuration = input.minSampleDuration ?? 3;
  const maxSampleDuration = input.maxSampleDuration ?? 30;
  const temperature = input.temperature ?? DEFAULT_TEMPERATURE_RANGE;
  const speed = input.speed ?? DEFAULT_SPEED_RANGE;
  const supportedModes = input.supportedModes ?? ["clone"];

  if (!Number.isInteger(input.maxTextLength) || input.maxTextLength <= 0) {
    throw new RangeError(`maxTextLength must be a positive integer, got ${input.maxTextLength}`);
  }
  if (input.recommendedTextLength <= 0 || input.recommendedTextLength > input.maxTextLength) {
    throw new RangeError(
      `recommendedTextLength (${input.recommendedTextLength}) must be between 1 and maxTextLength (${input.maxTextLength})`
    );
  }
  if (minSampleDuration < 0 || minSampleDuration > maxSampleDuration) {
    throw new RangeError(
      `Sample duration bounds are inconsistent: ${minSampleDuration}s to ${maxSampleDuration}s`
    );
  }
  assertRange("temperature", temperature);
  assertRange("speed", speed);
  if (supportedModes.length === 0) {
    throw new RangeError("An engine must support at least one generation mode");
  }

  return Object.freeze({
    maxTextLength: input.maxTextLength,
    recommendedTextLength: input.recommendedTextLength,
    supportsStreaming: input.supportsStreaming ?? false,
    minSampleDuration,
    maxSampleDuration,
    parameters: Object.freeze({
      temperature: Object.freeze({ ...temperature }),
      speed: Object.freeze({ ...speed }),
    }),
    supportedModes: Object.freeze([...supportedModes]),
    supportedLanguages: Object.freeze([...(input.supportedLanguages ?? [])]),
  });
}

/**
 * Applies configured overrides on top of an adapter's own declaration.
 */
export function applyCapabilityOverrides(
  base: Readonly<CapabilityDescriptorInput>,
  overrides: Readonly<CapabilityOverrides> | undefined
): CapabilityDescriptor {
  return createCapabilityDescriptor({ ...base, ...overrides });
}

/**
 * Length in Unicode code points, so astral characters count once.
 */
export function textLength(text: string): number {
  return Array.from(text).length;
}

export interface QualityWarning {
  readonly kind: "text_exceeds_recommended_length";
  readonly actual: number;
  readonly recommended: number;
  readonly message: string;
}

export type TextLengthCheck =
  | { readonly status: "ok"; readonly length: number }
  | { readonly status: "warning"; readonly length: number; readonly warning: QualityWarning };

/**
 * Hard limit rejects, soft limit warns.
 * @throws {TextTooLongError} When the text exceeds maxTextLength
 */
export function checkTextLength(
  text: string,
  capabilities: Readonly<CapabilityDescriptor>
): TextLengthCheck {
  const length = textLength(text);

  if (length > capabilities.maxTextLength) {
    throw new TextTooLongError(length, capabilities.maxTextLength);
  }

  if (length > capabilities.recommendedTextLength) {
    return {
      status: "warning",
      length,
      warning: {
        kind: "text_exceeds_recommended_length",
        actual: length,
        recommended: capabilities.recommendedTextLength,
        message: `Text has ${length} characters; quality may degrade above ${capabilities.recommendedTextLength}`,
      },
    };
  }

  return { status: "ok", length };
}

export type ParameterPolicy = "clamp" | "reject";

export interface ParameterAdjustment {
  readonly parameter: "temperature" | "speed";
  readonly requested: number;
  readonly applied: number;
}

export interface ResolvedParameterValue {
  readonly value: number;
  readonly adjustment?: ParameterAdjustment;
}

/**
 * Resolves one numeric parameter against its declared range.
 * Missing values take the range default. Non-finite values are always rejected.
 * @throws {InvalidParameterError}
 */
export function resolveParameter(
  parameter: "temperature" | "speed",
  requested: number | undefined,
  range: Readonly<ParameterRange>,
  policy: ParameterPolicy
): ResolvedParameterValue {
  if (requested === undefined) {
    return { value: range.default };
  }
  if (!Number.isFinite(requested)) {
    throw new InvalidParameterError(parameter, requested, range.min, range.max);
  }
  if (requested >= range.min && requested <= range.max) {
    return { value: requested };
  }
  if (policy === "reject") {
    throw new InvalidParameterError(parameter, requested, range.min, range.max);
  }

  const applied = Math.min(range.max, Math.max(range.min, requested));
  return { value: applied, adjustment: { parameter, requested, applied } };
}

/**
 * Checks a profile's valid samples against the engine's duration bounds.
 * @throws {ProfileIncompatibleError}
 */
export function checkProfileCompatibility(
  profile: Readonly<VoiceProfile>,
  capabilities: Readonly<CapabilityDescriptor>
): void {
  const usable = profile.samples.filter((sample) => sample.isValid);
  if (usable.length === 0) {
    throw new ProfileIncompatibleError(profile.id, ["profile has no valid samples"]);
  }

  const problems: string[] = [];
  for (const sample of usable) {
    if (sample.durationSec < capabilities.minSampleDuration) {
      problems.push(
        `${sample.path} is ${sample.durationSec.toFixed(2)}s (engine minimum ${capabilities.minSampleDuration}s)`
      );
    } else if (sample.durationSec > capabilities.maxSampleDuration) {
      problems.push(
        `${sample.path} is ${sample.durationSec.toFixed(2)}s (engine maximum ${capabilities.maxSampleDuration}s)`
      );
    }
  }

  if (problems.length > 0) {
    throw new ProfileIncompatibleError(profile.id, problems);
  }
}
