import type { AudioArtifact } from "./IAudioCodec.js";
import type { VoiceProfile } from "./IVoiceProfile.js";

export const GENERATION_MODES = ["clone", "custom", "design"] as const;
export type GenerationMode = (typeof GENERATION_MODES)[number];

export interface ParameterRange {
  readonly min: number;
  readonly max: number;
  readonly default: number;
}

/**
 * Static facts an engine declares about itself. Frozen on construction.
 */
export interface CapabilityDescriptor {
  /** Hard ceiling: longer texts are rejected before dispatch */
  readonly maxTextLength: number;
  /** Soft ceiling: longer texts are generated with a quality warning */
  readonly recommendedTextLength: number;
  readonly supportsStreaming: boolean;
  readonly minSampleDuration: number;
  readonly maxSampleDuration: number;
  readonly parameters: {
    readonly temperature: ParameterRange;
    readonly speed: ParameterRange;
  };
  readonly supportedModes: readonly GenerationMode[];
  readonly supportedLanguages: readonly string[];
}

/**
 * Parameters after validation, exactly as handed to the engine.
 */
export interface ResolvedParameters {
  readonly temperature: number;
  readonly speed: number;
  readonly language: string;
  readonly mode: GenerationMode;
}

export interface EngineGenerateRequest {
  readonly text: string;
  readonly profile: VoiceProfile;
  readonly parameters: ResolvedParameters;
}

export interface EngineGenerateOptions {
  readonly signal?: AbortSignal;
}

export interface IEngine {
  readonly name: string;
  readonly isReady: boolean;
  describeCapabilities(): CapabilityDescriptor;
  /** Loads the model. May be slow; callers go through EngineRunner. */
  initialize(): Promise<void>;
  generate(
    request: Readonly<EngineGenerateRequest>,
    options?: Readonly<EngineGenerateOptions>
  ): Promise<AudioArtifact>;
  dispose(): Promise<void>;
}
