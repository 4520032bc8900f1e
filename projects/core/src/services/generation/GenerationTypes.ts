import type { GenerationMode, ResolvedParameters } from "../../interfaces/IEngine.js";
import type {
  ParameterAdjustment,
  QualityWarning,
} from "../engine/CapabilityDescriptor.js";

/**
 * One synthesis request. Consumed once; never persisted.
 */
export interface GenerationRequest {
  readonly profileId: string;
  readonly text: string;
  readonly temperature?: number;
  readonly speed?: number;
  /** Defaults to the profile's language */
  readonly language?: string;
  /** Default: "clone" */
  readonly mode?: GenerationMode;
}

export interface GenerateOptions {
  /** Defaults to "<outputs>/<profileId>_<timestamp>.wav" */
  readonly outputPath?: string;
  readonly signal?: AbortSignal;
}

export interface GenerationResult {
  readonly id: string;
  readonly status: "success";
  readonly profileId: string;
  readonly text: string;
  readonly textLength: number;
  readonly outputPath: string;
  /** Measured from the produced samples */
  readonly durationSec: number;
  readonly sampleRate: number;
  readonly generationTimeMs: number;
  readonly parameters: ResolvedParameters;
  readonly parameterAdjustments: readonly ParameterAdjustment[];
  readonly qualityWarning?: QualityWarning;
  readonly engine: string;
  /** ISO-8601 */
  readonly createdAt: string;
}
