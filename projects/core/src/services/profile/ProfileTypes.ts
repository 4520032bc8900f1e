export interface SampleMetadata {
  /** Duration after normalization */
  readonly durationSec: number;
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitDepth: number;
  readonly peakAmplitude: number;
}

export interface SampleValidation {
  readonly path: string;
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  /** Absent when the file could not be decoded */
  readonly metadata?: SampleMetadata;
}

/**
 * Per-sample findings in input order.
 */
export interface ValidationReport {
  readonly samples: readonly SampleValidation[];
  readonly allValid: boolean;
  readonly validCount: number;
  readonly invalidCount: number;
  /** Sum over valid samples only */
  readonly totalDurationSec: number;
}

export interface CreateProfileInput {
  readonly name: string;
  readonly samplePaths: readonly string[];
  /** Defaults to the configured profile language */
  readonly language?: string;
  readonly referenceText?: string;
  readonly description?: string;
}

export interface ProfileMetadataUpdate {
  readonly name?: string;
  readonly description?: string;
}
