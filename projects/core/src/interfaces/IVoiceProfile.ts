/**
 * A reference audio sample as recorded in a voice profile.
 * Format fields describe the source file; duration is measured after normalization.
 */
export interface AudioSampleRef {
  readonly path: string;
  readonly durationSec: number;
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitDepth: number;
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface VoiceProfile {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly samples: readonly AudioSampleRef[];
  /** Sum of the valid samples' normalized durations */
  readonly totalDurationSec: number;
  readonly language: string;
  readonly referenceText?: string;
  /** ISO-8601 */
  readonly createdAt: string;
  /** ISO-8601 */
  readonly updatedAt: string;
}

export interface VoiceProfileSummary {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly language: string;
  readonly sampleCount: number;
  readonly validSampleCount: number;
  readonly totalDurationSec: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function validSamples(profile: VoiceProfile): readonly AudioSampleRef[] {
  return profile.samples.filter((sample) => sample.isValid);
}

export function summarizeProfile(profile: VoiceProfile): VoiceProfileSummary {
  return {
    id: profile.id,
    name: profile.name,
    ...(profile.description !== undefined ? { description: profile.description } : {}),
    language: profile.language,
    sampleCount: profile.samples.length,
    validSampleCount: validSamples(profile).length,
    totalDurationSec: profile.totalDurationSec,
    createdAt: profile.createdAt,
    updatedAt: profile.updatedAt,
  };
}
