import type { IAudioCodec } from "../../interfaces/IAudioCodec.js";
import { validSamples, type VoiceProfile } from "../../interfaces/IVoiceProfile.js";

export interface ReferenceAudio {
  readonly samples: Float32Array;
  readonly sampleRate: number;
  readonly durationSec: number;
}

/**
 * Normalizes a profile's valid samples and joins them, in profile order,
 * into one mono clip at the codec's target rate.
 */
export async function loadReferenceAudio(
  profile: Readonly<VoiceProfile>,
  codec: IAudioCodec
): Promise<ReferenceAudio> {
  const clips: Float32Array[] = [];
  for (const sample of validSamples(profile)) {
    const normalized = await codec.normalize(sample.path);
    clips.push(normalized.samples);
  }

  const length = clips.reduce((sum, clip) => sum + clip.length, 0);
  const samples = new Float32Array(length);
  let offset = 0;
  for (const clip of clips) {
    samples.set(clip, offset);
    offset += clip.length;
  }

  return {
    samples,
    sampleRate: codec.targetSampleRate,
    durationSec: length / codec.targetSampleRate,
  };
}

export function embeddingCacheKey(profile: Readonly<VoiceProfile>): string {
  return `${profile.id}@${profile.updatedAt}`;
}
