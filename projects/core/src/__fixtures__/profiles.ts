import type { AudioSampleRef, VoiceProfile } from "../interfaces/IVoiceProfile.js";

export function makeSample(path: string, durationSec: number, isValid: boolean = true): AudioSampleRef {
  return {
    path,
    durationSec,
    sampleRate: 24000,
    channels: 1,
    bitDepth: 16,
    isValid,
    errors: isValid ? [] : ["invalid"],
    warnings: [],
  };
}

export function makeProfile(overrides?: Partial<VoiceProfile>): VoiceProfile {
  const samples = overrides?.samples ?? [makeSample("/samples/narrator-1.wav", 8)];
  return {
    id: "profile-narrator",
    name: "Narrator",
    samples,
    totalDurationSec: samples
      .filter((sample) => sample.isValid)
      .reduce((sum, sample) => sum + sample.durationSec, 0),
    language: "es",
    createdAt: "2026-01-05T10:00:00.000Z",
    updatedAt: "2026-01-05T10:00:00.000Z",
    ...overrides,
  };
}
