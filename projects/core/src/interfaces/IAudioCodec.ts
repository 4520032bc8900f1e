/**
 * Format facts read from an audio file without converting it.
 */
export interface AudioProbe {
  readonly path: string;
  readonly durationSec: number;
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitDepth: number;
  /** Largest absolute sample value, 0..1 */
  readonly peakAmplitude: number;
}

/**
 * Canonical PCM: mono, float samples in [-1, 1] at the codec's target rate.
 * Written to disk as 16-bit.
 */
export interface NormalizedAudio {
  readonly samples: Float32Array;
  readonly sampleRate: number;
  readonly channels: 1;
  readonly bitDepth: 16;
  readonly durationSec: number;
}

export interface AudioArtifact {
  readonly samples: Float32Array;
  readonly sampleRate: number;
}

export interface WrittenAudio {
  readonly path: string;
  readonly durationSec: number;
  readonly bytes: number;
}

export interface IAudioCodec {
  /** Canonical sample rate produced by normalize() */
  readonly targetSampleRate: number;
  probe(path: string): Promise<AudioProbe>;
  normalize(path: string): Promise<NormalizedAudio>;
  write(path: string, artifact: Readonly<AudioArtifact>): Promise<WrittenAudio>;
}
