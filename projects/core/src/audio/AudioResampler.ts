/**
 * Sample rate conversion by linear interpolation.
 */

export interface ResampleOptions {
  readonly inputSampleRate: number;
  readonly outputSampleRate: number;
}

export function resampleLinear(
  samples: Float32Array,
  options: Readonly<ResampleOptions>
): Float32Array {
  const { inputSampleRate, outputSampleRate } = options;

  if (inputSampleRate <= 0 || outputSampleRate <= 0) {
    throw new RangeError("Sample rates must be positive");
  }

  if (inputSampleRate === outputSampleRate) {
    return samples;
  }

  const ratio = inputSampleRate / outputSampleRate;
  const outputLength = Math.floor(samples.length / ratio);
  const result = new Float32Array(outputLength);

  for (let i = 0; i < outputLength; i++) {
    const srcPosition = i * ratio;
    const srcIndex = Math.floor(srcPosition);
    const fraction = srcPosition - srcIndex;

    const sample0 = samples[srcIndex] ?? 0;
    const sample1 = samples[Math.min(srcIndex + 1, samples.length - 1)] ?? 0;

    result[i] = sample0 + fraction * (sample1 - sample0);
  }

  return result;
}

/**
 * Changes playback rate by resampling while keeping the declared sample rate.
 * rate > 1 shortens the audio (and raises pitch).
 */
export function changePlaybackRate(samples: Float32Array, rate: number): Float32Array {
  if (rate <= 0 || !Number.isFinite(rate)) {
    throw new RangeError(`Playback rate must be a positive number, got ${rate}`);
  }
  if (rate === 1) {
    return samples;
  }
  return resampleLinear(samples, {
    inputSampleRate: Math.round(10000 * rate),
    outputSampleRate: 10000,
  });
}

/**
 * Sample rate expected by x-vector speaker encoders.
 */
export const SPEAKER_ENCODER_SAMPLE_RATE = 16000;
