/**
 * WAV decoding, encoding and resampling used by the audio codec.
 */

export {
  resampleLinear,
  changePlaybackRate,
  SPEAKER_ENCODER_SAMPLE_RATE,
  type ResampleOptions,
} from "./AudioResampler.js";

export {
  int16ToFloat32,
  float32ToInt16,
  downmixToMono,
  peakAmplitude,
  parseWavHeader,
  decodeWav,
  encodeWav,
  wavDurationSec,
  type WavHeader,
  type DecodedWav,
} from "./AudioConverter.js";

export {
  WavAudioCodec,
  createWavAudioCodec,
  DEFAULT_TARGET_SAMPLE_RATE,
  type WavAudioCodecOptions,
} from "./WavAudioCodec.js";
