import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import {
  CodecError,
  CodecIoError,
  withCodecPath,
} from "../errors/CodecError.js";
import type {
  AudioArtifact,
  AudioProbe,
  IAudioCodec,
  NormalizedAudio,
  WrittenAudio,
} from "../interfaces/IAudioCodec.js";
import {
  decodeWav,
  downmixToMono,
  encodeWav,
  peakAmplitude,
  wavDurationSec,
} from "./AudioConverter.js";
import { resampleLinear } from "./AudioResampler.js";

export interface WavAudioCodecOptions {
  /** Canonical rate for normalize(). Default: 24000 */
  readonly targetSampleRate?: number;
}

export const DEFAULT_TARGET_SAMPLE_RATE = 24000;

/**
 * AudioCodec for RIFF/WAVE files on the local filesystem.
 */
export class WavAudioCodec implements IAudioCodec {
  readonly targetSampleRate: number;

  constructor(options?: Readonly<WavAudioCodecOptions>) {
    this.targetSampleRate = options?.targetSampleRate ?? DEFAULT_TARGET_SAMPLE_RATE;
  }

  async probe(path: string): Promise<AudioProbe> {
    const buffer = await this.read(path);
    const { header, interleaved } = this.decode(buffer, path);

    return {
      path,
      durationSec: wavDurationSec(header),
      sampleRate: header.sampleRate,
      channels: header.numChannels,
      bitDepth: header.bitsPerSample,
      peakAmplitude: peakAmplitude(interleaved),
    };
  }

  async normalize(path: string): Promise<NormalizedAudio> {
    const buffer = await this.read(path);
    const { header, interleaved } = this.decode(buffer, path);

    const mono = downmixToMono(interleaved, header.numChannels);
    const samples = resampleLinear(mono, {
      inputSampleRate: header.sampleRate,
      outputSampleRate: this.targetSampleRate,
    });

    return {
      samples,
      sampleRate: this.targetSampleRate,
      channels: 1,
      bitDepth: 16,
      durationSec: samples.length / this.targetSampleRate,
    };
  }

  async write(path: string, artifact: Readonly<AudioArtifact>): Promise<WrittenAudio> {
    const wav = encodeWav(artifact.samples, artifact.sampleRate);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, new Uint8Array(wav));
    } catch (error) {
      throw new CodecIoError("write", path, error);
    }

    return {
      path,
      durationSec: artifact.samples.length / artifact.sampleRate,
      bytes: wav.byteLength,
    };
  }

  private async read(path: string): Promise<ArrayBuffer> {
    let contents: Buffer;
    try {
      contents = await readFile(path);
    } catch (error) {
      throw new CodecIoError("read", path, error);
    }
    // Copy out of Node's pooled buffer so DataView offsets start at 0
    const buffer = new ArrayBuffer(contents.byteLength);
    new Uint8Array(buffer).set(contents);
    return buffer;
  }

  private decode(buffer: ArrayBuffer, path: string): ReturnType<typeof decodeWav> {
    try {
      return decodeWav(buffer);
    } catch (error) {
      if (error instanceof CodecError) {
        throw withCodecPath(error, path);
      }
      throw error;
    }
  }
}

export function createWavAudioCodec(options?: Readonly<WavAudioCodecOptions>): WavAudioCodec {
  return new WavAudioCodec(options);
}
