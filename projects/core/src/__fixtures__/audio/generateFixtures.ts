/**
 * Synthetic WAV fixtures for codec and profile tests.
 * Files are written into per-test temporary directories, never into the repo.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface ToneWavOptions {
  readonly durationSec: number;
  /** Default: 24000 */
  readonly sampleRate?: number;
  /** Default: 1 */
  readonly channels?: number;
  /** 8, 16, 24 or 32 (integer PCM). Default: 16 */
  readonly bitDepth?: 8 | 16 | 24 | 32;
  /** Peak of the sine wave. Default: 0.5 */
  readonly amplitude?: number;
  /** Default: 220 */
  readonly frequencyHz?: number;
}

/**
 * Generates a sine tone at the given rate.
 */
export function generateTone(
  durationSec: number,
  sampleRate: number,
  amplitude: number = 0.5,
  frequencyHz: number = 220
): Float32Array {
  const numSamples = Math.round(durationSec * sampleRate);
  const samples = new Float32Array(numSamples);

  for (let i = 0; i < numSamples; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequencyHz * i) / sampleRate);
  }

  return samples;
}

function writeAscii(view: DataView, offset: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

function writeSample(view: DataView, offset: number, value: number, bitDepth: number): void {
  const clamped = Math.max(-1, Math.min(1, value));
  switch (bitDepth) {
    case 8:
      view.setUint8(offset, Math.round(clamped * 127) + 128);
      break;
    case 16:
      view.setInt16(offset, Math.round(clamped * 32767), true);
      break;
    case 24: {
      const int = Math.round(clamped * 8388607);
      view.setUint8(offset, int & 0xff);
      view.setUint8(offset + 1, (int >> 8) & 0xff);
      view.setUint8(offset + 2, (int >> 16) & 0xff);
      break;
    }
    default:
      view.setInt32(offset, Math.round(clamped * 2147483647), true);
  }
}

/**
 * Builds an integer-PCM WAV buffer holding the same tone on every channel.
 */
export function buildToneWav(options: Readonly<ToneWavOptions>): Uint8Array {
  const sampleRate = options.sampleRate ?? 24000;
  const channels = options.channels ?? 1;
  const bitDepth = options.bitDepth ?? 16;
  const tone = generateTone(
    options.durationSec,
    sampleRate,
    options.amplitude ?? 0.5,
    options.frequencyHz ?? 220
  );

  const bytesPerSample = bitDepth / 8;
  const dataLength = tone.length * channels * bytesPerSample;
  const buffer = new ArrayBuffer(44 + dataLength);
  const view = new DataView(buffer);

  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataLength, true);
  writeAscii(view, 8, "WAVE");
  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, channels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * channels * bytesPerSample, true);
  view.setUint16(32, channels * bytesPerSample, true);
  view.setUint16(34, bitDepth, true);
  writeAscii(view, 36, "data");
  view.setUint32(40, dataLength, true);

  for (let i = 0; i < tone.length; i++) {
    for (let ch = 0; ch < channels; ch++) {
      const offset = 44 + (i * channels + ch) * bytesPerSample;
      writeSample(view, offset, tone[i] ?? 0, bitDepth);
    }
  }

  return new Uint8Array(buffer);
}

export async function writeToneWav(
  dir: string,
  fileName: string,
  options: Readonly<ToneWavOptions>
): Promise<string> {
  const path = join(dir, fileName);
  await writeFile(path, buildToneWav(options));
  return path;
}

export async function createTempDir(prefix: string = "voice-studio-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
