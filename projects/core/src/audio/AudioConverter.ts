/**
 * WAV parsing and PCM conversion.
 * Decoding accepts integer PCM (8/16/24/32-bit) and 32-bit IEEE float; encoding always writes 16-bit mono.
 */

import { CorruptFileError, UnsupportedFormatError } from "../errors/CodecError.js";

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface WavHeader {
  readonly audioFormat: "pcm" | "float";
  readonly sampleRate: number;
  readonly numChannels: number;
  readonly bitsPerSample: number;
  readonly dataOffset: number;
  readonly dataLength: number;
}

export interface DecodedWav {
  readonly header: WavHeader;
  /** Interleaved samples in [-1, 1] */
  readonly interleaved: Float32Array;
}

/**
 * Converts signed 16-bit PCM samples to normalized Float32Array.
 */
export function int16ToFloat32(samples: Int16Array): Float32Array {
  const result = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    result[i] = (samples[i] ?? 0) / 32768;
  }
  return result;
}

/**
 * Converts normalized Float32Array to signed 16-bit PCM samples. Values are clamped.
 */
export function float32ToInt16(samples: Float32Array): Int16Array {
  const result = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i] ?? 0));
    result[i] = Math.round(clamped * 32767);
  }
  return result;
}

/**
 * Down-mixes interleaved multi-channel audio to mono by averaging channels.
 */
export function downmixToMono(samples: Float32Array, numChannels: number): Float32Array {
  if (numChannels === 1) {
    return samples;
  }

  const monoLength = Math.floor(samples.length / numChannels);
  const result = new Float32Array(monoLength);

  for (let i = 0; i < monoLength; i++) {
    let sum = 0;
    for (let ch = 0; ch < numChannels; ch++) {
      sum += samples[i * numChannels + ch] ?? 0;
    }
    result[i] = sum / numChannels;
  }

  return result;
}

export function peakAmplitude(samples: Float32Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const magnitude = Math.abs(samples[i] ?? 0);
    if (magnitude > peak) {
      peak = magnitude;
    }
  }
  return Math.min(1, peak);
}

interface ChunkLocation {
  readonly offset: number;
  readonly size: number;
}

function readChunkId(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}

/**
 * Walks the RIFF chunk list looking for `targetChunkId`. Chunks are word-aligned.
 */
function findChunk(
  view: DataView,
  startOffset: number,
  targetChunkId: string
): ChunkLocation | undefined {
  let offset = startOffset;

  while (offset + 8 <= view.byteLength) {
    const chunkId = readChunkId(view, offset);
    const chunkSize = view.getUint32(offset + 4, true);

    if (chunkId === targetChunkId) {
      return { offset: offset + 8, size: chunkSize };
    }

    offset += 8 + chunkSize + (chunkSize % 2);
  }

  return undefined;
}

/**
 * Parses and validates a WAV header.
 * @throws {UnsupportedFormatError} Not RIFF/WAVE, or an encoding this decoder does not handle
 * @throws {CorruptFileError} Missing or truncated chunks
 */
export function parseWavHeader(buffer: ArrayBuffer): WavHeader {
  const view = new DataView(buffer);

  if (view.byteLength < 12) {
    throw new CorruptFileError(`file is only ${view.byteLength} bytes`);
  }
  if (readChunkId(view, 0) !== "RIFF" || readChunkId(view, 8) !== "WAVE") {
    throw new UnsupportedFormatError("not a RIFF/WAVE file");
  }

  const fmt = findChunk(view, 12, "fmt ");
  if (!fmt || fmt.size < 16 || fmt.offset + 16 > view.byteLength) {
    throw new CorruptFileError("missing fmt chunk");
  }

  let formatTag = view.getUint16(fmt.offset, true);
  const numChannels = view.getUint16(fmt.offset + 2, true);
  const sampleRate = view.getUint32(fmt.offset + 4, true);
  const bitsPerSample = view.getUint16(fmt.offset + 14, true);

  // WAVE_FORMAT_EXTENSIBLE keeps the real format tag in the sub-format GUID
  if (formatTag === WAVE_FORMAT_EXTENSIBLE && fmt.size >= 26 && fmt.offset + 26 <= view.byteLength) {
    formatTag = view.getUint16(fmt.offset + 24, true);
  }

  let audioFormat: WavHeader["audioFormat"];
  if (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitsPerSample)) {
    audioFormat = "pcm";
  } else if (formatTag === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32) {
    audioFormat = "float";
  } else {
    throw new UnsupportedFormatError(
      `format tag ${formatTag} with ${bitsPerSample} bits per sample`
    );
  }

  if (numChannels === 0 || sampleRate === 0) {
    throw new CorruptFileError(
      `invalid fmt chunk (channels=${numChannels}, sampleRate=${sampleRate})`
    );
  }

  const data = findChunk(view, fmt.offset + fmt.size + (fmt.size % 2), "data");
  if (!data) {
    throw new CorruptFileError("missing data chunk");
  }
  if (data.offset + data.size > view.byteLength) {
    throw new CorruptFileError(
      `data chunk declares ${data.size} bytes but only ${view.byteLength - data.offset} are present`
    );
  }

  return {
    audioFormat,
    sampleRate,
    numChannels,
    bitsPerSample,
    dataOffset: data.offset,
    dataLength: data.size,
  };
}

export function wavDurationSec(header: WavHeader): number {
  const frameBytes = header.numChannels * (header.bitsPerSample / 8);
  return Math.floor(header.dataLength / frameBytes) / header.sampleRate;
}

function readSample(view: DataView, offset: number, header: WavHeader): number {
  if (header.audioFormat === "float") {
    return view.getFloat32(offset, true);
  }
  switch (header.bitsPerSample) {
    case 8:
      // 8-bit PCM is unsigned
      return (view.getUint8(offset) - 128) / 128;
    case 16:
      return view.getInt16(offset, true) / 32768;
    case 24: {
      const low = view.getUint16(offset, true);
      const high = view.getInt8(offset + 2);
      return ((high << 16) | low) / 8388608;
    }
    default:
      return view.getInt32(offset, true) / 2147483648;
  }
}

/**
 * Decodes every frame of a WAV buffer, keeping the original channel layout.
 */
export function decodeWav(buffer: ArrayBuffer): DecodedWav {
  const header = parseWavHeader(buffer);
  const view = new DataView(buffer);
  const bytesPerSample = header.bitsPerSample / 8;
  const frameCount = Math.floor(
    header.dataLength / (bytesPerSample * header.numChannels)
  );
  const total = frameCount * header.numChannels;
  const interleaved = new Float32Array(total);

  for (let i = 0; i < total; i++) {
    interleaved[i] = readSample(view, header.dataOffset + i * bytesPerSample, header);
  }

  return { header, interleaved };
}

/**
 * Encodes Float32Array samples into a 16-bit mono WAV file buffer.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): ArrayBuffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const bytesPerSample = bitsPerSample / 8;
  const dataLength = samples.length * bytesPerSample;
  const fileSize = 44 + dataLength;

  const buffer = new ArrayBuffer(fileSize);
  const view = new DataView(buffer);

  writeString(view, 0, "RIFF");
  view.setUint32(4, fileSize - 8, true);
  writeString(view, 8, "WAVE");

  writeString(view, 12, "fmt ");
  view.setUint32(16, 16, true); // chunk size
  view.setUint16(20, WAVE_FORMAT_PCM, true);
  view.setUint16(22, numChannels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * numChannels * bytesPerSample, true); // byte rate
  view.setUint16(32, numChannels * bytesPerSample, true); // block align
  view.setUint16(34, bitsPerSample, true);

  writeString(view, 36, "data");
  view.setUint32(40, dataLength, true);

  const int16Samples = float32ToInt16(samples);
  for (let i = 0; i < int16Samples.length; i++) {
    view.setInt16(44 + i * 2, int16Samples[i] ?? 0, true);
  }

  return buffer;
}

function writeString(view: DataView, offset: number, str: string): void {
  for (let i = 0; i < str.length; i++) {
    view.setUint8(offset + i, str.charCodeAt(i));
  }
}
