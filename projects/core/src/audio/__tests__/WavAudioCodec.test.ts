import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { WavAudioCodec, createWavAudioCodec } from "../WavAudioCodec.js";
import { parseWavHeader } from "../AudioConverter.js";
import {
  CodecIoError,
  CorruptFileError,
  UnsupportedFormatError,
} from "../../errors/CodecError.js";
import {
  createTempDir,
  removeTempDir,
  writeToneWav,
} from "../../__fixtures__/audio/generateFixtures.js";

describe("WavAudioCodec", () => {
  let dir: string;
  let codec: WavAudioCodec;

  beforeEach(async () => {
    dir = await createTempDir();
    codec = createWavAudioCodec({ targetSampleRate: 16000 });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("probe()", () => {
    it("reports source format, duration and peak", async () => {
      const path = await writeToneWav(dir, "stereo.wav", {
        durationSec: 2,
        sampleRate: 44100,
        channels: 2,
        bitDepth: 24,
        amplitude: 0.6,
      });

      const probe = await codec.probe(path);

      expect(probe.path).toBe(path);
      expect(probe.durationSec).toBeCloseTo(2, 5);
      expect(probe.sampleRate).toBe(44100);
      expect(probe.channels).toBe(2);
      expect(probe.bitDepth).toBe(24);
      expect(probe.peakAmplitude).toBeCloseTo(0.6, 2);
    });

    it("throws CodecIoError with the path for a missing file", async () => {
      const path = join(dir, "missing.wav");

      const error = await codec.probe(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CodecIoError);
      expect(error instanceof CodecIoError && error.path).toBe(path);
    });

    it("throws UnsupportedFormatError for non-WAV content", async () => {
      const path = join(dir, "notes.wav");
      await writeFile(path, "plain text pretending to be audio");

      const error = await codec.probe(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error instanceof UnsupportedFormatError && error.path).toBe(path);
    });

    it("throws CorruptFileError for a truncated file", async () => {
      const source = await writeToneWav(dir, "full.wav", { durationSec: 1 });
      const bytes = await readFile(source);
      const path = join(dir, "cut.wav");
      await writeFile(path, bytes.subarray(0, 200));

      await expect(codec.probe(path)).rejects.toThrow(CorruptFileError);
    });
  });

  describe("normalize()", () => {
    it("down-mixes and resamples to the target rate", async () => {
      const path = await writeToneWav(dir, "in.wav", {
        durationSec: 1,
        sampleRate: 48000,
        channels: 2,
      });

      const normalized = await codec.normalize(path);

      expect(normalized.sampleRate).toBe(16000);
      expect(normalized.channels).toBe(1);
      expect(normalized.bitDepth).toBe(16);
      expect(normalized.samples.length).toBe(16000);
      expect(normalized.durationSec).toBe(1);
    });

    it("uses 24000 Hz when no target is configured", () => {
      expect(new WavAudioCodec().targetSampleRate).toBe(24000);
    });
  });

  describe("write()", () => {
    it("creates missing directories and writes 16-bit mono", async () => {
      const path = join(dir, "nested", "out", "clip.wav");

      const written = await codec.write(path, {
        samples: new Float32Array(12000),
        sampleRate: 24000,
      });

      expect(written).toEqual({ path, durationSec: 0.5, bytes: 24044 });
      const bytes = await readFile(path);
      const copy = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(copy).set(bytes);
      const header = parseWavHeader(copy);
      expect(header.sampleRate).toBe(24000);
      expect(header.numChannels).toBe(1);
      expect(header.bitsPerSample).toBe(16);
    });
  });
});
