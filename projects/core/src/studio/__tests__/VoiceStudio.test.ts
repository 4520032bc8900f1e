import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { VoiceStudio, createVoiceStudio, type VoiceStudioDependencies } from "../VoiceStudio.js";
import type { ApiResult } from "../ApiResult.js";
import { parseStudioConfig } from "../../config/StudioConfig.js";
import type { ErrorResponse } from "../../errors/ErrorResponse.js";
import type { Logger } from "../../logging/Logger.js";
import type { BatchManifest } from "../../services/batch/BatchTypes.js";
import { GenerationHistory } from "../../services/generation/GenerationHistory.js";
import { createTempDir, removeTempDir } from "../../__fixtures__/audio/generateFixtures.js";
import { makeProfile } from "../../__fixtures__/profiles.js";
import { InMemoryProfileRepository } from "../../__tests__/__mocks__/InMemoryProfileRepository.js";
import { MockAudioCodec } from "../../__tests__/__mocks__/MockAudioCodec.js";
import { MockEngine, type MockEngineOptions } from "../../__tests__/__mocks__/MockEngine.js";

const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

function unwrap<T>(result: ApiResult<T>): T {
  if (result.status !== "success") {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

function errorOf<T>(result: ApiResult<T>): ErrorResponse {
  if (result.status !== "error") {
    throw new Error("Expected an error result");
  }
  return result.error;
}

describe("VoiceStudio", () => {
  let repository: InMemoryProfileRepository;
  let codec: MockAudioCodec;
  let engine: MockEngine;
  let logger: Logger;
  let studio: VoiceStudio;

  function setup(
    engineOptions?: MockEngineOptions,
    dependencies?: Pick<VoiceStudioDependencies, "history">
  ): VoiceStudio {
    engine = new MockEngine(engineOptions);
    studio = createVoiceStudio(
      parseStudioConfig({ paths: { outputs: "/out" }, batch: { writeManifest: false } }),
      { codec, repository, engine, logger, now: () => FIXED_NOW, ...dependencies }
    );
    return studio;
  }

  beforeEach(() => {
    repository = new InMemoryProfileRepository([makeProfile()]);
    codec = new MockAudioCodec({
      "/s/a.wav": { durationSec: 5 },
      "/s/b.wav": { durationSec: 0.1 },
      "/s/c.wav": { durationSec: 8 },
    });
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };
  });

  afterEach(async () => {
    await studio.dispose();
  });

  describe("profiles", () => {
    it("reports a too-short sample without failing the call", async () => {
      setup();

      const report = unwrap(await studio.validateSamples(["/s/a.wav", "/s/b.wav"]));

      expect(report.allValid).toBe(false);
      expect(report.validCount).toBe(1);
      expect(report.samples[1]?.errors).toEqual(["Sample too short: 0.10s (minimum 3s)"]);
    });

    it("creates a profile that then appears in the list", async () => {
      setup();

      const profile = unwrap(
        await studio.createVoiceProfile("Host", ["/s/a.wav", "/s/c.wav"], "en", "Hello there")
      );
      const summaries = unwrap(await studio.listVoiceProfiles());

      expect(profile).toMatchObject({
        name: "Host",
        language: "en",
        referenceText: "Hello there",
        totalDurationSec: 13,
        createdAt: "2026-03-01T12:00:00.000Z",
      });
      expect(summaries.map((summary) => summary.name).sort()).toEqual(["Host", "Narrator"]);
      expect(unwrap(await studio.getVoiceProfile(profile.id))).toEqual(profile);
    });

    it("uses the configured default language", async () => {
      setup();

      const profile = unwrap(await studio.createVoiceProfile("Host", ["/s/a.wav"]));

      expect(profile.language).toBe("es");
    });

    it("falls back to the engine's first language when the default is unsupported", async () => {
      setup({
        capabilities: { maxTextLength: 2048, recommendedTextLength: 400, supportedLanguages: ["en"] },
      });

      const profile = unwrap(await studio.createVoiceProfile("Host", ["/s/a.wav"]));

      expect(profile.language).toBe("en");
      expect(logger.warn).toHaveBeenCalledWith(
        'Default language "es" is not supported by mock; new profiles default to "en"'
      );
    });

    it("accepts only one of two concurrent creates with the same name", async () => {
      setup();

      const [first, second] = await Promise.all([
        studio.createVoiceProfile("Alice", ["/s/a.wav"]),
        studio.createVoiceProfile("Alice", ["/s/a.wav"]),
      ]);

      expect(first?.status).toBe("success");
      expect(second?.status === "error" ? second.error.kind : second?.status).toBe(
        "DuplicateName"
      );
      expect(repository.size).toBe(2);
    });

    it("fails with NoValidSamples when every sample is rejected", async () => {
      setup();

      const error = errorOf(await studio.createVoiceProfile("Host", ["/s/b.wav", "/s/missing.wav"]));

      expect(error).toMatchObject({
        category: "profile",
        kind: "NoValidSamples",
        code: "PROFILE_001",
        message: "None of the 2 audio samples passed validation",
      });
      expect(repository.size).toBe(1);
    });

    it("rejects a name that differs only by case", async () => {
      setup();

      const error = errorOf(await studio.createVoiceProfile("  NARRATOR ", ["/s/a.wav"]));

      expect(error.kind).toBe("DuplicateName");
      expect(error.details).toEqual({ profileName: "NARRATOR", existingId: "profile-narrator" });
    });

    it("returns a structured NotFound for unknown ids", async () => {
      setup();

      expect(errorOf(await studio.getVoiceProfile("nope"))).toEqual({
        category: "profile",
        kind: "NotFound",
        code: "PROFILE_003",
        message: "Voice profile not found: nope",
        details: { profileId: "nope" },
      });
    });

    it("renames and re-describes a profile", async () => {
      setup();

      const updated = unwrap(
        await studio.updateVoiceProfile("profile-narrator", {
          name: "Storyteller",
          description: " Warm and slow ",
        })
      );
      const stored = unwrap(await studio.getVoiceProfile("profile-narrator"));

      expect(updated.name).toBe("Storyteller");
      expect(updated.description).toBe("Warm and slow");
      expect(updated.updatedAt).toBe("2026-03-01T12:00:00.000Z");
      expect(stored).toEqual(updated);
    });

    it("deletes a profile once", async () => {
      setup();

      expect(unwrap(await studio.deleteVoiceProfile("profile-narrator"))).toEqual({
        id: "profile-narrator",
        deleted: true,
      });
      expect(errorOf(await studio.deleteVoiceProfile("profile-narrator")).kind).toBe(
        "NotFound"
      );
    });

    it("refuses to delete a profile that is generating", async () => {
      setup({ latencyMs: 100 });

      const pending = studio.generateAudio("profile-narrator", "Hola");
      await vi.waitFor(() => expect(engine.generateCalls).toHaveLength(1));

      const error = errorOf(await studio.deleteVoiceProfile("profile-narrator"));

      expect(error).toMatchObject({
        kind: "ProfileBusy",
        code: "PROFILE_007",
        details: { profileId: "profile-narrator", activeUses: 1 },
      });
      expect(unwrap(await pending).profileId).toBe("profile-narrator");
      expect(unwrap(await studio.deleteVoiceProfile("profile-narrator")).deleted).toBe(true);
    });
  });

  describe("generation", () => {
    it("succeeds with a quality warning above the recommended length", async () => {
      setup();

      const result = unwrap(await studio.generateAudio("profile-narrator", "a".repeat(500)));

      expect(result.qualityWarning).toMatchObject({ actual: 500, recommended: 400 });
      expect(result.outputPath).toMatch(/^\/out\/profile-narrator_\d+-1\.wav$/);
      expect(unwrap(await studio.getHistory())).toEqual([result]);
    });

    it("rejects text over the hard limit without calling the engine", async () => {
      setup();

      const error = errorOf(await studio.generateAudio("profile-narrator", "a".repeat(3000)));

      expect(error).toEqual({
        category: "generation",
        kind: "TextTooLong",
        code: "GEN_002",
        message: "Text too long: 3000 characters (maximum 2048)",
        details: { actual: 3000, max: 2048 },
      });
      expect(engine.generateCalls).toHaveLength(0);
      expect(unwrap(await studio.getHistory())).toEqual([]);
    });

    it("passes parameters and the output path through", async () => {
      setup();

      const result = unwrap(
        await studio.generateAudio("profile-narrator", "Hola", {
          speed: 2,
          language: "en",
          outputPath: "/custom/take.wav",
        })
      );

      expect(result.outputPath).toBe("/custom/take.wav");
      expect(result.parameters).toEqual({
        temperature: 0.75,
        speed: 1.2,
        language: "en",
        mode: "clone",
      });
      expect(result.parameterAdjustments).toEqual([
        { parameter: "speed", requested: 2, applied: 1.2 },
      ]);
    });

    it("rejects a profile language the engine does not support before dispatch", async () => {
      setup({
        capabilities: { maxTextLength: 2048, recommendedTextLength: 400, supportedLanguages: ["en"] },
      });

      const error = errorOf(await studio.generateAudio("profile-narrator", "Hola"));

      expect(error).toMatchObject({
        category: "generation",
        kind: "UnsupportedLanguage",
        code: "GEN_011",
        details: { language: "es", supportedLanguages: ["en"] },
      });
      expect(engine.generateCalls).toHaveLength(0);
    });

    it("reports engine failures as generation errors", async () => {
      setup();

      const error = errorOf(await studio.generateAudio("profile-narrator", "Hola [fail]"));

      expect(error).toMatchObject({
        category: "generation",
        kind: "EngineFailure",
        message: "Engine mock failed: Mock engine failure",
      });
    });

    it("describes the engine for an existing profile only", async () => {
      setup();

      const capabilities = unwrap(await studio.getEngineCapabilities("profile-narrator"));

      expect(capabilities.maxTextLength).toBe(2048);
      expect(capabilities.recommendedTextLength).toBe(400);
      expect(errorOf(await studio.getEngineCapabilities("nope")).kind).toBe("NotFound");
    });
  });

  describe("batches", () => {
    it("records successful segments in the history", async () => {
      setup();

      const manifest = unwrap(
        await studio.processBatch(
          "profile-narrator",
          { kind: "text", text: "Uno.\n\nDos [fail]." },
          { outputDir: "/out/batch" }
        )
      );
      const history = unwrap(await studio.getHistory());

      expect(manifest.succeeded).toBe(1);
      expect(manifest.failed).toBe(1);
      expect(history.map((entry) => entry.outputPath)).toEqual(["/out/batch/segment-001.wav"]);
    });

    it("records only newly generated segments on retry", async () => {
      setup();
      const first = unwrap(
        await studio.processBatch(
          "profile-narrator",
          { kind: "text", text: "Uno.\n\nDos [fail]." },
          { outputDir: "/out/batch" }
        )
      );
      const edited: BatchManifest = {
        ...first,
        entries: first.entries.map((entry) =>
          entry.status === "failed" ? { ...entry, text: "Dos." } : entry
        ),
      };

      const retried = unwrap(await studio.retryBatch(edited));
      const history = unwrap(await studio.getHistory());

      expect(retried.succeeded).toBe(2);
      expect(history.map((entry) => entry.outputPath)).toEqual([
        "/out/batch/segment-001.wav",
        "/out/batch/segment-002.wav",
      ]);
    });

    it("fails the whole call for an unknown profile", async () => {
      setup();

      const error = errorOf(
        await studio.processBatch("nope", { kind: "text", text: "Uno." }, { outputDir: "/out/b" })
      );

      expect(error).toMatchObject({ category: "generation", kind: "ProfileNotFound" });
    });
  });

  describe("history failures", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
      await writeFile(join(dir, "blocker"), "not a directory");
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    function setupUnwritableHistory(): void {
      setup(undefined, {
        history: new GenerationHistory({ filePath: join(dir, "blocker", "history.jsonl") }),
      });
    }

    it("keeps a generated take when the history cannot be written", async () => {
      setupUnwritableHistory();

      const result = unwrap(await studio.generateAudio("profile-narrator", "Hola"));

      expect(codec.written.has(result.outputPath)).toBe(true);
      expect(logger.error).toHaveBeenCalledWith(
        expect.stringMatching(/^Failed to record \S+ in history: ENOTDIR/),
        { outputPath: result.outputPath }
      );
    });

    it("returns a completed batch when the history cannot be written", async () => {
      setupUnwritableHistory();

      const manifest = unwrap(
        await studio.processBatch(
          "profile-narrator",
          { kind: "text", text: "Uno.\n\nDos." },
          { outputDir: "/out/b" }
        )
      );

      expect(manifest.succeeded).toBe(2);
      expect(manifest.failed).toBe(0);
      expect(codec.written.has("/out/b/segment-001.wav")).toBe(true);
      expect(codec.written.has("/out/b/segment-002.wav")).toBe(true);
      expect(logger.error).toHaveBeenCalledTimes(2);
    });
  });

  describe("unexpected errors", () => {
    it("hides the message and logs it", async () => {
      setup();
      vi.spyOn(repository, "list").mockRejectedValue(new Error("boom"));

      expect(errorOf(await studio.listVoiceProfiles())).toEqual({
        category: "internal",
        kind: "Internal",
        code: "INTERNAL",
        message: "An unexpected internal error occurred",
        details: {},
      });
      expect(logger.error).toHaveBeenCalledWith("Unexpected error: boom");
    });

    it("passes storage failures through as profile errors", async () => {
      setup();
      repository.failWith = "disk unavailable";

      expect(errorOf(await studio.listVoiceProfiles())).toMatchObject({
        category: "profile",
        kind: "StorageFailure",
        message: "Profile storage list failed: disk unavailable",
      });
    });
  });

  describe("dispose()", () => {
    it("releases a loaded engine", async () => {
      setup();
      unwrap(await studio.generateAudio("profile-narrator", "Hola"));

      unwrap(await studio.dispose());

      expect(engine.disposeCount).toBe(1);
    });
  });
});
