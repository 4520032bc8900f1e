import { describe, expect, it } from "vitest";

import { toErrorResponse } from "../ErrorResponse.js";
import { CodecIoError } from "../CodecError.js";
import { InvalidConfigError } from "../ConfigError.js";
import { SynthesisFailedError } from "../EngineError.js";
import { EngineFailureError } from "../GenerationError.js";
import { ProfileError, ProfileErrorCode } from "../ProfileError.js";

describe("toErrorResponse()", () => {
  it("maps codec errors with their file path", () => {
    const response = toErrorResponse(
      new CodecIoError("read", "/s/a.wav", new Error("ENOENT"))
    );

    expect(response).toEqual({
      category: "codec",
      kind: "IoFailure",
      code: "CODEC_003",
      message: "Failed to read audio file /s/a.wav: ENOENT",
      details: { operation: "read", path: "/s/a.wav", reason: "ENOENT" },
    });
  });

  it("keeps the engine name and reason of a wrapped failure", () => {
    const response = toErrorResponse(
      new EngineFailureError("xtts", "server busy", new Error("503"))
    );

    expect(response).toEqual({
      category: "generation",
      kind: "EngineFailure",
      code: "GEN_004",
      message: "Engine xtts failed: server busy",
      details: { engine: "xtts", reason: "server busy" },
    });
  });

  it("categorizes adapter and config errors", () => {
    expect(toErrorResponse(new SynthesisFailedError("bad input"))).toMatchObject({
      category: "engine",
      kind: "SynthesisFailed",
      code: "ENGINE_002",
      details: { reason: "bad input" },
    });
    expect(toErrorResponse(new InvalidConfigError(["audio.sampleRate: too small"]))).toMatchObject({
      category: "config",
      kind: "InvalidConfig",
      code: "CONFIG_001",
      details: { issues: ["audio.sampleRate: too small"] },
    });
  });

  it("drops nested errors, typed arrays and undefined values from details", () => {
    const error = new ProfileError(ProfileErrorCode.STORAGE_FAILURE, "Storage broke", {
      samples: new Float32Array(2),
      inner: new Error("hidden"),
      missing: undefined,
      kept: 1,
    });

    expect(toErrorResponse(error).details).toEqual({ kept: 1 });
  });

  it.each([new Error("stack-bearing"), "plain string", null])(
    "hides unknown value %s behind an internal error",
    (value) => {
      expect(toErrorResponse(value)).toEqual({
        category: "internal",
        kind: "Internal",
        code: "INTERNAL",
        message: "An unexpected internal error occurred",
        details: {},
      });
    }
  );
});
