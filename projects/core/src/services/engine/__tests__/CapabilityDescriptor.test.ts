import { describe, it, expect } from "vitest";

import {
  applyCapabilityOverrides,
  checkProfileCompatibility,
  checkTextLength,
  createCapabilityDescriptor,
  resolveParameter,
  textLength,
} from "../CapabilityDescriptor.js";
import {
  InvalidParameterError,
  ProfileIncompatibleError,
  TextTooLongError,
} from "../../../errors/GenerationError.js";
import { makeProfile, makeSample } from "../../../__fixtures__/profiles.js";

const capabilities = createCapabilityDescriptor({
  maxTextLength: 2048,
  recommendedTextLength: 400,
});

describe("CapabilityDescriptor", () => {
  describe("createCapabilityDescriptor()", () => {
    it("fills defaults and freezes the result", () => {
      expect(capabilities).toEqual({
        maxTextLength: 2048,
        recommendedTextLength: 400,
        supportsStreaming: false,
        minSampleDuration: 3,
        maxSampleDuration: 30,
        parameters: {
          temperature: { min: 0.5, max: 1.0, default: 0.75 },
          speed: { min: 0.8, max: 1.2, default: 1.0 },
        },
        supportedModes: ["clone"],
        supportedLanguages: [],
      });
      expect(Object.isFrozen(capabilities)).toBe(true);
      expect(Object.isFrozen(capabilities.parameters.speed)).toBe(true);
    });

    it.each([
      { input: { maxTextLength: 100, recommendedTextLength: 200 }, label: "recommended above max" },
      { input: { maxTextLength: 0, recommendedTextLength: 0 }, label: "zero max" },
      {
        input: { maxTextLength: 100, recommendedTextLength: 50, minSampleDuration: 40, maxSampleDuration: 30 },
        label: "min sample duration above max",
      },
      {
        input: { maxTextLength: 100, recommendedTextLength: 50, speed: { min: 1, max: 2, default: 3 } },
        label: "default outside its range",
      },
      {
        input: { maxTextLength: 100, recommendedTextLength: 50, supportedModes: [] },
        label: "no modes",
      },
    ])("rejects $label", ({ input }) => {
      expect(() => createCapabilityDescriptor(input)).toThrow(RangeError);
    });

    it("applies configured overrides over the adapter's declaration", () => {
      const descriptor = applyCapabilityOverrides(
        { maxTextLength: 1000, recommendedTextLength: 250 },
        { recommendedTextLength: 300, maxSampleDuration: 60 }
      );

      expect(descriptor.maxTextLength).toBe(1000);
      expect(descriptor.recommendedTextLength).toBe(300);
      expect(descriptor.maxSampleDuration).toBe(60);
    });
  });

  describe("textLength()", () => {
    it("counts code points rather than UTF-16 units", () => {
      expect(textLength("hola 👋")).toBe(6);
      expect("hola 👋".length).toBe(7);
    });
  });

  describe("checkTextLength()", () => {
    it("accepts text within the recommended length", () => {
      expect(checkTextLength("a".repeat(400), capabilities)).toEqual({ status: "ok", length: 400 });
    });

    it("warns between the soft and hard limits", () => {
      const check = checkTextLength("a".repeat(500), capabilities);

      expect(check.status).toBe("warning");
      expect(check.status === "warning" && check.warning).toEqual({
        kind: "text_exceeds_recommended_length",
        actual: 500,
        recommended: 400,
        message: "Text has 500 characters; quality may degrade above 400",
      });
    });

    it("accepts text exactly at the hard limit with a warning", () => {
      expect(checkTextLength("a".repeat(2048), capabilities).status).toBe("warning");
    });

    it("rejects text above the hard limit with actual and max", () => {
      const error = (() => {
        try {
          checkTextLength("a".repeat(3000), capabilities);
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(TextTooLongError);
      expect(error instanceof TextTooLongError && [error.actual, error.max]).toEqual([3000, 2048]);
    });
  });

  describe("resolveParameter()", () => {
    const range = capabilities.parameters.speed;

    it("uses the default when no value is requested", () => {
      expect(resolveParameter("speed", undefined, range, "reject")).toEqual({ value: 1.0 });
    });

    it("passes in-range values through", () => {
      expect(resolveParameter("speed", 0.9, range, "clamp")).toEqual({ value: 0.9 });
    });

    it.each([
      { requested: 2, applied: 1.2 },
      { requested: 0.1, applied: 0.8 },
    ])("clamps $requested to $applied and records it", ({ requested, applied }) => {
      expect(resolveParameter("speed", requested, range, "clamp")).toEqual({
        value: applied,
        adjustment: { parameter: "speed", requested, applied },
      });
    });

    it("rejects out-of-range values under the reject policy", () => {
      expect(() => resolveParameter("speed", 2, range, "reject")).toThrow(
        "Invalid value for speed: 2 (allowed 0.8 to 1.2)"
      );
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY])("rejects %s under any policy", (value) => {
      expect(() => resolveParameter("temperature", value, range, "clamp")).toThrow(
        InvalidParameterError
      );
    });
  });

  describe("checkProfileCompatibility()", () => {
    it("accepts profiles whose valid samples fit the bounds", () => {
      const profile = makeProfile({
        samples: [makeSample("/a.wav", 5), makeSample("/short.wav", 1, false)],
      });

      expect(() => checkProfileCompatibility(profile, capabilities)).not.toThrow();
    });

    it("lists every valid sample outside the bounds", () => {
      const profile = makeProfile({
        samples: [makeSample("/long.wav", 45), makeSample("/tiny.wav", 2)],
      });

      const error = (() => {
        try {
          checkProfileCompatibility(profile, capabilities);
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ProfileIncompatibleError);
      expect(error instanceof ProfileIncompatibleError && error.problems).toEqual([
        "/long.wav is 45.00s (engine maximum 30s)",
        "/tiny.wav is 2.00s (engine minimum 3s)",
      ]);
    });

    it("rejects profiles with no valid samples", () => {
      const profile = makeProfile({ samples: [makeSample("/x.wav", 5, false)] });

      expect(() => checkProfileCompatibility(profile, capabilities)).toThrow(
        "profile has no valid samples"
      );
    });
  });
});
