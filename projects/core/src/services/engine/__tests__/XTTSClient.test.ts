import { afterEach, describe, expect, it, vi } from "vitest";

import {
  base64ToFloat32,
  createXTTSClient,
  float32ToBase64,
  isXTTSLanguage,
  XTTSClient,
} from "../XTTSClient.js";
import {
  EmbeddingExtractionError,
  EngineNetworkError,
  InvalidEngineResponseError,
  SynthesisFailedError,
  UnsupportedLanguageError,
  XTTSServerUnavailableError,
} from "../../../errors/EngineError.js";

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

/**
 * fetch that never resolves and rejects like the real one once aborted.
 */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
    });
  });
}

const EMBEDDING = new Float32Array([0.25, -0.5, 0.75, 1]);

describe("XTTSClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createXTTSClient()", () => {
    it("strips trailing slashes from the server URL", () => {
      const client = createXTTSClient({ serverUrl: "http://tts.local:9000//" });
      expect(client.serverUrl).toBe("http://tts.local:9000");
    });

    it("defaults to localhost:8000", () => {
      expect(new XTTSClient().serverUrl).toBe("http://localhost:8000");
    });
  });

  describe("base64 helpers", () => {
    it("encodes float32 samples as little-endian bytes", () => {
      const decoded = base64ToFloat32(float32ToBase64(EMBEDDING));
      expect(Array.from(decoded ?? [])).toEqual([0.25, -0.5, 0.75, 1]);
    });

    it("encodes only the viewed part of a larger buffer", () => {
      const view = new Float32Array([9, 1, 2, 9]).subarray(1, 3);
      expect(Array.from(base64ToFloat32(float32ToBase64(view)) ?? [])).toEqual([1, 2]);
    });

    it("rejects payloads that are not whole float32 values", () => {
      expect(base64ToFloat32(Buffer.from([1, 2, 3]).toString("base64"))).toBeNull();
    });
  });

  describe("isXTTSLanguage()", () => {
    it.each([
      { language: "es", expected: true },
      { language: "zh-cn", expected: true },
      { language: "zh", expected: false },
      { language: "sv", expected: false },
    ])("returns $expected for $language", ({ language, expected }) => {
      expect(isXTTSLanguage(language)).toBe(expected);
    });
  });

  describe("checkHealth()", () => {
    it("maps the health response", async () => {
      const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ status: "healthy", model_loaded: true, supported_languages: ["es", "en"] })
      );

      const health = await new XTTSClient().checkHealth();

      expect(health).toEqual({
        status: "healthy",
        modelLoaded: true,
        supportedLanguages: ["es", "en"],
      });
      expect(requestUrl(fetchSpy.mock.calls[0]?.[0] ?? "")).toBe("http://localhost:8000/health");
    });

    it("retries connection failures", async () => {
      const fetchSpy = vi
        .spyOn(globalThis, "fetch")
        .mockRejectedValueOnce(new Error("Connection refused"))
        .mockRejectedValueOnce(new Error("Connection refused"))
        .mockResolvedValue(jsonResponse({ status: "healthy", model_loaded: true }));

      const client = new XTTSClient({ retryAttempts: 2, retryDelayMs: 0 });
      const health = await client.checkHealth();

      expect(health.supportedLanguages).toEqual([]);
      expect(fetchSpy).toHaveBeenCalledTimes(3);
    });

    it("gives up after the configured retries", async () => {
      const fetchSpy = vi
        .spyOn(globalThis, "fetch")
        .mockRejectedValue(new Error("Connection refused"));

      const client = new XTTSClient({ retryAttempts: 1, retryDelayMs: 0 });

      await expect(client.checkHealth()).rejects.toThrow(
        "XTTS server unavailable at http://localhost:8000: Connection refused"
      );
      expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it("treats an error status as unavailable", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({}, 503));

      await expect(new XTTSClient().checkHealth()).rejects.toBeInstanceOf(
        XTTSServerUnavailableError
      );
    });

    it("rejects a malformed body", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ status: "ok" }));

      await expect(new XTTSClient().checkHealth()).rejects.toThrow(
        "Invalid response from /health: model_loaded: Required"
      );
    });
  });

  describe("extractEmbedding()", () => {
    it("sends base64 audio and decodes the embedding", async () => {
      const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ embedding_base64: float32ToBase64(EMBEDDING), embedding_shape: [1, 4] })
      );
      const audio = new Float32Array([0.1, 0.2]);

      const embedding = await new XTTSClient().extractEmbedding({ audio, sampleRate: 24000 });

      expect(Array.from(embedding.data)).toEqual([0.25, -0.5, 0.75, 1]);
      expect(embedding.shape).toEqual([1, 4]);
      const [input, init] = fetchSpy.mock.calls[0] ?? [];
      expect(requestUrl(input ?? "")).toBe("http://localhost:8000/extract-embedding");
      expect(requestBody(init)).toEqual({
        audio_base64: float32ToBase64(audio),
        sample_rate: 24000,
      });
    });

    it("reports the server's detail on failure", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ detail: "audio too short" }, 422)
      );

      const error = await new XTTSClient()
        .extractEmbedding({ audio: new Float32Array(4), sampleRate: 24000 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingExtractionError);
      expect(error).toHaveProperty("message", "Speaker embedding extraction failed: audio too short");
    });
  });

  describe("synthesize()", () => {
    const embedding = { data: EMBEDDING, shape: [1, 4] };

    it("sends text, parameters and embedding", async () => {
      const audio = new Float32Array([0, 0.5, -0.5]);
      const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ audio_base64: float32ToBase64(audio), sample_rate: 24000 })
      );

      const result = await new XTTSClient().synthesize({
        text: "Hola",
        language: "es",
        embedding,
        temperature: 0.7,
        speed: 1.1,
      });

      expect(Array.from(result.samples)).toEqual([0, 0.5, -0.5]);
      expect(result.sampleRate).toBe(24000);
      expect(requestBody(fetchSpy.mock.calls[0]?.[1])).toEqual({
        text: "Hola",
        language: "es",
        temperature: 0.7,
        speed: 1.1,
        embedding_base64: float32ToBase64(EMBEDDING),
        embedding_shape: [1, 4],
      });
    });

    it("rejects unsupported languages without a request", async () => {
      const fetchSpy = vi.spyOn(globalThis, "fetch");

      await expect(
        new XTTSClient().synthesize({
          text: "Hej",
          language: "sv",
          embedding,
          temperature: 0.75,
          speed: 1,
        })
      ).rejects.toBeInstanceOf(UnsupportedLanguageError);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it("raises SynthesisFailedError with the server detail", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ detail: "CUDA out of memory" }, 500)
      );

      await expect(
        new XTTSClient().synthesize({ text: "Hola", language: "es", embedding, temperature: 0.75, speed: 1 })
      ).rejects.toThrow(new SynthesisFailedError("CUDA out of memory").message);
    });

    it("falls back to the status when the error body is not JSON", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("gateway", { status: 502 }));

      await expect(
        new XTTSClient().synthesize({ text: "Hola", language: "es", embedding, temperature: 0.75, speed: 1 })
      ).rejects.toThrow("Speech synthesis failed: Server returned status 502");
    });

    it("does not retry synthesis", async () => {
      const fetchSpy = vi
        .spyOn(globalThis, "fetch")
        .mockRejectedValue(new Error("socket hang up"));

      await expect(
        new XTTSClient({ retryAttempts: 3, retryDelayMs: 0 }).synthesize({
          text: "Hola",
          language: "es",
          embedding,
          temperature: 0.75,
          speed: 1,
        })
      ).rejects.toBeInstanceOf(XTTSServerUnavailableError);
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it("rejects audio that is not float32 data", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(
        jsonResponse({ audio_base64: Buffer.from([1, 2, 3]).toString("base64"), sample_rate: 24000 })
      );

      await expect(
        new XTTSClient().synthesize({ text: "Hola", language: "es", embedding, temperature: 0.75, speed: 1 })
      ).rejects.toBeInstanceOf(InvalidEngineResponseError);
    });

    it("stops when the caller aborts", async () => {
      vi.spyOn(globalThis, "fetch").mockImplementation(hangingFetch);
      const controller = new AbortController();

      const pending = new XTTSClient().synthesize({
        text: "Hola",
        language: "es",
        embedding,
        temperature: 0.75,
        speed: 1,
        signal: controller.signal,
      });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(EngineNetworkError);
    });

    it("times out slow requests", async () => {
      vi.spyOn(globalThis, "fetch").mockImplementation(hangingFetch);

      await expect(
        new XTTSClient({ timeoutMs: 20 }).synthesize({
          text: "Hola",
          language: "es",
          embedding,
          temperature: 0.75,
          speed: 1,
        })
      ).rejects.toThrow("Request to /synthesize timed out after 20ms");
    });
  });
});
