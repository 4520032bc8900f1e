/**
 * HTTP client for an XTTS-v2 microservice.
 *
 * Endpoints:
 * - GET  /health
 * - POST /extract-embedding
 * - POST /synthesize
 *
 * Audio and embeddings travel as base64-encoded little-endian float32.
 */
import { z } from "zod";

import {
  EmbeddingExtractionError,
  EngineNetworkError,
  InvalidEngineResponseError,
  SynthesisFailedError,
  UnsupportedLanguageError,
  XTTSServerUnavailableError,
} from "../../errors/EngineError.js";
import type { AudioArtifact } from "../../interfaces/IAudioCodec.js";

/**
 * Languages XTTS-v2 was trained on.
 */
export const XTTS_LANGUAGES = [
  "en", "es", "fr", "de", "it", "pt", "pl", "tr", "ru",
  "nl", "cs", "ar", "zh-cn", "hu", "ko", "ja", "hi",
] as const;
export type XTTSLanguage = (typeof XTTS_LANGUAGES)[number];

export interface SpeakerEmbedding {
  readonly data: Float32Array;
  readonly shape: readonly number[];
}

export interface XTTSHealthResponse {
  readonly status: string;
  readonly modelLoaded: boolean;
  readonly supportedLanguages: readonly string[];
}

export interface XTTSClientOptions {
  /** Base URL of the XTTS server. Default: http://localhost:8000 */
  readonly serverUrl?: string;
  /** Request timeout in milliseconds. Default: 120000 */
  readonly timeoutMs?: number;
  /** Retries for the health check only. Default: 2 */
  readonly retryAttempts?: number;
  /** Default: 1000 */
  readonly retryDelayMs?: number;
}

export interface SynthesizeOptions {
  readonly text: string;
  readonly language: string;
  readonly embedding: SpeakerEmbedding;
  readonly temperature: number;
  readonly speed: number;
  readonly signal?: AbortSignal;
}

export interface ExtractEmbeddingOptions {
  readonly audio: Float32Array;
  readonly sampleRate: number;
  readonly signal?: AbortSignal;
}

const DEFAULT_SERVER_URL = "http://localhost:8000";
const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_RETRY_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;

const healthSchema = z.object({
  status: z.string(),
  model_loaded: z.boolean(),
  supported_languages: z.array(z.string()).default([]),
});

const embeddingSchema = z.object({
  embedding_base64: z.string().min(1),
  embedding_shape: z.array(z.number().int().nonnegative()),
});

const synthesisSchema = z.object({
  audio_base64: z.string(),
  sample_rate: z.number().int().positive(),
});

const errorBodySchema = z.object({ detail: z.string() });

export function isXTTSLanguage(language: string): language is XTTSLanguage {
  return XTTS_LANGUAGES.some((supported) => supported === language);
}

export function float32ToBase64(array: Float32Array): string {
  return Buffer.from(array.buffer, array.byteOffset, array.byteLength).toString("base64");
}

/**
 * @returns null when the payload is not a whole number of float32 values
 */
export function base64ToFloat32(base64: string): Float32Array | null {
  const bytes = Buffer.from(base64, "base64");
  if (bytes.byteLength % 4 !== 0) {
    return null;
  }
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  return new Float32Array(copy.buffer);
}

/**
 * Stateless client; embeddings are cached by the caller.
 */
export class XTTSClient {
  readonly serverUrl: string;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options?: Readonly<XTTSClientOptions>) {
    this.serverUrl = (options?.serverUrl ?? DEFAULT_SERVER_URL).replace(/\/+$/, "");
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryAttempts = options?.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    this.retryDelayMs = options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async checkHealth(): Promise<XTTSHealthResponse> {
    const response = await this.request("/health", { method: "GET" }, this.retryAttempts);

    if (!response.ok) {
      throw new XTTSServerUnavailableError(
        this.serverUrl,
        `Health check failed with status ${response.status}`
      );
    }

    const data = await this.parseBody(response, "/health", healthSchema);
    return {
      status: data.status,
      modelLoaded: data.model_loaded,
      supportedLanguages: data.supported_languages,
    };
  }

  /**
   * @throws {EmbeddingExtractionError} If the server rejects the audio
   */
  async extractEmbedding(options: Readonly<ExtractEmbeddingOptions>): Promise<SpeakerEmbedding> {
    const response = await this.request(
      "/extract-embedding",
      this.jsonPost(
        { audio_base64: float32ToBase64(options.audio), sample_rate: options.sampleRate },
        options.signal
      ),
      0
    );

    if (!response.ok) {
      throw new EmbeddingExtractionError(await this.errorDetail(response));
    }

    const data = await this.parseBody(response, "/extract-embedding", embeddingSchema);
    const embedding = base64ToFloat32(data.embedding_base64);
    if (!embedding) {
      throw new InvalidEngineResponseError("/extract-embedding", "embedding is not float32 data");
    }
    return { data: embedding, shape: data.embedding_shape };
  }

  /**
   * @throws {UnsupportedLanguageError}
   * @throws {SynthesisFailedError} If the server rejects the request
   */
  async synthesize(options: Readonly<SynthesizeOptions>): Promise<AudioArtifact> {
    const { text, language, embedding, temperature, speed, signal } = options;

    if (!isXTTSLanguage(language)) {
      throw new UnsupportedLanguageError(language, XTTS_LANGUAGES);
    }

    const response = await this.request(
      "/synthesize",
      this.jsonPost(
        {
          text,
          language,
          temperature,
          speed,
          embedding_base64: float32ToBase64(embedding.data),
          embedding_shape: embedding.shape,
        },
        signal
      ),
      0
    );

    if (!response.ok) {
      throw new SynthesisFailedError(await this.errorDetail(response), text);
    }

    const data = await this.parseBody(response, "/synthesize", synthesisSchema);
    const samples = base64ToFloat32(data.audio_base64);
    if (!samples) {
      throw new InvalidEngineResponseError("/synthesize", "audio is not float32 data");
    }
    return { samples, sampleRate: data.sample_rate };
  }

  private jsonPost(body: Record<string, unknown>, signal: AbortSignal | undefined): RequestInit {
    const init: RequestInit = {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    };
    if (signal) {
      init.signal = signal;
    }
    return init;
  }

  /**
   * Fetch with a timeout. Connection failures are retried `retries` times;
   * HTTP error statuses are returned to the caller untouched.
   */
  private async request(path: string, init: RequestInit, retries: number): Promise<Response> {
    const url = `${this.serverUrl}${path}`;
    const callerSignal = init.signal ?? undefined;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= retries; attempt++) {
      const timeoutController = new AbortController();
      const timeoutId = setTimeout(() => timeoutController.abort(), this.timeoutMs);
      const signal = callerSignal
        ? this.combineAbortSignals(callerSignal, timeoutController.signal)
        : timeoutController.signal;

      try {
        return await fetch(url, { ...init, signal });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (callerSignal?.aborted) {
          throw new EngineNetworkError(path, "Request was aborted");
        }
        if (timeoutController.signal.aborted) {
          throw new XTTSServerUnavailableError(
            this.serverUrl,
            `Request to ${path} timed out after ${this.timeoutMs}ms`
          );
        }
        if (attempt < retries) {
          await this.delay(this.retryDelayMs);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw new XTTSServerUnavailableError(this.serverUrl, lastError?.message ?? "Unknown error");
  }

  private async parseBody<T>(
    response: Response,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new InvalidEngineResponseError(endpoint, "body is not JSON");
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidEngineResponseError(
        endpoint,
        issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unexpected shape"
      );
    }
    return parsed.data;
  }

  private async errorDetail(response: Response): Promise<string> {
    const fallback = `Server returned status ${response.status}`;
    try {
      const parsed = errorBodySchema.safeParse(await response.json());
      return parsed.success ? parsed.data.detail : fallback;
    } catch {
      return fallback;
    }
  }

  private combineAbortSignals(...signals: AbortSignal[]): AbortSignal {
    const controller = new AbortController();

    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort();
        return controller.signal;
      }
      signal.addEventListener("abort", () => controller.abort(), { once: true });
    }

    return controller.signal;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function createXTTSClient(options?: Readonly<XTTSClientOptions>): XTTSClient {
  return new XTTSClient(options);
}
