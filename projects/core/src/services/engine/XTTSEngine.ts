import {
  EmbeddingExtractionError,
  EngineNotInitializedError,
  XTTSServerUnavailableError,
} from "../../errors/EngineError.js";
import type { AudioArtifact, IAudioCodec } from "../../interfaces/IAudioCodec.js";
import type {
  CapabilityDescriptor,
  EngineGenerateOptions,
  EngineGenerateRequest,
  IEngine,
} from "../../interfaces/IEngine.js";
import type { VoiceProfile } from "../../interfaces/IVoiceProfile.js";
import type { CapabilityOverrides } from "../../config/StudioConfig.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import {
  applyCapabilityOverrides,
  type CapabilityDescriptorInput,
} from "./CapabilityDescriptor.js";
import { embeddingCacheKey, loadReferenceAudio } from "./referenceAudio.js";
import {
  XTTS_LANGUAGES,
  XTTSClient,
  type SpeakerEmbedding,
  type XTTSClientOptions,
} from "./XTTSClient.js";

export const XTTS_CAPABILITIES: CapabilityDescriptorInput = {
  maxTextLength: 1000,
  recommendedTextLength: 250,
  supportsStreaming: false,
  minSampleDuration: 3,
  maxSampleDuration: 30,
  supportedModes: ["clone"],
  supportedLanguages: XTTS_LANGUAGES,
};

export interface XTTSEngineOptions extends XTTSClientOptions {
  readonly codec: IAudioCodec;
  readonly capabilities?: CapabilityOverrides;
  /** Injected client, mainly for tests */
  readonly client?: XTTSClient;
  readonly logger?: Logger;
}

/**
 * Voice cloning through a remote XTTS-v2 server.
 *
 * Speaker embeddings are extracted once per profile revision and cached;
 * editing a profile changes `updatedAt` and so invalidates its entry.
 */
export class XTTSEngine implements IEngine {
  readonly name = "xtts";

  private readonly client: XTTSClient;
  private readonly codec: IAudioCodec;
  private readonly capabilities: CapabilityDescriptor;
  private readonly logger: Logger;
  private readonly embeddings = new Map<string, SpeakerEmbedding>();
  private ready = false;

  constructor(options: Readonly<XTTSEngineOptions>) {
    this.client = options.client ?? new XTTSClient(options);
    this.codec = options.codec;
    this.capabilities = applyCapabilityOverrides(XTTS_CAPABILITIES, options.capabilities);
    this.logger = (options.logger ?? silentLogger).child("XTTS");
  }

  get isReady(): boolean {
    return this.ready;
  }

  /** Number of cached speaker embeddings */
  get cachedEmbeddings(): number {
    return this.embeddings.size;
  }

  describeCapabilities(): CapabilityDescriptor {
    return this.capabilities;
  }

  /**
   * Confirms the server is reachable and its model is loaded.
   * @throws {XTTSServerUnavailableError}
   */
  async initialize(): Promise<void> {
    if (this.ready) {
      return;
    }
    const health = await this.client.checkHealth();
    if (!health.modelLoaded) {
      throw new XTTSServerUnavailableError(this.client.serverUrl, "model not loaded");
    }
    this.logger.info(`Connected to ${this.client.serverUrl}`, { status: health.status });
    this.ready = true;
  }

  async generate(
    request: Readonly<EngineGenerateRequest>,
    options?: Readonly<EngineGenerateOptions>
  ): Promise<AudioArtifact> {
    if (!this.ready) {
      throw new EngineNotInitializedError(this.name);
    }

    const { text, profile, parameters } = request;
    const embedding = await this.embeddingFor(profile, options?.signal);

    return this.client.synthesize({
      text,
      language: parameters.language,
      embedding,
      temperature: parameters.temperature,
      speed: parameters.speed,
      ...(options?.signal ? { signal: options.signal } : {}),
    });
  }

  async dispose(): Promise<void> {
    this.embeddings.clear();
    this.ready = false;
  }

  private async embeddingFor(
    profile: Readonly<VoiceProfile>,
    signal: AbortSignal | undefined
  ): Promise<SpeakerEmbedding> {
    const key = embeddingCacheKey(profile);
    const cached = this.embeddings.get(key);
    if (cached) {
      return cached;
    }

    const reference = await loadReferenceAudio(profile, this.codec);
    if (reference.samples.length === 0) {
      throw new EmbeddingExtractionError(`profile ${profile.id} has no usable reference audio`);
    }

    const embedding = await this.client.extractEmbedding({
      audio: reference.samples,
      sampleRate: reference.sampleRate,
      ...(signal ? { signal } : {}),
    });

    for (const existing of this.embeddings.keys()) {
      if (existing.startsWith(`${profile.id}@`)) {
        this.embeddings.delete(existing);
      }
    }
    this.embeddings.set(key, embedding);
    this.logger.debug(`Cached speaker embedding for ${profile.id}`, {
      referenceSec: Number(reference.durationSec.toFixed(2)),
    });
    return embedding;
  }
}

export function createXTTSEngine(options: Readonly<XTTSEngineOptions>): XTTSEngine {
  return new XTTSEngine(options);
}
