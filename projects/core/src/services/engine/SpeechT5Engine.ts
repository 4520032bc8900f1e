import {
  AutoModel,
  AutoProcessor,
  Tensor,
  pipeline,
  type PreTrainedModel,
  type Processor,
  type TextToAudioPipeline,
} from "@huggingface/transformers";

import {
  changePlaybackRate,
  resampleLinear,
  SPEAKER_ENCODER_SAMPLE_RATE,
} from "../../audio/AudioResampler.js";
import {
  EmbeddingExtractionError,
  EngineNotInitializedError,
  InvalidEngineResponseError,
  ModelLoadError,
  UnsupportedLanguageError,
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

const DEFAULT_MODEL_ID = "Xenova/speecht5_tts";
const DEFAULT_SPEAKER_ENCODER_ID = "Xenova/wavlm-base-plus-sv";

export const SPEECHT5_CAPABILITIES: CapabilityDescriptorInput = {
  maxTextLength: 600,
  recommendedTextLength: 200,
  supportsStreaming: false,
  minSampleDuration: 1,
  maxSampleDuration: 60,
  supportedModes: ["clone"],
  supportedLanguages: ["en"],
};

export interface SpeechT5EngineOptions {
  readonly codec: IAudioCodec;
  /** Default: Xenova/speecht5_tts */
  readonly modelId?: string;
  /** Default: Xenova/wavlm-base-plus-sv */
  readonly speakerEncoderId?: string;
  readonly cacheDir?: string;
  readonly capabilities?: CapabilityOverrides;
  readonly logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Scales a vector to unit length. A zero vector is returned unchanged.
 */
export function l2Normalize(vector: Float32Array): Float32Array {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return vector;
  }
  return vector.map((value) => value / norm);
}

/**
 * Local synthesis with SpeechT5 through Transformers.js.
 *
 * The speaker embedding is a WavLM x-vector computed from the profile's
 * reference audio at 16 kHz. SpeechT5 has no sampling temperature, so only
 * speed is applied, as a playback-rate change on the output.
 */
export class SpeechT5Engine implements IEngine {
  readonly name = "speecht5";

  private readonly codec: IAudioCodec;
  private readonly modelId: string;
  private readonly speakerEncoderId: string;
  private readonly cacheDir: string | null;
  private readonly capabilities: CapabilityDescriptor;
  private readonly logger: Logger;
  private readonly embeddings = new Map<string, Float32Array>();

  private synthesizer: TextToAudioPipeline | null = null;
  private processor: Processor | null = null;
  private encoder: PreTrainedModel | null = null;

  constructor(options: Readonly<SpeechT5EngineOptions>) {
    this.codec = options.codec;
    this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
    this.speakerEncoderId = options.speakerEncoderId ?? DEFAULT_SPEAKER_ENCODER_ID;
    this.cacheDir = options.cacheDir ?? null;
    this.capabilities = applyCapabilityOverrides(SPEECHT5_CAPABILITIES, options.capabilities);
    this.logger = (options.logger ?? silentLogger).child("SpeechT5");
  }

  get isReady(): boolean {
    return this.synthesizer !== null && this.processor !== null && this.encoder !== null;
  }

  describeCapabilities(): CapabilityDescriptor {
    return this.capabilities;
  }

  /**
   * Downloads (or reads from cache) the synthesizer and the speaker encoder.
   * @throws {ModelLoadError}
   */
  async initialize(): Promise<void> {
    if (this.isReady) {
      return;
    }

    const cacheOptions = this.cacheDir ? { cache_dir: this.cacheDir } : {};

    const [synthesizer, processor, encoder] = await Promise.all([
      pipeline("text-to-audio", this.modelId, { ...cacheOptions, dtype: "fp32" }).catch(
        (error: unknown) => {
          throw new ModelLoadError(this.modelId, error);
        }
      ),
      AutoProcessor.from_pretrained(this.speakerEncoderId, cacheOptions).catch(
        (error: unknown) => {
          throw new ModelLoadError(this.speakerEncoderId, error);
        }
      ),
      AutoModel.from_pretrained(this.speakerEncoderId, { ...cacheOptions, dtype: "fp32" }).catch(
        (error: unknown) => {
          throw new ModelLoadError(this.speakerEncoderId, error);
        }
      ),
    ]);

    this.synthesizer = synthesizer;
    this.processor = processor;
    this.encoder = encoder;
    this.logger.info(`Loaded ${this.modelId} with speaker encoder ${this.speakerEncoderId}`);
  }

  async generate(
    request: Readonly<EngineGenerateRequest>,
    options?: Readonly<EngineGenerateOptions>
  ): Promise<AudioArtifact> {
    const synthesizer = this.synthesizer;
    if (!synthesizer) {
      throw new EngineNotInitializedError(this.name);
    }

    const { text, profile, parameters } = request;
    if (!this.capabilities.supportedLanguages.includes(parameters.language)) {
      throw new UnsupportedLanguageError(parameters.language, this.capabilities.supportedLanguages);
    }

    const speakerEmbedding = await this.embeddingFor(profile);
    options?.signal?.throwIfAborted();

    const output: unknown = await synthesizer(text, { speaker_embeddings: speakerEmbedding });
    if (
      !isRecord(output) ||
      !(output["audio"] instanceof Float32Array) ||
      typeof output["sampling_rate"] !== "number"
    ) {
      throw new InvalidEngineResponseError(this.modelId, "pipeline returned no audio");
    }

    return {
      samples: changePlaybackRate(output["audio"], parameters.speed),
      sampleRate: output["sampling_rate"],
    };
  }

  async dispose(): Promise<void> {
    await Promise.all([this.synthesizer?.dispose(), this.encoder?.dispose()]);
    this.synthesizer = null;
    this.processor = null;
    this.encoder = null;
    this.embeddings.clear();
  }

  private async embeddingFor(profile: Readonly<VoiceProfile>): Promise<Float32Array> {
    const key = embeddingCacheKey(profile);
    const cached = this.embeddings.get(key);
    if (cached) {
      return cached;
    }

    const embedding = await this.computeEmbedding(profile);
    this.embeddings.set(key, embedding);
    return embedding;
  }

  private async computeEmbedding(profile: Readonly<VoiceProfile>): Promise<Float32Array> {
    const processor = this.processor;
    const encoder = this.encoder;
    if (!processor || !encoder) {
      throw new EngineNotInitializedError(this.name);
    }

    const reference = await loadReferenceAudio(profile, this.codec);
    if (reference.samples.length === 0) {
      throw new EmbeddingExtractionError(`profile ${profile.id} has no usable reference audio`);
    }

    const audio = resampleLinear(reference.samples, {
      inputSampleRate: reference.sampleRate,
      outputSampleRate: SPEAKER_ENCODER_SAMPLE_RATE,
    });

    try {
      const inputs: unknown = await processor(audio);
      const output: unknown = await encoder(inputs);
      const embeddings = isRecord(output) ? output["embeddings"] : undefined;
      if (!(embeddings instanceof Tensor) || !(embeddings.data instanceof Float32Array)) {
        throw new Error("speaker encoder returned no embeddings");
      }
      return l2Normalize(Float32Array.from(embeddings.data));
    } catch (error) {
      throw new EmbeddingExtractionError(
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}

export function createSpeechT5Engine(options: Readonly<SpeechT5EngineOptions>): SpeechT5Engine {
  return new SpeechT5Engine(options);
}
