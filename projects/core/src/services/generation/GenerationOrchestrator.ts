/**
 * Single-request generation.
 *
 * Order of checks: profile lookup, empty text, hard length limit, soft length
 * limit, parameters, mode, language, profile compatibility. Only then is the engine
 * dispatched, so a rejected request never reaches it.
 */

import { join } from "node:path";

import {
  EmptyTextError,
  EngineFailureError,
  GenerationError,
  GenerationProfileNotFoundError,
  GenerationUnsupportedLanguageError,
  UnsupportedModeError,
} from "../../errors/GenerationError.js";
import type { AudioArtifact, IAudioCodec } from "../../interfaces/IAudioCodec.js";
import type {
  CapabilityDescriptor,
  ResolvedParameters,
} from "../../interfaces/IEngine.js";
import type { IProfileRepository } from "../../interfaces/IProfileRepository.js";
import type { VoiceProfile } from "../../interfaces/IVoiceProfile.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { errorMessage, generateId } from "../../utils/ids.js";
import {
  checkProfileCompatibility,
  checkTextLength,
  resolveParameter,
  type ParameterAdjustment,
  type ParameterPolicy,
  type TextLengthCheck,
} from "../engine/CapabilityDescriptor.js";
import type { EngineRunner } from "../engine/EngineRunner.js";
import type { ProfileUsageTracker } from "../profile/ProfileUsageTracker.js";
import type {
  GenerateOptions,
  GenerationRequest,
  GenerationResult,
} from "./GenerationTypes.js";

export interface GenerationOrchestratorOptions {
  readonly repository: IProfileRepository;
  readonly runner: EngineRunner;
  readonly codec: IAudioCodec;
  /** Directory for outputs without an explicit path */
  readonly outputDir: string;
  /** Per-request engine timeout. Defaults to the runner's own. */
  readonly timeoutMs?: number;
  /** Default: "clamp" */
  readonly parameterPolicy?: ParameterPolicy;
  readonly usageTracker?: ProfileUsageTracker;
  readonly logger?: Logger;
}

export interface PreparedRequest {
  readonly profile: VoiceProfile;
  readonly text: string;
  readonly textLength: number;
  readonly parameters: ResolvedParameters;
  readonly adjustments: readonly ParameterAdjustment[];
  readonly check: TextLengthCheck;
}

export class GenerationOrchestrator {
  private readonly repository: IProfileRepository;
  private readonly runner: EngineRunner;
  private readonly codec: IAudioCodec;
  private readonly outputDir: string;
  private readonly timeoutMs: number | undefined;
  private readonly parameterPolicy: ParameterPolicy;
  private readonly usageTracker: ProfileUsageTracker | undefined;
  private readonly logger: Logger;
  private outputSequence = 0;

  constructor(options: Readonly<GenerationOrchestratorOptions>) {
    this.repository = options.repository;
    this.runner = options.runner;
    this.codec = options.codec;
    this.outputDir = options.outputDir;
    this.timeoutMs = options.timeoutMs;
    this.parameterPolicy = options.parameterPolicy ?? "clamp";
    this.usageTracker = options.usageTracker;
    this.logger = (options.logger ?? silentLogger).child("Generation");
  }

  get engineName(): string {
    return this.runner.engineName;
  }

  describeCapabilities(): CapabilityDescriptor {
    return this.runner.describeCapabilities();
  }

  /**
   * Generates audio for one request and writes it to disk.
   *
   * @throws {GenerationError} For every request-level failure
   * @throws {CodecError} If the output file cannot be written
   * @throws {ProfileStorageError} If the profile store cannot be read
   */
  async generate(
    request: Readonly<GenerationRequest>,
    options?: Readonly<GenerateOptions>
  ): Promise<GenerationResult> {
    // Held from the profile lookup until the output is written
    const release = this.usageTracker?.acquire(request.profileId);

    try {
      const prepared = await this.prepare(request);
      const { profile, parameters } = prepared;

      if (prepared.check.status === "warning") {
        this.logger.warn(prepared.check.warning.message, { profileId: profile.id });
      }
      for (const adjustment of prepared.adjustments) {
        this.logger.warn(
          `Clamped ${adjustment.parameter} from ${adjustment.requested} to ${adjustment.applied}`
        );
      }

      const id = generateId("gen");
      const startedAt = performance.now();
      const artifact = await this.dispatch(prepared, options?.signal);
      const generationTimeMs = Math.round(performance.now() - startedAt);

      const outputPath = options?.outputPath ?? this.defaultOutputPath(profile.id);
      const written = await this.codec.write(outputPath, artifact);

      const result: GenerationResult = {
        id,
        status: "success",
        profileId: profile.id,
        text: prepared.text,
        textLength: prepared.textLength,
        outputPath: written.path,
        durationSec: written.durationSec,
        sampleRate: artifact.sampleRate,
        generationTimeMs,
        parameters,
        parameterAdjustments: prepared.adjustments,
        ...(prepared.check.status === "warning" ? { qualityWarning: prepared.check.warning } : {}),
        engine: this.runner.engineName,
        createdAt: new Date().toISOString(),
      };

      this.logger.info(`Generated ${result.durationSec.toFixed(2)}s of audio`, {
        id,
        profileId: profile.id,
        generationTimeMs,
        outputPath: written.path,
      });

      return Object.freeze(result);
    } finally {
      release?.();
    }
  }

  /**
   * Runs every pre-dispatch check. Exposed so callers can validate without generating.
   */
  async prepare(request: Readonly<GenerationRequest>): Promise<PreparedRequest> {
    const profile = await this.repository.findById(request.profileId);
    if (!profile) {
      throw new GenerationProfileNotFoundError(request.profileId);
    }

    const capabilities = this.runner.describeCapabilities();

    const text = request.text.trim();
    if (text.length === 0) {
      throw new EmptyTextError();
    }

    const check = checkTextLength(text, capabilities);

    const temperature = resolveParameter(
      "temperature",
      request.temperature,
      capabilities.parameters.temperature,
      this.parameterPolicy
    );
    const speed = resolveParameter(
      "speed",
      request.speed,
      capabilities.parameters.speed,
      this.parameterPolicy
    );

    const mode = request.mode ?? "clone";
    if (!capabilities.supportedModes.includes(mode)) {
      throw new UnsupportedModeError(mode, capabilities.supportedModes);
    }

    // An empty list means the engine accepts any language
    const language = request.language ?? profile.language;
    const languages = capabilities.supportedLanguages;
    if (languages.length > 0 && !languages.includes(language)) {
      throw new GenerationUnsupportedLanguageError(language, languages);
    }

    checkProfileCompatibility(profile, capabilities);

    const adjustments: ParameterAdjustment[] = [];
    if (temperature.adjustment) adjustments.push(temperature.adjustment);
    if (speed.adjustment) adjustments.push(speed.adjustment);

    return {
      profile,
      text,
      textLength: check.length,
      parameters: {
        temperature: temperature.value,
        speed: speed.value,
        language,
        mode,
      },
      adjustments,
      check,
    };
  }

  private async dispatch(
    prepared: PreparedRequest,
    signal: AbortSignal | undefined
  ): Promise<AudioArtifact> {
    const engineName = this.runner.engineName;
    try {
      const artifact = await this.runner.run(
        (engine, taskSignal) =>
          engine.generate(
            { text: prepared.text, profile: prepared.profile, parameters: prepared.parameters },
            { signal: taskSignal }
          ),
        {
          ...(this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}),
          ...(signal ? { signal } : {}),
        }
      );

      if (artifact.samples.length === 0 || !(artifact.sampleRate > 0)) {
        throw new EngineFailureError(engineName, "engine returned no audio");
      }
      return artifact;
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      this.logger.error(`Engine ${engineName} failed: ${errorMessage(error)}`);
      throw new EngineFailureError(engineName, errorMessage(error), error);
    }
  }

  private defaultOutputPath(profileId: string): string {
    this.outputSequence++;
    return join(this.outputDir, `${profileId}_${Date.now()}-${this.outputSequence}.wav`);
  }
}

export function createGenerationOrchestrator(
  options: Readonly<GenerationOrchestratorOptions>
): GenerationOrchestrator {
  return new GenerationOrchestrator(options);
}
