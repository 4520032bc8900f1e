/**
 * Front-end facing API of the studio.
 *
 * Every method resolves to an ApiResult; errors never escape as exceptions.
 * Engine models load lazily on the first generation.
 */

import { WavAudioCodec } from "../audio/WavAudioCodec.js";
import {
  loadStudioConfig,
  parseStudioConfig,
  type LoadStudioConfigOptions,
  type StudioConfig,
} from "../config/StudioConfig.js";
import { ProfileBusyError, ProfileNotFoundError } from "../errors/ProfileError.js";
import type { IAudioCodec } from "../interfaces/IAudioCodec.js";
import type { CapabilityDescriptor, GenerationMode, IEngine } from "../interfaces/IEngine.js";
import type { IProfileRepository } from "../interfaces/IProfileRepository.js";
import type { VoiceProfile, VoiceProfileSummary } from "../interfaces/IVoiceProfile.js";
import { createConsoleLogger, type Logger } from "../logging/Logger.js";
import { BatchOrchestrator } from "../services/batch/BatchOrchestrator.js";
import type {
  BatchManifest,
  BatchOptions,
  RetryOptions,
  ScriptSource,
} from "../services/batch/BatchTypes.js";
import { createEngine } from "../services/engine/EngineFactory.js";
import { EngineRunner } from "../services/engine/EngineRunner.js";
import { GenerationHistory } from "../services/generation/GenerationHistory.js";
import { GenerationOrchestrator } from "../services/generation/GenerationOrchestrator.js";
import type { GenerationResult } from "../services/generation/GenerationTypes.js";
import { FileProfileRepository } from "../services/profile/FileProfileRepository.js";
import { ProfileBuilder } from "../services/profile/ProfileBuilder.js";
import type {
  ProfileMetadataUpdate,
  ValidationReport,
} from "../services/profile/ProfileTypes.js";
import { ProfileUsageTracker } from "../services/profile/ProfileUsageTracker.js";
import { errorMessage } from "../utils/ids.js";
import { toApiResult, type ApiResult } from "./ApiResult.js";

export interface GenerateAudioParams {
  readonly temperature?: number;
  readonly speed?: number;
  readonly language?: string;
  readonly mode?: GenerationMode;
  readonly outputPath?: string;
  readonly signal?: AbortSignal;
}

export interface DeletedProfile {
  readonly id: string;
  readonly deleted: true;
}

/**
 * Replacements for the collaborators built from config. Mainly for tests.
 */
export interface VoiceStudioDependencies {
  readonly codec?: IAudioCodec;
  readonly repository?: IProfileRepository;
  readonly engine?: IEngine;
  readonly history?: GenerationHistory;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export class VoiceStudio {
  private readonly repository: IProfileRepository;
  private readonly builder: ProfileBuilder;
  private readonly runner: EngineRunner;
  private readonly generator: GenerationOrchestrator;
  private readonly batch: BatchOrchestrator;
  private readonly history: GenerationHistory;
  private readonly usageTracker = new ProfileUsageTracker();
  private readonly logger: Logger;
  /** Create and rename run one at a time */
  private profileWrites: Promise<void> = Promise.resolve();

  constructor(
    readonly config: StudioConfig,
    dependencies?: Readonly<VoiceStudioDependencies>
  ) {
    const logger = dependencies?.logger ?? createConsoleLogger({ level: config.logging.level });
    this.logger = logger.child("Studio");

    const codec =
      dependencies?.codec ?? new WavAudioCodec({ targetSampleRate: config.audio.sampleRate });
    this.repository =
      dependencies?.repository ??
      new FileProfileRepository({ directory: config.paths.profiles, logger });

    const engine = dependencies?.engine ?? createEngine(config.engine, { codec, logger });

    this.builder = new ProfileBuilder({
      codec,
      repository: this.repository,
      minSampleDuration: config.profile.minSampleDuration,
      maxSampleDuration: config.profile.maxSampleDuration,
      recommendedMaxSampleDuration: config.profile.recommendedMaxSampleDuration,
      maxSamples: config.profile.maxSamples,
      defaultLanguage: this.resolveDefaultLanguage(config.profile.defaultLanguage, engine),
      logger,
      ...(dependencies?.now ? { now: dependencies.now } : {}),
    });
    this.runner = new EngineRunner(engine, { timeoutMs: config.generation.timeoutMs, logger });

    this.generator = new GenerationOrchestrator({
      repository: this.repository,
      runner: this.runner,
      codec,
      outputDir: config.paths.outputs,
      parameterPolicy: config.generation.parameterPolicy,
      usageTracker: this.usageTracker,
      logger,
    });

    this.batch = new BatchOrchestrator({
      generator: this.generator,
      repository: this.repository,
      defaultSplitter: config.batch.splitter,
      writeManifest: config.batch.writeManifest,
      usageTracker: this.usageTracker,
      logger,
    });

    this.history =
      dependencies?.history ??
      new GenerationHistory({
        ...(config.paths.history ? { filePath: config.paths.history } : {}),
        logger,
      });
  }

  validateSamples(paths: readonly string[]): Promise<ApiResult<ValidationReport>> {
    return toApiResult(() => this.builder.validate(paths), this.logger);
  }

  createVoiceProfile(
    name: string,
    paths: readonly string[],
    language?: string,
    referenceText?: string
  ): Promise<ApiResult<VoiceProfile>> {
    return toApiResult(() => this.serializeProfileWrite(async () => {
      const profile = await this.builder.build({
        name,
        samplePaths: paths,
        ...(language !== undefined ? { language } : {}),
        ...(referenceText !== undefined ? { referenceText } : {}),
      });
      await this.repository.save(profile);
      this.logger.info(`Created voice profile "${profile.name}"`, { profileId: profile.id });
      return profile;
    }), this.logger);
  }

  listVoiceProfiles(): Promise<ApiResult<readonly VoiceProfileSummary[]>> {
    return toApiResult(() => this.repository.list(), this.logger);
  }

  getVoiceProfile(id: string): Promise<ApiResult<VoiceProfile>> {
    return toApiResult(() => this.requireProfile(id), this.logger);
  }

  updateVoiceProfile(
    id: string,
    update: Readonly<ProfileMetadataUpdate>
  ): Promise<ApiResult<VoiceProfile>> {
    return toApiResult(() => this.serializeProfileWrite(async () => {
      const profile = await this.requireProfile(id);
      const updated = await this.builder.updateMetadata(profile, update);
      await this.repository.save(updated);
      return updated;
    }), this.logger);
  }

  deleteVoiceProfile(id: string): Promise<ApiResult<DeletedProfile>> {
    return toApiResult(async () => {
      const activeUses = this.usageTracker.activeUses(id);
      if (activeUses > 0) {
        throw new ProfileBusyError(id, activeUses);
      }
      if (!(await this.repository.delete(id))) {
        throw new ProfileNotFoundError(id);
      }
      this.logger.info(`Deleted voice profile ${id}`);
      return { id, deleted: true };
    }, this.logger);
  }

  generateAudio(
    profileId: string,
    text: string,
    params?: Readonly<GenerateAudioParams>
  ): Promise<ApiResult<GenerationResult>> {
    return toApiResult(async () => {
      const { outputPath, signal, ...request }: Readonly<GenerateAudioParams> = params ?? {};
      const result = await this.generator.generate(
        { ...request, profileId, text },
        {
          ...(outputPath !== undefined ? { outputPath } : {}),
          ...(signal ? { signal } : {}),
        }
      );
      await this.record(result);
      return result;
    }, this.logger);
  }

  /**
   * Successful segments are added to the history as well.
   */
  processBatch(
    profileId: string,
    script: Readonly<ScriptSource>,
    options: Readonly<BatchOptions>
  ): Promise<ApiResult<BatchManifest>> {
    return toApiResult(async () => {
      const manifest = await this.batch.process(profileId, script, options);
      await this.recordBatch(manifest.entries);
      return manifest;
    }, this.logger);
  }

  retryBatch(
    manifest: Readonly<BatchManifest>,
    options?: Readonly<RetryOptions>
  ): Promise<ApiResult<BatchManifest>> {
    return toApiResult(async () => {
      const retried = await this.batch.retryFailed(manifest, options);
      // Carried-over successes are the same objects as before and are already recorded
      const previous = new Set(manifest.entries);
      await this.recordBatch(retried.entries.filter((entry) => !previous.has(entry)));
      return retried;
    }, this.logger);
  }

  getEngineCapabilities(profileId: string): Promise<ApiResult<CapabilityDescriptor>> {
    return toApiResult(async () => {
      await this.requireProfile(profileId);
      return this.generator.describeCapabilities();
    }, this.logger);
  }

  getHistory(): Promise<ApiResult<readonly GenerationResult[]>> {
    return toApiResult(() => this.history.list(), this.logger);
  }

  /**
   * Waits for the running generation, rejects queued ones and releases the engine.
   */
  dispose(): Promise<ApiResult<void>> {
    return toApiResult(() => this.runner.dispose(), this.logger);
  }

  private async requireProfile(id: string): Promise<VoiceProfile> {
    const profile = await this.repository.findById(id);
    if (!profile) {
      throw new ProfileNotFoundError(id);
    }
    return profile;
  }

  private async recordBatch(entries: BatchManifest["entries"]): Promise<void> {
    for (const entry of entries) {
      if (entry.status === "success") {
        await this.record(entry.result);
      }
    }
  }

  /**
   * Appends to the history. A failed append is logged and never fails the
   * generation it records.
   */
  private async record(result: GenerationResult): Promise<void> {
    try {
      await this.history.append(result);
    } catch (error) {
      this.logger.error(`Failed to record ${result.id} in history: ${errorMessage(error)}`, {
        outputPath: result.outputPath,
      });
    }
  }

  private serializeProfileWrite<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.profileWrites.then(operation);
    // The chain only orders writes; each caller sees its own outcome through `run`
    this.profileWrites = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Falls back to the engine's first language when the configured default is not supported.
   */
  private resolveDefaultLanguage(configured: string, engine: IEngine): string {
    const supported = engine.describeCapabilities().supportedLanguages;
    const fallback = supported[0];
    if (fallback === undefined || supported.includes(configured)) {
      return configured;
    }
    this.logger.warn(
      `Default language "${configured}" is not supported by ${engine.name}; new profiles default to "${fallback}"`
    );
    return fallback;
  }
}

export function createVoiceStudio(
  config?: StudioConfig,
  dependencies?: Readonly<VoiceStudioDependencies>
): VoiceStudio {
  return new VoiceStudio(config ?? parseStudioConfig({}), dependencies);
}

/**
 * Loads configuration from file, environment and overrides, then builds the studio.
 */
export async function openVoiceStudio(
  options?: Readonly<LoadStudioConfigOptions>,
  dependencies?: Readonly<VoiceStudioDependencies>
): Promise<VoiceStudio> {
  return new VoiceStudio(await loadStudioConfig(options), dependencies);
}
