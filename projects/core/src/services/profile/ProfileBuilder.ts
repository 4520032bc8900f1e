/**
 * Validates reference samples and assembles voice profiles.
 *
 * Only probes audio through the codec; persisting the result is the caller's job.
 * Engine-specific duration bounds are not checked here, because a profile may
 * later be used with a different engine.
 */

import { CodecError } from "../../errors/CodecError.js";
import {
  DuplicateNameError,
  InvalidProfileNameError,
  NoValidSamplesError,
  TooManySamplesError,
} from "../../errors/ProfileError.js";
import type {
  AudioProbe,
  IAudioCodec,
  NormalizedAudio,
} from "../../interfaces/IAudioCodec.js";
import type { IProfileRepository } from "../../interfaces/IProfileRepository.js";
import type { AudioSampleRef, VoiceProfile } from "../../interfaces/IVoiceProfile.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { generateId } from "../../utils/ids.js";
import type {
  CreateProfileInput,
  ProfileMetadataUpdate,
  SampleValidation,
  ValidationReport,
} from "./ProfileTypes.js";

export interface ProfileBuilderOptions {
  readonly codec: IAudioCodec;
  readonly repository: IProfileRepository;
  /** Default: 3 */
  readonly minSampleDuration?: number;
  /** Default: 120 */
  readonly maxSampleDuration?: number;
  /** Longer samples are accepted with a warning. Default: 30 */
  readonly recommendedMaxSampleDuration?: number;
  /** Default: 10 */
  readonly maxSamples?: number;
  /** Default: "es" */
  readonly defaultLanguage?: string;
  readonly logger?: Logger;
  /** Injectable clock for timestamps */
  readonly now?: () => Date;
}

const CLIPPING_THRESHOLD = 0.99;

export function normalizeProfileName(name: string): string {
  return name.trim().toLowerCase();
}

export class ProfileBuilder {
  private readonly codec: IAudioCodec;
  private readonly repository: IProfileRepository;
  private readonly minSampleDuration: number;
  private readonly maxSampleDuration: number;
  private readonly recommendedMaxSampleDuration: number;
  private readonly maxSamples: number;
  private readonly defaultLanguage: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: Readonly<ProfileBuilderOptions>) {
    this.codec = options.codec;
    this.repository = options.repository;
    this.minSampleDuration = options.minSampleDuration ?? 3;
    this.maxSampleDuration = options.maxSampleDuration ?? 120;
    this.recommendedMaxSampleDuration = options.recommendedMaxSampleDuration ?? 30;
    this.maxSamples = options.maxSamples ?? 10;
    this.defaultLanguage = options.defaultLanguage ?? "es";
    this.logger = (options.logger ?? silentLogger).child("ProfileBuilder");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Checks every sample independently. Codec failures mark a sample invalid
   * rather than failing the whole report.
   */
  async validate(samplePaths: readonly string[]): Promise<ValidationReport> {
    const samples = await Promise.all(samplePaths.map((path) => this.validateSample(path)));
    const valid = samples.filter((sample) => sample.valid);

    return {
      samples,
      allValid: samples.length > 0 && valid.length === samples.length,
      validCount: valid.length,
      invalidCount: samples.length - valid.length,
      totalDurationSec: valid.reduce((sum, sample) => sum + (sample.metadata?.durationSec ?? 0), 0),
    };
  }

  /**
   * Builds a new profile from the samples that pass validation.
   *
   * @throws {InvalidProfileNameError} Blank name
   * @throws {TooManySamplesError} More samples than allowed
   * @throws {NoValidSamplesError} No sample passed validation
   * @throws {DuplicateNameError} Another profile already uses the name
   */
  async build(input: Readonly<CreateProfileInput>): Promise<VoiceProfile> {
    const name = input.name.trim();
    if (name.length === 0) {
      throw new InvalidProfileNameError(input.name);
    }
    if (input.samplePaths.length > this.maxSamples) {
      throw new TooManySamplesError(input.samplePaths.length, this.maxSamples);
    }

    const report = await this.validate(input.samplePaths);
    if (report.validCount === 0) {
      const sampleErrors: Record<string, readonly string[]> = {};
      for (const sample of report.samples) {
        sampleErrors[sample.path] = sample.errors;
      }
      throw new NoValidSamplesError(report.samples.length, sampleErrors);
    }

    await this.assertNameAvailable(name);

    const timestamp = this.now().toISOString();
    const description = input.description?.trim();
    const profile: VoiceProfile = {
      id: generateId("voice"),
      name,
      ...(description ? { description } : {}),
      samples: report.samples.map(toSampleRef),
      totalDurationSec: report.totalDurationSec,
      language: input.language ?? this.defaultLanguage,
      ...(input.referenceText ? { referenceText: input.referenceText } : {}),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.logger.info(`Built profile "${name}"`, {
      profileId: profile.id,
      validSamples: report.validCount,
      invalidSamples: report.invalidCount,
      totalDurationSec: Number(report.totalDurationSec.toFixed(2)),
    });

    return profile;
  }

  /**
   * Returns a copy of `profile` with renamed or re-described metadata.
   * Samples are never touched.
   *
   * @throws {InvalidProfileNameError}
   * @throws {DuplicateNameError}
   */
  async updateMetadata(
    profile: Readonly<VoiceProfile>,
    update: Readonly<ProfileMetadataUpdate>
  ): Promise<VoiceProfile> {
    let name = profile.name;
    if (update.name !== undefined) {
      name = update.name.trim();
      if (name.length === 0) {
        throw new InvalidProfileNameError(update.name);
      }
      if (normalizeProfileName(name) !== normalizeProfileName(profile.name)) {
        await this.assertNameAvailable(name, profile.id);
      }
    }

    const { description: _previous, ...rest } = profile;
    const description =
      update.description !== undefined ? update.description.trim() : profile.description;

    return {
      ...rest,
      name,
      ...(description ? { description } : {}),
      updatedAt: this.now().toISOString(),
    };
  }

  private async assertNameAvailable(name: string, ignoreId?: string): Promise<void> {
    const wanted = normalizeProfileName(name);
    const existing = (await this.repository.list()).find(
      (summary) => summary.id !== ignoreId && normalizeProfileName(summary.name) === wanted
    );
    if (existing) {
      throw new DuplicateNameError(name, existing.id);
    }
  }

  private async decodeSample(
    path: string
  ): Promise<{ probe: AudioProbe; normalized: NormalizedAudio } | CodecError> {
    try {
      const probe = await this.codec.probe(path);
      const normalized = await this.codec.normalize(path);
      return { probe, normalized };
    } catch (error) {
      if (error instanceof CodecError) {
        return error;
      }
      throw error;
    }
  }

  private async validateSample(path: string): Promise<SampleValidation> {
    const decoded = await this.decodeSample(path);
    if (decoded instanceof CodecError) {
      this.logger.warn(`Sample rejected: ${decoded.message}`);
      return { path, valid: false, errors: [decoded.message], warnings: [] };
    }
    const { probe, normalized } = decoded;

    const durationSec = normalized.durationSec;
    const errors: string[] = [];
    const warnings: string[] = [];

    if (durationSec <= 0) {
      errors.push("Sample contains no audio");
    } else if (durationSec < this.minSampleDuration) {
      errors.push(
        `Sample too short: ${durationSec.toFixed(2)}s (minimum ${this.minSampleDuration}s)`
      );
    } else if (durationSec > this.maxSampleDuration) {
      errors.push(
        `Sample too long: ${durationSec.toFixed(2)}s (maximum ${this.maxSampleDuration}s)`
      );
    } else if (durationSec > this.recommendedMaxSampleDuration) {
      warnings.push(
        `Sample longer than recommended: ${durationSec.toFixed(2)}s (recommended up to ${this.recommendedMaxSampleDuration}s)`
      );
    }

    if (probe.sampleRate !== this.codec.targetSampleRate) {
      warnings.push(
        `Sample rate ${probe.sampleRate} Hz will be resampled to ${this.codec.targetSampleRate} Hz`
      );
    }
    if (probe.channels > 1) {
      warnings.push(`${probe.channels} channels will be down-mixed to mono`);
    }
    if (probe.bitDepth !== 16) {
      warnings.push(`${probe.bitDepth}-bit audio will be stored as 16-bit`);
    }
    if (probe.peakAmplitude >= CLIPPING_THRESHOLD) {
      warnings.push(`Possible clipping (peak ${probe.peakAmplitude.toFixed(2)})`);
    }

    return {
      path,
      valid: errors.length === 0,
      errors,
      warnings,
      metadata: {
        durationSec,
        sampleRate: probe.sampleRate,
        channels: probe.channels,
        bitDepth: probe.bitDepth,
        peakAmplitude: probe.peakAmplitude,
      },
    };
  }
}

function toSampleRef(sample: SampleValidation): AudioSampleRef {
  return {
    path: sample.path,
    durationSec: sample.metadata?.durationSec ?? 0,
    sampleRate: sample.metadata?.sampleRate ?? 0,
    channels: sample.metadata?.channels ?? 0,
    bitDepth: sample.metadata?.bitDepth ?? 0,
    isValid: sample.valid,
    errors: sample.errors,
    warnings: sample.warnings,
  };
}

export function createProfileBuilder(options: Readonly<ProfileBuilderOptions>): ProfileBuilder {
  return new ProfileBuilder(options);
}
