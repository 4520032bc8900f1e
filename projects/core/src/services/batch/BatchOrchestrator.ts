/**
 * Batch generation from a script.
 *
 * Segments run one after another through the single-request orchestrator, so
 * every segment gets the same checks. A failed segment is recorded in the
 * manifest and the run continues. Once the caller's signal aborts, remaining
 * segments are recorded as cancelled without reaching the engine.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { toErrorResponse } from "../../errors/ErrorResponse.js";
import {
  EmptyTextError,
  GenerationCancelledError,
  GenerationProfileNotFoundError,
  ScriptReadError,
} from "../../errors/GenerationError.js";
import type { IProfileRepository } from "../../interfaces/IProfileRepository.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { errorMessage, generateId } from "../../utils/ids.js";
import type { GenerationOrchestrator } from "../generation/GenerationOrchestrator.js";
import type { ProfileUsageTracker } from "../profile/ProfileUsageTracker.js";
import type {
  BatchEntry,
  BatchEntryBase,
  BatchManifest,
  BatchOptions,
  RetryOptions,
  ScriptSource,
} from "./BatchTypes.js";
import {
  resolveSplitter,
  toSegments,
  type ScriptSegment,
  type SplitterKind,
} from "./ScriptSplitter.js";

export interface BatchOrchestratorOptions {
  readonly generator: GenerationOrchestrator;
  readonly repository: IProfileRepository;
  /** Default: "paragraphs" */
  readonly defaultSplitter?: SplitterKind;
  /** Write manifest.json next to the outputs. Default: true */
  readonly writeManifest?: boolean;
  readonly usageTracker?: ProfileUsageTracker;
  readonly logger?: Logger;
}

/**
 * Failure kinds that would fail again with the same input.
 */
export const NON_RETRYABLE_KINDS: ReadonlySet<string> = new Set([
  "TextTooLong",
  "EmptyText",
  "InvalidParameter",
  "UnsupportedMode",
  "UnsupportedLanguage",
]);

export const MANIFEST_FILENAME = "manifest.json";

interface PlannedSegment {
  readonly segment: ScriptSegment;
  /** Outcome carried over unchanged from an earlier run */
  readonly carried?: BatchEntry;
}

export class BatchOrchestrator {
  private readonly generator: GenerationOrchestrator;
  private readonly repository: IProfileRepository;
  private readonly defaultSplitter: SplitterKind;
  private readonly writeManifestByDefault: boolean;
  private readonly usageTracker: ProfileUsageTracker | undefined;
  private readonly logger: Logger;

  constructor(options: Readonly<BatchOrchestratorOptions>) {
    this.generator = options.generator;
    this.repository = options.repository;
    this.defaultSplitter = options.defaultSplitter ?? "paragraphs";
    this.writeManifestByDefault = options.writeManifest ?? true;
    this.usageTracker = options.usageTracker;
    this.logger = (options.logger ?? silentLogger).child("Batch");
  }

  /**
   * Generates every segment of `script` into `options.outputDir`.
   *
   * @throws {GenerationProfileNotFoundError} Before any segment runs
   * @throws {ScriptReadError} If a script file cannot be read
   * @throws {EmptyTextError} If the script yields no segments
   */
  async process(
    profileId: string,
    script: Readonly<ScriptSource>,
    options: Readonly<BatchOptions>
  ): Promise<BatchManifest> {
    await this.assertProfileExists(profileId);

    const segments = await this.loadSegments(script, options);
    if (segments.length === 0) {
      throw new EmptyTextError();
    }

    this.logger.info(`Starting batch of ${segments.length} segments`, {
      profileId,
      outputDir: options.outputDir,
    });

    return this.run(
      profileId,
      options.outputDir,
      segments.map((segment) => ({ segment })),
      options
    );
  }

  /**
   * Re-runs the failed entries of a finished manifest. Failures that cannot
   * succeed on a second attempt are carried over as they are.
   */
  async retryFailed(
    manifest: Readonly<BatchManifest>,
    options?: Readonly<RetryOptions>
  ): Promise<BatchManifest> {
    await this.assertProfileExists(manifest.profileId);

    const planned: PlannedSegment[] = manifest.entries.map((entry) => {
      const segment: ScriptSegment = {
        index: entry.index,
        segmentId: entry.segmentId,
        ...(entry.marker !== undefined ? { marker: entry.marker } : {}),
        text: entry.text,
      };
      const retry = entry.status === "failed" && !NON_RETRYABLE_KINDS.has(entry.error.kind);
      return retry ? { segment } : { segment, carried: entry };
    });

    const retrying = planned.filter((item) => !item.carried).length;
    this.logger.info(`Retrying ${retrying} of ${planned.length} segments`, {
      manifestId: manifest.id,
    });

    return this.run(manifest.profileId, manifest.outputDir, planned, {
      ...options,
      outputDir: manifest.outputDir,
    });
  }

  private async run(
    profileId: string,
    outputDir: string,
    planned: readonly PlannedSegment[],
    options: Readonly<BatchOptions>
  ): Promise<BatchManifest> {
    const createdAt = new Date().toISOString();
    const release = this.usageTracker?.acquire(profileId);
    const entries: BatchEntry[] = [];
    const total = planned.filter((item) => !item.carried).length;
    let completed = 0;
    let cancelled = false;

    try {
      for (const { segment, carried } of planned) {
        if (carried) {
          entries.push(carried);
          continue;
        }

        let entry: BatchEntry;
        if (options.signal?.aborted) {
          cancelled = true;
          entry = this.failedEntry(segment, new GenerationCancelledError(this.generator.engineName));
        } else {
          entry = await this.runSegment(profileId, outputDir, segment, options);
          if (entry.status === "failed" && options.signal?.aborted) {
            cancelled = true;
          }
        }

        entries.push(entry);
        completed++;
        options.onProgress?.(entry, completed, total);
      }
    } finally {
      release?.();
    }

    let succeeded = 0;
    let totalDurationSec = 0;
    let totalGenerationTimeMs = 0;
    for (const entry of entries) {
      if (entry.status === "success") {
        succeeded++;
        totalDurationSec += entry.result.durationSec;
        totalGenerationTimeMs += entry.result.generationTimeMs;
      }
    }

    const manifest: BatchManifest = {
      id: generateId("batch"),
      profileId,
      outputDir,
      createdAt,
      completedAt: new Date().toISOString(),
      entries: Object.freeze(entries.map((entry) => Object.freeze(entry))),
      succeeded,
      failed: entries.length - succeeded,
      cancelled,
      totalDurationSec,
      totalGenerationTimeMs,
    };

    this.logger.info(`Batch finished: ${succeeded}/${entries.length} succeeded`, {
      manifestId: manifest.id,
      cancelled,
    });

    const shouldWrite = options.writeManifest ?? this.writeManifestByDefault;
    const manifestPath = shouldWrite ? await this.writeManifest(manifest) : undefined;

    return Object.freeze(manifestPath ? { ...manifest, manifestPath } : manifest);
  }

  private async runSegment(
    profileId: string,
    outputDir: string,
    segment: ScriptSegment,
    options: Readonly<BatchOptions>
  ): Promise<BatchEntry> {
    try {
      const result = await this.generator.generate(
        {
          profileId,
          text: segment.text,
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          ...(options.speed !== undefined ? { speed: options.speed } : {}),
          ...(options.language !== undefined ? { language: options.language } : {}),
          ...(options.mode !== undefined ? { mode: options.mode } : {}),
        },
        {
          outputPath: join(outputDir, `${segment.segmentId}.wav`),
          ...(options.signal ? { signal: options.signal } : {}),
        }
      );
      return { ...this.entryBase(segment), status: "success", result };
    } catch (error) {
      this.logger.warn(`Segment ${segment.segmentId} failed: ${errorMessage(error)}`);
      return this.failedEntry(segment, error);
    }
  }

  private entryBase(segment: ScriptSegment): BatchEntryBase {
    return {
      index: segment.index,
      segmentId: segment.segmentId,
      ...(segment.marker !== undefined ? { marker: segment.marker } : {}),
      text: segment.text,
    };
  }

  private failedEntry(segment: ScriptSegment, error: unknown): BatchEntry {
    return { ...this.entryBase(segment), status: "failed", error: toErrorResponse(error) };
  }

  private async loadSegments(
    script: Readonly<ScriptSource>,
    options: Readonly<BatchOptions>
  ): Promise<ScriptSegment[]> {
    if (script.kind === "segments") {
      return toSegments(script.segments.map((text) => ({ text })));
    }

    const text = script.kind === "file" ? await this.readScript(script.path) : script.text;
    const split = resolveSplitter(options.splitter ?? this.defaultSplitter);
    return toSegments(split(text));
  }

  private async readScript(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      throw new ScriptReadError(path, error);
    }
  }

  private async assertProfileExists(profileId: string): Promise<void> {
    const profile = await this.repository.findById(profileId);
    if (!profile) {
      throw new GenerationProfileNotFoundError(profileId);
    }
  }

  /**
   * Returns the written path, or undefined when writing failed. The batch
   * outcome does not depend on the manifest file.
   */
  private async writeManifest(manifest: Readonly<BatchManifest>): Promise<string | undefined> {
    const path = join(manifest.outputDir, MANIFEST_FILENAME);
    try {
      await mkdir(manifest.outputDir, { recursive: true });
      await writeFile(path, JSON.stringify({ ...manifest, manifestPath: path }, null, 2), "utf8");
      return path;
    } catch (error) {
      this.logger.error(`Failed to write batch manifest ${path}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}

export function createBatchOrchestrator(
  options: Readonly<BatchOrchestratorOptions>
): BatchOrchestrator {
  return new BatchOrchestrator(options);
}
