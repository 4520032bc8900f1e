import type { ErrorResponse } from "../../errors/ErrorResponse.js";
import type { GenerationMode } from "../../interfaces/IEngine.js";
import type { GenerationResult } from "../generation/GenerationTypes.js";
import type { ScriptSplitterFn, SplitterKind } from "./ScriptSplitter.js";

/**
 * Where a batch script comes from.
 * Pre-split segments are used as given, including empty ones.
 */
export type ScriptSource =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "file"; readonly path: string }
  | { readonly kind: "segments"; readonly segments: readonly string[] };

export interface BatchEntryBase {
  readonly index: number;
  readonly segmentId: string;
  readonly marker?: string;
  readonly text: string;
}

export interface BatchSuccessEntry extends BatchEntryBase {
  readonly status: "success";
  readonly result: GenerationResult;
}

export interface BatchFailedEntry extends BatchEntryBase {
  readonly status: "failed";
  readonly error: ErrorResponse;
}

export type BatchEntry = BatchSuccessEntry | BatchFailedEntry;

export interface BatchManifest {
  readonly id: string;
  readonly profileId: string;
  readonly outputDir: string;
  /** ISO-8601 */
  readonly createdAt: string;
  /** ISO-8601 */
  readonly completedAt: string;
  readonly entries: readonly BatchEntry[];
  readonly succeeded: number;
  readonly failed: number;
  /** True when the run stopped early because its signal aborted */
  readonly cancelled: boolean;
  readonly totalDurationSec: number;
  readonly totalGenerationTimeMs: number;
  /** Set when the manifest was written to disk */
  readonly manifestPath?: string;
}

export type BatchProgressListener = (
  entry: BatchEntry,
  completed: number,
  total: number
) => void;

export interface BatchOptions {
  readonly outputDir: string;
  /** Default: the configured splitter, else "paragraphs" */
  readonly splitter?: SplitterKind | ScriptSplitterFn;
  readonly temperature?: number;
  readonly speed?: number;
  readonly language?: string;
  readonly mode?: GenerationMode;
  readonly signal?: AbortSignal;
  readonly onProgress?: BatchProgressListener;
  /** Default: the orchestrator's setting */
  readonly writeManifest?: boolean;
}

export type RetryOptions = Omit<BatchOptions, "outputDir" | "splitter">;
