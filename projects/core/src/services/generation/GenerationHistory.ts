/**
 * Append-only log of successful generations.
 *
 * Entries are kept in memory. When a file path is given, each entry is also
 * appended to it as one JSON line and earlier lines are loaded on first use.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { GENERATION_MODES } from "../../interfaces/IEngine.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { errorMessage } from "../../utils/ids.js";
import type { GenerationResult } from "./GenerationTypes.js";

export interface GenerationHistoryOptions {
  /** JSON-lines file. Unset keeps history in memory only. */
  readonly filePath?: string;
  readonly logger?: Logger;
}

const historyEntrySchema = z.object({
  id: z.string(),
  status: z.literal("success"),
  profileId: z.string(),
  text: z.string(),
  textLength: z.number().int().nonnegative(),
  outputPath: z.string(),
  durationSec: z.number().nonnegative(),
  sampleRate: z.number().int().positive(),
  generationTimeMs: z.number().nonnegative(),
  parameters: z.object({
    temperature: z.number(),
    speed: z.number(),
    language: z.string(),
    mode: z.enum(GENERATION_MODES),
  }),
  parameterAdjustments: z.array(
    z.object({
      parameter: z.enum(["temperature", "speed"]),
      requested: z.number(),
      applied: z.number(),
    })
  ),
  qualityWarning: z
    .object({
      kind: z.literal("text_exceeds_recommended_length"),
      actual: z.number(),
      recommended: z.number(),
      message: z.string(),
    })
    .optional(),
  engine: z.string(),
  createdAt: z.string(),
});

export class GenerationHistory {
  private readonly filePath: string | null;
  private readonly logger: Logger;
  private readonly entries: GenerationResult[] = [];
  private loaded: Promise<void> | null = null;

  constructor(options?: Readonly<GenerationHistoryOptions>) {
    this.filePath = options?.filePath ?? null;
    this.logger = (options?.logger ?? silentLogger).child("History");
  }

  /**
   * Records a result. The stored entry is frozen.
   */
  async append(result: Readonly<GenerationResult>): Promise<GenerationResult> {
    await this.load();
    const entry = Object.freeze({ ...result });
    this.entries.push(entry);

    if (this.filePath) {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
    }
    return entry;
  }

  /** Oldest first. */
  async list(): Promise<readonly GenerationResult[]> {
    await this.load();
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  private load(): Promise<void> {
    if (!this.loaded) {
      // A failed read is forgotten so the next call tries again
      this.loaded = this.readFile().catch((error: unknown) => {
        this.loaded = null;
        throw error;
      });
    }
    return this.loaded;
  }

  /**
   * Malformed lines are skipped with a warning; a missing file is an empty history.
   */
  private async readFile(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    const restored: GenerationResult[] = [];
    content.split("\n").forEach((line, lineIndex) => {
      if (line.trim().length === 0) {
        return;
      }
      try {
        const parsed = historyEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          restored.push(Object.freeze(parsed.data));
        } else {
          this.logger.warn(`Skipping history line ${lineIndex + 1}: not a generation result`);
        }
      } catch (error) {
        this.logger.warn(`Skipping history line ${lineIndex + 1}: ${errorMessage(error)}`);
      }
    });

    this.entries.unshift(...restored);
  }
}

export function createGenerationHistory(
  options?: Readonly<GenerationHistoryOptions>
): GenerationHistory {
  return new GenerationHistory(options);
}
