/**
 * Studio configuration.
 *
 * Sources in rising precedence: built-in defaults, an optional JSON file,
 * VOICE_STUDIO_* environment variables, explicit overrides. Objects are
 * deep-merged before the schema runs.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ConfigFileError, InvalidConfigError } from "../errors/ConfigError.js";
import { LOG_LEVELS } from "../logging/Logger.js";

const parameterRangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
    default: z.number(),
  })
  .refine((range) => range.min <= range.default && range.default <= range.max, {
    message: "default must lie within [min, max]",
  });

/**
 * Per-engine overrides of the descriptor the adapter declares.
 */
const capabilityOverridesSchema = z
  .object({
    maxTextLength: z.number().int().positive(),
    recommendedTextLength: z.number().int().positive(),
    minSampleDuration: z.number().nonnegative(),
    maxSampleDuration: z.number().positive(),
    temperature: parameterRangeSchema,
    speed: parameterRangeSchema,
  })
  .partial();

const xttsEngineSchema = z.object({
  kind: z.literal("xtts"),
  serverUrl: z.string().url().default("http://localhost:8000"),
  requestTimeoutMs: z.number().int().positive().default(120000),
  retryAttempts: z.number().int().nonnegative().default(2),
  retryDelayMs: z.number().int().nonnegative().default(1000),
  capabilities: capabilityOverridesSchema.default({}),
});

const speechT5EngineSchema = z.object({
  kind: z.literal("speecht5"),
  modelId: z.string().min(1).default("Xenova/speecht5_tts"),
  speakerEncoderId: z.string().min(1).default("Xenova/wavlm-base-plus-sv"),
  cacheDir: z.string().optional(),
  capabilities: capabilityOverridesSchema.default({}),
});

export const engineConfigSchema = z.discriminatedUnion("kind", [
  xttsEngineSchema,
  speechT5EngineSchema,
]);

export const studioConfigSchema = z
  .object({
    paths: z
      .object({
        profiles: z.string().min(1).default("profiles"),
        outputs: z.string().min(1).default("outputs"),
        /** JSON-lines generation history. Unset keeps history in memory only. */
        history: z.string().min(1).optional(),
      })
      .default({}),
    audio: z
      .object({
        sampleRate: z.number().int().min(8000).max(192000).default(24000),
      })
      .default({}),
    profile: z
      .object({
        minSampleDuration: z.number().positive().default(3),
        maxSampleDuration: z.number().positive().default(120),
        recommendedMaxSampleDuration: z.number().positive().default(30),
        maxSamples: z.number().int().positive().default(10),
        defaultLanguage: z.string().min(2).default("es"),
      })
      .default({}),
    generation: z
      .object({
        timeoutMs: z.number().int().positive().default(120000),
        parameterPolicy: z.enum(["clamp", "reject"]).default("clamp"),
      })
      .default({}),
    batch: z
      .object({
        splitter: z.enum(["paragraphs", "lines", "markers"]).default("paragraphs"),
        writeManifest: z.boolean().default(true),
      })
      .default({}),
    engine: engineConfigSchema.default({ kind: "xtts" }),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).default("info"),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.profile.minSampleDuration > config.profile.maxSampleDuration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "minSampleDuration must not exceed maxSampleDuration",
        path: ["profile", "minSampleDuration"],
      });
    }
  });

export type StudioConfig = z.infer<typeof studioConfigSchema>;
export type StudioConfigInput = z.input<typeof studioConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type CapabilityOverrides = z.infer<typeof capabilityOverridesSchema>;

export interface LoadStudioConfigOptions {
  /** JSON file merged over the defaults. Missing file is an error. */
  readonly configPath?: string;
  /** Defaults to process.env */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly overrides?: unknown;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merges `override` into `base`. Arrays and scalars replace.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

/**
 * Maps VOICE_STUDIO_* variables onto a partial config object.
 * Numeric values stay strings here and are coerced below.
 */
function configFromEnv(env: Readonly<Record<string, string | undefined>>): PlainObject {
  const config: PlainObject = {};
  const set = (path: readonly string[], value: unknown): void => {
    let node = config;
    for (const key of path.slice(0, -1)) {
      const next = node[key];
      if (isPlainObject(next)) {
        node = next;
      } else {
        const created: PlainObject = {};
        node[key] = created;
        node = created;
      }
    }
    const leaf = path[path.length - 1];
    if (leaf !== undefined) {
      node[leaf] = value;
    }
  };

  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const profilesDir = read("VOICE_STUDIO_PROFILES_DIR");
  if (profilesDir) set(["paths", "profiles"], profilesDir);

  const outputsDir = read("VOICE_STUDIO_OUTPUTS_DIR");
  if (outputsDir) set(["paths", "outputs"], outputsDir);

  const historyFile = read("VOICE_STUDIO_HISTORY_FILE");
  if (historyFile) set(["paths", "history"], historyFile);

  const logLevel = read("VOICE_STUDIO_LOG_LEVEL");
  if (logLevel) set(["logging", "level"], logLevel);

  const engine = read("VOICE_STUDIO_ENGINE");
  if (engine) set(["engine", "kind"], engine);

  const xttsUrl = read("VOICE_STUDIO_XTTS_URL");
  if (xttsUrl) set(["engine", "serverUrl"], xttsUrl);

  const timeout = read("VOICE_STUDIO_GENERATION_TIMEOUT_MS");
  if (timeout) set(["generation", "timeoutMs"], Number(timeout));

  const policy = read("VOICE_STUDIO_PARAMETER_POLICY");
  if (policy) set(["generation", "parameterPolicy"], policy);

  return config;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates an already-merged config object.
 * @throws {InvalidConfigError} With one line per schema issue
 */
export function parseStudioConfig(input: unknown): StudioConfig {
  const result = studioConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

async function readConfigFile(path: string): Promise<unknown> {
  try {
    const raw = await readFile(path, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigFileError(path, error);
  }
}

export async function loadStudioConfig(
  options?: Readonly<LoadStudioConfigOptions>
): Promise<StudioConfig> {
  let merged: unknown = {};

  if (options?.configPath) {
    merged = deepMerge(merged, await readConfigFile(options.configPath));
  }

  merged = deepMerge(merged, configFromEnv(options?.env ?? process.env));

  if (options?.overrides !== undefined) {
    merged = deepMerge(merged, options.overrides);
  }

  // Engine settings given without a kind belong to the default engine
  if (isPlainObject(merged) && isPlainObject(merged["engine"]) && merged["engine"]["kind"] === undefined) {
    merged = deepMerge(merged, { engine: { kind: "xtts" } });
  }

  return parseStudioConfig(merged);
}
