/**
 * JSON wire format for stored voice profiles.
 */

import { z } from "zod";

import type { VoiceProfile } from "../../interfaces/IVoiceProfile.js";

export const PROFILE_FORMAT_VERSION = 1;

const sampleSchema = z.object({
  path: z.string().min(1),
  durationSec: z.number().nonnegative(),
  sampleRate: z.number().int().nonnegative(),
  channels: z.number().int().nonnegative(),
  bitDepth: z.number().int().nonnegative(),
  isValid: z.boolean(),
  errors: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
});

export const storedProfileSchema = z
  .object({
    version: z.literal(PROFILE_FORMAT_VERSION),
    id: z.string().min(1),
    name: z.string().trim().min(1),
    description: z.string().optional(),
    samples: z.array(sampleSchema).min(1),
    totalDurationSec: z.number().nonnegative(),
    language: z.string().min(1),
    referenceText: z.string().optional(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .refine((profile) => profile.samples.some((sample) => sample.isValid), {
    message: "profile must contain at least one valid sample",
    path: ["samples"],
  });

export type StoredProfile = z.infer<typeof storedProfileSchema>;

export function serializeProfile(profile: Readonly<VoiceProfile>): string {
  const stored = { version: PROFILE_FORMAT_VERSION, ...profile };
  return `${JSON.stringify(stored, null, 2)}\n`;
}

export type ParsedProfile =
  | { readonly ok: true; readonly profile: VoiceProfile }
  | { readonly ok: false; readonly reason: string };

/**
 * Parses and validates stored JSON. Never throws.
 */
export function parseProfile(json: string): ParsedProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = storedProfileSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  const { version: _version, ...profile } = result.data;
  return { ok: true, profile };
}
