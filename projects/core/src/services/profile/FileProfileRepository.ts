/**
 * Stores each voice profile as "<id>.json" in one directory.
 */

import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ProfileStorageError } from "../../errors/ProfileError.js";
import type { IProfileRepository } from "../../interfaces/IProfileRepository.js";
import {
  summarizeProfile,
  type VoiceProfile,
  type VoiceProfileSummary,
} from "../../interfaces/IVoiceProfile.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { errorMessage } from "../../utils/ids.js";
import { parseProfile, serializeProfile } from "./ProfileSerializer.js";

export interface FileProfileRepositoryOptions {
  readonly directory: string;
  readonly logger?: Logger;
}

const PROFILE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PROFILE_FILE_SUFFIX = ".json";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileProfileRepository implements IProfileRepository {
  readonly directory: string;
  private readonly logger: Logger;

  constructor(options: Readonly<FileProfileRepositoryOptions>) {
    this.directory = options.directory;
    this.logger = (options.logger ?? silentLogger).child("ProfileRepository");
  }

  async save(profile: Readonly<VoiceProfile>): Promise<void> {
    if (!PROFILE_ID_PATTERN.test(profile.id)) {
      throw new ProfileStorageError("save", `invalid profile id "${profile.id}"`);
    }

    const target = this.pathFor(profile.id);
    const temporary = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temporary, serializeProfile(profile), "utf8");
      await rename(temporary, target);
    } catch (error) {
      throw new ProfileStorageError("save", errorMessage(error), error);
    }
    this.logger.debug(`Saved profile ${profile.id}`);
  }

  async findById(id: string): Promise<VoiceProfile | undefined> {
    if (!PROFILE_ID_PATTERN.test(id)) {
      return undefined;
    }

    let json: string;
    try {
      json = await readFile(this.pathFor(id), "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new ProfileStorageError("read", errorMessage(error), error);
    }

    const parsed = parseProfile(json);
    if (!parsed.ok) {
      throw new ProfileStorageError("read", `profile ${id} is corrupt: ${parsed.reason}`);
    }
    return parsed.profile;
  }

  /**
   * Summaries sorted by name. Files that fail validation are skipped with a warning.
   */
  async list(): Promise<readonly VoiceProfileSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new ProfileStorageError("list", errorMessage(error), error);
    }

    const summaries: VoiceProfileSummary[] = [];
    for (const entry of entries.filter((name) => name.endsWith(PROFILE_FILE_SUFFIX)).sort()) {
      const path = join(this.directory, entry);
      let json: string;
      try {
        json = await readFile(path, "utf8");
      } catch (error) {
        this.logger.warn(`Skipping unreadable profile file ${entry}: ${errorMessage(error)}`);
        continue;
      }

      const parsed = parseProfile(json);
      if (!parsed.ok) {
        this.logger.warn(`Skipping invalid profile file ${entry}: ${parsed.reason}`);
        continue;
      }
      summaries.push(summarizeProfile(parsed.profile));
    }

    return summaries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async delete(id: string): Promise<boolean> {
    if (!PROFILE_ID_PATTERN.test(id)) {
      return false;
    }
    try {
      await unlink(this.pathFor(id));
      this.logger.debug(`Deleted profile ${id}`);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new ProfileStorageError("delete", errorMessage(error), error);
    }
  }

  private pathFor(id: string): string {
    return join(this.directory, `${id}${PROFILE_FILE_SUFFIX}`);
  }
}

export function createFileProfileRepository(
  options: Readonly<FileProfileRepositoryOptions>
): FileProfileRepository {
  return new FileProfileRepository(options);
}
