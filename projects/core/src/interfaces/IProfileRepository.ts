import type { VoiceProfile, VoiceProfileSummary } from "./IVoiceProfile.js";

/**
 * Persistence port for voice profiles.
 * Lookups return undefined for missing profiles; storage problems throw ProfileStorageError.
 */
export interface IProfileRepository {
  save(profile: Readonly<VoiceProfile>): Promise<void>;
  findById(id: string): Promise<VoiceProfile | undefined>;
  list(): Promise<readonly VoiceProfileSummary[]>;
  /** Returns false when no profile had that id. */
  delete(id: string): Promise<boolean>;
}
