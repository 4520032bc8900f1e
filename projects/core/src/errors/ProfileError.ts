/**
 * Error codes for voice profile errors.
 * Using unique string codes for programmatic identification.
 */
export const ProfileErrorCode = {
  NO_VALID_SAMPLES: "PROFILE_001",
  DUPLICATE_NAME: "PROFILE_002",
  NOT_FOUND: "PROFILE_003",
  STORAGE_FAILURE: "PROFILE_004",
  INVALID_NAME: "PROFILE_005",
  TOO_MANY_SAMPLES: "PROFILE_006",
  PROFILE_BUSY: "PROFILE_007",
} as const;

export type ProfileErrorCodeType =
  (typeof ProfileErrorCode)[keyof typeof ProfileErrorCode];

/**
 * Base error class for profile creation, lookup and storage errors.
 */
export class ProfileError extends Error {
  readonly code: ProfileErrorCodeType;

  constructor(
    code: ProfileErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = "ProfileError";
  }
}

/**
 * Error thrown when none of the submitted samples passed validation.
 */
export class NoValidSamplesError extends ProfileError {
  constructor(
    public readonly sampleCount: number,
    public readonly sampleErrors: Readonly<Record<string, readonly string[]>>
  ) {
    super(
      ProfileErrorCode.NO_VALID_SAMPLES,
      sampleCount === 0
        ? "No audio samples were provided"
        : `None of the ${sampleCount} audio samples passed validation`,
      { sampleCount, sampleErrors }
    );
    this.name = "NoValidSamplesError";
  }
}

export class DuplicateNameError extends ProfileError {
  constructor(
    public readonly profileName: string,
    public readonly existingId: string
  ) {
    super(
      ProfileErrorCode.DUPLICATE_NAME,
      `A voice profile named "${profileName}" already exists`,
      { profileName, existingId }
    );
    this.name = "DuplicateNameError";
  }
}

export class ProfileNotFoundError extends ProfileError {
  constructor(public readonly profileId: string) {
    super(ProfileErrorCode.NOT_FOUND, `Voice profile not found: ${profileId}`, {
      profileId,
    });
    this.name = "NotFoundError";
  }
}

/**
 * Error thrown when the profile store cannot be read or written.
 */
export class ProfileStorageError extends ProfileError {
  constructor(operation: string, reason: string, cause?: unknown) {
    super(
      ProfileErrorCode.STORAGE_FAILURE,
      `Profile storage ${operation} failed: ${reason}`,
      { operation, reason },
      { cause }
    );
    this.name = "StorageFailureError";
  }
}

export class InvalidProfileNameError extends ProfileError {
  constructor(profileName: string) {
    super(ProfileErrorCode.INVALID_NAME, "Profile name cannot be empty", {
      profileName,
    });
    this.name = "InvalidProfileNameError";
  }
}

export class TooManySamplesError extends ProfileError {
  constructor(
    public readonly sampleCount: number,
    public readonly maxSamples: number
  ) {
    super(
      ProfileErrorCode.TOO_MANY_SAMPLES,
      `Too many samples: ${sampleCount} (maximum ${maxSamples})`,
      { sampleCount, maxSamples }
    );
    this.name = "TooManySamplesError";
  }
}

/**
 * Error thrown when a profile is deleted while a generation is using it.
 */
export class ProfileBusyError extends ProfileError {
  constructor(
    public readonly profileId: string,
    public readonly activeUses: number
  ) {
    super(
      ProfileErrorCode.PROFILE_BUSY,
      `Voice profile ${profileId} is in use by ${activeUses} active generation(s)`,
      { profileId, activeUses }
    );
    this.name = "ProfileBusyError";
  }
}
