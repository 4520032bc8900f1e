export const ConfigErrorCode = {
  INVALID_CONFIG: "CONFIG_001",
  UNREADABLE_FILE: "CONFIG_002",
} as const;

export type ConfigErrorCodeType =
  (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class ConfigError extends Error {
  readonly code: ConfigErrorCodeType;

  constructor(
    code: ConfigErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when the merged configuration fails schema validation.
 * `issues` holds one "path: message" line per problem.
 */
export class InvalidConfigError extends ConfigError {
  constructor(public readonly issues: readonly string[]) {
    super(
      ConfigErrorCode.INVALID_CONFIG,
      `Invalid configuration:\n  ${issues.join("\n  ")}`,
      { issues }
    );
    this.name = "InvalidConfigError";
  }
}

export class ConfigFileError extends ConfigError {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      ConfigErrorCode.UNREADABLE_FILE,
      `Cannot read config file ${path}: ${reason}`,
      { path, reason },
      { cause }
    );
    this.name = "ConfigFileError";
  }
}
