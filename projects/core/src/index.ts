/**
 * Voice studio core: profiles, constrained generation and batch scripts
 * over a pluggable speech engine.
 */

export {
  VoiceStudio,
  createVoiceStudio,
  openVoiceStudio,
  type GenerateAudioParams,
  type DeletedProfile,
  type VoiceStudioDependencies,
} from "./studio/VoiceStudio.js";
export { toApiResult, type ApiResult } from "./studio/ApiResult.js";

export {
  loadStudioConfig,
  parseStudioConfig,
  studioConfigSchema,
  type StudioConfig,
  type StudioConfigInput,
  type EngineConfig,
  type LoadStudioConfigOptions,
} from "./config/StudioConfig.js";

export {
  createConsoleLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from "./logging/Logger.js";

// Errors
export { toErrorResponse, type ErrorResponse, type ErrorCategory } from "./errors/ErrorResponse.js";
export * from "./errors/ProfileError.js";
export * from "./errors/GenerationError.js";
export * from "./errors/CodecError.js";
export * from "./errors/EngineError.js";
export * from "./errors/ConfigError.js";

// Contracts
export type * from "./interfaces/IAudioCodec.js";
export type * from "./interfaces/IEngine.js";
export type * from "./interfaces/IProfileRepository.js";
export { GENERATION_MODES } from "./interfaces/IEngine.js";
export {
  summarizeProfile,
  validSamples,
  type AudioSampleRef,
  type VoiceProfile,
  type VoiceProfileSummary,
} from "./interfaces/IVoiceProfile.js";

// Profiles
export { ProfileBuilder, createProfileBuilder, type ProfileBuilderOptions } from "./services/profile/ProfileBuilder.js";
export {
  FileProfileRepository,
  createFileProfileRepository,
  type FileProfileRepositoryOptions,
} from "./services/profile/FileProfileRepository.js";
export { ProfileUsageTracker } from "./services/profile/ProfileUsageTracker.js";
export type * from "./services/profile/ProfileTypes.js";

// Engines
export {
  createCapabilityDescriptor,
  applyCapabilityOverrides,
  checkTextLength,
  checkProfileCompatibility,
  resolveParameter,
  textLength,
  DEFAULT_TEMPERATURE_RANGE,
  DEFAULT_SPEED_RANGE,
  type CapabilityDescriptorInput,
  type ParameterPolicy,
  type ParameterAdjustment,
  type QualityWarning,
  type TextLengthCheck,
} from "./services/engine/CapabilityDescriptor.js";
export { EngineRunner, type EngineRunnerOptions, type RunOptions } from "./services/engine/EngineRunner.js";
export { createEngine, type EngineDependencies } from "./services/engine/EngineFactory.js";
export { XTTSEngine, createXTTSEngine, XTTS_CAPABILITIES, type XTTSEngineOptions } from "./services/engine/XTTSEngine.js";
export { XTTSClient, createXTTSClient, XTTS_LANGUAGES, type XTTSClientOptions } from "./services/engine/XTTSClient.js";
export {
  SpeechT5Engine,
  createSpeechT5Engine,
  SPEECHT5_CAPABILITIES,
  type SpeechT5EngineOptions,
} from "./services/engine/SpeechT5Engine.js";

// Generation
export {
  GenerationOrchestrator,
  createGenerationOrchestrator,
  type GenerationOrchestratorOptions,
  type PreparedRequest,
} from "./services/generation/GenerationOrchestrator.js";
export {
  GenerationHistory,
  createGenerationHistory,
  type GenerationHistoryOptions,
} from "./services/generation/GenerationHistory.js";
export type * from "./services/generation/GenerationTypes.js";

// Batch
export {
  BatchOrchestrator,
  createBatchOrchestrator,
  NON_RETRYABLE_KINDS,
  MANIFEST_FILENAME,
  type BatchOrchestratorOptions,
} from "./services/batch/BatchOrchestrator.js";
export {
  SPLITTER_KINDS,
  resolveSplitter,
  splitLines,
  splitMarkers,
  splitParagraphs,
  type SplitterKind,
  type ScriptSegment,
} from "./services/batch/ScriptSplitter.js";
export type * from "./services/batch/BatchTypes.js";

// Audio
export * from "./audio/index.js";
