import type { EngineConfig } from "../../config/StudioConfig.js";
import type { IAudioCodec } from "../../interfaces/IAudioCodec.js";
import type { IEngine } from "../../interfaces/IEngine.js";
import type { Logger } from "../../logging/Logger.js";
import { SpeechT5Engine } from "./SpeechT5Engine.js";
import { XTTSEngine } from "./XTTSEngine.js";

export interface EngineDependencies {
  readonly codec: IAudioCodec;
  readonly logger?: Logger;
}

/**
 * Builds the configured engine. Nothing is loaded until initialize().
 */
export function createEngine(config: EngineConfig, dependencies: EngineDependencies): IEngine {
  const { codec, logger } = dependencies;

  switch (config.kind) {
    case "xtts":
      return new XTTSEngine({
        codec,
        serverUrl: config.serverUrl,
        timeoutMs: config.requestTimeoutMs,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
        capabilities: config.capabilities,
        ...(logger ? { logger } : {}),
      });
    case "speecht5":
      return new SpeechT5Engine({
        codec,
        modelId: config.modelId,
        speakerEncoderId: config.speakerEncoderId,
        ...(config.cacheDir ? { cacheDir: config.cacheDir } : {}),
        capabilities: config.capabilities,
        ...(logger ? { logger } : {}),
      });
  }
}
