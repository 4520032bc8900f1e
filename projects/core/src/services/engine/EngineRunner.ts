/**
 * Serializes access to a single engine instance.
 *
 * - The model is loaded at most once per runner (concurrent first calls share the load).
 * - Tasks run one at a time in FIFO order.
 * - Each task gets a timeout and honours the caller's AbortSignal.
 *
 * A task that times out or is cancelled is rejected immediately, but the engine
 * stays locked until its call actually settles. Adapters receive an AbortSignal
 * and are expected to stop work when it fires.
 */

import { EngineNotInitializedError } from "../../errors/EngineError.js";
import {
  GenerationCancelledError,
  GenerationTimeoutError,
} from "../../errors/GenerationError.js";
import type { CapabilityDescriptor, IEngine } from "../../interfaces/IEngine.js";
import { silentLogger, type Logger } from "../../logging/Logger.js";
import { errorMessage } from "../../utils/ids.js";

export interface EngineRunnerOptions {
  /** Default timeout per task in milliseconds. Default: 120000 */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

export interface RunOptions {
  /** Overrides the runner's default timeout */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export type EngineTask<T> = (engine: IEngine, signal: AbortSignal) => Promise<T>;

interface QueueEntry {
  readonly id: number;
  /** Runs the task; never rejects. Resolves once the engine call has settled. */
  start(): Promise<void>;
  /** Rejects the caller without touching the engine. */
  cancel(error: Error): void;
}

export const DEFAULT_ENGINE_TIMEOUT_MS = 120000;

export class EngineRunner {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly queue: QueueEntry[] = [];
  private currentTask: { readonly id: number; readonly done: Promise<void> } | null = null;
  private readyPromise: Promise<void> | null = null;
  private nextTaskId = 1;
  private disposed = false;

  constructor(
    readonly engine: IEngine,
    options?: Readonly<EngineRunnerOptions>
  ) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_ENGINE_TIMEOUT_MS;
    this.logger = (options?.logger ?? silentLogger).child("EngineRunner");
  }

  get engineName(): string {
    return this.engine.name;
  }

  /** Tasks waiting plus the one running. */
  get pendingCount(): number {
    return this.queue.length + (this.currentTask ? 1 : 0);
  }

  describeCapabilities(): CapabilityDescriptor {
    return this.engine.describeCapabilities();
  }

  /**
   * Loads the engine once. A failed load is forgotten so the next call retries.
   */
  ensureReady(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new EngineNotInitializedError(this.engine.name));
    }
    if (!this.readyPromise) {
      this.logger.info(`Loading engine ${this.engine.name}`);
      const startedAt = Date.now();
      this.readyPromise = this.engine.initialize().then(
        () => {
          this.logger.info(`Engine ${this.engine.name} ready`, {
            loadTimeMs: Date.now() - startedAt,
          });
        },
        (error: unknown) => {
          this.readyPromise = null;
          throw error;
        }
      );
    }
    return this.readyPromise;
  }

  /**
   * Runs `task` with exclusive access to the engine.
   *
   * @throws {GenerationTimeoutError} When the task runs longer than the timeout
   * @throws {GenerationCancelledError} When the signal aborts before the task finishes
   */
  async run<T>(task: EngineTask<T>, options?: Readonly<RunOptions>): Promise<T> {
    const signal = options?.signal;
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;

    if (signal?.aborted) {
      throw new GenerationCancelledError(this.engine.name);
    }

    await this.ensureReady();

    return new Promise<T>((resolve, reject) => {
      const id = this.nextTaskId++;
      let settled = false;
      let removeQueuedAbort: () => void = () => {};

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        removeQueuedAbort();
        finish();
      };

      const entry: QueueEntry = {
        id,
        cancel: (error) => settle(() => reject(error)),
        start: async () => {
          if (settled) return;
          if (signal?.aborted) {
            entry.cancel(new GenerationCancelledError(this.engine.name));
            return;
          }

          const controller = new AbortController();
          const timeoutId = setTimeout(() => {
            this.logger.warn(`Task ${id} timed out after ${timeoutMs}ms`);
            entry.cancel(new GenerationTimeoutError(this.engine.name, timeoutMs));
            controller.abort();
          }, timeoutMs);
          const onAbort = (): void => {
            entry.cancel(new GenerationCancelledError(this.engine.name));
            controller.abort();
          };
          signal?.addEventListener("abort", onAbort, { once: true });

          try {
            const value = await task(this.engine, controller.signal);
            settle(() => resolve(value));
          } catch (error) {
            settle(() => reject(error));
          } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener("abort", onAbort);
          }
        },
      };

      if (signal) {
        const onQueuedAbort = (): void => {
          const index = this.queue.findIndex((queued) => queued.id === id);
          if (index !== -1) {
            this.queue.splice(index, 1);
            entry.cancel(new GenerationCancelledError(this.engine.name));
          }
        };
        signal.addEventListener("abort", onQueuedAbort, { once: true });
        removeQueuedAbort = () => signal.removeEventListener("abort", onQueuedAbort);
      }

      if (this.disposed) {
        entry.cancel(new EngineNotInitializedError(this.engine.name));
        return;
      }

      this.queue.push(entry);
      this.processNextTask();
    });
  }

  /**
   * Rejects queued tasks, waits for the running one and any pending load, then
   * releases the engine.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    for (const entry of this.queue) {
      entry.cancel(new GenerationCancelledError(this.engine.name));
    }
    this.queue.length = 0;

    if (this.currentTask) {
      await this.currentTask.done;
    }

    if (this.readyPromise) {
      const loading = this.readyPromise;
      this.readyPromise = null;
      // A load still in flight finishes before the engine is released
      try {
        await loading;
      } catch (error) {
        this.logger.warn(`Engine ${this.engine.name} failed to load: ${errorMessage(error)}`);
        return;
      }
      await this.engine.dispose();
    }
  }

  private processNextTask(): void {
    if (this.currentTask) {
      return;
    }

    const entry = this.queue.shift();
    if (!entry) {
      return;
    }

    const done = entry.start().finally(() => {
      this.currentTask = null;
      this.processNextTask();
    });
    this.currentTask = { id: entry.id, done };
  }
}
