import type { AutoSaveState, Persister } from "../types.js";
import type { TaskStore } from "./store.js";
import { errorMessage } from "../logger.js";
import type { Logger } from "../logger.js";

export const DEFAULT_AUTOSAVE_INTERVAL_MS = 10_000;

// setTimeout fires after 1 ms for anything longer than this.
export const MAX_AUTOSAVE_INTERVAL_MS = 2_147_483_647;

export interface AutoSaverOptions {
  store: TaskStore;
  persister: Persister;
  logger: Logger;
  intervalMs?: number;
}

/**
 * Background loop that saves the store every `intervalMs` while it is dirty.
 *
 * Each wait ends on whichever comes first: the timer or `requestShutdown()`.
 * A tick whose timer already fired always runs to completion, so shutdown
 * never cuts a save short.
 */
export class AutoSaver {
  private state: AutoSaveState = "running";
  private ticks = 0;
  private wake: (() => void) | undefined;
  private readonly done: Promise<void>;
  private readonly store: TaskStore;
  private readonly persister: Persister;
  private readonly logger: Logger;
  readonly intervalMs: number;

  private constructor(options: AutoSaverOptions) {
    this.store = options.store;
    this.persister = options.persister;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_AUTOSAVE_INTERVAL_MS;
    if (!Number.isInteger(this.intervalMs) || this.intervalMs < 1 || this.intervalMs > MAX_AUTOSAVE_INTERVAL_MS) {
      throw new RangeError(
        `Auto-save interval must be an integer between 1 and ${MAX_AUTOSAVE_INTERVAL_MS} ms, got ${this.intervalMs}`
      );
    }
    this.done = this.loop();
  }

  static start(options: AutoSaverOptions): AutoSaver {
    return new AutoSaver(options);
  }

  get status(): AutoSaveState {
    return this.state;
  }

  get tickCount(): number {
    return this.ticks;
  }

  requestShutdown(): void {
    if (this.state !== "running") return;
    this.state = "stopping";
    this.wake?.();
  }

  awaitShutdownComplete(): Promise<void> {
    return this.done;
  }

  private async loop(): Promise<void> {
    while (this.state === "running") {
      const fired = await this.nextTick();
      if (!fired) break;
      await this.tick();
    }
    this.state = "stopped";
    this.logger.info("Auto-save stopped.");
  }

  private nextTick(): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve(true);
      }, this.intervalMs);
      this.wake = () => {
        this.wake = undefined;
        clearTimeout(timer);
        resolve(false);
      };
    });
  }

  private async tick(): Promise<void> {
    this.ticks++;
    try {
      if (!(await this.store.isDirty())) return;
      const result = await this.persister.save(this.store);
      if (result.ok) {
        if (result.message) this.logger.info(result.message);
      } else {
        this.logger.error(`Error saving file: ${result.error ?? "unknown error"}`);
      }
    } catch (err) {
      this.logger.error(`Error saving file: ${errorMessage(err)}`);
    }
  }
}
