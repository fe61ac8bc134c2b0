import type { Persister, TaskRecord } from "./types.js";
import type { AppConfig } from "./config.js";
import { TaskStore } from "./state/store.js";
import { TaskFile } from "./state/persistence.js";
import { AutoSaver } from "./state/autosave.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface TodoAppParts {
  store?: TaskStore;
  persister: Persister;
  logger: Logger;
  autosaveIntervalMs?: number;
  reseedIds?: boolean;
}

/** What the interactive shell is allowed to call. */
export interface TodoApi {
  create(title: string): Promise<TaskRecord>;
  list(): Promise<TaskRecord[]>;
  update(id: number, newTitle: string, completed: boolean): Promise<boolean>;
  delete(id: number): Promise<boolean>;
  requestShutdown(): void;
  awaitShutdownComplete(): Promise<void>;
}

export class TodoApp implements TodoApi {
  private constructor(
    private readonly store: TaskStore,
    private readonly persister: Persister,
    private readonly saver: AutoSaver,
    private readonly logger: Logger
  ) {}

  static start(config: AppConfig, logger: Logger = consoleLogger): Promise<TodoApp> {
    return TodoApp.open({
      persister: new TaskFile(config.filePath, logger),
      logger,
      autosaveIntervalMs: config.autosaveIntervalMs,
      reseedIds: config.reseedIds,
    });
  }

  /** Loads the saved list into the store, then starts auto-saving. */
  static async open(parts: TodoAppParts): Promise<TodoApp> {
    const store = parts.store ?? new TaskStore();
    const loaded = await parts.persister.load(store, { reseedCounter: parts.reseedIds ?? false });
    if (loaded.ok) {
      if (loaded.message) parts.logger.info(loaded.message);
    } else {
      parts.logger.error(`Error loading file: ${loaded.error ?? "unknown error"}`);
    }

    const saver = AutoSaver.start({
      store,
      persister: parts.persister,
      logger: parts.logger,
      intervalMs: parts.autosaveIntervalMs,
    });
    return new TodoApp(store, parts.persister, saver, parts.logger);
  }

  create(title: string): Promise<TaskRecord> {
    return this.store.create(title);
  }

  list(): Promise<TaskRecord[]> {
    return this.store.list();
  }

  async update(id: number, newTitle: string, completed: boolean): Promise<boolean> {
    return (await this.store.update(id, newTitle, completed)) !== undefined;
  }

  async delete(id: number): Promise<boolean> {
    return (await this.store.delete(id)) !== undefined;
  }

  requestShutdown(): void {
    this.saver.requestShutdown();
  }

  /** Waits for the auto-saver to stop, then flushes anything still unsaved. */
  async awaitShutdownComplete(): Promise<void> {
    await this.saver.awaitShutdownComplete();
    if (!(await this.store.isDirty())) return;
    const result = await this.persister.save(this.store);
    if (result.ok) {
      if (result.message) this.logger.info(result.message);
    } else {
      this.logger.error(`Error saving file: ${result.error ?? "unknown error"}`);
    }
  }
}
