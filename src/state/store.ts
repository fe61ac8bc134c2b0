import type { LoadOptions, StoreSnapshot, TaskRecord } from "../types.js";
import { Mutex } from "./mutex.js";

export interface TaskStoreOptions {
  now?: () => Date;
}

/**
 * In-memory task list shared by the shell and the auto-saver.
 * Every method goes through the same lock; nothing outside this class
 * touches the records or the id counter.
 */
export class TaskStore {
  private tasks: TaskRecord[] = [];
  private idCounter = 0;
  private dirty = false;
  private revision = 0;
  private readonly lock = new Mutex();
  private readonly now: () => Date;

  constructor(options: TaskStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  create(title: string): Promise<TaskRecord> {
    return this.lock.runExclusive(() => {
      this.idCounter++;
      const task: TaskRecord = {
        id: this.idCounter,
        title,
        completed: false,
        createdAt: this.now().toISOString(),
      };
      this.tasks.push(task);
      this.touch();
      return { ...task };
    });
  }

  list(): Promise<TaskRecord[]> {
    return this.lock.runExclusive(() => this.tasks.map((t) => ({ ...t })));
  }

  /** Empty `newTitle` keeps the current title; `completed` is always written. */
  update(id: number, newTitle: string, completed: boolean): Promise<TaskRecord | undefined> {
    return this.lock.runExclusive(() => {
      const task = this.tasks.find((t) => t.id === id);
      if (!task) return undefined;
      if (newTitle !== "") task.title = newTitle;
      task.completed = completed;
      this.touch();
      return { ...task };
    });
  }

  delete(id: number): Promise<TaskRecord | undefined> {
    return this.lock.runExclusive(() => {
      const idx = this.tasks.findIndex((t) => t.id === id);
      if (idx === -1) return undefined;
      const [removed] = this.tasks.splice(idx, 1);
      this.touch();
      return { ...removed };
    });
  }

  isDirty(): Promise<boolean> {
    return this.lock.runExclusive(() => this.dirty);
  }

  lastAssignedId(): Promise<number> {
    return this.lock.runExclusive(() => this.idCounter);
  }

  snapshot(): Promise<StoreSnapshot> {
    return this.lock.runExclusive(() => ({
      tasks: this.tasks.map((t) => ({ ...t })),
      revision: this.revision,
    }));
  }

  /**
   * Clears the dirty flag if nothing changed since the snapshot taken at
   * `revision`. Returns whether the flag was cleared.
   */
  markSaved(revision: number): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (revision !== this.revision) return false;
      this.dirty = false;
      return true;
    });
  }

  replaceAll(tasks: TaskRecord[], options: LoadOptions = {}): Promise<void> {
    return this.lock.runExclusive(() => {
      this.tasks = tasks.map((t) => ({ ...t }));
      if (options.reseedCounter) {
        const highest = this.tasks.reduce((max, t) => Math.max(max, t.id), 0);
        this.idCounter = Math.max(this.idCounter, highest);
      }
      this.revision++;
      this.dirty = false;
    });
  }

  private touch(): void {
    this.revision++;
    this.dirty = true;
  }
}
