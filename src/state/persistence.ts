import { readFile, writeFile, rename, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type {
  LoadOptions,
  PersistResult,
  PersistedTask,
  Persister,
  TaskRecord,
} from "../types.js";
import type { TaskStore } from "./store.js";
import { Mutex } from "./mutex.js";
import { consoleLogger, errorMessage } from "../logger.js";
import type { Logger } from "../logger.js";

const persistedTaskSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  completed: z.boolean(),
  created_at: z.string().datetime({ offset: true }),
});

// An empty list saved by older builds may have been written as `null`.
export const persistedFileSchema = z
  .array(persistedTaskSchema)
  .nullable()
  .transform((tasks) => tasks ?? []);

export function toPersisted(task: TaskRecord): PersistedTask {
  return {
    id: task.id,
    title: task.title,
    completed: task.completed,
    created_at: task.createdAt,
  };
}

export function fromPersisted(task: PersistedTask): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    completed: task.completed,
    createdAt: task.created_at,
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON file holding the whole task list.
 *
 * The store lock is held only while the snapshot is copied; the write itself
 * runs outside it. Writes to this file are serialized so that snapshots land
 * on disk in the order they were taken.
 */
export class TaskFile implements Persister {
  private readonly writeLock = new Mutex();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  save(store: TaskStore): Promise<PersistResult> {
    return this.writeLock.runExclusive(async () => {
      const { tasks, revision } = await store.snapshot();
      const tmpPath = `${this.filePath}.tmp.${process.pid}`;
      const data = JSON.stringify(tasks.map(toPersisted), null, 2) + "\n";

      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(tmpPath, data, "utf-8");
        await rename(tmpPath, this.filePath);
      } catch (err) {
        await unlink(tmpPath).catch(() => undefined);
        return { ok: false, error: `Could not save ${this.filePath}: ${errorMessage(err)}` };
      }

      await store.markSaved(revision);
      return { ok: true, message: "To-Do list saved to file." };
    });
  }

  async load(
    store: TaskStore,
    options: LoadOptions = {}
  ): Promise<PersistResult<{ loaded: number }>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return { ok: true, message: "No saved To-Do list found, starting empty.", data: { loaded: 0 } };
      }
      return { ok: false, error: `Could not read ${this.filePath}: ${errorMessage(err)}` };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      await this.backupCorrupt(raw);
      return { ok: false, error: `${this.filePath} is not valid JSON: ${errorMessage(err)}` };
    }

    const parsed = persistedFileSchema.safeParse(json);
    if (!parsed.success) {
      await this.backupCorrupt(raw);
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      return {
        ok: false,
        error: `${this.filePath} has an unexpected format${where}: ${issue?.message ?? "invalid"}`,
      };
    }

    await store.replaceAll(parsed.data.map(fromPersisted), options);
    return {
      ok: true,
      message: "To-Do list loaded from file.",
      data: { loaded: parsed.data.length },
    };
  }

  // A later auto-save would overwrite the unreadable file, so keep a copy.
  private async backupCorrupt(raw: string): Promise<void> {
    const backupPath = `${this.filePath}.corrupt.${Date.now()}`;
    try {
      await writeFile(backupPath, raw, "utf-8");
      this.logger.error(`Unreadable To-Do file backed up to ${backupPath}`);
    } catch (err) {
      this.logger.error(`Could not back up unreadable To-Do file: ${errorMessage(err)}`);
    }
  }
}
