import type { TaskStore } from "./state/store.js";

// --- Core Models ---

export interface TaskRecord {
  id: number;
  title: string;
  completed: boolean;
  createdAt: string;
}

/** On-disk shape of a task; the id counter is never written. */
export interface PersistedTask {
  id: number;
  title: string;
  completed: boolean;
  created_at: string;
}

export interface StoreSnapshot {
  tasks: TaskRecord[];
  revision: number;
}

// --- Results ---

export interface PersistResult<T = unknown> {
  ok: boolean;
  message?: string;
  error?: string;
  data?: T;
}

export interface LoadOptions {
  /** Raise the id counter to the highest loaded id. Off by default. */
  reseedCounter?: boolean;
}

// --- Ports ---

export interface Persister {
  save(store: TaskStore): Promise<PersistResult>;
  load(store: TaskStore, options?: LoadOptions): Promise<PersistResult<{ loaded: number }>>;
}

export type AutoSaveState = "running" | "stopping" | "stopped";
