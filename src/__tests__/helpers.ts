import { vi } from "vitest";
import type { Logger } from "../logger.js";
import type { PersistResult, Persister } from "../types.js";
import type { TaskStore } from "../state/store.js";

export interface RecordingLogger extends Logger {
  infos: string[];
  errors: string[];
}

export function recordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: (message) => infos.push(message),
    error: (message) => errors.push(message),
  };
}

/** Persister that never touches disk; `save` marks the store saved like TaskFile does. */
export function memoryPersister(loadResult: PersistResult<{ loaded: number }> = { ok: true, data: { loaded: 0 } }) {
  const persister = {
    save: vi.fn(async (store: TaskStore): Promise<PersistResult> => {
      const { revision } = await store.snapshot();
      await store.markSaved(revision);
      return { ok: true };
    }),
    load: vi.fn(async (_store: TaskStore): Promise<PersistResult<{ loaded: number }>> => loadResult),
  };
  return persister satisfies Persister;
}

export interface ScriptedPrompt {
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
  output: string[];
}

/** Answers questions from a fixed list, then reports end of input. */
export function scriptedPrompt(answers: string[]): ScriptedPrompt {
  const output: string[] = [];
  const queue = [...answers];
  return {
    output,
    ask: async (question) => {
      output.push(question);
      return queue.shift() ?? null;
    },
    print: (line) => {
      output.push(line);
    },
    close: () => undefined,
  };
}
