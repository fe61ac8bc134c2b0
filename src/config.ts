import { z } from "zod";
import { DEFAULT_AUTOSAVE_INTERVAL_MS, MAX_AUTOSAVE_INTERVAL_MS } from "./state/autosave.js";

export interface AppConfig {
  filePath: string;
  autosaveIntervalMs: number;
  reseedIds: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const flagSchema = z
  .enum(["1", "0", "true", "false"])
  .default("false")
  .transform((v) => v === "1" || v === "true");

const envSchema = z.object({
  TODO_FILE: z.string().min(1).default("todos.json"),
  TODO_AUTOSAVE_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_AUTOSAVE_INTERVAL_MS)
    .default(DEFAULT_AUTOSAVE_INTERVAL_MS),
  TODO_RESEED_IDS: flagSchema,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return {
    filePath: parsed.data.TODO_FILE,
    autosaveIntervalMs: parsed.data.TODO_AUTOSAVE_INTERVAL_MS,
    reseedIds: parsed.data.TODO_RESEED_IDS,
  };
}
