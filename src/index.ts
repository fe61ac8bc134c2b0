#!/usr/bin/env node
import { loadConfig, ConfigError } from "./config.js";
import type { AppConfig } from "./config.js";
import { TodoApp } from "./app.js";
import { createConsolePrompt, runShell } from "./cli.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`[todo-cli] ${err.message}`);
    process.exit(1);
  }
}

const app = await TodoApp.start(readConfig());
const prompt = createConsolePrompt(process.stdin, process.stdout);
try {
  await runShell(prompt, app);
} finally {
  prompt.close();
}
