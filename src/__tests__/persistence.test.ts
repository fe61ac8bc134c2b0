import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir, rm, writeFile } from "node:fs/promises";
import { TaskStore } from "../state/store.js";
import { TaskFile } from "../state/persistence.js";
import { recordingLogger } from "./helpers.js";
import type { RecordingLogger } from "./helpers.js";

const TEST_DIR = "/tmp/todo-cli-test-persistence";
const TEST_FILE = `${TEST_DIR}/todos.json`;
const FIXED_NOW = new Date("2026-03-01T09:30:00.000Z");

let store: TaskStore;
let logger: RecordingLogger;
let file: TaskFile;

beforeEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
  store = new TaskStore({ now: () => FIXED_NOW });
  logger = recordingLogger();
  file = new TaskFile(TEST_FILE, logger);
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("TaskFile", () => {
  it("writes the task list as JSON with snake_case timestamps", async () => {
    await store.create("Buy milk");

    const result = await file.save(store);
    expect(result).toEqual({ ok: true, message: "To-Do list saved to file." });

    const raw = await readFile(TEST_FILE, "utf-8");
    expect(raw.endsWith("]\n")).toBe(true);
    expect(JSON.parse(raw)).toEqual([
      { id: 1, title: "Buy milk", completed: false, created_at: "2026-03-01T09:30:00.000Z" },
    ]);
  });

  it("clears the dirty flag after a successful save", async () => {
    await store.create("Buy milk");
    expect(await store.isDirty()).toBe(true);
    await file.save(store);
    expect(await store.isDirty()).toBe(false);
  });

  it("round-trips the task sequence into a fresh store", async () => {
    await store.create("Buy milk");
    await store.create("Walk dog");
    await store.create("Pay bills");
    await store.update(2, "", true);
    await store.delete(1);
    await file.save(store);

    const fresh = new TaskStore();
    const result = await file.load(fresh);

    expect(result.ok).toBe(true);
    expect(result.data).toEqual({ loaded: 2 });
    expect(await fresh.list()).toEqual(await store.list());
    expect(await fresh.lastAssignedId()).toBe(0);
    expect(await fresh.isDirty()).toBe(false);
  });

  it("reseeds the counter from loaded ids when asked", async () => {
    await store.create("A");
    await store.create("B");
    await file.save(store);

    const fresh = new TaskStore();
    await file.load(fresh, { reseedCounter: true });
    expect((await fresh.create("C")).id).toBe(3);
  });

  it("treats a missing file as an empty start", async () => {
    const result = await file.load(store);
    expect(result).toEqual({
      ok: true,
      message: "No saved To-Do list found, starting empty.",
      data: { loaded: 0 },
    });
    expect(await store.list()).toEqual([]);
  });

  it("reads a null document as an empty list", async () => {
    await file.save(store);
    await writeFile(TEST_FILE, "null\n", "utf-8");

    const result = await file.load(store);
    expect(result.ok).toBe(true);
    expect(result.data).toEqual({ loaded: 0 });
  });

  it("keeps timestamps written with a zone offset", async () => {
    await file.save(store);
    const createdAt = "2024-05-01T10:00:00.123456789+02:00";
    await writeFile(
      TEST_FILE,
      JSON.stringify([{ id: 7, title: "Old task", completed: true, created_at: createdAt }]),
      "utf-8"
    );

    await file.load(store);
    expect(await store.list()).toEqual([
      { id: 7, title: "Old task", completed: true, createdAt },
    ]);
  });

  it("reports invalid JSON, leaves the store empty and backs the file up", async () => {
    await file.save(store);
    await writeFile(TEST_FILE, "{not json", "utf-8");

    const result = await file.load(store);
    expect(result.ok).toBe(false);
    expect(result.error).toContain(`${TEST_FILE} is not valid JSON`);
    expect(await store.list()).toEqual([]);

    const backups = (await readdir(TEST_DIR)).filter((name) => name.startsWith("todos.json.corrupt."));
    expect(backups).toHaveLength(1);
    expect(await readFile(`${TEST_DIR}/${backups[0]}`, "utf-8")).toBe("{not json");
    expect(logger.errors).toEqual([`Unreadable To-Do file backed up to ${TEST_DIR}/${backups[0]}`]);
  });

  it("reports records that do not match the file format", async () => {
    await file.save(store);
    await writeFile(
      TEST_FILE,
      JSON.stringify([{ id: "one", title: "Bad", completed: false, created_at: "2026-01-01T00:00:00Z" }]),
      "utf-8"
    );

    const result = await file.load(store);
    expect(result.ok).toBe(false);
    expect(result.error).toContain("has an unexpected format at 0.id");
    expect(await store.list()).toEqual([]);
  });

  it("reports a failed save and keeps the store dirty", async () => {
    await file.save(store);
    const blocker = `${TEST_DIR}/blocker`;
    await writeFile(blocker, "", "utf-8");
    const blocked = new TaskFile(`${blocker}/todos.json`, logger);

    await store.create("Unsaved");
    const result = await blocked.save(store);

    expect(result.ok).toBe(false);
    expect(result.error).toMatch(/^Could not save \/tmp\/todo-cli-test-persistence\/blocker\/todos\.json: /);
    expect(await store.isDirty()).toBe(true);
  });

  it("orders overlapping saves so the newest snapshot wins", async () => {
    await store.create("A");
    const first = file.save(store);
    await store.create("B");
    const second = file.save(store);
    await Promise.all([first, second]);

    const saved = JSON.parse(await readFile(TEST_FILE, "utf-8")) as Array<{ title: string }>;
    expect(saved.map((t) => t.title)).toEqual(["A", "B"]);
    expect(await store.isDirty()).toBe(false);
  });
});
