import type { TaskRecord } from "./types.js";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const pad = (n: number): string => String(n).padStart(2, "0");

/** RFC 822 style, always in UTC: `19 Oct 26 10:54 UTC`. */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return [
    pad(d.getUTCDate()),
    MONTHS[d.getUTCMonth()],
    pad(d.getUTCFullYear() % 100),
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`,
    "UTC",
  ].join(" ");
}

export function formatTask(task: TaskRecord): string {
  const status = task.completed ? "Completed" : "Incomplete";
  return `ID: ${task.id} | Title: ${task.title} | Status: ${status} | Created At: ${formatTimestamp(task.createdAt)}`;
}

export function formatTaskList(tasks: TaskRecord[]): string {
  if (tasks.length === 0) return "No To-Dos found.";
  return ["To-Do List:", ...tasks.map(formatTask)].join("\n");
}
