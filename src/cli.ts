import { createInterface } from "node:readline";
import { z } from "zod";
import type { TodoApi } from "./app.js";
import { formatTaskList } from "./formatter.js";

export interface Prompt {
  /** Resolves to the trimmed answer, or `null` once input has ended. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Prompt {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  return {
    async ask(question) {
      // Line edits redraw readline's prompt, so the question must be that prompt.
      rl.setPrompt(question);
      rl.prompt();
      const next = await lines.next();
      return next.done ? null : next.value.trim();
    },
    print(line) {
      output.write(line + "\n");
    },
    close() {
      rl.close();
    },
  };
}

export const idSchema = z
  .string()
  .regex(/^-?\d+$/, "Invalid ID. Please enter a numeric value.")
  .transform(Number);

export const titleSchema = z.string().min(1, "Title cannot be empty. Please try again.");

const MENU = `
🔷 MAIN MENU
1️⃣  ➡  Create a New To-Do
2️⃣  ➡  View All To-Dos
3️⃣  ➡  Update an Existing To-Do
4️⃣  ➡  Delete a To-Do
5️⃣  ➡  Exit`;

const NOT_FOUND = "To-Do not found.";

function warn(prompt: Prompt, message: string): void {
  prompt.print(`⚠️ ${message}`);
}

/** Parses an id answer; prints the warning and returns undefined when it is not an integer. */
function readId(prompt: Prompt, answer: string): number | undefined {
  const parsed = idSchema.safeParse(answer);
  if (!parsed.success) {
    warn(prompt, parsed.error.issues[0]?.message ?? "Invalid ID.");
    return undefined;
  }
  return parsed.data;
}

async function createFlow(prompt: Prompt, app: TodoApi): Promise<void> {
  prompt.print("\n📝 CREATE A NEW TO-DO");
  const title = await prompt.ask("Enter the title of the new to-do: ");
  if (title === null) return;
  const parsed = titleSchema.safeParse(title);
  if (!parsed.success) {
    warn(prompt, parsed.error.issues[0]?.message ?? "Invalid title.");
    return;
  }
  const task = await app.create(parsed.data);
  prompt.print(`✅ To-Do ${task.id} created successfully!`);
}

async function updateFlow(prompt: Prompt, app: TodoApi): Promise<void> {
  prompt.print("\n✏️ UPDATE A TO-DO");
  const idAnswer = await prompt.ask("Enter the ID of the to-do to update: ");
  if (idAnswer === null) return;
  const id = readId(prompt, idAnswer);
  if (id === undefined) return;

  const newTitle = await prompt.ask("Enter new title (leave empty to keep the current title): ");
  if (newTitle === null) return;
  const completedAnswer = await prompt.ask("Mark as completed? (yes/no): ");
  if (completedAnswer === null) return;
  const completed = completedAnswer.toLowerCase() === "yes";

  const found = await app.update(id, newTitle, completed);
  prompt.print(found ? "✅ To-Do updated successfully!" : NOT_FOUND);
}

async function deleteFlow(prompt: Prompt, app: TodoApi): Promise<void> {
  prompt.print("\n🗑️ DELETE A TO-DO");
  const idAnswer = await prompt.ask("Enter the ID of the to-do to delete: ");
  if (idAnswer === null) return;
  const id = readId(prompt, idAnswer);
  if (id === undefined) return;

  const found = await app.delete(id);
  prompt.print(found ? "✅ To-Do deleted successfully!" : NOT_FOUND);
}

/**
 * Menu loop. Returns after the exit choice (or end of input) once the
 * auto-saver has stopped and the final save has run.
 */
export async function runShell(prompt: Prompt, app: TodoApi): Promise<void> {
  prompt.print("Welcome to the To-Do Application with Auto-Save!");
  prompt.print("-------------------------------------------------");

  for (;;) {
    prompt.print(MENU);
    const choice = await prompt.ask("Please enter your choice (1-5): ");
    if (choice === null || choice === "5") break;

    switch (choice) {
      case "1":
        await createFlow(prompt, app);
        break;
      case "2":
        prompt.print("\n📋 VIEW ALL TO-DOS");
        prompt.print(formatTaskList(await app.list()));
        break;
      case "3":
        await updateFlow(prompt, app);
        break;
      case "4":
        await deleteFlow(prompt, app);
        break;
      default:
        warn(prompt, "Invalid choice. Please enter a valid option (1-5).");
    }
  }

  prompt.print("\n👋 Exiting the application... Goodbye!");
  app.requestShutdown();
  await app.awaitShutdownComplete();
}
