export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

const PREFIX = "[todo-cli]";

// Both levels go to stdout so load and save reports sit next to the menu.
export const consoleLogger: Logger = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  error: (message) => console.log(`${PREFIX} ${message}`),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
