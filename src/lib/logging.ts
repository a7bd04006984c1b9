export type Logger = Pick<Console, "info" | "warn">;

export const defaultLogger: Logger = console;

export const describeError = (error: unknown, fallbackMessage: string): string =>
  error instanceof Error ? error.message : fallbackMessage;
