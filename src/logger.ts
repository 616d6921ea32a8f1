import { LogLevel } from "./config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

type ConsoleSink = Pick<Console, "debug" | "info" | "warn" | "error">;

// Diagnostics only; the interactive transcript goes through the Prompter.
export function createLogger(level: LogLevel = "info", sink: ConsoleSink = console): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (messageLevel: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_RANK[messageLevel] < threshold) {
      return;
    }
    // eslint-disable-next-line no-console
    sink[messageLevel](`[essay-editor] ${messageLevel}: ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message)
  };
}
