import { appendFileSync } from "node:fs";

export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  info: () => undefined,
  error: () => undefined
};

export interface FileLoggerOptions {
  now?: () => number;
  /** Called once, on the first failed write; later lines are dropped. */
  onWriteError?: (error: unknown) => void;
}

/**
 * The terminal belongs to the renderer while the inspector runs, so log lines
 * go to a file. Without a file nothing is written.
 */
export function createFileLogger(filePath: string, options: FileLoggerOptions = {}): Logger {
  if (!filePath) {
    return silentLogger;
  }
  const now = options.now ?? Date.now;
  let disabled = false;
  const write = (level: string, message: string) => {
    if (disabled) {
      return;
    }
    try {
      appendFileSync(filePath, `${new Date(now()).toISOString()} ${level} ${message}\n`, "utf8");
    } catch (error) {
      disabled = true;
      options.onWriteError?.(error);
    }
  };
  return {
    info: (message) => write("info", message),
    error: (message) => write("error", message)
  };
}
