import * as path from "path";
import pino, { type Logger } from "pino";
import { createStream } from "rotating-file-stream";
import { loadConfig, type LogLevel } from "./config";

export type { Logger };

interface LoggerOptions {
  level: LogLevel;
  /** Log file path; rotated once it reaches 1 MB, keeping the last 5 files. */
  file: string;
}

export const createLogger = ({ level, file }: LoggerOptions): Logger => {
  const stream = createStream(path.basename(file), {
    path: path.dirname(file),
    size: "1M",
    maxFiles: 5,
  });

  return pino({ level, base: { app: "multisearch" } }, stream);
};

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger built from the environment on first use. Components
 * that receive a logger explicitly never touch it, which keeps tests off disk.
 */
export const getDefaultLogger = (): Logger => {
  if (!defaultLogger) {
    const config = loadConfig();
    defaultLogger = createLogger({ level: config.logLevel, file: config.logFile });
  }
  return defaultLogger;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
