import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  /** Write to stderr so command output on stdout stays clean. */
  stderr?: boolean;
}

export function createLogger(level = process.env.LOG_LEVEL ?? "info", opts: LoggerOptions = {}): Logger {
  const options = { level, base: { service: "issue-sieve" } };
  // JSON lines; pretty-printing is left to the caller's pipeline
  return opts.stderr ? pino(options, pino.destination(2)) : pino(options);
}

export function createChildLogger(
  logger: Logger,
  context: { repo?: string; issueNumber?: number; requestId?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
