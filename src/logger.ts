/** pino loggers. Always stderr: stdout may be carrying DAP frames. */

import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LEVEL: LogLevel = "error";

function initialLevel(): LogLevel {
  const fromEnv = process.env.EVALDBG_LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === fromEnv) ?? DEFAULT_LEVEL;
}

export const rootLogger: Logger = pino(
  {
    name: "evaldbg",
    level: initialLevel(),
    serializers: { err: pino.stdSerializers.err },
  },
  pino.destination({ dest: 2, sync: true }),
);

// pino children copy the parent level at creation time.
const children = new Set<Logger>();

export function createLogger(component: string): Logger {
  const child = rootLogger.child({ component });
  children.add(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const child of children) child.level = level;
}
