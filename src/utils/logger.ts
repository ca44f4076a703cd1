/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function resolveMinLevel(value: string | undefined): number {
  if (!value) return LEVELS.info;
  return LEVELS[value.trim().toLowerCase()] ?? LEVELS.info;
}

/** Optional file transport: if LOG_FILE is set, also append plain lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  mkdirSync(dirname(logFile), { recursive: true });

  return [
    (logObj: ILogObj) => {
      const meta = logObj["_meta"];
      const ts =
        typeof meta === "object" && meta !== null && "date" in meta && meta.date instanceof Date
          ? meta.date.toISOString()
          : new Date().toISOString();
      const parts = Object.values(logObj).filter(
        (v) => typeof v === "string" || typeof v === "number",
      );
      try {
        appendFileSync(logFile, `${ts} ${parts.join(" ")}\n`);
      } catch (err) {
        // Logging through the logger here would recurse into this transport.
        process.stderr.write(`log file write failed: ${String(err)}\n`);
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "domain-sweep",
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string) {
  return logger.getSubLogger({ name });
}
