import type { LogLevel } from "@nestjs/common";

const LOG_LEVELS: Record<string, LogLevel[]> = {
  fatal: ["fatal"],
  error: ["fatal", "error"],
  warn: ["fatal", "error", "warn"],
  log: ["fatal", "error", "warn", "log"],
  // "info" is accepted as an alias of Nest's "log" level.
  info: ["fatal", "error", "warn", "log"],
  debug: ["fatal", "error", "warn", "log", "debug"],
  verbose: ["fatal", "error", "warn", "log", "debug", "verbose"],
};

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  if (!level) {
    return LOG_LEVELS.log;
  }
  const normalized = level.toLowerCase().trim();
  return LOG_LEVELS[normalized] ?? LOG_LEVELS.log;
}
