// src/observability/logger.ts
// pino root logger and module-scoped children.
//
// LOG_LEVEL picks the level (default info, unknown values fall back to it);
// LOG_PRETTY=true routes output through pino-pretty for local runs.

import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

function isLogLevel(v: string): v is LogLevel {
  return LEVELS.has(v);
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "info";
}

/** Options for the root logger, derived from the environment only. */
export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): pino.LoggerOptions {
  const options: pino.LoggerOptions = {
    level: getLogLevel(env),
    base: { service: "knowledge-base-backend", version: env.npm_package_version ?? "unknown" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (env.LOG_PRETTY !== "true") return options;

  return {
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    },
  };
}

let root: Logger | undefined;

/**
 * Module-scoped logger; `module` is added to every line.
 *
 * @example
 * const log = createLogger('knowledge/aggregator');
 * log.info({ collections: 4 }, 'Fan-out started');
 */
export function createLogger(moduleName: string): Logger {
  if (!root) root = pino(buildLoggerOptions());
  return root.child({ module: moduleName });
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
