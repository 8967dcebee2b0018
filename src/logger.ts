import { mkdirSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import { startTelemetry } from "./tracing/telemetry.js";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const ENV_LOG_DIR = "EVO_LOG_DIR";
export const ENV_LOG_LEVEL = "EVO_LOG_LEVEL";
export const DEFAULT_LOG_DIR = "./logs";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/** Keeps a process-wide logging or telemetry pipeline alive until shut down. */
export interface LogGuard {
  readonly kind: "log" | "telemetry";
  shutdown(): Promise<void>;
}

export interface LoggingHandle {
  readonly logger: Logger;
  readonly guards: readonly LogGuard[];
}

export function logDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_LOG_DIR] || DEFAULT_LOG_DIR;
}

export function logLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === configured) ?? DEFAULT_LOG_LEVEL;
}

/** `<component>.<YYYY-MM-DD>.log`, dated by the UTC day of `date`. */
export function logFileName(component: string, date: Date = new Date()): string {
  return `${component}.${date.toISOString().slice(0, 10)}.log`;
}

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: "HH:MM:ss",
  ignore: "pid,hostname",
};

export function createLogger(config: { component: string; level: LogLevel }): Logger {
  return pino({
    name: config.component,
    level: config.level,
    transport: {
      target: "pino-pretty",
      options: PRETTY_OPTIONS,
    },
  });
}

/**
 * One-time process setup. Writes JSON lines to the component's log file and
 * pretty output to stdout. The file is named for the UTC day the process
 * started and is not rotated afterwards. With an OTLP endpoint, also starts exporting
 * trace spans there. Call every returned guard's `shutdown` before exit.
 */
export function initLogging(component: string, otlpEndpoint?: string): LoggingHandle {
  const dir = logDir();
  const level = logLevel();
  mkdirSync(dir, { recursive: true });

  const transport = pino.transport<Record<string, unknown>>({
    targets: [
      { target: "pino/file", level, options: { destination: join(dir, logFileName(component)), mkdir: true } },
      { target: "pino-pretty", level, options: PRETTY_OPTIONS },
    ],
  });
  const logger = pino({ name: component, level }, transport);

  const guards: LogGuard[] = [
    {
      kind: "log",
      shutdown: () =>
        new Promise<void>((resolve, reject) => {
          logger.flush((error) => (error ? reject(error) : resolve()));
        }),
    },
  ];

  if (otlpEndpoint) {
    guards.push(startTelemetry(component, otlpEndpoint));
    logger.info({ otlpEndpoint }, "Trace export enabled");
  }

  logger.info({ dir, level }, "Logging initialized");
  return { logger, guards };
}
