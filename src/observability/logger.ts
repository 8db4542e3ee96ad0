import pino, { type LevelWithSilent, type Logger as PinoLogger } from "pino";
import { redactForLogs } from "@/observability/redaction";

type LogMethod = "debug" | "info" | "warn" | "error";

const SERVICE_NAME = "mapproxy-bootstrap";

const SUPPORTED_LOG_LEVELS: ReadonlySet<string> = new Set<LevelWithSilent>([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

const BOOLEAN_TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

const isLogLevel = (value: string): value is LevelWithSilent =>
  SUPPORTED_LOG_LEVELS.has(value);

const asLogLevel = (value: string | undefined): LevelWithSilent => {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return "info";
};

const isTruthy = (value: string | undefined) =>
  value ? BOOLEAN_TRUE_VALUES.has(value.trim().toLowerCase()) : false;

export const shouldUsePrettyLogs = (
  env: Partial<Pick<NodeJS.ProcessEnv, "LOG_PRETTY" | "NODE_ENV">> = process.env,
  isTTY = process.stdout.isTTY === true,
) => {
  if (env.LOG_PRETTY !== undefined) {
    return isTruthy(env.LOG_PRETTY);
  }
  return env.NODE_ENV !== "production" && isTTY;
};

const buildPinoLogger = (): PinoLogger => {
  const transport = shouldUsePrettyLogs()
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service",
          singleLine: true,
        },
      })
    : undefined;

  return pino(
    {
      level: asLogLevel(process.env.LOG_LEVEL),
      base: { service: SERVICE_NAME, pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    transport,
  );
};

const baseLogger = buildPinoLogger();

const emit = (level: LogMethod, message: string, metadata?: unknown) => {
  if (metadata === undefined) {
    baseLogger[level](message);
    return;
  }

  baseLogger[level]({ metadata: redactForLogs(metadata) }, message);
};

export const logger = {
  debug: (message: string, metadata?: unknown) =>
    emit("debug", message, metadata),
  info: (message: string, metadata?: unknown) => emit("info", message, metadata),
  warn: (message: string, metadata?: unknown) => emit("warn", message, metadata),
  error: (message: string, metadata?: unknown) =>
    emit("error", message, metadata),
};

/** Resolves once buffered log lines are written; call before `process.exit`. */
export const flushLogs = () =>
  new Promise<void>((resolve) => {
    baseLogger.flush(() => resolve());
  });
