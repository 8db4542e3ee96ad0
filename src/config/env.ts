import { availableParallelism } from "node:os";
import { z } from "zod";
import { BootstrapError, EXIT_CODE_CONFIG } from "@/errors";

const SEED_OPT_OUT_VALUE = "YES";
const MAX_SEED_CONCURRENCY = 1024;

const optionalNonEmptyString = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  },
  z.string().min(1).optional(),
);

const nonEmptyStringWithDefault = (defaultValue: string) =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") {
        return value;
      }
      const trimmed = value.trim();
      return trimmed.length > 0 ? trimmed : undefined;
    },
    z.string().min(1).default(defaultValue),
  );

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess(
    (value) => {
      if (typeof value === "boolean") {
        return value;
      }
      if (typeof value !== "string") {
        return value;
      }

      const normalized = value.trim().toLowerCase();
      if (normalized.length === 0) {
        return undefined;
      }
      if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
      }
      if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
      }

      return value;
    },
    z.boolean().default(defaultValue),
  );

// Only the exact literal opts out; "yes", "1" or "true" still seed.
const seedOptOutFromEnv = z.preprocess(
  (value) => value === SEED_OPT_OUT_VALUE,
  z.boolean(),
);

const csvStringListFromEnv = z.preprocess(
  (value) => {
    if (Array.isArray(value)) {
      return value;
    }
    if (typeof value !== "string") {
      return value;
    }
    return value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  },
  z.array(z.string().min(1)).default([]),
);

const integerFromEnv = (input: {
  min: number;
  max: number;
  defaultValue: () => number;
}) =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") {
        return value;
      }

      const trimmed = value.trim();
      if (trimmed.length === 0) {
        return undefined;
      }

      const parsed = Number(trimmed);
      return Number.isInteger(parsed) ? parsed : value;
    },
    z.number().int().min(input.min).max(input.max).default(input.defaultValue),
  );

const detectProcessorCount = () => Math.max(1, availableParallelism());

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("production"),
  MAPPROXY_CONFIG_DIR: nonEmptyStringWithDefault("config"),
  MAPPROXY_UTIL_BIN: nonEmptyStringWithDefault("mapproxy-util"),
  MAPPROXY_SEED_BIN: nonEmptyStringWithDefault("mapproxy-seed"),
  MAPPROXY_WSGI_APP: booleanFromEnv(false),
  NO_SEED: seedOptOutFromEnv,
  SEED_NUM_CORE: integerFromEnv({
    min: 1,
    max: MAX_SEED_CONCURRENCY,
    defaultValue: detectProcessorCount,
  }),
  SEED_TASKS: csvStringListFromEnv,
  SEED_CONTINUE: booleanFromEnv(false),
  SEED_DRY_RUN: booleanFromEnv(false),
  SEED_PROGRESS_FILE: optionalNonEmptyString,
  SEED_USE_LOG_CONFIG: booleanFromEnv(false),
  OTEL_EXPORTER_OTLP_ENDPOINT: optionalNonEmptyString,
});

export type BootstrapEnv = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): BootstrapEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new BootstrapError(`Invalid environment configuration: ${issues}`, {
      exitCode: EXIT_CODE_CONFIG,
    });
  }

  return parsed.data;
};

let cachedEnv: BootstrapEnv | null = null;

export const getEnv = (): BootstrapEnv => {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
};
