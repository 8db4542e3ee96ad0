import {
  metrics,
  SpanStatusCode,
  trace,
  type Attributes,
} from "@opentelemetry/api";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK, metrics as sdkMetrics } from "@opentelemetry/sdk-node";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import type { BootstrapEnv } from "@/config/env";
import { errorMessage } from "@/errors";
import { logger } from "@/observability/logger";

const SERVICE_NAME = "mapproxy-bootstrap";
const INSTRUMENTATION_SCOPE = "mapproxy-bootstrap";
const TRACE_PATH_SUFFIX = "/v1/traces";
const METRIC_PATH_SUFFIX = "/v1/metrics";
// The bootstrap phase lasts seconds; shutdown() performs the final export.
const METRIC_EXPORT_INTERVAL_MS = 60_000;

type OtlpExportUrls = {
  tracesUrl: string;
  metricsUrl: string;
};

export type TelemetryHandle = {
  enabled: boolean;
  shutdown: () => Promise<void>;
};

export type BootstrapCounter = "template_generations" | "seed_launches";

const NOOP_TELEMETRY_HANDLE: TelemetryHandle = {
  enabled: false,
  shutdown: async () => {},
};

let cachedTelemetryHandle: TelemetryHandle | null = null;

const ensureEndpointHasProtocol = (endpoint: string) => {
  if (/^[a-zA-Z][a-zA-Z\d+\-.]*:\/\//.test(endpoint)) {
    return endpoint;
  }
  return `http://${endpoint}`;
};

const stripSignalPath = (path: string) => {
  const trimmed = path.replace(/\/+$/, "");
  for (const suffix of [TRACE_PATH_SUFFIX, METRIC_PATH_SUFFIX]) {
    if (trimmed.endsWith(suffix)) {
      return trimmed.slice(0, -suffix.length);
    }
  }
  return trimmed;
};

export const buildOtlpHttpExportUrls = (rawEndpoint: string): OtlpExportUrls => {
  const endpoint = rawEndpoint.trim();
  if (!endpoint) {
    throw new Error("OTLP endpoint must be non-empty.");
  }

  const endpointUrl = new URL(ensureEndpointHasProtocol(endpoint));
  endpointUrl.hash = "";
  const basePath = stripSignalPath(endpointUrl.pathname);

  const toSignalUrl = (suffix: string) => {
    const url = new URL(endpointUrl.toString());
    url.pathname = `${basePath}${suffix}`;
    return url.toString();
  };

  return {
    tracesUrl: toSignalUrl(TRACE_PATH_SUFFIX),
    metricsUrl: toSignalUrl(METRIC_PATH_SUFFIX),
  };
};

export const initTelemetry = (
  env: Pick<BootstrapEnv, "OTEL_EXPORTER_OTLP_ENDPOINT" | "NODE_ENV">,
): TelemetryHandle => {
  if (cachedTelemetryHandle) {
    return cachedTelemetryHandle;
  }

  if (!env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    logger.debug("Telemetry exporter not configured; running without OTLP.");
    cachedTelemetryHandle = NOOP_TELEMETRY_HANDLE;
    return cachedTelemetryHandle;
  }

  let exportUrls: OtlpExportUrls;
  try {
    exportUrls = buildOtlpHttpExportUrls(env.OTEL_EXPORTER_OTLP_ENDPOINT);
  } catch (error) {
    logger.error("Invalid OTLP endpoint. Telemetry disabled.", {
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
      error: errorMessage(error),
    });
    cachedTelemetryHandle = NOOP_TELEMETRY_HANDLE;
    return cachedTelemetryHandle;
  }

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
      "deployment.environment.name": env.NODE_ENV,
    }),
    traceExporter: new OTLPTraceExporter({ url: exportUrls.tracesUrl }),
    metricReader: new sdkMetrics.PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: exportUrls.metricsUrl }),
      exportIntervalMillis: METRIC_EXPORT_INTERVAL_MS,
    }),
  });

  try {
    sdk.start();
  } catch (error) {
    logger.error("Failed to initialize OpenTelemetry SDK. Telemetry disabled.", {
      error: errorMessage(error),
    });
    cachedTelemetryHandle = NOOP_TELEMETRY_HANDLE;
    return cachedTelemetryHandle;
  }

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = async () => {
    if (!shutdownPromise) {
      shutdownPromise = sdk.shutdown().catch((error: unknown) => {
        logger.error("Failed to shutdown OpenTelemetry SDK cleanly.", {
          error: errorMessage(error),
        });
      });
    }

    await shutdownPromise;
  };

  cachedTelemetryHandle = {
    enabled: true,
    shutdown,
  };

  logger.info("Telemetry initialized.", {
    tracesUrl: exportUrls.tracesUrl,
    metricsUrl: exportUrls.metricsUrl,
  });

  return cachedTelemetryHandle;
};

/**
 * Runs `work` inside an active span. Without an SDK the API hands out
 * non-recording spans, so callers never branch on whether telemetry is on.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Attributes,
  work: () => Promise<T>,
): Promise<T> =>
  trace
    .getTracer(INSTRUMENTATION_SCOPE)
    .startActiveSpan(name, { attributes }, async (span) => {
      try {
        return await work();
      } catch (error) {
        span.recordException(error instanceof Error ? error : errorMessage(error));
        span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
        throw error;
      } finally {
        span.end();
      }
    });

export const countBootstrapEvent = (
  counter: BootstrapCounter,
  attributes: Attributes = {},
) => {
  metrics
    .getMeter(INSTRUMENTATION_SCOPE)
    .createCounter(`mapproxy_bootstrap.${counter}`)
    .add(1, attributes);
};
