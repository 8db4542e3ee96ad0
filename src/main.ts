import { getEnv } from "@/config/env";
import { runEntrypoint } from "@/bootstrap/orchestrator";
import { BootstrapError, EXIT_CODE_FAILURE, errorMessage } from "@/errors";
import { flushLogs, logger } from "@/observability/logger";
import { initTelemetry, type TelemetryHandle } from "@/observability/telemetry";
import { createCommandRunner } from "@/process/command-runner";

let telemetry: TelemetryHandle | null = null;

const boot = async () => {
  const env = getEnv();
  telemetry = initTelemetry(env);

  const exitCode = await runEntrypoint({
    argv: process.argv.slice(2),
    env,
    runner: createCommandRunner(),
    beforeHandOff: telemetry.shutdown,
  });

  await flushLogs();
  process.exit(exitCode);
};

boot().catch(async (error: unknown) => {
  logger.error("Fatal startup error.", { error: errorMessage(error) });
  await telemetry?.shutdown();
  await flushLogs();
  process.exit(error instanceof BootstrapError ? error.exitCode : EXIT_CODE_FAILURE);
});
