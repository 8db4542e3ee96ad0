import type { BootstrapEnv } from "@/config/env";
import { hasCompleteConfiguration, inspectArtifacts } from "@/bootstrap/artifacts";
import { resolveConfigPaths } from "@/bootstrap/paths";
import { buildSeedCommand, decideSeeding } from "@/bootstrap/seeding";
import { generateFromTemplate } from "@/bootstrap/templates";
import { BootstrapError, EXIT_CODE_USAGE } from "@/errors";
import { logger } from "@/observability/logger";
import { countBootstrapEvent, withSpan } from "@/observability/telemetry";
import type { CommandRunner } from "@/process/command-runner";
import type { BootstrapReport, CommandSpec, TemplateName } from "@/types/contracts";

type PrepareContainerArgs = {
  env: BootstrapEnv;
  runner: CommandRunner;
};

type RunEntrypointArgs = PrepareContainerArgs & {
  argv: ReadonlyArray<string>;
  beforeHandOff?: () => Promise<void>;
};

export const toForegroundCommand = (argv: ReadonlyArray<string>): CommandSpec => {
  const [command, ...args] = argv[0] === "--" ? argv.slice(1) : argv;
  if (command === undefined || command.length === 0) {
    throw new BootstrapError(
      "No foreground command given. Pass the service command as entrypoint arguments.",
      { exitCode: EXIT_CODE_USAGE },
    );
  }
  return { command, args };
};

/**
 * Makes sure the configuration exists and starts seeding when eligible.
 * Existing files are never regenerated, so repeated starts are no-ops apart
 * from seeding.
 */
export const prepareContainer = async ({
  env,
  runner,
}: PrepareContainerArgs): Promise<BootstrapReport> => {
  const paths = resolveConfigPaths(env.MAPPROXY_CONFIG_DIR);
  const presence = await inspectArtifacts(paths);
  const generated: TemplateName[] = [];

  const generate = async (template: TemplateName) => {
    await generateFromTemplate({
      runner,
      utilBin: env.MAPPROXY_UTIL_BIN,
      template,
      paths,
    });
    generated.push(template);
  };

  if (hasCompleteConfiguration(presence)) {
    logger.info("Found MapProxy and seed configuration.", {
      mapproxyConfig: paths.mapproxyConfig,
      seedConfig: paths.seedConfig,
    });
  } else {
    logger.info("MapProxy or seed configuration missing. Creating from template.", {
      configDir: paths.configDir,
      mapproxyConfigPresent: presence.mapproxyConfig,
      seedConfigPresent: presence.seedConfig,
    });
    await generate("base-config");
  }

  if (presence.logConfig) {
    logger.info("Found logging configuration.", { logConfig: paths.logConfig });
  } else {
    logger.info("Logging configuration missing. Creating from template.", {
      logConfig: paths.logConfig,
    });
    await generate("log-ini");
  }

  if (env.MAPPROXY_WSGI_APP && !presence.wsgiApp) {
    logger.info("WSGI application script missing. Creating from template.", {
      wsgiApp: paths.wsgiApp,
    });
    await generate("wsgi-app");
  }

  const seed = decideSeeding({ presence, env });
  if (seed.launch) {
    runner.launchBackground(
      buildSeedCommand({
        seedBin: env.MAPPROXY_SEED_BIN,
        paths,
        concurrency: seed.concurrency,
        env,
      }),
      "seeding",
    );
    countBootstrapEvent("seed_launches", { "mapproxy.seed.concurrency": seed.concurrency });
  } else {
    logger.info("Seeding skipped.", { reason: seed.reason });
  }

  return { paths, presence, generated, seed };
};

export const runEntrypoint = async ({
  argv,
  env,
  runner,
  beforeHandOff,
}: RunEntrypointArgs) => {
  const foreground = toForegroundCommand(argv);

  const report = await withSpan(
    "bootstrap.prepare",
    { "mapproxy.config_dir": env.MAPPROXY_CONFIG_DIR },
    () => prepareContainer({ env, runner }),
  );

  logger.info("Bootstrap complete. Handing off to foreground command.", {
    command: foreground.command,
    args: foreground.args,
    generated: report.generated,
    seeding: report.seed.launch,
  });

  if (beforeHandOff) {
    await beforeHandOff();
  }

  return runner.handOff(foreground);
};
