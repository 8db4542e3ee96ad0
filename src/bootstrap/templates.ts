import { mkdir } from "node:fs/promises";
import { BootstrapError } from "@/errors";
import { logger } from "@/observability/logger";
import { countBootstrapEvent, withSpan } from "@/observability/telemetry";
import type { CommandRunner } from "@/process/command-runner";
import type { CommandSpec, ConfigPaths, TemplateName } from "@/types/contracts";

export const buildTemplateCommand = (input: {
  utilBin: string;
  template: TemplateName;
  paths: ConfigPaths;
}): CommandSpec => {
  const { utilBin, template, paths } = input;
  switch (template) {
    case "base-config":
      return {
        command: utilBin,
        args: ["create", "-t", template, paths.configDir],
      };
    case "log-ini":
      return {
        command: utilBin,
        args: ["create", "-t", template, paths.logConfig],
      };
    case "wsgi-app":
      return {
        command: utilBin,
        args: ["create", "-t", template, "-f", paths.mapproxyConfig, paths.wsgiApp],
      };
  }
};

/**
 * Runs `mapproxy-util create` once for `template`. Any non-zero exit aborts the
 * bootstrap with the tool's own exit code; the tool prints its diagnostics.
 */
export const generateFromTemplate = async (input: {
  runner: CommandRunner;
  utilBin: string;
  template: TemplateName;
  paths: ConfigPaths;
}) => {
  const spec = buildTemplateCommand(input);
  await mkdir(input.paths.configDir, { recursive: true });

  await withSpan(
    "bootstrap.template",
    { "mapproxy.template": input.template },
    async () => {
      const exitCode = await input.runner.run(spec);
      if (exitCode !== 0) {
        throw new BootstrapError(
          `Template generation "${input.template}" failed with exit code ${exitCode}.`,
          { exitCode },
        );
      }
    },
  );

  countBootstrapEvent("template_generations", { "mapproxy.template": input.template });
  logger.info("Generated configuration from template.", {
    template: input.template,
    target: spec.args[spec.args.length - 1],
  });
};
