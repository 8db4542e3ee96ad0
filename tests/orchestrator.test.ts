import { EventEmitter } from "node:events";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveConfigPaths } from "@/bootstrap/paths";
import {
  prepareContainer,
  runEntrypoint,
  toForegroundCommand,
} from "@/bootstrap/orchestrator";
import { parseEnv, type BootstrapEnv } from "@/config/env";
import { createCommandRunner, type CommandRunner } from "@/process/command-runner";
import type { CommandSpec } from "@/types/contracts";

vi.mock("@/observability/logger", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const FOREGROUND_ARGV = ["uwsgi", "--ini", "uwsgi.conf"];

const createFakeRunner = (
  input: { templateExitCode?: number; foregroundExitCode?: number } = {},
) => {
  const calls: string[] = [];
  const runner = {
    run: vi.fn(async (spec: CommandSpec) => {
      calls.push(`run:${spec.args[2]}`);
      return input.templateExitCode ?? 0;
    }),
    launchBackground: vi.fn((_spec: CommandSpec, label: string) => {
      calls.push(`background:${label}`);
    }),
    handOff: vi.fn(async (spec: CommandSpec) => {
      calls.push(`handOff:${spec.command}`);
      return input.foregroundExitCode ?? 0;
    }),
  } satisfies CommandRunner;
  return { runner, calls };
};

describe("bootstrap orchestrator", () => {
  let configDir = "";

  const buildEnv = (overrides: Partial<BootstrapEnv> = {}): BootstrapEnv => ({
    ...parseEnv({ SEED_NUM_CORE: "2" }),
    MAPPROXY_CONFIG_DIR: configDir,
    ...overrides,
  });

  const writeArtifacts = async (...names: string[]) => {
    for (const name of names) {
      await writeFile(join(configDir, name), "# test\n");
    }
  };

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), "mapproxy-bootstrap-"));
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it("never generates templates when every configuration exists", async () => {
    await writeArtifacts("mapproxy.yaml", "seed.yaml", "log.ini");
    const { runner } = createFakeRunner();

    const report = await prepareContainer({ env: buildEnv(), runner });

    expect(runner.run).not.toHaveBeenCalled();
    expect(report.generated).toEqual([]);
  });

  it("launches seeding in the background with the configured concurrency", async () => {
    await writeArtifacts("mapproxy.yaml", "seed.yaml", "log.ini");
    const { runner } = createFakeRunner();
    const paths = resolveConfigPaths(configDir);

    const report = await prepareContainer({
      env: buildEnv({ SEED_NUM_CORE: 4 }),
      runner,
    });

    expect(report.seed).toEqual({ launch: true, concurrency: 4 });
    expect(runner.launchBackground).toHaveBeenCalledTimes(1);
    expect(runner.launchBackground).toHaveBeenCalledWith(
      {
        command: "mapproxy-seed",
        args: [
          "-f",
          paths.mapproxyConfig,
          "-s",
          paths.seedConfig,
          "-c",
          "4",
        ],
      },
      "seeding",
    );
  });

  it("regenerates the base configuration when only one of the pair is missing", async () => {
    await writeArtifacts("mapproxy.yaml", "log.ini");
    const { runner } = createFakeRunner();

    const report = await prepareContainer({ env: buildEnv(), runner });

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runner.run).toHaveBeenCalledWith({
      command: "mapproxy-util",
      args: ["create", "-t", "base-config", configDir],
    });
    expect(report.generated).toEqual(["base-config"]);
    expect(report.seed).toEqual({ launch: false, reason: "config_incomplete" });
    expect(runner.launchBackground).not.toHaveBeenCalled();
  });

  it("generates one template per missing category, in order", async () => {
    const { runner, calls } = createFakeRunner();

    const report = await prepareContainer({ env: buildEnv(), runner });

    expect(calls).toEqual(["run:base-config", "run:log-ini"]);
    expect(report.generated).toEqual(["base-config", "log-ini"]);
  });

  it("generates the WSGI script only when enabled", async () => {
    await writeArtifacts("mapproxy.yaml", "seed.yaml", "log.ini");
    const { runner, calls } = createFakeRunner();

    await prepareContainer({ env: buildEnv({ MAPPROXY_WSGI_APP: true }), runner });

    expect(calls).toEqual(["run:wsgi-app", "background:seeding"]);
  });

  it("does not seed when opted out", async () => {
    await writeArtifacts("mapproxy.yaml", "seed.yaml", "log.ini");
    const { runner } = createFakeRunner();

    const report = await prepareContainer({
      env: buildEnv({ NO_SEED: true }),
      runner,
    });

    expect(report.seed).toEqual({ launch: false, reason: "opted_out" });
    expect(runner.launchBackground).not.toHaveBeenCalled();
  });

  it("hands off after bootstrap and returns the foreground exit code", async () => {
    await writeArtifacts("mapproxy.yaml", "seed.yaml", "log.ini");
    const { runner, calls } = createFakeRunner({ foregroundExitCode: 42 });
    const beforeHandOff = vi.fn(async () => {
      calls.push("beforeHandOff");
    });

    const exitCode = await runEntrypoint({
      argv: FOREGROUND_ARGV,
      env: buildEnv(),
      runner,
      beforeHandOff,
    });

    expect(exitCode).toBe(42);
    expect(calls).toEqual(["background:seeding", "beforeHandOff", "handOff:uwsgi"]);
    expect(runner.handOff).toHaveBeenCalledWith({
      command: "uwsgi",
      args: ["--ini", "uwsgi.conf"],
    });
  });

  it("aborts before the foreground command when template generation fails", async () => {
    const { runner } = createFakeRunner({ templateExitCode: 2 });

    await expect(
      runEntrypoint({ argv: FOREGROUND_ARGV, env: buildEnv(), runner }),
    ).rejects.toMatchObject({ name: "BootstrapError", exitCode: 2 });
    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runner.handOff).not.toHaveBeenCalled();
  });

  it("exits 127 when the template tool is not installed", async () => {
    const runner = createCommandRunner({ signalSource: new EventEmitter() });
    const handOff = vi.spyOn(runner, "handOff");

    await expect(
      runEntrypoint({
        argv: FOREGROUND_ARGV,
        env: buildEnv({ MAPPROXY_UTIL_BIN: join(configDir, "missing", "mapproxy-util") }),
        runner,
      }),
    ).rejects.toMatchObject({ name: "BootstrapError", exitCode: 127 });
    expect(handOff).not.toHaveBeenCalled();
  });

  it("rejects an empty command before touching the configuration", async () => {
    const { runner } = createFakeRunner();

    await expect(
      runEntrypoint({ argv: [], env: buildEnv(), runner }),
    ).rejects.toMatchObject({ exitCode: 64 });
    expect(runner.run).not.toHaveBeenCalled();
  });
});

describe("toForegroundCommand", () => {
  it("passes arguments through unchanged", () => {
    expect(toForegroundCommand(["mapproxy-util", "serve-develop", "-b", "0.0.0.0:8080"])).toEqual({
      command: "mapproxy-util",
      args: ["serve-develop", "-b", "0.0.0.0:8080"],
    });
  });

  it("drops a leading argument separator", () => {
    expect(toForegroundCommand(["--", "echo", "--"])).toEqual({
      command: "echo",
      args: ["--"],
    });
  });
});
