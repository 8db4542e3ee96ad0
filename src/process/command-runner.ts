import { spawn, type ChildProcess } from "node:child_process";
import { BootstrapError, errorMessage } from "@/errors";
import { logger } from "@/observability/logger";
import { exitCodeForTermination } from "@/process/exit-codes";
import type { CommandSpec, ForegroundSignal } from "@/types/contracts";

const FORWARDED_SIGNALS: ReadonlyArray<ForegroundSignal> = [
  "SIGTERM",
  "SIGINT",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR1",
  "SIGUSR2",
];

const EXIT_CODE_NOT_EXECUTABLE = 126;
const EXIT_CODE_NOT_FOUND = 127;

type SignalListener = (signal: NodeJS.Signals) => void;

export type SignalSource = {
  on: (event: ForegroundSignal, listener: SignalListener) => unknown;
  off: (event: ForegroundSignal, listener: SignalListener) => unknown;
};

export type CommandRunner = {
  /** Runs a tool with inherited stdio and resolves with its exit code. */
  run: (spec: CommandSpec) => Promise<number>;
  /** Starts a process nobody waits for; failures are only logged. */
  launchBackground: (spec: CommandSpec, label: string) => void;
  /**
   * Starts the foreground command, relays termination signals to it and
   * resolves with the exit code the entrypoint should exit with.
   */
  handOff: (spec: CommandSpec) => Promise<number>;
};

const spawnErrorCode = (error: unknown) =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

// Same codes a shell reports for `exec` of a missing or non-executable file.
const exitCodeForSpawnError = (error: unknown) => {
  const code = spawnErrorCode(error);
  if (code === "ENOENT") {
    return EXIT_CODE_NOT_FOUND;
  }
  if (code === "EACCES") {
    return EXIT_CODE_NOT_EXECUTABLE;
  }
  return undefined;
};

const waitForExit = (child: ChildProcess, spec: CommandSpec) =>
  new Promise<number>((resolve, reject) => {
    let settled = false;
    child.once("error", (error) => {
      if (settled) {
        logger.warn("Child process reported an error after exiting.", {
          command: spec.command,
          error: errorMessage(error),
        });
        return;
      }
      settled = true;
      reject(
        new BootstrapError(`Failed to start ${spec.command}: ${error.message}`, {
          exitCode: exitCodeForSpawnError(error),
          cause: error,
        }),
      );
    });
    child.once("exit", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(exitCodeForTermination(code, signal));
    });
  });

// Ctrl-C on a terminal already reaches the child through the foreground
// process group; relaying it again would deliver a second SIGINT.
export const signalsToForward = (interactive: boolean) =>
  interactive
    ? FORWARDED_SIGNALS.filter((signal) => signal !== "SIGINT")
    : FORWARDED_SIGNALS;

export const createCommandRunner = ({
  signalSource = process,
  interactive = process.stdin.isTTY === true,
}: { signalSource?: SignalSource; interactive?: boolean } = {}): CommandRunner => {
  const forwardedSignals = signalsToForward(interactive);

  const run = async (spec: CommandSpec) => {
    logger.debug("Running command.", spec);
    const child = spawn(spec.command, spec.args, { stdio: "inherit" });
    return waitForExit(child, spec);
  };

  const launchBackground = (spec: CommandSpec, label: string) => {
    let child: ChildProcess;
    try {
      child = spawn(spec.command, spec.args, { stdio: "inherit" });
    } catch (error) {
      logger.warn(`Failed to launch ${label}; continuing without it.`, {
        ...spec,
        error: errorMessage(error),
      });
      return;
    }

    child.once("error", (error) => {
      logger.warn(`Failed to launch ${label}; continuing without it.`, {
        ...spec,
        error: error.message,
      });
    });
    child.once("exit", (code, signal) => {
      const exitCode = exitCodeForTermination(code, signal);
      if (exitCode === 0) {
        logger.info(`Background ${label} finished.`, { pid: child.pid });
        return;
      }
      logger.warn(`Background ${label} exited unsuccessfully.`, {
        pid: child.pid,
        exitCode,
        signal,
      });
    });
    // Never keeps the entrypoint alive on its own.
    child.unref();

    logger.info(`Background ${label} launched.`, { pid: child.pid, ...spec });
  };

  const handOff = async (spec: CommandSpec) => {
    const child = spawn(spec.command, spec.args, { stdio: "inherit" });

    const forward: SignalListener = (signal) => {
      logger.info(`${signal} received. Forwarding to foreground command.`, {
        pid: child.pid,
      });
      child.kill(signal);
    };
    for (const signal of forwardedSignals) {
      signalSource.on(signal, forward);
    }

    try {
      const exitCode = await waitForExit(child, spec);
      logger.info("Foreground command exited.", {
        command: spec.command,
        exitCode,
      });
      return exitCode;
    } finally {
      for (const signal of forwardedSignals) {
        signalSource.off(signal, forward);
      }
    }
  };

  return {
    run,
    launchBackground,
    handOff,
  };
};
