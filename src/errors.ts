export const EXIT_CODE_FAILURE = 1;
export const EXIT_CODE_USAGE = 64;
export const EXIT_CODE_CONFIG = 78;

/**
 * A failure that stops the container before the foreground command starts.
 * `exitCode` is what the entrypoint exits with.
 */
export class BootstrapError extends Error {
  readonly exitCode: number;

  constructor(message: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "BootstrapError";
    this.exitCode =
      options.exitCode !== undefined && options.exitCode > 0
        ? options.exitCode
        : EXIT_CODE_FAILURE;
  }
}

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
