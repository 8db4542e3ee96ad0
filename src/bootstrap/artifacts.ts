import { stat } from "node:fs/promises";
import type { ArtifactPresence, ConfigPaths } from "@/types/contracts";

const isMissingPathError = (error: unknown) =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "ENOTDIR");

/**
 * True only for a regular file (symlinks followed). A directory at the path
 * counts as absent; any other stat failure propagates.
 */
export const isRegularFile = async (path: string) => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw new Error(`Unable to inspect ${path}`, { cause: error });
  }
};

export const inspectArtifacts = async (
  paths: ConfigPaths,
): Promise<ArtifactPresence> => {
  const [mapproxyConfig, seedConfig, logConfig, wsgiApp] = await Promise.all([
    isRegularFile(paths.mapproxyConfig),
    isRegularFile(paths.seedConfig),
    isRegularFile(paths.logConfig),
    isRegularFile(paths.wsgiApp),
  ]);

  return { mapproxyConfig, seedConfig, logConfig, wsgiApp };
};

export const hasCompleteConfiguration = (presence: ArtifactPresence) =>
  presence.mapproxyConfig && presence.seedConfig;
