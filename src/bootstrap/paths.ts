import { join } from "node:path";
import type { ArtifactName, ConfigPaths } from "@/types/contracts";

const ARTIFACT_FILE_NAMES: Readonly<Record<ArtifactName, string>> = {
  mapproxyConfig: "mapproxy.yaml",
  seedConfig: "seed.yaml",
  logConfig: "log.ini",
  wsgiApp: "config.py",
};

export const resolveConfigPaths = (configDir: string): ConfigPaths => ({
  configDir,
  mapproxyConfig: join(configDir, ARTIFACT_FILE_NAMES.mapproxyConfig),
  seedConfig: join(configDir, ARTIFACT_FILE_NAMES.seedConfig),
  logConfig: join(configDir, ARTIFACT_FILE_NAMES.logConfig),
  wsgiApp: join(configDir, ARTIFACT_FILE_NAMES.wsgiApp),
});
