import type { BootstrapEnv } from "@/config/env";
import { hasCompleteConfiguration } from "@/bootstrap/artifacts";
import type {
  ArtifactPresence,
  CommandSpec,
  ConfigPaths,
  SeedDecision,
} from "@/types/contracts";

type SeedEnv = Pick<
  BootstrapEnv,
  | "NO_SEED"
  | "SEED_NUM_CORE"
  | "SEED_TASKS"
  | "SEED_CONTINUE"
  | "SEED_DRY_RUN"
  | "SEED_PROGRESS_FILE"
  | "SEED_USE_LOG_CONFIG"
>;

// `presence` is what existed before this start: generated demo configs are
// never seeded.
export const decideSeeding = (input: {
  presence: ArtifactPresence;
  env: Pick<SeedEnv, "NO_SEED" | "SEED_NUM_CORE">;
}): SeedDecision => {
  if (input.env.NO_SEED) {
    return { launch: false, reason: "opted_out" };
  }
  if (!hasCompleteConfiguration(input.presence)) {
    return { launch: false, reason: "config_incomplete" };
  }
  return { launch: true, concurrency: input.env.SEED_NUM_CORE };
};

export const buildSeedCommand = (input: {
  seedBin: string;
  paths: ConfigPaths;
  concurrency: number;
  env: SeedEnv;
}): CommandSpec => {
  const { env, paths } = input;
  const args = [
    "-f",
    paths.mapproxyConfig,
    "-s",
    paths.seedConfig,
    "-c",
    String(input.concurrency),
  ];

  if (env.SEED_TASKS.length > 0) {
    args.push("--seed", env.SEED_TASKS.join(","));
  }
  if (env.SEED_CONTINUE) {
    args.push("--continue");
  }
  if (env.SEED_PROGRESS_FILE) {
    args.push("--progress-file", env.SEED_PROGRESS_FILE);
  }
  if (env.SEED_DRY_RUN) {
    args.push("--dry-run");
  }
  if (env.SEED_USE_LOG_CONFIG) {
    args.push("--log-config", paths.logConfig);
  }

  return { command: input.seedBin, args };
};
