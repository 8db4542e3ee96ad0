export type TemplateName = "base-config" | "log-ini" | "wsgi-app";

export type ArtifactName = "mapproxyConfig" | "seedConfig" | "logConfig" | "wsgiApp";

export type ConfigPaths = {
  configDir: string;
} & Record<ArtifactName, string>;

export type ArtifactPresence = Record<ArtifactName, boolean>;

export type CommandSpec = {
  command: string;
  args: string[];
};

export type SeedSkipReason = "opted_out" | "config_incomplete";

export type SeedDecision =
  | {
      launch: true;
      concurrency: number;
    }
  | {
      launch: false;
      reason: SeedSkipReason;
    };

export type BootstrapReport = {
  paths: ConfigPaths;
  presence: ArtifactPresence;
  generated: TemplateName[];
  seed: SeedDecision;
};

export type ForegroundSignal =
  | "SIGTERM"
  | "SIGINT"
  | "SIGHUP"
  | "SIGQUIT"
  | "SIGUSR1"
  | "SIGUSR2";
