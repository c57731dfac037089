export type PlaygroundConfig = {
  trace: boolean;
  hostCommitsTrigger: boolean;
};

function flag(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): PlaygroundConfig {
  return {
    trace: flag(env.VNI_TRACE),
    hostCommitsTrigger: !flag(env.VNI_HOST_SUPPRESSES_TRIGGER)
  };
}
