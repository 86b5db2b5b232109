// =============================================================================
// TYPES
// =============================================================================

export type LaunchConfig = Readonly<{
  runName: string;
  image?: string;
  cpus?: number;
  memory?: string;
  prescript?: string;
  background: boolean;
  namespace?: string;
  volumeMounts: readonly string[];
  remoteConfig: readonly string[];
  remoteProfile?: string;
}>;

export type LaunchConfigInput = {
  runName: string;
  image?: string;
  cpus?: number;
  memory?: string;
  prescript?: string;
  background?: boolean;
  namespace?: string;
  volumeMounts?: string[];
  remoteConfig?: string[];
  remoteProfile?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildLaunchConfig(input: LaunchConfigInput): LaunchConfig {
  const config: LaunchConfig = {
    runName: input.runName,
    image: input.image,
    // 0 is "not requested", as with an unset flag.
    cpus: input.cpus && input.cpus > 0 ? input.cpus : undefined,
    memory: input.memory,
    prescript: input.prescript,
    background: input.background ?? false,
    namespace: input.namespace,
    volumeMounts: Object.freeze([...(input.volumeMounts ?? [])]),
    remoteConfig: Object.freeze([...(input.remoteConfig ?? [])]),
    remoteProfile: input.remoteProfile,
  };

  return Object.freeze(config);
}
