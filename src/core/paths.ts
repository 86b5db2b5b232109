import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  podlaunchHome: string;
};

export type ResolvePodlaunchHomeOptions = {
  podlaunchHome?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolvePodlaunchHome(opts: ResolvePodlaunchHomeOptions = {}): string {
  if (opts.podlaunchHome) {
    return path.resolve(opts.podlaunchHome);
  }

  const envHome = (opts.env ?? process.env).PODLAUNCH_HOME;
  if (envHome) {
    return path.resolve(envHome);
  }

  return path.join(os.homedir(), ".podlaunch");
}

export function createPathsContext(opts: ResolvePodlaunchHomeOptions = {}): PathsContext {
  return { podlaunchHome: resolvePodlaunchHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultConfigPath(paths: PathsContext): string {
  return path.join(paths.podlaunchHome, "config.yaml");
}

export function historyDir(paths: PathsContext): string {
  return path.join(paths.podlaunchHome, "history");
}

export function runHistoryIndexPath(paths: PathsContext): string {
  return path.join(historyDir(paths), "runs.json");
}

export function runLogsDir(runName: string, paths: PathsContext): string {
  return path.join(paths.podlaunchHome, "logs", runName);
}

export function launchLogPath(runName: string, paths: PathsContext): string {
  return path.join(runLogsDir(runName, paths), "launch.jsonl");
}
