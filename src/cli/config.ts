import type { LauncherConfig } from "../core/config.js";
import { loadLauncherConfig } from "../core/config-loader.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): {
  config: LauncherConfig;
  configPath: string | null;
  paths: PathsContext;
  warnings: string[];
} {
  const paths = createPathsContext({ env: args.env });
  const loaded = loadLauncherConfig({ explicitPath: args.explicitConfigPath, paths });

  return { ...loaded, paths };
}
