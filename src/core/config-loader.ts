import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { applyDeprecatedAliases, type DeprecatedOptionAlias } from "../launch/image-resolver.js";

import { LauncherConfigSchema, resolveLauncherConfig, type LauncherConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultConfigPath, type PathsContext } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedLauncherConfig = {
  config: LauncherConfig;
  configPath: string | null;
  warnings: string[];
};

const DEPRECATED_HEAD_KEYS: ReadonlyArray<DeprecatedOptionAlias<"image" | "pod_image">> = [
  {
    legacy: "pod_image",
    current: "image",
    legacyLabel: "head.pod_image",
    currentLabel: "head.image",
  },
];

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the --config path, or omit it to use the defaults.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

function resolveYamlErrorLocation(error: unknown): { line: number; column: number } | null {
  if (error instanceof yaml.YAMLException) {
    return { line: error.mark.line + 1, column: error.mark.column + 1 };
  }

  return null;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Launcher config missing.",
    message: `Launcher config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Launcher config invalid.",
    message: `Launcher config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

// An explicit path must exist; otherwise <home>/config.yaml is used when present.
export function loadLauncherConfig(opts: {
  explicitPath?: string;
  paths: PathsContext;
}): LoadedLauncherConfig {
  if (opts.explicitPath) {
    const absolutePath = path.resolve(opts.explicitPath);
    if (!fs.existsSync(absolutePath)) {
      throw createMissingConfigError(absolutePath);
    }
    return loadConfigFile(absolutePath);
  }

  const homeConfig = defaultConfigPath(opts.paths);
  if (fs.existsSync(homeConfig)) {
    return loadConfigFile(homeConfig);
  }

  return { ...parseLauncherConfig({}), configPath: null };
}

export function parseLauncherConfig(doc: unknown): Omit<LoadedLauncherConfig, "configPath"> {
  const parsed = LauncherConfigSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid launcher config:\n${formatIssues(parsed.error.issues)}`, parsed.error);
  }

  const { values, warnings } = applyDeprecatedAliases(
    { image: parsed.data.head.image, pod_image: parsed.data.head.pod_image },
    DEPRECATED_HEAD_KEYS,
  );

  return { config: resolveLauncherConfig(parsed.data, values.image), warnings };
}

// =============================================================================
// INTERNALS
// =============================================================================

function loadConfigFile(absolutePath: string): LoadedLauncherConfig {
  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read launcher config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });
    return { ...parseLauncherConfig(expanded), configPath: absolutePath };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(absolutePath, err);
    }
    throw err;
  }
}
