import type { LauncherConfig } from "../core/config.js";
import { formatErrorMessage, resolveErrorCode } from "../core/error-format.js";
import {
  DriverError,
  HistoryError,
  LaunchError,
  UserFacingError,
  type LaunchErrorKind,
} from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { launchLogPath, type PathsContext } from "../core/paths.js";
import { isoNow } from "../core/utils.js";
import {
  buildRunHistoryEntry,
  FileHistoryStore,
  resolveHistoryEnabled,
  type RunHistoryEntry,
} from "../history/run-history.js";
import { KubectlClient } from "../k8s/kube-client.js";
import { PodDriver } from "../k8s/pod-driver.js";
import { launchPipeline, STDIN_PIPELINE_MARKER } from "../launch/orchestrator.js";
import type { Driver, LaunchLogSink, LaunchReporter } from "../launch/ports.js";

import { createCliReporter } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  volumeMount?: string[];
  namespace?: string;
  headImage?: string;
  podImage?: string;
  headCpus?: number;
  headMemory?: string;
  headPrescript?: string;
  remoteConfig?: string[];
  remoteProfile?: string;
  name?: string;
  bg?: boolean;
  ansiLog?: boolean;
};

export type RunCommandContext = {
  config: LauncherConfig;
  paths: PathsContext;
  history: FileHistoryStore;
  driver: Driver;
  reporter: LaunchReporter;
  logSink?: LaunchLogSink;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function createRunCommandContext(
  config: LauncherConfig,
  paths: PathsContext,
  reporter: LaunchReporter = createCliReporter(),
): RunCommandContext {
  const history = new FileHistoryStore({
    paths,
    enabled: resolveHistoryEnabled(config.history.enabled),
  });

  const driver = new PodDriver({
    client: new KubectlClient(),
    defaults: {
      image: config.head.image,
      command: config.head.command,
      serviceAccount: config.service_account,
      env: config.head.env,
    },
    pollIntervalMs: config.driver.poll_interval_ms,
    startTimeoutMs: config.driver.start_timeout_seconds * 1000,
    reporter,
  });

  const logSink: LaunchLogSink = {
    createLaunchLogger: (runName) => new JsonlLogger(launchLogPath(runName, paths), { runName }),
  };

  return { config, paths, history, driver, reporter, logSink };
}

// =============================================================================
// COMMAND
// =============================================================================

// Returns the driver status, which becomes the process exit code.
// The run is recorded before the driver starts, so its name is taken even if the driver fails.
export async function runCommand(
  pipeline: string | undefined,
  scriptArgs: string[],
  opts: RunCommandOptions,
  context: RunCommandContext,
): Promise<number> {
  const { config } = context;
  const startedAt = isoNow();
  const recorded: { launch?: RunHistoryEntry } = {};

  try {
    const outcome = await launchPipeline(
      {
        args: pipeline ? [pipeline, ...scriptArgs] : [],
        stdin: pipeline === STDIN_PIPELINE_MARKER,
        runName: opts.name,
        headImage: opts.headImage,
        podImage: opts.podImage,
        cpus: opts.headCpus ?? config.head.cpus,
        memory: opts.headMemory ?? config.head.memory,
        prescript: opts.headPrescript ?? config.head.prescript,
        background: opts.bg ?? false,
        namespace: opts.namespace ?? config.namespace,
        volumeMounts:
          opts.volumeMount && opts.volumeMount.length > 0 ? opts.volumeMount : config.volume_mounts,
        remoteConfig: opts.remoteConfig,
        remoteProfile: opts.remoteProfile,
        ansiLog: opts.ansiLog,
      },
      {
        history: context.history,
        driver: context.driver,
        reporter: context.reporter,
        logSink: context.logSink,
        onLaunch: async ({ pipelineRef, config: launchConfig }) => {
          const entry = buildRunHistoryEntry({
            runName: launchConfig.runName,
            pipeline: pipelineRef,
            namespace: launchConfig.namespace,
            background: launchConfig.background,
            startedAt,
          });
          await context.history.record(entry);
          recorded.launch = entry;
        },
      },
    );
    // The driver has finished; a failure past this point leaves the submitted entry as is.
    recorded.launch = undefined;

    await context.history.record(
      buildRunHistoryEntry({
        runName: outcome.config.runName,
        pipeline: outcome.pipelineRef,
        namespace: outcome.config.namespace,
        background: outcome.config.background,
        exitCode: outcome.status,
        startedAt,
      }),
    );

    return outcome.status;
  } catch (error) {
    if (recorded.launch) {
      await recordLaunchFailure(context, recorded.launch);
    }
    throw normalizeRunCommandError(error);
  }
}

async function recordLaunchFailure(
  context: RunCommandContext,
  launched: RunHistoryEntry,
): Promise<void> {
  try {
    await context.history.record({ ...launched, status: "failed", updatedAt: isoNow() });
  } catch (recordError) {
    context.reporter.warn(
      `Could not mark run ${launched.runName} as failed: ${formatErrorMessage(recordError)}`,
    );
  }
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Launch failed.";

const LAUNCH_ERROR_HINTS: Record<LaunchErrorKind, string> = {
  MissingPipeline:
    "Pass a pipeline, e.g. `podlaunch run org/repo`, or `-` to read the script from standard input.",
  InvalidClusterName:
    "Use lower case letters, digits, '-' or '.' in --name, starting and ending with a letter or digit.",
  ReservedRunName: "`last` is reserved. Choose a different --name.",
  MalformedRunName:
    "Run names start with a letter, use letters, digits, '-' or '_', and are at most 80 characters.",
  DuplicateRunName:
    "Choose another --name, or omit it to generate one. Used names are listed by `podlaunch runs`.",
  MissingRunName:
    "Pass --name, or enable run history (history.enabled in the config, PODLAUNCH_HISTORY_DISABLED unset).",
};

const DRIVER_HINT = "Check cluster access with `kubectl get pods` and retry.";
const HISTORY_HINT = "Inspect or remove the run history file under $PODLAUNCH_HOME/history.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: RUN_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof LaunchError) {
    return LAUNCH_ERROR_HINTS[error.kind];
  }
  if (error instanceof DriverError) {
    return DRIVER_HINT;
  }
  if (error instanceof HistoryError) {
    return HISTORY_HINT;
  }

  return undefined;
}
