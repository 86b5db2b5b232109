/**
 * Launch orchestrator.
 * Purpose: validate a launch request, hand one immutable LaunchConfig to the driver,
 * and return the driver's status untouched.
 * Assumptions: every validation failure is raised before the driver is called;
 * driver failures propagate as thrown.
 * Usage: const outcome = await launchPipeline(request, { history, driver, reporter }).
 */

import { LaunchError } from "../core/errors.js";
import { logLaunchEvent, type JsonObject, type JsonlLogger } from "../core/logger.js";

import { resolveHeadImage } from "./image-resolver.js";
import { buildLaunchConfig, type LaunchConfig } from "./launch-config.js";
import {
  consoleReporter,
  type Driver,
  type HistoryStore,
  type LaunchLogSink,
  type LaunchReporter,
} from "./ports.js";
import { resolveRunName } from "./run-name-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export const STDIN_PIPELINE_MARKER = "-";

export type LaunchRequest = {
  // Positional arguments: the pipeline reference followed by its script arguments.
  args: string[];
  stdin?: boolean;
  runName?: string;
  headImage?: string;
  podImage?: string;
  cpus?: number;
  memory?: string;
  prescript?: string;
  background?: boolean;
  namespace?: string;
  volumeMounts?: string[];
  remoteConfig?: string[];
  remoteProfile?: string;
  ansiLog?: boolean;
};

export type LaunchDeps = {
  history: HistoryStore;
  driver: Driver;
  reporter?: LaunchReporter;
  logSink?: LaunchLogSink;
  // Runs once the name is final and before the driver is called; a rejection aborts the launch.
  onLaunch?: (launch: LaunchedRun) => Promise<void>;
};

export type LaunchedRun = {
  pipelineRef: string;
  config: LaunchConfig;
};

export type LaunchOutcome = {
  status: number;
  pipelineRef: string;
  config: LaunchConfig;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function launchPipeline(
  request: LaunchRequest,
  deps: LaunchDeps,
): Promise<LaunchOutcome> {
  const reporter = deps.reporter ?? consoleReporter;
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    reporter.warn(message);
  };

  const scriptArgs = request.args.slice(1);
  const pipelineRef = request.stdin ? STDIN_PIPELINE_MARKER : request.args[0];
  if (!pipelineRef) {
    throw new LaunchError("MissingPipeline", "No project name was specified");
  }

  if (request.ansiLog) {
    warn("ANSI logging is not supported by cluster launches");
  }

  const { image, warnings: imageWarnings } = resolveHeadImage(request.headImage, request.podImage);
  imageWarnings.forEach(warn);

  const runName = await resolveRunName(request.runName, {
    clusterBound: true,
    history: deps.history,
  });

  const config = buildLaunchConfig({
    runName,
    image,
    cpus: request.cpus,
    memory: request.memory,
    prescript: request.prescript,
    background: request.background,
    namespace: request.namespace,
    volumeMounts: request.volumeMounts,
    remoteConfig: request.remoteConfig,
    remoteProfile: request.remoteProfile,
  });

  const logger = deps.logSink?.createLaunchLogger(runName) ?? null;
  try {
    for (const message of warnings) {
      logEvent(logger, "launch.warning", { message });
    }
    logEvent(logger, "launch.config", describeLaunch(pipelineRef, scriptArgs, config));

    await deps.onLaunch?.({ pipelineRef, config });
    logEvent(logger, "driver.start", { pipeline: pipelineRef });
    await deps.driver.run(pipelineRef, scriptArgs, config);
    const status = await deps.driver.shutdown();
    logEvent(logger, "driver.complete", { status });

    return { status, pipelineRef, config };
  } finally {
    logger?.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function logEvent(logger: JsonlLogger | null, type: string, payload: JsonObject): void {
  if (!logger) return;
  logLaunchEvent(logger, type, payload);
}

function describeLaunch(
  pipelineRef: string,
  scriptArgs: string[],
  config: LaunchConfig,
): JsonObject {
  const payload: JsonObject = {
    pipeline: pipelineRef,
    script_args: scriptArgs,
    background: config.background,
    volume_mounts: [...config.volumeMounts],
    remote_config: [...config.remoteConfig],
  };

  if (config.image) payload.image = config.image;
  if (config.namespace) payload.namespace = config.namespace;
  if (config.cpus !== undefined) payload.cpus = config.cpus;
  if (config.memory) payload.memory = config.memory;
  if (config.prescript) payload.prescript = config.prescript;
  if (config.remoteProfile) payload.remote_profile = config.remoteProfile;

  return payload;
}
