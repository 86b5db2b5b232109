/**
 * PodDriver launches a run as a single head pod and reports its exit status.
 * Purpose: the cluster-side Driver used by `podlaunch run`.
 * Assumptions: one driver instance per launch; shutdown() follows run().
 * Usage: const driver = new PodDriver({ client: new KubectlClient(), defaults });
 */

import { text } from "node:stream/consumers";
import { setTimeout as delay } from "node:timers/promises";

import { DriverError } from "../core/errors.js";
import type { LaunchConfig } from "../launch/launch-config.js";
import { STDIN_PIPELINE_MARKER } from "../launch/orchestrator.js";
import { consoleReporter, type Driver, type LaunchReporter } from "../launch/ports.js";

import type { KubeClient, PodState } from "./kube-client.js";
import { buildHeadPodManifests, type HeadPodDefaults } from "./pod-spec.js";

// =============================================================================
// TYPES
// =============================================================================

export type PodDriverOptions = {
  client: KubeClient;
  defaults: HeadPodDefaults;
  pollIntervalMs?: number;
  startTimeoutMs?: number;
  reporter?: LaunchReporter;
  readStdin?: () => Promise<string>;
};

type LaunchedPod = {
  name: string;
  namespace?: string;
  background: boolean;
};

const DEFAULT_POLL_INTERVAL_MS = 2_000;
const DEFAULT_START_TIMEOUT_MS = 10 * 60 * 1_000;

const FATAL_WAITING_REASONS = new Set([
  "ErrImagePull",
  "ImagePullBackOff",
  "InvalidImageName",
  "CreateContainerConfigError",
  "CreateContainerError",
]);

// =============================================================================
// DRIVER
// =============================================================================

export class PodDriver implements Driver {
  private readonly client: KubeClient;
  private readonly defaults: HeadPodDefaults;
  private readonly pollIntervalMs: number;
  private readonly startTimeoutMs: number;
  private readonly reporter: LaunchReporter;
  private readonly readStdin: () => Promise<string>;
  private launched: LaunchedPod | null = null;

  constructor(opts: PodDriverOptions) {
    this.client = opts.client;
    this.defaults = opts.defaults;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.startTimeoutMs = opts.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.reporter = opts.reporter ?? consoleReporter;
    this.readStdin = opts.readStdin ?? (() => text(process.stdin));
  }

  async run(pipelineRef: string, scriptArgs: string[], config: LaunchConfig): Promise<void> {
    const script = pipelineRef === STDIN_PIPELINE_MARKER ? await this.readStdin() : undefined;
    const manifests = buildHeadPodManifests({
      pipelineRef,
      scriptArgs,
      config,
      defaults: this.defaults,
      script,
    });

    await this.client.create(manifests, config.namespace);
    const pod: LaunchedPod = {
      name: config.runName,
      namespace: config.namespace,
      background: config.background,
    };
    this.launched = pod;

    await this.waitForStart(pod);

    if (pod.background) {
      const namespaceFlag = pod.namespace ? ` -n ${pod.namespace}` : "";
      this.reporter.info(
        `Pod submitted: ${pod.name} .. you can see it with: kubectl logs -f ${pod.name}${namespaceFlag}`,
      );
      return;
    }

    this.reporter.info(`Pod started: ${pod.name}`);
    await this.client.followLogs(pod.name, pod.namespace);
  }

  async shutdown(): Promise<number> {
    const pod = this.launched;
    if (!pod) {
      throw new DriverError("Driver shutdown requested before a pod was launched");
    }

    if (pod.background) {
      return 0;
    }

    return this.waitForExitCode(pod);
  }

  // ===========================================================================
  // POLLING
  // ===========================================================================

  private async waitForStart(pod: LaunchedPod): Promise<void> {
    const startedAt = Date.now();

    for (;;) {
      const state = await this.client.getPodState(pod.name, pod.namespace);
      if (state) {
        assertStartable(pod.name, state);
        if (state.phase !== "Pending") {
          return;
        }
      }

      if (Date.now() - startedAt >= this.startTimeoutMs) {
        throw new DriverError(
          `Pod ${pod.name} did not start within ${Math.round(this.startTimeoutMs / 1000)}s`,
        );
      }

      await delay(this.pollIntervalMs);
    }
  }

  private async waitForExitCode(pod: LaunchedPod): Promise<number> {
    for (;;) {
      const state = await this.client.getPodState(pod.name, pod.namespace);
      if (!state) {
        throw new DriverError(`Pod ${pod.name} no longer exists; unable to read its exit status`);
      }

      if (state.exitCode !== undefined) {
        return state.exitCode;
      }
      if (state.phase === "Succeeded") {
        return 0;
      }
      if (state.phase === "Failed") {
        return 1;
      }

      await delay(this.pollIntervalMs);
    }
  }
}

function assertStartable(name: string, state: PodState): void {
  if (state.waitingReason && FATAL_WAITING_REASONS.has(state.waitingReason)) {
    throw new DriverError(`Pod ${name} cannot start: ${state.waitingReason}`);
  }
}
