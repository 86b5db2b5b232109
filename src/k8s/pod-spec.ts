/*
Purpose: build the head pod (and optional pipeline ConfigMap) manifests for one launch.
Assumptions: LaunchConfig fields are already validated; volume mounts are parsed here.
Usage: const manifests = buildHeadPodManifests({ pipelineRef, scriptArgs, config, defaults });
*/

import { ConfigError } from "../core/errors.js";
import type { LaunchConfig } from "../launch/launch-config.js";
import { STDIN_PIPELINE_MARKER } from "../launch/orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

type ObjectMeta = {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
};

type Volume =
  | { name: string; persistentVolumeClaim: { claimName: string } }
  | { name: string; configMap: { name: string } };

type Container = {
  name: string;
  image: string;
  command: string[];
  env: Array<{ name: string; value: string }>;
  volumeMounts: Array<{ name: string; mountPath: string }>;
  resources?: { requests: Record<string, string> };
};

export type PodManifest = {
  apiVersion: "v1";
  kind: "Pod";
  metadata: ObjectMeta;
  spec: {
    restartPolicy: "Never";
    serviceAccountName?: string;
    containers: Container[];
    volumes: Volume[];
  };
};

export type ConfigMapManifest = {
  apiVersion: "v1";
  kind: "ConfigMap";
  metadata: ObjectMeta;
  data: Record<string, string>;
};

export type KubeManifest = PodManifest | ConfigMapManifest;

export type HeadPodDefaults = {
  image: string;
  command: string;
  serviceAccount?: string;
  env?: Record<string, string>;
};

export type HeadPodInput = {
  pipelineRef: string;
  scriptArgs: string[];
  config: LaunchConfig;
  defaults: HeadPodDefaults;
  // Pipeline script text, required when pipelineRef is the stdin marker.
  script?: string;
};

export type VolumeClaimMount = {
  claimName: string;
  mountPath: string;
};

export const PIPELINE_MOUNT_PATH = "/etc/podlaunch/pipeline";
export const PIPELINE_SCRIPT_FILE = "main.nf";
export const RUN_NAME_ANNOTATION = "podlaunch/run-name";

const HEAD_CONTAINER_NAME = "head";

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildHeadPodManifests(input: HeadPodInput): KubeManifest[] {
  const { config, defaults } = input;
  const manifests: KubeManifest[] = [];
  const volumes: Volume[] = [];
  const volumeMounts: Container["volumeMounts"] = [];

  parseVolumeMounts(config.volumeMounts).forEach((mount, index) => {
    const name = `vol-${index + 1}`;
    volumes.push({ name, persistentVolumeClaim: { claimName: mount.claimName } });
    volumeMounts.push({ name, mountPath: mount.mountPath });
  });

  let pipeline = input.pipelineRef;
  if (input.pipelineRef === STDIN_PIPELINE_MARKER) {
    if (input.script === undefined) {
      throw new ConfigError("Pipeline script from standard input is required for `-`");
    }
    const configMapName = `${config.runName}-pipeline`;
    manifests.push({
      apiVersion: "v1",
      kind: "ConfigMap",
      metadata: withNamespace({ name: configMapName, labels: runLabels() }, config.namespace),
      data: { [PIPELINE_SCRIPT_FILE]: input.script },
    });
    volumes.push({ name: "pipeline", configMap: { name: configMapName } });
    volumeMounts.push({ name: "pipeline", mountPath: PIPELINE_MOUNT_PATH });
    pipeline = `${PIPELINE_MOUNT_PATH}/${PIPELINE_SCRIPT_FILE}`;
  }

  const container: Container = {
    name: HEAD_CONTAINER_NAME,
    image: config.image ?? defaults.image,
    command: ["/bin/sh", "-c", buildHeadCommand(pipeline, input.scriptArgs, config, defaults.command)],
    env: buildEnv(config.runName, defaults.env),
    volumeMounts,
  };

  const requests = buildResourceRequests(config);
  if (requests) {
    container.resources = { requests };
  }

  const pod: PodManifest = {
    apiVersion: "v1",
    kind: "Pod",
    metadata: withNamespace(
      {
        name: config.runName,
        labels: runLabels(),
        annotations: { [RUN_NAME_ANNOTATION]: config.runName },
      },
      config.namespace,
    ),
    spec: {
      restartPolicy: "Never",
      containers: [container],
      volumes,
    },
  };

  if (defaults.serviceAccount) {
    pod.spec.serviceAccountName = defaults.serviceAccount;
  }

  manifests.push(pod);
  return manifests;
}

export function buildHeadCommand(
  pipeline: string,
  scriptArgs: string[],
  config: LaunchConfig,
  command: string,
): string {
  const runArgs = [command, "run", pipeline, "-name", config.runName];
  for (const file of config.remoteConfig) {
    runArgs.push("-c", file);
  }
  if (config.remoteProfile) {
    runArgs.push("-profile", config.remoteProfile);
  }
  runArgs.push(...scriptArgs);

  const runLine = runArgs.map(shellQuote).join(" ");
  // The prescript is a shell fragment (path plus optional arguments); it is not quoted.
  return config.prescript ? `${config.prescript}; ${runLine}` : runLine;
}

export function parseVolumeMounts(mounts: readonly string[]): VolumeClaimMount[] {
  return mounts.map((mount) => {
    const separator = mount.indexOf(":");
    const claimName = separator > 0 ? mount.slice(0, separator) : "";
    const mountPath = separator > 0 ? mount.slice(separator + 1) : "";

    if (!claimName || !mountPath.startsWith("/")) {
      throw new ConfigError(
        `Not a valid volume claim mount: \`${mount}\` -- Expected <claim-name>:<absolute-path>`,
      );
    }

    return { claimName, mountPath };
  });
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\-.,:/@=+%]+$/.test(value)) {
    return value;
  }

  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function runLabels(): Record<string, string> {
  return { app: "podlaunch" };
}

function withNamespace(meta: ObjectMeta, namespace?: string): ObjectMeta {
  return namespace ? { ...meta, namespace } : meta;
}

function buildEnv(runName: string, env: Record<string, string> = {}): Container["env"] {
  const entries = Object.entries(env).map(([name, value]) => ({ name, value }));
  entries.push({ name: "PODLAUNCH_RUN_NAME", value: runName });
  return entries;
}

function buildResourceRequests(config: LaunchConfig): Record<string, string> | null {
  const requests: Record<string, string> = {};
  if (config.cpus !== undefined) requests.cpu = String(config.cpus);
  if (config.memory) requests.memory = config.memory;

  return Object.keys(requests).length > 0 ? requests : null;
}
