/*
Purpose: talk to the cluster through kubectl: create manifests, read pod state, stream logs.
Assumptions: kubectl is on PATH and already pointed at the target cluster context.
Usage: const client = new KubectlClient(); await client.create(manifests, "default");
*/

import { execa } from "execa";
import yaml from "js-yaml";
import { z } from "zod";

import { DriverError } from "../core/errors.js";

import type { KubeManifest } from "./pod-spec.js";

// =============================================================================
// TYPES
// =============================================================================

export type PodState = {
  phase: string;
  waitingReason?: string;
  exitCode?: number;
};

export interface KubeClient {
  create(manifests: KubeManifest[], namespace?: string): Promise<void>;
  getPodState(name: string, namespace?: string): Promise<PodState | null>;
  followLogs(name: string, namespace?: string): Promise<void>;
}

const ContainerStatusSchema = z
  .object({
    state: z
      .object({
        waiting: z.object({ reason: z.string().optional() }).passthrough().optional(),
        terminated: z.object({ exitCode: z.number().int() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const PodStatusSchema = z
  .object({
    status: z
      .object({
        phase: z.string().optional(),
        containerStatuses: z.array(ContainerStatusSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// =============================================================================
// COMMAND RUNNER
// =============================================================================

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  input?: string;
  stdio: "pipe" | "inherit";
};

export type CommandRunner = (
  file: string,
  args: string[],
  opts: CommandOptions,
) => Promise<CommandResult>;

export const execaRunner: CommandRunner = async (file, args, opts) => {
  const res = await execa(file, args, { input: opts.input, stdio: opts.stdio, reject: false });
  return {
    exitCode: res.exitCode,
    stdout: typeof res.stdout === "string" ? res.stdout : "",
    stderr: typeof res.stderr === "string" ? res.stderr : "",
  };
};

// =============================================================================
// CLIENT
// =============================================================================

export class KubectlClient implements KubeClient {
  private readonly binary: string;
  private readonly run: CommandRunner;

  constructor(opts: { binary?: string; run?: CommandRunner } = {}) {
    this.binary = opts.binary ?? "kubectl";
    this.run = opts.run ?? execaRunner;
  }

  // Never updates in place: a leftover pod with the same name must not be adopted.
  async create(manifests: KubeManifest[], namespace?: string): Promise<void> {
    const list = { apiVersion: "v1", kind: "List", items: manifests };
    const args = ["create", "-f", "-", ...namespaceArgs(namespace)];
    const res = await this.run(this.binary, args, {
      input: yaml.dump(list, { noRefs: true }),
      stdio: "pipe",
    });

    if (res.exitCode !== 0 && /AlreadyExists/i.test(res.stderr)) {
      const pod = manifests.find((manifest) => manifest.kind === "Pod");
      const runName = pod?.metadata.name ?? manifests.map((m) => m.metadata.name).join(", ");
      throw new DriverError(
        `Run ${runName} already exists on the cluster -- delete it or choose a different --name`,
        { stderr: res.stderr },
      );
    }
    assertSucceeded(args, res);
  }

  async getPodState(name: string, namespace?: string): Promise<PodState | null> {
    const res = await this.run(
      this.binary,
      ["get", "pod", name, "-o", "json", ...namespaceArgs(namespace)],
      { stdio: "pipe" },
    );

    if (res.exitCode !== 0) {
      if (/NotFound/i.test(res.stderr)) {
        return null;
      }
      throw new DriverError(`kubectl get pod ${name} failed: ${res.stderr.trim()}`, {
        stdout: res.stdout,
        stderr: res.stderr,
      });
    }

    return parsePodState(res.stdout);
  }

  async followLogs(name: string, namespace?: string): Promise<void> {
    await this.exec(["logs", "-f", name, ...namespaceArgs(namespace)], { stdio: "inherit" });
  }

  private async exec(args: string[], opts: CommandOptions): Promise<void> {
    assertSucceeded(args, await this.run(this.binary, args, opts));
  }
}

function assertSucceeded(args: string[], res: CommandResult): void {
  if (res.exitCode === 0) return;

  const stderr = res.stderr.trim();
  throw new DriverError(
    `kubectl ${args.join(" ")} failed with exit code ${res.exitCode}${stderr ? `: ${stderr}` : ""}`,
  );
}

// =============================================================================
// PARSING
// =============================================================================

export function parsePodState(raw: string): PodState {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new DriverError("kubectl returned pod status that is not valid JSON", err);
  }

  const parsed = PodStatusSchema.safeParse(doc);
  if (!parsed.success) {
    throw new DriverError("kubectl returned an unexpected pod status shape", parsed.error);
  }

  const status = parsed.data.status;
  const containerState = status?.containerStatuses?.[0]?.state;
  const state: PodState = { phase: status?.phase ?? "Unknown" };

  if (containerState?.waiting?.reason) {
    state.waitingReason = containerState.waiting.reason;
  }
  if (containerState?.terminated) {
    state.exitCode = containerState.terminated.exitCode;
  }

  return state;
}

function namespaceArgs(namespace?: string): string[] {
  return namespace ? ["-n", namespace] : [];
}
