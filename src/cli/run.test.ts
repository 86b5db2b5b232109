import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseLauncherConfig } from "../core/config-loader.js";
import { DriverError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createPathsContext, launchLogPath, type PathsContext } from "../core/paths.js";
import { FileHistoryStore } from "../history/run-history.js";
import { FakeDriver, RecordingReporter } from "../launch/__tests__/fakes.js";
import type { LaunchConfig } from "../launch/launch-config.js";

import { createRunCommandContext, runCommand, type RunCommandContext } from "./run.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makePaths(): PathsContext {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "run-cli-home-"));
  tempDirs.push(dir);
  return createPathsContext({ podlaunchHome: dir });
}

function makeContext(
  opts: { driver?: FakeDriver; configDoc?: unknown; paths?: PathsContext } = {},
): RunCommandContext & { driver: FakeDriver; reporter: RecordingReporter } {
  const paths = opts.paths ?? makePaths();
  const { config } = parseLauncherConfig(opts.configDoc ?? {});
  const reporter = new RecordingReporter();
  const driver = opts.driver ?? new FakeDriver(0);

  return {
    ...createRunCommandContext(config, paths, reporter),
    history: new FileHistoryStore({
      paths,
      words: { adjectives: ["quirky"], names: ["einstein"] },
      random: () => 0,
    }),
    driver,
    reporter,
  };
}

// Lists history at the moment the driver is asked to run.
class HistoryReadingDriver extends FakeDriver {
  readonly seen: string[] = [];

  constructor(private readonly history: FileHistoryStore) {
    super(0);
  }

  async run(pipelineRef: string, scriptArgs: string[], config: LaunchConfig): Promise<void> {
    const runs = await this.history.list();
    this.seen.push(...runs.map((run) => `${run.runName}:${run.status}`));
    await super.run(pipelineRef, scriptArgs, config);
  }
}

async function captureError(promise: Promise<unknown>): Promise<UserFacingError> {
  const error = await promise.then(
    () => null,
    (err: unknown) => err,
  );
  if (!(error instanceof UserFacingError)) {
    throw new Error(`Expected a UserFacingError, got ${String(error)}`);
  }
  return error;
}

// =============================================================================
// TESTS
// =============================================================================

describe("runCommand", () => {
  it("launches with a generated name and records the run", async () => {
    const context = makeContext();

    const status = await runCommand("org/repo", [], {}, context);

    expect(status).toBe(0);
    const runs = await context.history.list();
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({
      runName: "quirky-einstein",
      pipeline: "org/repo",
      status: "succeeded",
      exitCode: 0,
    });
    expect(fs.existsSync(launchLogPath("quirky-einstein", context.paths))).toBe(true);
  });

  it("returns a failing driver status and records the failure", async () => {
    const context = makeContext({ driver: new FakeDriver(2) });

    const status = await runCommand("org/repo", ["--reads", "r.fq"], { name: "nightly" }, context);

    expect(status).toBe(2);
    expect(context.driver.runCalls[0]?.scriptArgs).toEqual(["--reads", "r.fq"]);
    const [run] = await context.history.list();
    expect(run).toMatchObject({ runName: "nightly", status: "failed", exitCode: 2 });
  });

  it("records background launches as submitted", async () => {
    const context = makeContext();

    await runCommand("org/repo", [], { name: "nightly", bg: true }, context);

    const [run] = await context.history.list();
    expect(run?.status).toBe("submitted");
    expect(run).not.toHaveProperty("exitCode");
  });

  it("uses config values unless options override them", async () => {
    const context = makeContext({
      configDoc: {
        namespace: "pipelines",
        volume_mounts: ["data:/mnt/data"],
        head: { cpus: 2, memory: "4Gi", prescript: "/opt/setup.sh" },
      },
    });

    await runCommand(
      "org/repo",
      [],
      { name: "nightly", headCpus: 8, volumeMount: ["scratch:/mnt/scratch"] },
      context,
    );

    expect(context.driver.runCalls[0]?.config).toEqual({
      runName: "nightly",
      cpus: 8,
      memory: "4Gi",
      prescript: "/opt/setup.sh",
      background: false,
      namespace: "pipelines",
      volumeMounts: ["scratch:/mnt/scratch"],
      remoteConfig: [],
    });
  });

  it("marks stdin launches with the stdin pipeline reference", async () => {
    const context = makeContext();

    await runCommand("-", ["--greeting", "hi"], { name: "from-stdin" }, context);

    expect(context.driver.runCalls[0]?.pipelineRef).toBe("-");
    expect(context.driver.runCalls[0]?.scriptArgs).toEqual(["--greeting", "hi"]);
  });

  it("reports the deprecated pod image through the reporter", async () => {
    const context = makeContext();

    await runCommand("org/repo", [], { name: "nightly", podImage: "legacy:1" }, context);

    expect(context.reporter.warnings).toEqual([
      "--pod-image is deprecated (use --head-image instead)",
    ]);
    expect(context.driver.runCalls[0]?.config.image).toBe("legacy:1");
  });

  it("rejects a missing pipeline with a hint", async () => {
    const context = makeContext();

    const error = await captureError(runCommand(undefined, [], {}, context));

    expect(error.title).toBe("Launch failed.");
    expect(error.code).toBe(USER_FACING_ERROR_CODES.launch);
    expect(error.message).toBe("No project name was specified");
    expect(error.hint).toBe(
      "Pass a pipeline, e.g. `podlaunch run org/repo`, or `-` to read the script from standard input.",
    );
    expect(context.driver.runCalls).toHaveLength(0);
  });

  it("rejects the reserved run name", async () => {
    const context = makeContext();

    const error = await captureError(runCommand("org/repo", [], { name: "last" }, context));

    expect(error.message).toBe("Not a valid run name: `last`");
    expect(error.hint).toBe("`last` is reserved. Choose a different --name.");
  });

  it("rejects a run name that was already used", async () => {
    const paths = makePaths();
    const first = makeContext({ paths });
    await runCommand("org/repo", [], { name: "nightly" }, first);

    const second = makeContext({ paths });
    const error = await captureError(runCommand("org/repo", [], { name: "nightly" }, second));

    expect(error.message).toBe("Run name `nightly` has been already used -- Specify a different one");
    expect(second.driver.runCalls).toHaveLength(0);
  });

  it("wraps driver failures and records the run as failed", async () => {
    const context = makeContext({
      driver: new FakeDriver(0, new DriverError("Pod nightly cannot start: ErrImagePull")),
    });

    const error = await captureError(runCommand("org/repo", [], { name: "nightly" }, context));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.driver);
    expect(error.message).toBe("Pod nightly cannot start: ErrImagePull");
    expect(error.hint).toBe("Check cluster access with `kubectl get pods` and retry.");
    expect(error.cause).toBeInstanceOf(DriverError);
    const runs = await context.history.list();
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ runName: "nightly", pipeline: "org/repo", status: "failed" });
    expect(runs[0]).not.toHaveProperty("exitCode");
  });

  it("keeps a generated name taken after the driver fails", async () => {
    const paths = makePaths();
    const failing = makeContext({
      paths,
      driver: new FakeDriver(0, new DriverError("Pod quirky-einstein cannot start: ErrImagePull")),
    });
    await captureError(runCommand("org/repo", [], {}, failing));

    const second = makeContext({ paths });
    const error = await captureError(runCommand("org/repo", [], {}, second));

    expect(error.code).toBe(USER_FACING_ERROR_CODES.history);
    expect(error.message).toBe("Unable to generate an unused run name after 500 attempts");
    expect(second.driver.runCalls).toHaveLength(0);
  });

  it("records the run before the driver starts", async () => {
    const context = makeContext();
    const driver = new HistoryReadingDriver(context.history);

    await runCommand("org/repo", [], { name: "nightly" }, { ...context, driver });

    expect(driver.seen).toEqual(["nightly:submitted"]);
    const [finished] = await context.history.list();
    expect(finished).toMatchObject({ status: "succeeded", exitCode: 0 });
  });
});
