import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { InvalidArgumentError } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";

import { UserFacingError } from "../core/errors.js";
import { createPathsContext, runHistoryIndexPath } from "../core/paths.js";
import { FileHistoryStore } from "../history/run-history.js";

import { parseLimit, runsListCommand } from "./runs.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  vi.restoreAllMocks();
});

// =============================================================================
// HELPERS
// =============================================================================

function makeStore(enabled = true): FileHistoryStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "runs-cli-"));
  tempDirs.push(dir);
  return new FileHistoryStore({ paths: createPathsContext({ podlaunchHome: dir }), enabled });
}

async function seed(store: FileHistoryStore): Promise<void> {
  await store.record({
    runName: "nightly",
    pipeline: "org/repo",
    status: "succeeded",
    exitCode: 0,
    startedAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:05:00.000Z",
  });
  await store.record({
    runName: "bg-run",
    pipeline: "-",
    status: "submitted",
    startedAt: "2026-03-02T09:30:00.000Z",
    updatedAt: "2026-03-02T09:30:00.000Z",
  });
}

function captureLog(): () => string[] {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  return () => logSpy.mock.calls.map((call) => String(call[0]));
}

// =============================================================================
// TESTS
// =============================================================================

describe("runsListCommand", () => {
  it("prints a table of runs, newest first", async () => {
    const store = makeStore();
    await seed(store);
    const lines = captureLog();

    await runsListCommand(store, {});

    expect(lines()).toEqual([
      "Run      Status     Started               Exit  Pipeline",
      "bg-run   submitted  2026-03-02 09:30:00Z  -     -",
      "nightly  succeeded  2026-03-01 10:00:00Z  0     org/repo",
    ]);
  });

  it("limits the number of runs", async () => {
    const store = makeStore();
    await seed(store);
    const lines = captureLog();

    await runsListCommand(store, { limit: 1, json: true });

    const printed = JSON.parse(lines().join("\n")) as Array<{ runName: string }>;
    expect(printed.map((run) => run.runName)).toEqual(["bg-run"]);
  });

  it("reports when no runs are recorded", async () => {
    const lines = captureLog();

    await runsListCommand(makeStore(), {});

    expect(lines()).toEqual(["No runs recorded."]);
  });

  it("reports when history is disabled", async () => {
    const lines = captureLog();

    await runsListCommand(makeStore(false), {});

    expect(lines()).toEqual(["Run history is disabled."]);
  });

  it("wraps history failures in a user-facing error", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "runs-cli-"));
    tempDirs.push(dir);
    const paths = createPathsContext({ podlaunchHome: dir });
    fs.mkdirSync(path.dirname(runHistoryIndexPath(paths)), { recursive: true });
    fs.writeFileSync(runHistoryIndexPath(paths), "{broken", "utf8");

    const error = await runsListCommand(new FileHistoryStore({ paths }), {}).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toHaveProperty("title", "Runs command failed.");
    expect(error).toHaveProperty(
      "hint",
      "Inspect or remove the run history file under $PODLAUNCH_HOME/history.",
    );
  });
});

describe("parseLimit", () => {
  it("accepts positive integers", () => {
    expect(parseLimit("5")).toBe(5);
  });

  it.each(["0", "-1", "2.5", "many"])("rejects %s", (value) => {
    expect(() => parseLimit(value)).toThrow(InvalidArgumentError);
  });
});
