import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logLaunchEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function makeLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, ...segments);
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with the run name", () => {
    const logPath = makeLogPath("nested", "launch.jsonl");
    const logger = new JsonlLogger(logPath, { runName: "quirky-einstein" });

    logger.log({ type: "driver.start", payload: { pipeline: "org/repo" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0].type).toBe("driver.start");
    expect(events[0].run_name).toBe("quirky-einstein");
    expect(events[0].payload).toEqual({ pipeline: "org/repo" });
    expect(new Date(String(events[0].ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = makeLogPath("launch.jsonl");

    const first = new JsonlLogger(logPath, { runName: "run-a" });
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath, { runName: "run-a" });
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("logs launch events with their payload", () => {
    const logPath = makeLogPath("launch.jsonl");
    const logger = new JsonlLogger(logPath, { runName: "run-b" });

    logLaunchEvent(logger, "driver.complete", { status: 3 });
    logLaunchEvent(logger, "launch.started");
    logger.close();

    const events = readEvents(logPath);
    expect(events[0]).toMatchObject({ type: "driver.complete", payload: { status: 3 } });
    expect(events[1]).not.toHaveProperty("payload");
  });

  it("ignores events logged after close", () => {
    const logPath = makeLogPath("launch.jsonl");
    const logger = new JsonlLogger(logPath, { runName: "run-c" });

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = makeLogPath("launch.jsonl");
    const logger = new JsonlLogger(logPath, { runName: "run-d" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "driver.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, ts: "2026-01-02T03:04:05.000Z" },
      { runName: "run-x" },
    );

    expect(event).toEqual({
      ts: "2026-01-02T03:04:05.000Z",
      type: "sample",
      run_name: "run-x",
      payload: { key: "value" },
    });
  });

  it("prefers the event run name over the default", () => {
    const event = eventWithTs({ type: "sample", runName: "run-y" }, { runName: "run-x" });

    expect(event.run_name).toBe("run-y");
  });

  it("throws when the run name is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_name is required/i);
  });
});
