import { InvalidArgumentError } from "commander";

import { formatErrorMessage, resolveErrorCode } from "../core/error-format.js";
import { UserFacingError } from "../core/errors.js";
import type { FileHistoryStore, RunHistoryEntry } from "../history/run-history.js";

// =============================================================================
// COMMANDS
// =============================================================================

export async function runsListCommand(
  history: FileHistoryStore,
  opts: { limit?: number; json?: boolean },
): Promise<void> {
  try {
    if (!history.enabled) {
      console.log("Run history is disabled.");
      return;
    }

    const runs = await history.list({ limit: opts.limit });

    if (opts.json) {
      console.log(JSON.stringify(runs, null, 2));
      return;
    }

    if (runs.length === 0) {
      console.log("No runs recorded.");
      return;
    }

    printRunList(runs);
  } catch (error) {
    throw normalizeRunsCommandError(error);
  }
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }

  return limit;
}

// =============================================================================
// OUTPUT
// =============================================================================

type RunRow = {
  runName: string;
  status: string;
  startedAt: string;
  exitCode: string;
  pipeline: string;
};

const HEADERS: RunRow = {
  runName: "Run",
  status: "Status",
  startedAt: "Started",
  exitCode: "Exit",
  pipeline: "Pipeline",
};

const COLUMNS: Array<keyof RunRow> = ["runName", "status", "startedAt", "exitCode", "pipeline"];

function printRunList(runs: RunHistoryEntry[]): void {
  const rows: RunRow[] = runs.map((run) => ({
    runName: run.runName,
    status: run.status,
    startedAt: formatTimestamp(run.startedAt),
    exitCode: run.exitCode === undefined ? "-" : String(run.exitCode),
    pipeline: run.pipeline,
  }));

  const widths = Object.fromEntries(
    COLUMNS.map((column) => [column, columnWidth(rows.map((row) => row[column]), HEADERS[column])]),
  );

  const formatRow = (row: RunRow): string =>
    COLUMNS.map((column) => row[column].padEnd(widths[column] ?? 0))
      .join("  ")
      .trimEnd();

  console.log(formatRow(HEADERS));
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUNS_COMMAND_FAILURE_TITLE = "Runs command failed.";
const RUNS_COMMAND_HISTORY_HINT =
  "Inspect or remove the run history file under $PODLAUNCH_HOME/history.";

function normalizeRunsCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveErrorCode(error),
    title: RUNS_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: RUNS_COMMAND_HISTORY_HINT,
    cause: error,
  });
}
