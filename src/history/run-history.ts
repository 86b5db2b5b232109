import fs from "node:fs/promises";

import { z } from "zod";

import { HistoryError } from "../core/errors.js";
import { runHistoryIndexPath, type PathsContext } from "../core/paths.js";
import { isMissingFile, isoNow, writeJsonFileAtomic } from "../core/utils.js";
import type { HistoryStore } from "../launch/ports.js";

import { generateRunName, type NameWords, type RandomSource } from "./name-generator.js";

// =============================================================================
// TYPES
// =============================================================================

export const RunStatusSchema = z.enum(["submitted", "succeeded", "failed"]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

const RunHistoryEntrySchema = z
  .object({
    runName: z.string().min(1),
    pipeline: z.string().min(1),
    namespace: z.string().optional(),
    status: RunStatusSchema,
    exitCode: z.number().int().optional(),
    startedAt: z.string(),
    updatedAt: z.string(),
  })
  .strict();

export type RunHistoryEntry = z.infer<typeof RunHistoryEntrySchema>;

const RunHistoryIndexSchema = z
  .object({
    schemaVersion: z.number().int().positive(),
    updatedAt: z.string(),
    runs: z.array(RunHistoryEntrySchema),
  })
  .strict();

export type RunHistoryIndex = z.infer<typeof RunHistoryIndexSchema>;

export type FileHistoryStoreOptions = {
  paths: PathsContext;
  enabled?: boolean;
  words?: NameWords;
  random?: RandomSource;
  maxNameAttempts?: number;
};

const RUN_HISTORY_SCHEMA_VERSION = 1;
const DEFAULT_MAX_NAME_ATTEMPTS = 500;

// =============================================================================
// STORE
// =============================================================================

export class FileHistoryStore implements HistoryStore {
  readonly enabled: boolean;
  private readonly indexPath: string;
  private readonly words?: NameWords;
  private readonly random?: RandomSource;
  private readonly maxNameAttempts: number;

  constructor(opts: FileHistoryStoreOptions) {
    this.enabled = opts.enabled ?? true;
    this.indexPath = runHistoryIndexPath(opts.paths);
    this.words = opts.words;
    this.random = opts.random;
    this.maxNameAttempts = opts.maxNameAttempts ?? DEFAULT_MAX_NAME_ATTEMPTS;
  }

  async exists(runName: string): Promise<boolean> {
    if (!this.enabled) return false;
    const runs = await this.loadRuns();
    return runs.some((run) => run.runName === runName);
  }

  async generateNextName(): Promise<string> {
    const taken = new Set((await this.loadRuns()).map((run) => run.runName));

    for (let attempt = 0; attempt < this.maxNameAttempts; attempt += 1) {
      const candidate = generateRunName(this.words, this.random);
      if (!taken.has(candidate)) {
        return candidate;
      }
    }

    throw new HistoryError(
      `Unable to generate an unused run name after ${this.maxNameAttempts} attempts`,
    );
  }

  async record(entry: RunHistoryEntry): Promise<void> {
    if (!this.enabled) return;

    const runs = (await this.loadRuns()).filter((run) => run.runName !== entry.runName);
    runs.push(entry);

    const index: RunHistoryIndex = {
      schemaVersion: RUN_HISTORY_SCHEMA_VERSION,
      updatedAt: entry.updatedAt,
      runs: sortRunHistoryEntries(runs),
    };
    await writeJsonFileAtomic(this.indexPath, index);
  }

  async list(opts: { limit?: number } = {}): Promise<RunHistoryEntry[]> {
    const runs = sortRunHistoryEntries(await this.loadRuns());
    if (!opts.limit || !Number.isInteger(opts.limit) || opts.limit <= 0) {
      return runs;
    }

    return runs.slice(0, opts.limit);
  }

  private async loadRuns(): Promise<RunHistoryEntry[]> {
    if (!this.enabled) return [];

    const raw = await fs.readFile(this.indexPath, "utf8").catch((err: unknown) => {
      if (isMissingFile(err)) return null;
      throw new HistoryError(`Failed to read run history at ${this.indexPath}`, err);
    });
    if (raw === null) {
      return [];
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err) {
      throw new HistoryError(`Run history at ${this.indexPath} is not valid JSON`, err);
    }

    const parsed = RunHistoryIndexSchema.safeParse(doc);
    if (!parsed.success) {
      throw new HistoryError(`Run history at ${this.indexPath} is invalid`, parsed.error);
    }

    return parsed.data.runs;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function resolveHistoryEnabled(
  configEnabled: boolean,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.PODLAUNCH_HISTORY_DISABLED === "1" || env.PODLAUNCH_HISTORY_DISABLED === "true") {
    return false;
  }

  return configEnabled;
}

export function buildRunHistoryEntry(input: {
  runName: string;
  pipeline: string;
  namespace?: string;
  background: boolean;
  // Absent while the pod has been launched but has not finished.
  exitCode?: number;
  startedAt: string;
}): RunHistoryEntry {
  const finished = !input.background && input.exitCode !== undefined;
  const entry: RunHistoryEntry = {
    runName: input.runName,
    pipeline: input.pipeline,
    status: !finished ? "submitted" : input.exitCode === 0 ? "succeeded" : "failed",
    startedAt: input.startedAt,
    updatedAt: isoNow(),
  };

  if (input.namespace) entry.namespace = input.namespace;
  if (finished) entry.exitCode = input.exitCode;

  return entry;
}

function sortRunHistoryEntries(entries: RunHistoryEntry[]): RunHistoryEntry[] {
  return [...entries].sort((a, b) => {
    const aTime = Date.parse(a.startedAt);
    const bTime = Date.parse(b.startedAt);
    if (Number.isNaN(aTime) || Number.isNaN(bTime)) {
      return b.startedAt.localeCompare(a.startedAt);
    }
    if (bTime !== aTime) {
      return bTime - aTime;
    }
    return a.runName.localeCompare(b.runName);
  });
}
