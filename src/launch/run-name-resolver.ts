import { LaunchError } from "../core/errors.js";

import {
  RESERVED_RUN_NAME,
  RUN_NAME_PATTERN,
  matchesClusterResourceGrammar,
  matchesRunNameGrammar,
  normalizeRunName,
} from "./name-pattern.js";
import type { HistoryStore } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolveRunNameOptions = {
  clusterBound: boolean;
  history: HistoryStore;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveRunName(
  suppliedName: string | undefined,
  opts: ResolveRunNameOptions,
): Promise<string> {
  const name = suppliedName && suppliedName.length > 0 ? suppliedName : undefined;

  // The cluster grammar is checked against the name as typed, before normalization and
  // before the general grammar. "My_Run" is rejected here even though "my-run" would pass.
  // Kept as observed launcher behavior; do not reorder.
  if (opts.clusterBound && name !== undefined && !matchesClusterResourceGrammar(name)) {
    throw new LaunchError(
      "InvalidClusterName",
      "Not a valid cluster pod name -- It can only contain lower case alphanumeric characters, '-' or '.', and must start and end with an alphanumeric character",
    );
  }

  if (name === RESERVED_RUN_NAME) {
    throw new LaunchError("ReservedRunName", `Not a valid run name: \`${RESERVED_RUN_NAME}\``);
  }

  if (name !== undefined && !matchesRunNameGrammar(name)) {
    throw new LaunchError(
      "MalformedRunName",
      `Not a valid run name: \`${name}\` -- It must match the pattern ${RUN_NAME_PATTERN.source} (case-insensitive)`,
    );
  }

  const resolved = name === undefined ? await mintRunName(opts.history) : name;

  if (name !== undefined && opts.history.enabled && (await opts.history.exists(name))) {
    throw new LaunchError(
      "DuplicateRunName",
      `Run name \`${name}\` has been already used -- Specify a different one`,
    );
  }

  return normalizeRunName(resolved);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function mintRunName(history: HistoryStore): Promise<string> {
  if (!history.enabled) {
    throw new LaunchError("MissingRunName", "Missing workflow run name");
  }

  return history.generateNextName();
}
