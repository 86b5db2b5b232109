/**
 * Launch ports define the boundary between the launch core and its adapters.
 * Purpose: keep history, the cluster driver and output sinks injectable.
 * Assumptions: the core only reads history and never records runs itself.
 * Usage: the CLI wires FileHistoryStore + PodDriver; tests wire the fakes.
 */

import type { JsonlLogger } from "../core/logger.js";

import type { LaunchConfig } from "./launch-config.js";

// =============================================================================
// PORTS
// =============================================================================

export interface HistoryStore {
  readonly enabled: boolean;
  exists(runName: string): Promise<boolean>;
  generateNextName(): Promise<string>;
}

export interface Driver {
  run(pipelineRef: string, scriptArgs: string[], config: LaunchConfig): Promise<void>;
  // Returns the launch status once the driver has finished with the run.
  shutdown(): Promise<number>;
}

export interface LaunchReporter {
  info(message: string): void;
  warn(message: string): void;
}

export interface LaunchLogSink {
  createLaunchLogger(runName: string): JsonlLogger;
}

export const consoleReporter: LaunchReporter = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`Warning: ${message}`),
};
