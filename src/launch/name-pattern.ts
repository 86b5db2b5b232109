/*
Purpose: pure grammar predicates for run names and cluster resource names.
Assumptions: callers compose the checks; nothing here consults history or config.
Usage: matchesRunNameGrammar("my_run"); matchesClusterResourceGrammar(normalizeRunName(name)).
*/

// Starts with a letter; every "-" or "_" must be followed by an alphanumeric; 80 chars max.
export const RUN_NAME_PATTERN = /^[a-z](?:[a-z\d]|[-_](?=[a-z\d])){0,79}$/i;

// Dot-separated lowercase segments, alphanumeric runs joined by single hyphens.
export const CLUSTER_RESOURCE_NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*(?:\.[a-z0-9]+(?:-[a-z0-9]+)*)*$/;

export const RESERVED_RUN_NAME = "last";

export function matchesRunNameGrammar(name: string): boolean {
  return RUN_NAME_PATTERN.test(name);
}

export function matchesClusterResourceGrammar(name: string): boolean {
  return CLUSTER_RESOURCE_NAME_PATTERN.test(name);
}

export function normalizeRunName(name: string): string {
  return name.replace(/_/g, "-");
}
