import fs from "node:fs";

import { z } from "zod";

// =============================================================================
// TYPES
// =============================================================================

const NameWordsSchema = z
  .object({
    adjectives: z.array(z.string().regex(/^[a-z]+$/)).min(1),
    names: z.array(z.string().regex(/^[a-z]+$/)).min(1),
  })
  .strict();

export type NameWords = z.infer<typeof NameWordsSchema>;

export type RandomSource = () => number;

// =============================================================================
// PUBLIC API
// =============================================================================

let cachedWords: NameWords | null = null;

export function loadNameWords(): NameWords {
  if (cachedWords) return cachedWords;

  const raw = fs.readFileSync(new URL("./name-words.json", import.meta.url), "utf8");
  cachedWords = NameWordsSchema.parse(JSON.parse(raw));
  return cachedWords;
}

// Produces "<adjective>-<name>", e.g. "quirky-einstein"; valid under both run-name grammars.
export function generateRunName(
  words: NameWords = loadNameWords(),
  random: RandomSource = Math.random,
): string {
  return `${pick(words.adjectives, random)}-${pick(words.names, random)}`;
}

function pick(values: string[], random: RandomSource): string {
  const index = Math.min(values.length - 1, Math.floor(random() * values.length));
  return values[index];
}
