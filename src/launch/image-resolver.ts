/*
Purpose: resolve options that have a deprecated alias, starting with the head image.
Assumptions: a legacy option always warns when set; it only supplies the value when the current one is empty.
Usage: const { image, warnings } = resolveHeadImage(opts.headImage, opts.podImage);
*/

// =============================================================================
// TYPES
// =============================================================================

export type OptionValues = Record<string, string | undefined>;

export type DeprecatedOptionAlias<K extends string> = {
  legacy: K;
  current: K;
  legacyLabel: string;
  currentLabel: string;
};

export type AliasResolution<T extends OptionValues> = {
  values: T;
  warnings: string[];
};

// =============================================================================
// ALIAS TABLES
// =============================================================================

export const DEPRECATED_LAUNCH_OPTIONS: ReadonlyArray<
  DeprecatedOptionAlias<"headImage" | "podImage">
> = [{ legacy: "podImage", current: "headImage", legacyLabel: "--pod-image", currentLabel: "--head-image" }];

// =============================================================================
// PUBLIC API
// =============================================================================

export function applyDeprecatedAliases<T extends OptionValues>(
  input: T,
  aliases: ReadonlyArray<DeprecatedOptionAlias<Extract<keyof T, string>>>,
): AliasResolution<T> {
  const values: T = { ...input };
  const warnings: string[] = [];

  for (const alias of aliases) {
    const legacyValue = values[alias.legacy];
    if (!legacyValue) continue;

    warnings.push(`${alias.legacyLabel} is deprecated (use ${alias.currentLabel} instead)`);
    if (!values[alias.current]) {
      values[alias.current] = legacyValue;
    }
  }

  return { values, warnings };
}

export function resolveHeadImage(
  headImage: string | undefined,
  podImage: string | undefined,
): { image?: string; warnings: string[] } {
  const { values, warnings } = applyDeprecatedAliases(
    { headImage, podImage },
    DEPRECATED_LAUNCH_OPTIONS,
  );

  return { image: values.headImage || undefined, warnings };
}
