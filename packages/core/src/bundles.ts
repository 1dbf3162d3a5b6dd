import { type Comparison, graphemes } from "@argot/unicode";
import type { ShortFlagGroup } from "./configuration.js";
import { logDebug } from "./debug.js";

/**
 * Merge groups that share a prefix, keeping registration order.
 */
function mergeGroups(groups: readonly ShortFlagGroup[]): ShortFlagGroup[] {
  const merged: { prefix: Comparison; forms: Comparison[] }[] = [];
  for (const group of groups) {
    const existing = merged.find((candidate) => candidate.prefix.equals(group.prefix));
    if (existing) {
      existing.forms.push(...group.forms);
    } else {
      merged.push({ prefix: group.prefix, forms: [...group.forms] });
    }
  }
  return merged;
}

function expandToken(token: string, groups: readonly ShortFlagGroup[]): string[] {
  for (const { prefix, forms } of groups) {
    const rest = prefix.stripPrefix(token);
    if (rest === undefined || rest === "") {
      continue;
    }
    const names = graphemes(rest);
    if (!names.every((name) => forms.some((form) => form.matches(name)))) {
      return [token];
    }
    return names.map((name) => `${prefix.text}${name}`);
  }
  return [token];
}

/**
 * Split bundled short flags: with `v` and `q` registered behind `-`,
 * `-vq` becomes `-v`, `-q`. A token with any unregistered grapheme is kept.
 */
export function expandShortFlags(
  argv: readonly string[],
  groups: readonly ShortFlagGroup[],
): string[] {
  const merged = mergeGroups(groups);
  if (merged.length === 0) {
    return [...argv];
  }
  return argv.flatMap((token) => {
    const expanded = expandToken(token, merged);
    if (expanded.length > 1) {
      logDebug("bundle", `expanded ${JSON.stringify(token)} into ${JSON.stringify(expanded)}`);
    }
    return expanded;
  });
}
