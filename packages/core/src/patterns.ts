import type { ArgumentNames, InvertPair } from "./configuration.js";
import type { NonEmptyArray } from "./types.js";

/**
 * What decides the shape of a name pattern: flags may carry an invert pair,
 * values a meta variable.
 */
export type PatternKind =
  | { readonly _tag: "Flag"; readonly invert: InvertPair | undefined }
  | { readonly _tag: "Value"; readonly valueInfix: string; readonly metaVar: string };

function alternatives(names: NonEmptyArray<string>): string {
  const [first, ...rest] = names;
  return rest.length === 0 ? first : `(${names.join("|")})`;
}

/** `--[no-]verbose`, `--help`, `--name(=| )VALUE` */
export function longPattern(names: ArgumentNames, kind: PatternKind): string {
  if (kind._tag === "Value") {
    return `${names.longPrefix}${alternatives(names.long)}(${kind.valueInfix}| )${kind.metaVar}`;
  }
  const invert = kind.invert === undefined ? "" : `[${kind.invert.prefix}${kind.invert.infix}]`;
  return `${names.longPrefix}${invert}${alternatives(names.long)}`;
}

/** `-v`, `-n[=| ]VALUE`, or `undefined` without short names */
export function shortPattern(names: ArgumentNames, kind: PatternKind): string | undefined {
  const [first, ...rest] = names.short;
  if (first === undefined) {
    return undefined;
  }
  const pattern = `${names.shortPrefix}${alternatives([first, ...rest])}`;
  return kind._tag === "Value" ? `${pattern}[${kind.valueInfix}| ]${kind.metaVar}` : pattern;
}

/** Long and short pattern joined by ` | ` */
export function namesPattern(names: ArgumentNames, kind: PatternKind): string {
  const long = longPattern(names, kind);
  const short = shortPattern(names, kind);
  return short === undefined ? long : `${long} | ${short}`;
}
