import { caseFolding, cjkCompatVariants } from "./tables.js";

const ASCII = /^[\x00-\x7F]*$/;
const CJK_COMPATIBILITY = /[\u{F900}-\u{FAFF}\u{2F800}-\u{2FA1F}]/u;
const CJK_COMPATIBILITY_GLOBAL = new RegExp(CJK_COMPATIBILITY.source, "gu");

/**
 * NFC-normalize a string after replacing CJK compatibility ideographs with
 * their standardized variation sequences, so that U+F900 stays distinct from
 * U+8C48 instead of collapsing into it.
 *
 * ASCII input is already in this form and is returned as is.
 */
export function normalize(s: string): string {
  if (ASCII.test(s)) {
    return s;
  }
  const folded = CJK_COMPATIBILITY.test(s)
    ? s.replace(CJK_COMPATIBILITY_GLOBAL, (char) => cjkCompatVariants().get(char) ?? char)
    : s;
  return folded.normalize("NFC");
}

/**
 * Unicode full case folding, then {@link normalize}.
 *
 * `ß` folds to `ss` and `İ` to `i` with a combining dot; dotless `ı` has no
 * folding and stays distinct from `i`.
 */
export function foldCase(s: string): string {
  if (ASCII.test(s)) {
    return s.toLowerCase();
  }
  const table = caseFolding();
  let folded = "";
  for (const char of s) {
    folded += table.get(char) ?? char;
  }
  return normalize(folded);
}
