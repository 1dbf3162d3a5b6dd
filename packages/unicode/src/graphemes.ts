const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

// Lone surrogates: a high surrogate not followed by a low one, or a low
// surrogate not preceded by a high one.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const LONE_SURROGATE_GLOBAL = new RegExp(LONE_SURROGATE.source, "g");

/** Extended grapheme clusters of a string, segmented on demand. */
export function* iterateGraphemes(s: string): Generator<string, void> {
  for (const { segment } of segmenter.segment(s)) {
    yield segment;
  }
}

/** Split a string into extended grapheme clusters. */
export function graphemes(s: string): string[] {
  return Array.from(iterateGraphemes(s));
}

/** Number of extended grapheme clusters, used as display width. */
export function graphemeCount(s: string): number {
  return Array.from(segmenter.segment(s)).length;
}

/** Stops after the second cluster. */
export function isSingleGrapheme(s: string): boolean {
  const clusters = iterateGraphemes(s);
  return clusters.next().done !== true && clusters.next().done === true;
}

/** True when the string contains no lone surrogate code unit. */
export function isWellFormed(s: string): boolean {
  return !LONE_SURROGATE.test(s);
}

/** Replace every lone surrogate with U+FFFD. */
export function toWellFormed(s: string): string {
  return s.replace(LONE_SURROGATE_GLOBAL, "\uFFFD");
}
