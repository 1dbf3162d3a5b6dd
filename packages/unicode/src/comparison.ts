import { iterateGraphemes } from "./graphemes.js";
import { foldCase, normalize } from "./normalize.js";

/**
 * A normalized name together with its case policy.
 *
 * Used for long and short names, their prefixes, the invert prefix and infix,
 * and the value infix.
 */
export class Comparison {
  /** Normalized form of the text the comparison was built from */
  readonly text: string;
  readonly caseSensitive: boolean;
  private readonly key: string;

  private constructor(text: string, caseSensitive: boolean) {
    this.text = normalize(text);
    this.caseSensitive = caseSensitive;
    this.key = caseSensitive ? this.text : foldCase(this.text);
  }

  /** Case-insensitive unless `caseSensitive` is set. */
  static of(text: string, caseSensitive = false): Comparison {
    return new Comparison(text, caseSensitive);
  }

  /** Does the whole of `s` match this comparison? */
  matches(s: string): boolean {
    return this.keyOf(normalize(s)) === this.key;
  }

  /**
   * Strip the longest grapheme-aligned prefix of `s` whose normalized form
   * matches. The remainder is returned as written, without normalization.
   *
   * Folded prefixes only grow, so scanning stops once one is as long as the
   * key.
   *
   * @returns the remainder, or `undefined` when no prefix matches
   */
  stripPrefix(s: string): string | undefined {
    if (this.key === "") {
      return s;
    }

    let prefix = "";
    for (const grapheme of iterateGraphemes(s)) {
      prefix += grapheme;
      const candidate = this.keyOf(normalize(prefix));
      if (candidate === this.key) {
        return s.slice(prefix.length);
      }
      if (candidate.length >= this.key.length) {
        return undefined;
      }
    }
    return undefined;
  }

  /**
   * Can a prefix matching this comparison start with `grapheme`? Lets callers
   * skip offsets before calling {@link stripPrefix}.
   */
  admitsLeading(grapheme: string): boolean {
    return this.key.startsWith(this.keyOf(normalize(grapheme)));
  }

  /** Same text under the same case policy */
  equals(other: Comparison): boolean {
    return this.caseSensitive === other.caseSensitive && this.key === other.key;
  }

  toString(): string {
    return this.text;
  }

  private keyOf(normalized: string): string {
    return this.caseSensitive ? normalized : foldCase(normalized);
  }
}
