/**
 * @argot/unicode
 *
 * Unicode helpers for matching command-line names: normalization with CJK
 * compatibility variants, full case folding, grapheme segmentation and prefix
 * stripping.
 */

export { Comparison } from "./comparison.js";
export {
  graphemeCount,
  graphemes,
  iterateGraphemes,
  isSingleGrapheme,
  isWellFormed,
  toWellFormed,
} from "./graphemes.js";
export { foldCase, normalize } from "./normalize.js";

export const PACKAGE_NAME = "@argot/unicode";
