import { expandShortFlags } from "./bundles.js";
import type { Configuration, ShortFlagGroup } from "./configuration.js";
import type { ParseResult } from "./result.js";
import type { Token } from "./types.js";

export interface StepOutcome<T, E> {
  readonly result: ParseResult<T, E>;
  /** Input tokens with claimed ones replaced by `undefined` */
  readonly remaining: readonly Token[];
}

export type Step<T, E> = (tokens: readonly Token[]) => StepOutcome<T, E>;

/**
 * A composable argument parser producing `T`, or errors carrying `E`.
 *
 * Instances are immutable. Build them with `flag`, `value`, `earlyExit` and
 * their wrappers, and compose them with `combine`.
 */
export class Arguments<T, E = never> {
  /** Help text projections, in registration order */
  readonly configurations: readonly Configuration[];
  /** Short flag names available for bundling */
  readonly shortFlags: readonly ShortFlagGroup[];
  private readonly step: Step<T, E>;

  constructor(
    configurations: readonly Configuration[],
    shortFlags: readonly ShortFlagGroup[],
    step: Step<T, E>,
  ) {
    this.configurations = configurations;
    this.shortFlags = shortFlags;
    this.step = step;
  }

  /**
   * Run over a token list without bundle expansion.
   */
  run(tokens: readonly Token[]): StepOutcome<T, E> {
    return this.step(tokens);
  }

  /**
   * Expand bundled short flags, run once, and report the tokens nothing
   * claimed.
   */
  parse(argv: readonly string[]): { result: ParseResult<T, E>; unused: string[] } {
    const { result, remaining } = this.step(expandShortFlags(argv, this.shortFlags));
    return {
      result,
      unused: remaining.filter((token): token is string => token !== undefined),
    };
  }
}
