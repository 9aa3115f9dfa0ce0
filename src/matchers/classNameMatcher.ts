/**
 * Class name set matching.
 *
 * Compares the tokens of a space-delimited class string against an expected
 * set (optionally requiring nothing else to be present) or an unexpected set.
 */

import { InvalidArgumentError } from '../errors/InvalidArgumentError';
import type { ClassNames, Matcher, MatchResult } from '../types/matcher';
import { isIterable } from '../utils/guards';

export interface ClassNameEvaluation {
  pass: boolean;
  /** Expected classes absent from the actual value. */
  missing: Set<string>;
  /** Unexpected classes present in the actual value. */
  unwanted: Set<string>;
  /** Actual classes, in order, not accounted for by the expected set. Repeats of an expected class count. */
  extraneous: string[];
}

export interface ExpectedClassOptions {
  /** Whether classes beyond the expected ones are tolerated. Defaults to true. */
  allowExtraneous?: boolean;
}

const invalidClassNames = (value: unknown) =>
  new InvalidArgumentError(value, 'classNames', 'Must be a list of classNames or a className string');

const splitSpaceDelimitedString = (value: string): string[] =>
  value.split(/\s+/).filter((token) => token.length > 0);

/**
 * Splits class names into their tokens, in order and with duplicates kept.
 *
 * @throws InvalidArgumentError when `classNames` is neither a string nor a collection of strings
 */
export function getClassTokens(classNames: unknown): string[] {
  if (typeof classNames === 'string') {
    return splitSpaceDelimitedString(classNames);
  }

  if (isIterable(classNames)) {
    const tokens: string[] = [];
    for (const entry of classNames) {
      if (entry === null || entry === undefined) continue;
      if (typeof entry !== 'string') {
        throw invalidClassNames(classNames);
      }
      tokens.push(...splitSpaceDelimitedString(entry));
    }
    return tokens;
  }

  throw invalidClassNames(classNames);
}

const formatSet = (tokens: Iterable<string>) => `{${Array.from(tokens).join(', ')}}`;
const formatList = (tokens: string[]) => `[${tokens.join(', ')}]`;

export class ClassNameMatcher implements Matcher<ClassNames> {
  private constructor(
    readonly expectedClasses: ReadonlySet<string>,
    readonly unexpectedClasses: ReadonlySet<string>,
    readonly allowExtraneous: boolean
  ) {}

  static expected(classes: ClassNames, { allowExtraneous = true }: ExpectedClassOptions = {}) {
    return new ClassNameMatcher(new Set(getClassTokens(classes)), new Set(), allowExtraneous);
  }

  static unexpected(classes: ClassNames) {
    return new ClassNameMatcher(new Set(), new Set(getClassTokens(classes)), true);
  }

  evaluate(actual: ClassNames): ClassNameEvaluation {
    const actualTokens = getClassTokens(actual);
    const actualSet = new Set(actualTokens);

    const missing = new Set([...this.expectedClasses].filter((name) => !actualSet.has(name)));
    const unwanted = new Set([...this.unexpectedClasses].filter((name) => actualSet.has(name)));

    // Each expected class accounts for exactly one occurrence in the actual value.
    const remaining = new Map<string, number>();
    this.expectedClasses.forEach((name) => remaining.set(name, 1));
    const extraneous = actualTokens.filter((name) => {
      const count = remaining.get(name) ?? 0;
      if (count === 0) return true;
      remaining.set(name, count - 1);
      return false;
    });

    const pass = this.allowExtraneous
      ? missing.size === 0 && unwanted.size === 0
      : missing.size === 0 && extraneous.length === 0;

    return { pass, missing, unwanted, extraneous };
  }

  describe(): string {
    if (!this.allowExtraneous) {
      return `has ONLY the classes: ${formatSet(this.expectedClasses)}`;
    }

    const parts: string[] = [];
    if (this.expectedClasses.size > 0) {
      parts.push(`has the classes: ${formatSet(this.expectedClasses)}`);
    }
    if (this.unexpectedClasses.size > 0) {
      parts.push(`does not have the classes: ${formatSet(this.unexpectedClasses)}`);
    }
    return parts.join(' and ');
  }

  describeMismatch({ missing, unwanted, extraneous }: ClassNameEvaluation): string {
    const parts: string[] = [];
    if (this.allowExtraneous) {
      if (unwanted.size > 0) parts.push(`has unwanted classes: ${formatSet(unwanted)}`);
    } else if (extraneous.length > 0) {
      parts.push(`has extraneous classes: ${formatList(extraneous)}`);
    }

    if (missing.size > 0) parts.push(`is missing classes: ${formatSet(missing)}`);

    return parts.join('; ');
  }

  matches(actual: ClassNames): MatchResult {
    const evaluation = this.evaluate(actual);
    return {
      pass: evaluation.pass,
      mismatch: evaluation.pass ? '' : this.describeMismatch(evaluation),
    };
  }
}
