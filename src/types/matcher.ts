/**
 * Matcher contract shared by every feature matcher in the library.
 */

export interface MatchResult {
  pass: boolean;
  /** Why the subject did not match. Empty when passing or when there is nothing to add. */
  mismatch: string;
}

export interface Matcher<T = unknown> {
  describe(): string;
  matches(item: T): MatchResult;
}

/**
 * A matcher whose subject may settle later, such as a function returning a
 * promise. The result is a promise exactly when the subject is asynchronous.
 */
export interface AsyncMatcher<T = unknown> {
  describe(): string;
  matches(item: T): MatchResult | Promise<MatchResult>;
}

/** Class names as accepted by the class matchers: a space-delimited string or a collection of them. */
export type ClassNames = string | Iterable<string | null | undefined>;

export const matched = (): MatchResult => ({ pass: true, mismatch: '' });

export const mismatched = (mismatch = ''): MatchResult => ({ pass: false, mismatch });
