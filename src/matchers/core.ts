/**
 * Primitive matchers and the feature matcher the rest of the library is
 * built from. Equality is delegated to Vitest's own `equals`, so asymmetric
 * matchers such as `expect.stringContaining()` can be used as expected values.
 */

import { equals as deepEquals } from '@vitest/expect';
import { matched, mismatched, type Matcher } from '../types/matcher';
import { describeValue } from '../utils/describeValue';
import { isIterable, isRecord } from '../utils/guards';

export const isMatcher = (value: unknown): value is Matcher =>
  typeof value === 'object' &&
  value !== null &&
  'describe' in value &&
  typeof value.describe === 'function' &&
  'matches' in value &&
  typeof value.matches === 'function';

/** Appends an inner mismatch to a prefix, if there is one. */
export const withWhich = (prefix: string, inner: string): string =>
  inner ? `${prefix} which ${inner}` : prefix;

export const equals = (expected: unknown): Matcher => ({
  describe: () => describeValue(expected),
  matches: (item) => (deepEquals(item, expected) ? matched() : mismatched()),
});

/** Returns `value` if it is already a matcher, an equality matcher otherwise. */
export const wrapMatcher = (value: unknown): Matcher =>
  isMatcher(value) ? value : equals(value);

/**
 * Substring match for strings, membership for any other iterable.
 */
export const contains = (expected: unknown): Matcher => ({
  describe: () => `contains ${describeValue(expected)}`,
  matches: (item) => {
    if (typeof item === 'string') {
      return typeof expected === 'string' && item.includes(expected) ? matched() : mismatched();
    }
    if (isIterable(item)) {
      for (const element of item) {
        if (deepEquals(element, expected)) return matched();
      }
      return mismatched();
    }
    return mismatched('is not a string or an iterable');
  },
});

export const equalsIgnoringCase = (expected: string): Matcher => ({
  describe: () => `${describeValue(expected)} ignoring case`,
  matches: (item) => {
    if (typeof item !== 'string') return mismatched('is not a string');
    return item.toLowerCase() === expected.toLowerCase() ? matched() : mismatched();
  },
});

export const anyOf = (...candidates: unknown[]): Matcher => {
  const matchers = candidates.map(wrapMatcher);

  return {
    describe: () => `(${matchers.map((matcher) => matcher.describe()).join(' or ')})`,
    matches: (item) =>
      matchers.some((matcher) => matcher.matches(item).pass) ? matched() : mismatched(),
  };
};

type Lookup = { found: false } | { found: true; value: unknown };

const lookup = (item: unknown, key: unknown): Lookup | null => {
  if (item instanceof Map) {
    return item.has(key) ? { found: true, value: item.get(key) } : { found: false };
  }
  if (isRecord(item)) {
    return typeof key === 'string' && Object.prototype.hasOwnProperty.call(item, key)
      ? { found: true, value: item[key] }
      : { found: false };
  }
  return null;
};

export const containsPair = (key: unknown, value: unknown): Matcher => {
  const valueMatcher = wrapMatcher(value);

  return {
    describe: () => `contains pair ${describeValue(key)} => ${valueMatcher.describe()}`,
    matches: (item) => {
      const entry = lookup(item, key);
      if (entry === null) return mismatched('is not a map');
      if (!entry.found) return mismatched(`doesn't contain key ${describeValue(key)}`);

      const result = valueMatcher.matches(entry.value);
      if (result.pass) return matched();

      return mismatched(
        withWhich(
          `contains key ${describeValue(key)} but with value ${describeValue(entry.value)}`,
          result.mismatch
        )
      );
    },
  };
};

export interface FeatureMatcherOptions<S, F> {
  /** Prefix for the description, e.g. `Element that`. */
  description: string;
  /** Name of the extracted feature, used in mismatches. */
  featureName: string;
  /** Subjects this rejects fail with `rejection` before anything is extracted. */
  accepts: (item: unknown) => item is S;
  rejection?: string;
  extract: (subject: S) => F;
  matcher: Matcher<F>;
}

/**
 * Matches a single feature of the subject (its class name, an attribute,
 * its props) against an inner matcher.
 */
export function featureMatcher<S, F>(options: FeatureMatcherOptions<S, F>): Matcher {
  const { description, featureName, accepts, rejection = '', extract, matcher } = options;

  return {
    describe: () => `${description} ${matcher.describe()}`,
    matches: (item) => {
      if (!accepts(item)) return mismatched(rejection);

      const feature = extract(item);
      const result = matcher.matches(feature);
      if (result.pass) return matched();

      return mismatched(
        withWhich(`has ${featureName} with value ${describeValue(feature)}`, result.mismatch)
      );
    },
  };
}
