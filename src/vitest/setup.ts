/**
 * Registers the library's matchers with Vitest's `expect`.
 *
 * Add this module to `setupFiles` (or import it from an existing setup file):
 *
 *   expect(getByRole('button')).toHaveClasses('btn btn-primary');
 *   expect(() => render(<Badge />)).toThrowRequiredPropError('size');
 *   await expect(loadBadge()).toThrowRequiredPropError('size');
 */

import { expect } from 'vitest';
import { excludesClasses, hasAttr, hasClasses, hasExactClasses, hasNodeName } from '../matchers/elementMatchers';
import { isFocused } from '../matchers/focusMatchers';
import { hasProp } from '../matchers/propMatchers';
import {
  throwsPropError,
  throwsPropError_Combination,
  throwsPropError_Required,
  throwsPropError_Value,
} from '../matchers/throwsMatchers';
import { hasToStringValue } from '../matchers/toStringMatchers';
import type { AsyncMatcher, ClassNames, Matcher, MatchResult } from '../types/matcher';
import { describeValue } from '../utils/describeValue';

/**
 * Formats a matcher outcome the way failures read:
 *
 *   Expected: <description>
 *     Actual: <subject>
 *      Which: <mismatch>
 */
export function formatFailure(
  matcher: Pick<Matcher, 'describe'>,
  received: unknown,
  mismatch: string,
  negated: boolean
): string {
  const lines = [
    `Expected: ${negated ? 'not ' : ''}${matcher.describe()}`,
    `  Actual: ${describeValue(received)}`,
  ];
  if (!negated && mismatch) lines.push(`   Which: ${mismatch}`);
  return lines.join('\n');
}

const toExpectationResult = (
  matcher: Matcher | AsyncMatcher,
  received: unknown,
  { pass, mismatch }: MatchResult
) => ({
  pass,
  // Vitest shows this message for a failing assertion, or for a passing one under `.not`.
  message: () => formatFailure(matcher, received, mismatch, pass),
});

// Asynchronous subjects yield a promise, which Vitest awaits as an async matcher.
const assertMatcher = (received: unknown, matcher: Matcher | AsyncMatcher) => {
  const outcome = matcher.matches(received);
  return outcome instanceof Promise
    ? outcome.then((result) => toExpectationResult(matcher, received, result))
    : toExpectationResult(matcher, received, outcome);
};

export const customMatchers = {
  toSatisfyMatcher(received: unknown, matcher: Matcher | AsyncMatcher) {
    return assertMatcher(received, matcher);
  },
  toHaveClasses(received: unknown, classes: ClassNames) {
    return assertMatcher(received, hasClasses(classes));
  },
  toHaveExactClasses(received: unknown, classes: ClassNames) {
    return assertMatcher(received, hasExactClasses(classes));
  },
  toExcludeClasses(received: unknown, classes: ClassNames) {
    return assertMatcher(received, excludesClasses(classes));
  },
  toHaveAttr(received: unknown, attributeName: string, value: unknown) {
    return assertMatcher(received, hasAttr(attributeName, value));
  },
  toHaveNodeName(received: unknown, nodeName: string) {
    return assertMatcher(received, hasNodeName(nodeName));
  },
  toHaveProp(received: unknown, propKey: string, propValue: unknown) {
    return assertMatcher(received, hasProp(propKey, propValue));
  },
  toHaveToStringValue(received: unknown, value: unknown) {
    return assertMatcher(received, hasToStringValue(value));
  },
  toBeFocused(received: unknown) {
    return assertMatcher(received, isFocused);
  },
  toThrowPropError(received: unknown, propName: string, message?: string) {
    return assertMatcher(received, throwsPropError(propName, message));
  },
  toThrowRequiredPropError(received: unknown, propName: string, message?: string) {
    return assertMatcher(received, throwsPropError_Required(propName, message));
  },
  toThrowInvalidPropValueError(
    received: unknown,
    invalidValue: unknown,
    propName: string,
    message?: string
  ) {
    return assertMatcher(received, throwsPropError_Value(invalidValue, propName, message));
  },
  toThrowInvalidPropCombinationError(
    received: unknown,
    propName: string,
    prop2Name: string,
    message?: string
  ) {
    return assertMatcher(received, throwsPropError_Combination(propName, prop2Name, message));
  },
};

interface CustomMatchers<R = unknown> {
  toSatisfyMatcher(matcher: Matcher | AsyncMatcher): R;
  toHaveClasses(classes: ClassNames): R;
  toHaveExactClasses(classes: ClassNames): R;
  toExcludeClasses(classes: ClassNames): R;
  toHaveAttr(attributeName: string, value: unknown): R;
  toHaveNodeName(nodeName: string): R;
  toHaveProp(propKey: string, propValue: unknown): R;
  toHaveToStringValue(value: unknown): R;
  toBeFocused(): R;
  toThrowPropError(propName: string, message?: string): R;
  toThrowRequiredPropError(propName: string, message?: string): R;
  toThrowInvalidPropValueError(invalidValue: unknown, propName: string, message?: string): R;
  toThrowInvalidPropCombinationError(propName: string, prop2Name: string, message?: string): R;
}

declare module 'vitest' {
  interface Assertion<T> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}

expect.extend(customMatchers);
