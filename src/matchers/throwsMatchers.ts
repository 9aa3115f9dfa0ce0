import { matched, mismatched, type AsyncMatcher, type MatchResult } from '../types/matcher';
import { describeValue } from '../utils/describeValue';
import { isThenable } from '../utils/guards';
import { anyOf, contains, withWhich, wrapMatcher } from './core';
import { hasToStringValue } from './toStringMatchers';

/**
 * The message browsers report in place of an error raised by a cross-origin
 * script. Such an error carries nothing else to match on.
 */
export const MASKED_ERROR_MESSAGE = 'Script error.';

/**
 * Matches a function that throws a value matching `matcher` when called.
 *
 * A function returning a promise, or a promise given directly, matches when it
 * rejects with such a value; the result is then a promise as well.
 */
export const throwsA = (matcher: unknown): AsyncMatcher => {
  const errorMatcher = wrapMatcher(matcher);

  const matchError = (error: unknown): MatchResult => {
    const result = errorMatcher.matches(error);
    if (result.pass) return matched();
    return mismatched(withWhich(`threw ${describeValue(error)}`, result.mismatch));
  };

  const matchSettled = (pending: PromiseLike<unknown>): Promise<MatchResult> =>
    Promise.resolve(pending).then(
      (value) => mismatched(`did not throw; resolved to ${describeValue(value)}`),
      matchError
    );

  return {
    describe: () => `throws ${errorMatcher.describe()}`,
    matches: (item) => {
      if (isThenable(item)) return matchSettled(item);
      if (typeof item !== 'function') return mismatched('is not a Function or a Promise');

      let returned: unknown;
      try {
        returned = item();
      } catch (thrown) {
        return matchError(thrown);
      }

      return isThenable(returned) ? matchSettled(returned) : mismatched('did not throw');
    },
  };
};

const throwsErrorContaining = (expectedMessage: string): AsyncMatcher =>
  throwsA(
    anyOf(
      hasToStringValue(MASKED_ERROR_MESSAGE),
      hasToStringValue(contains(expectedMessage.trim()))
    )
  );

/** Matches a function that throws a `PropError` for `propName`. */
export const throwsPropError = (propName: string, message = ''): AsyncMatcher =>
  throwsErrorContaining(`PropError: Prop ${propName}. ${message}`);

/** Matches a function that throws a `RequiredPropError` for `propName`. */
export const throwsPropError_Required = (propName: string, message = ''): AsyncMatcher =>
  throwsErrorContaining(`RequiredPropError: Prop ${propName} is required. ${message}`);

/** Matches a function that throws an `InvalidPropValueError` for `propName` set to `invalidValue`. */
export const throwsPropError_Value = (
  invalidValue: unknown,
  propName: string,
  message = ''
): AsyncMatcher =>
  throwsErrorContaining(
    `InvalidPropValueError: Prop ${propName} set to ${String(invalidValue)}. ${message}`
  );

/** Matches a function that throws an `InvalidPropCombinationError` for `propName` and `prop2Name`. */
export const throwsPropError_Combination = (
  propName: string,
  prop2Name: string,
  message = ''
): AsyncMatcher =>
  throwsErrorContaining(
    `InvalidPropCombinationError: Prop ${propName} and prop ${prop2Name} are set to incompatible values. ${message}`
  );
