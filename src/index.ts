export type { AsyncMatcher, ClassNames, Matcher, MatchResult } from './types/matcher';
export { matched, mismatched } from './types/matcher';

export { InvalidArgumentError } from './errors/InvalidArgumentError';
export {
  InvalidPropCombinationError,
  InvalidPropValueError,
  PropError,
  RequiredPropError,
} from './errors/propErrors';

export {
  anyOf,
  contains,
  containsPair,
  equals,
  equalsIgnoringCase,
  featureMatcher,
  isMatcher,
  wrapMatcher,
} from './matchers/core';
export type { FeatureMatcherOptions } from './matchers/core';
export { ClassNameMatcher, getClassTokens } from './matchers/classNameMatcher';
export type { ClassNameEvaluation, ExpectedClassOptions } from './matchers/classNameMatcher';
export {
  excludesClasses,
  hasAttr,
  hasClasses,
  hasExactClasses,
  hasNodeName,
} from './matchers/elementMatchers';
export { attributeNameForProp, hasProp, isValidDomPropKey } from './matchers/propMatchers';
export { hasToStringValue } from './matchers/toStringMatchers';
export { isFocused } from './matchers/focusMatchers';
export {
  MASKED_ERROR_MESSAGE,
  throwsA,
  throwsPropError,
  throwsPropError_Combination,
  throwsPropError_Required,
  throwsPropError_Value,
} from './matchers/throwsMatchers';
export { describeValue } from './utils/describeValue';
