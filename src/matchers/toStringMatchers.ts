import type { Matcher } from '../types/matcher';
import { isAnything } from '../utils/guards';
import { featureMatcher, wrapMatcher } from './core';

/** Matches an object whose string form matches `value`. */
export const hasToStringValue = (value: unknown): Matcher =>
  featureMatcher({
    description: 'Object with toString() value',
    featureName: 'toString()',
    accepts: isAnything,
    extract: (item) => String(item),
    matcher: wrapMatcher(value),
  });
