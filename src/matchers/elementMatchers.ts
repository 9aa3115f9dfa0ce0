import type { ClassNames, Matcher } from '../types/matcher';
import { isElement } from '../utils/guards';
import { ClassNameMatcher } from './classNameMatcher';
import { equalsIgnoringCase, featureMatcher, wrapMatcher } from './core';

const NOT_AN_ELEMENT = 'is not a valid Element';

// SVG elements expose className as an SVGAnimatedString, so read the attribute.
const classNameOf = (element: Element): string => element.getAttribute('class') ?? '';

const elementClassNameMatcher = (matcher: ClassNameMatcher): Matcher =>
  featureMatcher({
    description: 'Element that',
    featureName: 'className',
    accepts: isElement,
    rejection: NOT_AN_ELEMENT,
    extract: classNameOf,
    matcher,
  });

/** Matches an element that has all of `classes`. */
export const hasClasses = (classes: ClassNames): Matcher =>
  elementClassNameMatcher(ClassNameMatcher.expected(classes));

/** Matches an element that has `classes`, with no additional or duplicated classes. */
export const hasExactClasses = (classes: ClassNames): Matcher =>
  elementClassNameMatcher(ClassNameMatcher.expected(classes, { allowExtraneous: false }));

/** Matches an element that has none of `classes`. */
export const excludesClasses = (classes: ClassNames): Matcher =>
  elementClassNameMatcher(ClassNameMatcher.unexpected(classes));

/**
 * Matches an element whose `attributeName` attribute matches `value`.
 * An absent attribute reads as `null`.
 */
export const hasAttr = (attributeName: string, value: unknown): Matcher =>
  featureMatcher({
    description: `Element with "${attributeName}" attribute that equals`,
    featureName: 'attributes',
    accepts: isElement,
    rejection: NOT_AN_ELEMENT,
    extract: (element) => element.getAttribute(attributeName),
    matcher: wrapMatcher(value),
  });

/** Matches an element with the given nodeName, ignoring case. */
export const hasNodeName = (nodeName: string): Matcher =>
  featureMatcher({
    description: 'Element with nodeName that is',
    featureName: 'nodeName',
    accepts: isElement,
    rejection: NOT_AN_ELEMENT,
    extract: (element) => element.nodeName,
    matcher: equalsIgnoringCase(nodeName),
  });
