/**
 * Prop matching for React elements, class component instances and the DOM
 * nodes React renders.
 *
 * Props of a rendered DOM node cannot be read back, so its attributes are
 * matched instead; only prop keys with an attribute counterpart are supported
 * there.
 */

import { Component, isValidElement } from 'react';
import domPropKeys from '../data/domPropKeys.json';
import { matched, mismatched, type Matcher } from '../types/matcher';
import { describeValue } from '../utils/describeValue';
import { isElement, isRecord } from '../utils/guards';
import { containsPair, withWhich } from './core';

const SUPPORTED_DOM_PROP_KEYS: ReadonlySet<string> = new Set([
  ...domPropKeys.html,
  ...domPropKeys.svg,
]);

const ATTRIBUTE_NAMES: Readonly<Record<string, string>> = domPropKeys.attributeNames;

const HTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

export const isValidDomPropKey = (propKey: string): boolean =>
  SUPPORTED_DOM_PROP_KEYS.has(propKey) || propKey.startsWith('data-') || propKey.startsWith('aria-');

/** Name of the attribute React renders `propKey` to on `element`. */
export const attributeNameForProp = (propKey: string, element: Element): string => {
  const name = ATTRIBUTE_NAMES[propKey] ?? propKey;
  // HTML attribute names are stored lower-cased; SVG ones keep their case.
  return element.namespaceURI === HTML_NAMESPACE ? name.toLowerCase() : name;
};

const attributesOf = (element: Element): Record<string, string> =>
  Object.fromEntries(Array.from(element.attributes, (attribute) => [attribute.name, attribute.value]));

const propsOf = (item: object): Record<string, unknown> | null => {
  if (item instanceof Component) {
    const props: unknown = item.props;
    return isRecord(props) ? props : {};
  }
  if (isValidElement(item)) {
    return isRecord(item.props) ? item.props : {};
  }
  return null;
};

const matchFeature = (props: Record<string, unknown>, matcher: Matcher) => {
  const result = matcher.matches(props);
  if (result.pass) return matched();

  return mismatched(
    withWhich(`has props/attributes map with value ${describeValue(props)}`, result.mismatch)
  );
};

/**
 * Matches React elements, class component instances and rendered DOM nodes
 * that carry the prop pair (`propKey`, `propValue`).
 *
 * Always fails for a DOM node when `propKey` has no attribute counterpart.
 */
export const hasProp = (propKey: string, propValue: unknown): Matcher => {
  const pair = containsPair(propKey, propValue);

  return {
    describe: () => `React instance with props that ${pair.describe()}`,
    matches: (item) => {
      if (item === null || item === undefined) return mismatched();

      if (isElement(item)) {
        if (!isValidDomPropKey(propKey)) {
          return mismatched(
            `Cannot verify whether the \`${propKey}\` prop is available on a DOM element. ` +
              'Only HTML/SVG attribute props or props starting with "data-"/"aria-" are supported.'
          );
        }
        return matchFeature(
          attributesOf(item),
          containsPair(attributeNameForProp(propKey, item), propValue)
        );
      }

      const props = typeof item === 'object' ? propsOf(item) : null;
      if (props === null) {
        return mismatched('is not a React element, component instance or DOM element');
      }
      return matchFeature(props, pair);
    },
  };
};
