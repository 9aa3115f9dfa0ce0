import { matched, mismatched, type Matcher } from '../types/matcher';
import { describeValue } from '../utils/describeValue';
import { isElement } from '../utils/guards';

const describeFocusMismatch = (item: unknown, activeElement: Element | null): string => {
  if (!isElement(item)) return 'is not a valid Element.';

  if (!document.documentElement.contains(item)) {
    return (
      'is not attached to the document, and thus cannot be focused. ' +
      'If testing with React, render into a container attached to document.body.'
    );
  }

  if (activeElement === null || activeElement === document.body) {
    return 'is not focused; there is no element currently focused';
  }
  return `is not focused; the currently focused element is ${describeValue(activeElement)}`;
};

/** Matches the currently focused element (`document.activeElement`). */
export const isFocused: Matcher = Object.freeze({
  describe: () => 'is focused',
  matches: (item: unknown) => {
    const { activeElement } = document;
    if (item !== null && item !== undefined && item === activeElement) return matched();
    return mismatched(describeFocusMismatch(item, activeElement));
  },
});
