/**
 * Tests for the package entry point exports.
 */

import { describe, it, expect } from 'vitest';
import * as library from '@/index';

describe('package entry point', () => {
  it('should expose every matcher factory', () => {
    const factories = [
      library.hasClasses,
      library.hasExactClasses,
      library.excludesClasses,
      library.hasAttr,
      library.hasNodeName,
      library.hasProp,
      library.hasToStringValue,
      library.throwsPropError,
      library.throwsPropError_Required,
      library.throwsPropError_Value,
      library.throwsPropError_Combination,
    ];

    factories.forEach((factory) => expect(typeof factory).toBe('function'));
    expect(library.isMatcher(library.isFocused)).toBe(true);
  });

  it('should build matchers that share the matcher contract', () => {
    expect(library.isMatcher(library.hasClasses('a'))).toBe(true);
    expect(library.isMatcher(library.ClassNameMatcher.unexpected('a'))).toBe(true);
    expect(library.matched()).toEqual({ pass: true, mismatch: '' });
    expect(library.mismatched('why')).toEqual({ pass: false, mismatch: 'why' });
  });
});
