/**
 * Tests for class name tokenizing and ClassNameMatcher.
 *
 * Covers the expected, exact and unexpected modes, including how repeated
 * classes count as extraneous only when no extra classes are allowed.
 */

import { describe, it, expect } from 'vitest';
import { ClassNameMatcher, getClassTokens } from '@/matchers/classNameMatcher';
import { InvalidArgumentError } from '@/errors/InvalidArgumentError';

describe('getClassTokens', () => {
  it('should split a string on any whitespace and drop empty tokens', () => {
    expect(getClassTokens('  a   b\tc\n')).toEqual(['a', 'b', 'c']);
  });

  it('should keep duplicates and order', () => {
    expect(getClassTokens('b a b')).toEqual(['b', 'a', 'b']);
  });

  it('should flatten a collection and skip null entries', () => {
    expect(getClassTokens(['a b', null, undefined, 'c'])).toEqual(['a', 'b', 'c']);
    expect(getClassTokens(new Set(['x', 'y z']))).toEqual(['x', 'y', 'z']);
  });

  it('should return no tokens for an empty string', () => {
    expect(getClassTokens('')).toEqual([]);
  });

  it('should reject a value that is neither a string nor a collection of strings', () => {
    expect(() => getClassTokens(42)).toThrow(InvalidArgumentError);
    expect(() => getClassTokens(42)).toThrow(
      'Invalid argument (classNames): Must be a list of classNames or a className string: 42'
    );
  });

  it('should reject a collection holding something other than strings', () => {
    expect(() => getClassTokens(['a', 3])).toThrow(
      "Invalid argument (classNames): Must be a list of classNames or a className string: ['a', 3]"
    );
  });

  it('should name the parameter and keep the value on the error', () => {
    const value = { className: 'a' };
    try {
      getClassTokens(value);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.argumentName).toBe('classNames');
        expect(error.invalidValue).toBe(value);
      }
    }
  });
});

describe('ClassNameMatcher', () => {
  describe('expected mode', () => {
    it('should pass with nothing left over when actual equals expected', () => {
      const evaluation = ClassNameMatcher.expected('a b').evaluate('a b');

      expect(evaluation.pass).toBe(true);
      expect([...evaluation.missing]).toEqual([]);
      expect([...evaluation.unwanted]).toEqual([]);
      expect(evaluation.extraneous).toEqual([]);
    });

    it('should ignore order', () => {
      expect(ClassNameMatcher.expected(['a', 'b']).evaluate('b a').pass).toBe(true);
    });

    it('should report missing classes', () => {
      const matcher = ClassNameMatcher.expected('a b');
      const evaluation = matcher.evaluate('b');

      expect(evaluation.pass).toBe(false);
      expect([...evaluation.missing]).toEqual(['a']);
      expect(matcher.matches('b')).toEqual({ pass: false, mismatch: 'is missing classes: {a}' });
    });

    it('should tolerate extraneous and duplicated classes by default', () => {
      expect(ClassNameMatcher.expected('a').evaluate('a b').pass).toBe(true);
      expect(ClassNameMatcher.expected('x').evaluate('x x').pass).toBe(true);
    });

    it('should return an empty mismatch when passing', () => {
      expect(ClassNameMatcher.expected('a').matches('a b')).toEqual({ pass: true, mismatch: '' });
    });

    it('should describe the expected classes', () => {
      expect(ClassNameMatcher.expected('a b').describe()).toBe('has the classes: {a, b}');
    });
  });

  describe('exact mode', () => {
    const exact = (classes: string) => ClassNameMatcher.expected(classes, { allowExtraneous: false });

    it('should report classes beyond the expected ones as extraneous', () => {
      const evaluation = exact('a').evaluate('a b');

      expect(evaluation.pass).toBe(false);
      expect(evaluation.extraneous).toEqual(['b']);
      expect(exact('a').matches('a b').mismatch).toBe('has extraneous classes: [b]');
    });

    it('should report a repeated expected class as extraneous', () => {
      const evaluation = exact('x').evaluate('x x');

      expect(evaluation.pass).toBe(false);
      expect([...evaluation.missing]).toEqual([]);
      expect(evaluation.extraneous).toEqual(['x']);
    });

    it('should list extraneous classes in order before missing ones', () => {
      expect(exact('a b').matches('b c c')).toEqual({
        pass: false,
        mismatch: 'has extraneous classes: [c, c]; is missing classes: {a}',
      });
    });

    it('should pass for exactly the expected classes in any order', () => {
      expect(exact('a b').evaluate('b a').pass).toBe(true);
    });

    it('should treat no expected classes as requiring none', () => {
      expect(exact('').matches('')).toEqual({ pass: true, mismatch: '' });
      expect(exact('').matches('a')).toEqual({
        pass: false,
        mismatch: 'has extraneous classes: [a]',
      });
    });

    it('should describe itself as requiring only the expected classes', () => {
      expect(exact('a').describe()).toBe('has ONLY the classes: {a}');
    });
  });

  describe('unexpected mode', () => {
    it('should fail when an unexpected class is present', () => {
      const matcher = ClassNameMatcher.unexpected('a');
      const evaluation = matcher.evaluate('a b');

      expect(evaluation.pass).toBe(false);
      expect([...evaluation.unwanted]).toEqual(['a']);
      expect(matcher.matches('a b').mismatch).toBe('has unwanted classes: {a}');
    });

    it('should pass when no unexpected class is present', () => {
      const evaluation = ClassNameMatcher.unexpected('a').evaluate('b c');

      expect(evaluation.pass).toBe(true);
      expect(evaluation.extraneous).toEqual(['b', 'c']);
    });

    it('should always allow extraneous classes', () => {
      expect(ClassNameMatcher.unexpected('a').allowExtraneous).toBe(true);
    });

    it('should describe the excluded classes', () => {
      expect(ClassNameMatcher.unexpected(['c', 'd']).describe()).toBe(
        'does not have the classes: {c, d}'
      );
    });
  });
});
