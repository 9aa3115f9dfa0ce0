/**
 * Tests for the prop error types and their string forms.
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidPropCombinationError,
  InvalidPropValueError,
  PropError,
  RequiredPropError,
} from '@/errors/propErrors';

describe('prop errors', () => {
  it('should format a PropError', () => {
    const error = new PropError('variant', 'Unknown variant.');

    expect(String(error)).toBe('PropError: Prop variant. Unknown variant.');
    expect(error.propName).toBe('variant');
  });

  it('should format a RequiredPropError', () => {
    const error = PropError.required('size');

    expect(error).toBeInstanceOf(RequiredPropError);
    expect(error).toBeInstanceOf(PropError);
    expect(String(error)).toBe('RequiredPropError: Prop size is required. ');
  });

  it('should format an InvalidPropValueError', () => {
    const error = PropError.value(7, 'columns', 'Must be between 1 and 6.');

    expect(error).toBeInstanceOf(InvalidPropValueError);
    expect(error.invalidValue).toBe(7);
    expect(String(error)).toBe('InvalidPropValueError: Prop columns set to 7. Must be between 1 and 6.');
  });

  it('should format an InvalidPropCombinationError', () => {
    const error = PropError.combination('min', 'max');

    expect(error).toBeInstanceOf(InvalidPropCombinationError);
    expect(error.prop2Name).toBe('max');
    expect(String(error)).toBe(
      'InvalidPropCombinationError: Prop min and prop max are set to incompatible values. '
    );
  });
});
