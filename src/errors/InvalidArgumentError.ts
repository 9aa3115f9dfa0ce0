import { describeValue } from '../utils/describeValue';

/**
 * Thrown when a matcher factory receives an argument it cannot use.
 */
export class InvalidArgumentError extends Error {
  readonly argumentName: string;
  readonly invalidValue: unknown;

  constructor(invalidValue: unknown, argumentName: string, message: string) {
    super(`Invalid argument (${argumentName}): ${message}: ${describeValue(invalidValue)}`);
    this.name = 'InvalidArgumentError';
    this.argumentName = argumentName;
    this.invalidValue = invalidValue;
  }
}
