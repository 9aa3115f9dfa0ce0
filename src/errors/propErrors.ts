/**
 * Errors a component throws when its props fail validation.
 *
 * The string form of each is `<name>: <message>`, which is what the
 * `throwsPropError*` matchers read.
 */

export class PropError extends Error {
  readonly propName: string;

  constructor(propName: string, message = '') {
    super(`Prop ${propName}. ${message}`);
    this.name = 'PropError';
    this.propName = propName;
  }

  static required(propName: string, message = '') {
    return new RequiredPropError(propName, message);
  }

  static value(invalidValue: unknown, propName: string, message = '') {
    return new InvalidPropValueError(invalidValue, propName, message);
  }

  static combination(propName: string, prop2Name: string, message = '') {
    return new InvalidPropCombinationError(propName, prop2Name, message);
  }
}

export class RequiredPropError extends PropError {
  constructor(propName: string, message = '') {
    super(propName);
    this.name = 'RequiredPropError';
    this.message = `Prop ${propName} is required. ${message}`;
  }
}

export class InvalidPropValueError extends PropError {
  readonly invalidValue: unknown;

  constructor(invalidValue: unknown, propName: string, message = '') {
    super(propName);
    this.name = 'InvalidPropValueError';
    this.message = `Prop ${propName} set to ${String(invalidValue)}. ${message}`;
    this.invalidValue = invalidValue;
  }
}

export class InvalidPropCombinationError extends PropError {
  readonly prop2Name: string;

  constructor(propName: string, prop2Name: string, message = '') {
    super(propName);
    this.name = 'InvalidPropCombinationError';
    this.message = `Prop ${propName} and prop ${prop2Name} are set to incompatible values. ${message}`;
    this.prop2Name = prop2Name;
  }
}
