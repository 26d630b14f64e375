/**
 * Base class for precondition failures raised while building a graph.
 * @public
 */
export class AutogradError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutogradError';
  }
}

/**
 * An arithmetic operation received something that is neither a Value nor a number.
 * @public
 */
export class InvalidOperand extends AutogradError {
  readonly operation: string;
  readonly operandType: string;

  constructor(operation: string, operandType: string) {
    super(`Can't ${operation} a Value with an operand of type ${operandType}`);
    this.name = 'InvalidOperand';
    this.operation = operation;
    this.operandType = operandType;
  }
}

/**
 * pow() was called with an exponent that is not a numeric constant.
 * @public
 */
export class InvalidExponent extends AutogradError {
  readonly exponentType: string;

  constructor(exponentType: string) {
    super(`Can't raise a Value to an exponent of type ${exponentType}`);
    this.name = 'InvalidExponent';
    this.exponentType = exponentType;
  }
}

/** typeof, refined for null, arrays and class instances. */
export function describeType(x: unknown): string {
  if (x === null) return 'null';
  if (Array.isArray(x)) return 'array';
  if (typeof x === 'object') {
    const ctor: unknown = Object.getPrototypeOf(x)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'object';
  }
  return typeof x;
}
