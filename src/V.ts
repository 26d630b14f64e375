import { type Operand, Value } from './Value';

/**
 * Free-function form of the Value operations. Either side may be a bare
 * number, and operand order is kept: `V.sub(3, x)` is `3 - x`.
 * @public
 */
export class V {
  /**
   * Creates a leaf.
   * @param data Leaf value
   * @param label Display name
   */
  static leaf(data: number, label = ''): Value {
    return new Value(data, label);
  }

  static add(a: Operand, b: Operand): Value {
    return Value.from(a, 'add').add(b);
  }

  static sub(a: Operand, b: Operand): Value {
    return Value.from(a, 'sub').sub(b);
  }

  static mul(a: Operand, b: Operand): Value {
    return Value.from(a, 'mul').mul(b);
  }

  static div(a: Operand, b: Operand): Value {
    return Value.from(a, 'div').div(b);
  }

  /**
   * a raised to a numeric constant.
   */
  static pow(a: Operand, exponent: number): Value {
    return Value.from(a, 'pow').pow(exponent);
  }

  static neg(a: Operand): Value {
    return Value.from(a, 'neg').neg();
  }

  static relu(a: Operand): Value {
    return Value.from(a, 'relu').relu();
  }

  static sum(vals: readonly Operand[]): Value {
    return Value.sum(vals);
  }
}
