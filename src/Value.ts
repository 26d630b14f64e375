import { InvalidExponent, InvalidOperand, describeType } from './ValueErrors';

/**
 * Operand accepted by every arithmetic operation: a node, or a bare number
 * that gets wrapped into a fresh leaf.
 * @public
 */
export type Operand = Value | number;

/**
 * Identifies the local derivative rule of a node.
 * @public
 */
export type OpTag =
  | { readonly kind: 'none' }
  | { readonly kind: 'add' }
  | { readonly kind: 'mul' }
  | { readonly kind: 'pow'; readonly exponent: number }
  | { readonly kind: 'relu' };

const LEAF: OpTag = { kind: 'none' };
const ADD: OpTag = { kind: 'add' };
const MUL: OpTag = { kind: 'mul' };
const RELU: OpTag = { kind: 'relu' };

let nextId = 0;

/**
 * Short symbol for an operation tag, as shown in graph renderings.
 * @public
 */
export function opSymbol(op: OpTag): string {
  switch (op.kind) {
    case 'none': return '';
    case 'add': return '+';
    case 'mul': return '*';
    case 'pow': return `**${op.exponent}`;
    case 'relu': return 'ReLU';
  }
}

/**
 * Represents a scalar value in the computational graph for automatic differentiation.
 * Supports forward computation and reverse-mode autodiff (backpropagation).
 *
 * NaN and infinities are accepted and propagate through every operation;
 * nothing here throws on numeric overflow.
 * @public
 */
export class Value {
  /**
   * The numeric value stored in this node.
   * @public
   */
  readonly data: number;

  /**
   * The gradient of the backward root with respect to this value.
   * Accumulates across passes until the caller resets it.
   * @public
   */
  grad = 0;

  /**
   * Optional label for debugging and visualization.
   * @public
   */
  readonly label: string;

  /**
   * Stable handle, increasing in construction order. Operands always carry
   * a smaller id than the node consuming them.
   * @public
   */
  readonly id: number;

  private _op: OpTag = LEAF;

  private prev: readonly Value[] = [];

  /**
   * Creates a leaf. Interior nodes come only from the operations.
   * @param data Any float; NaN and infinities included
   * @param label Display name
   */
  constructor(data: number, label = '') {
    this.data = data;
    this.label = label;
    this.id = nextId++;
  }

  /**
   * Operation that produced this node.
   * @public
   */
  get op(): OpTag {
    return this._op;
  }

  /**
   * Direct predecessors, in operand order. Empty for leaves.
   */
  get operands(): readonly Value[] {
    return this.prev;
  }

  get isLeaf(): boolean {
    return this.prev.length === 0;
  }

  /**
   * Wraps numbers into leaves and rejects anything that is not a node.
   * @param x Candidate operand
   * @param operation Name reported in the error
   */
  static from(x: unknown, operation: string): Value {
    if (x instanceof Value) return x;
    if (typeof x === 'number') return new Value(x);
    throw new InvalidOperand(operation, describeType(x));
  }

  private static make(data: number, op: OpTag, operands: readonly Value[]): Value {
    const out = new Value(data);
    out._op = op;
    out.prev = operands;
    return out;
  }

  /**
   * Adds this and other.
   * @param other Value or number to add
   * @returns New Value with sum.
   */
  add(other: Operand): Value {
    const b = Value.from(other, 'add');
    return Value.make(this.data + b.data, ADD, [this, b]);
  }

  /**
   * Multiplies this and other.
   * @param other Value or number to multiply
   * @returns New Value with product.
   */
  mul(other: Operand): Value {
    const b = Value.from(other, 'mul');
    return Value.make(this.data * b.data, MUL, [this, b]);
  }

  /**
   * Raises this to a constant power. Negative and fractional exponents are allowed.
   * @param exponent Numeric constant; a Value is rejected
   */
  pow(exponent: number): Value {
    if (typeof exponent !== 'number') {
      throw new InvalidExponent(describeType(exponent));
    }
    return Value.make(this.data ** exponent, { kind: 'pow', exponent }, [this]);
  }

  relu(): Value {
    return Value.make(this.data > 0 ? this.data : 0, RELU, [this]);
  }

  /** -this, built as this * -1. */
  neg(): Value {
    return this.mul(-1);
  }

  /**
   * Subtracts other from this, built as this + (-other).
   * @param other Value or number to subtract
   */
  sub(other: Operand): Value {
    return this.add(Value.from(other, 'sub').neg());
  }

  /**
   * Divides this by other, built as this * other^-1. A zero divisor
   * yields an infinite or NaN result rather than an error.
   * @param other Value or number divisor
   */
  div(other: Operand): Value {
    return this.mul(Value.from(other, 'div').pow(-1));
  }

  /** other - this. */
  rsub(other: Operand): Value {
    return Value.from(other, 'rsub').add(this.neg());
  }

  /** other / this. */
  rdiv(other: Operand): Value {
    return Value.from(other, 'rdiv').mul(this.pow(-1));
  }

  /**
   * Returns the sum of the given Values, folded left to right.
   * @param vals Values or numbers to add
   * @returns New Value holding their sum (a leaf 0 when empty).
   */
  static sum(vals: readonly Operand[]): Value {
    if (vals.length === 0) return new Value(0);
    let acc = Value.from(vals[0], 'sum');
    for (let i = 1; i < vals.length; i++) {
      acc = acc.add(Value.from(vals[i], 'sum'));
    }
    return acc;
  }

  /**
   * Nodes reachable from root, each after all of its operands. Iterative,
   * so chain depth is bounded by memory rather than the call stack.
   */
  static topologicalOrder(root: Value): Value[] {
    const topo: Value[] = [];
    const visited = new Set<number>();
    const stack: Array<{ node: Value; expanded: boolean }> = [{ node: root, expanded: false }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;
      const { node, expanded } = frame;
      if (expanded) {
        topo.push(node);
        continue;
      }
      if (visited.has(node.id)) continue;
      visited.add(node.id);
      stack.push({ node, expanded: true });
      // reversed so the first operand is finished first
      for (let i = node.prev.length - 1; i >= 0; i--) {
        const child = node.prev[i];
        if (!visited.has(child.id)) stack.push({ node: child, expanded: false });
      }
    }

    return topo;
  }

  /**
   * Performs a reverse-mode autodiff backward pass from this Value.
   *
   * Only the root's gradient is seeded; every other gradient keeps what it
   * held before the call, so reset parameters between independent passes.
   * @returns The evaluation order, leaves first and this node last.
   */
  backward(): Value[] {
    const topo = Value.topologicalOrder(this);
    this.grad = 1;
    for (let i = topo.length - 1; i >= 0; i--) {
      topo[i].propagate();
    }
    return topo;
  }

  /**
   * Sets grad of each given value to 0.
   * @param vals Values to reset
   */
  static zeroGrad(vals: Iterable<Value>): void {
    for (const v of vals) v.grad = 0;
  }

  private propagate(): void {
    const g = this.grad;
    const [a, b] = this.prev;
    switch (this.op.kind) {
      case 'none':
        return;
      case 'add':
        a.grad += g;
        b.grad += g;
        return;
      case 'mul':
        a.grad += b.data * g;
        b.grad += a.data * g;
        return;
      case 'pow': {
        const p = this.op.exponent;
        a.grad += p * a.data ** (p - 1) * g;
        return;
      }
      case 'relu':
        a.grad += (a.data > 0 ? 1 : 0) * g;
        return;
    }
  }

  /**
   * Returns string representation for debugging.
   * @returns String summary of Value
   */
  toString(): string {
    return `Value(data=${this.data.toFixed(4)}, grad=${this.grad.toFixed(4)}, label=${this.label})`;
  }
}
