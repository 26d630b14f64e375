import { describe, expect, it } from 'vitest';
import { V } from '../src/V';
import { Value } from '../src/Value';
import { AutogradError, InvalidExponent, InvalidOperand } from '../src/ValueErrors';

describe('V helpers', () => {
  it('creates labelled leaves', () => {
    const w = V.leaf(0.5, 'w');
    expect(w.data).toBe(0.5);
    expect(w.label).toBe('w');
    expect(w.isLeaf).toBe(true);
    expect(w.grad).toBe(0);
  });

  it('commutes add and mul with a literal on either side', () => {
    const x = V.leaf(3, 'x');
    expect(V.add(2, x).data).toBe(5);
    expect(V.add(x, 2).data).toBe(5);
    expect(V.mul(2, x).data).toBe(6);
    expect(V.mul(x, 2).data).toBe(6);

    const y = V.leaf(4, 'y');
    V.mul(2, y).backward();
    expect(y.grad).toBe(2);
  });

  it('keeps operand order for sub and div', () => {
    const x = V.leaf(1, 'x');
    const left = V.sub(3, x);
    left.backward();
    expect(left.data).toBe(2);
    expect(x.grad).toBe(-1);

    expect(V.sub(x, 3).data).toBe(-2);

    const y = V.leaf(2, 'y');
    const q = V.div(3, y);
    q.backward();
    expect(q.data).toBe(1.5);
    expect(y.grad).toBe(-0.75);
    expect(V.div(y, 4).data).toBe(0.5);
  });

  it('raises, negates and rectifies literals', () => {
    expect(V.pow(3, 2).data).toBe(9);
    expect(V.neg(3).data).toBe(-3);
    expect(V.relu(-3).data).toBe(0);
    expect(V.relu(V.leaf(3)).data).toBe(3);
  });

  it('sums mixed operands', () => {
    const x = V.leaf(2);
    expect(V.sum([x, 1, 2]).data).toBe(5);
  });

  it('rejects values that are neither nodes nor numbers', () => {
    const bogus: unknown = undefined;
    expect(() => Reflect.apply(V.add, V, [bogus, 1])).toThrow(InvalidOperand);
    expect(() => Reflect.apply(V.neg, V, ['x'])).toThrow(AutogradError);
    expect(() => Reflect.apply(V.div, V, [1, true])).toThrow("Can't div a Value with an operand of type boolean");
    expect(() => Reflect.apply(V.pow, V, [2, new Value(3)])).toThrow(InvalidExponent);
  });
});
