import { type RandomSource, uniform } from './Random';
import { type Operand, Value } from './Value';

/**
 * Options shared by Neuron, Layer and MLP.
 * @property nonlin: Apply ReLU to the neuron output (default true).
 * @property random: Source for weight initialisation (default Math.random).
 */
export interface NeuronOptions {
  nonlin?: boolean;
  random?: RandomSource;
}

/**
 * Base class for everything that owns trainable leaves.
 * @public
 */
export abstract class Module {
  /**
   * Trainable leaves, in a stable order.
   */
  abstract parameters(): Value[];

  /**
   * Replaces every parameter leaf with `update(leaf)`. Values are immutable,
   * so training steps swap leaves rather than writing to `data`.
   */
  abstract updateParameters(update: (param: Value) => Value): void;

  /**
   * Sets grads of all parameters to zero.
   */
  zeroGrad(): void {
    Value.zeroGrad(this.parameters());
  }
}

/**
 * A single neuron: weighted sum of its inputs plus a bias, optionally through ReLU.
 * @public
 */
export class Neuron extends Module {
  private weights: Value[];
  private bias: Value;
  readonly nonlin: boolean;

  constructor(nin: number, opts: NeuronOptions = {}) {
    super();
    const random = opts.random ?? Math.random;
    this.weights = Array.from({ length: nin }, () => new Value(uniform(random, -1, 1)));
    this.bias = new Value(0);
    this.nonlin = opts.nonlin ?? true;
  }

  get nin(): number {
    return this.weights.length;
  }

  forward(x: readonly Operand[]): Value {
    if (x.length !== this.weights.length) {
      throw new RangeError(`Neuron expects ${this.weights.length} inputs, got ${x.length}`);
    }
    let act = this.bias;
    for (let i = 0; i < x.length; i++) {
      act = act.add(this.weights[i].mul(x[i]));
    }
    return this.nonlin ? act.relu() : act;
  }

  parameters(): Value[] {
    return [...this.weights, this.bias];
  }

  updateParameters(update: (param: Value) => Value): void {
    this.weights = this.weights.map(update);
    this.bias = update(this.bias);
  }

  toString(): string {
    return `${this.nonlin ? 'ReLU' : 'Linear'} Neuron(${this.weights.length})`;
  }
}

/**
 * A layer of independent neurons fed the same inputs.
 * @public
 */
export class Layer extends Module {
  readonly neurons: Neuron[];

  constructor(nin: number, nout: number, opts: NeuronOptions = {}) {
    super();
    this.neurons = Array.from({ length: nout }, () => new Neuron(nin, opts));
  }

  forward(x: readonly Operand[]): Value[] {
    return this.neurons.map(n => n.forward(x));
  }

  parameters(): Value[] {
    return this.neurons.flatMap(n => n.parameters());
  }

  updateParameters(update: (param: Value) => Value): void {
    for (const n of this.neurons) n.updateParameters(update);
  }

  toString(): string {
    return `Layer of [${this.neurons.join(', ')}]`;
  }
}

/**
 * Multi-layer perceptron. Every layer but the last applies ReLU.
 * @public
 */
export class MLP extends Module {
  readonly layers: Layer[];

  /**
   * @param nin Input width
   * @param nouts Width of each layer, the last one being the output width
   * @param opts `random` is honoured; `nonlin` is decided per layer
   */
  constructor(nin: number, nouts: readonly number[], opts: Pick<NeuronOptions, 'random'> = {}) {
    super();
    const sizes = [nin, ...nouts];
    this.layers = nouts.map((_, i) =>
      new Layer(sizes[i], sizes[i + 1], { random: opts.random, nonlin: i !== nouts.length - 1 })
    );
  }

  forward(x: readonly Operand[]): Value[] {
    let out: readonly Operand[] = x;
    for (const layer of this.layers) {
      out = layer.forward(out);
    }
    return out.map(v => Value.from(v, 'forward'));
  }

  parameters(): Value[] {
    return this.layers.flatMap(l => l.parameters());
  }

  updateParameters(update: (param: Value) => Value): void {
    for (const l of this.layers) l.updateParameters(update);
  }

  toString(): string {
    return `MLP of [${this.layers.join(', ')}]`;
  }
}
