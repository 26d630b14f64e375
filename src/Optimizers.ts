import type { Module } from './NeuralNet';
import { Value } from './Value';

/**
 * Optional arguments for SGD.
 * @property learningRate: Step size for parameter updates (default 1e-2).
 */
export interface OptimizerOptions {
  learningRate?: number;
}

/**
 * Plain gradient descent over a module's parameters.
 * @public
 */
export class SGD {
  private module: Module;
  public learningRate: number;

  constructor(module: Module, opts: OptimizerOptions = {}) {
    this.module = module;
    this.learningRate = opts.learningRate ?? 1e-2;
  }

  /**
   * Replaces every parameter p with a fresh leaf holding p - lr * grad.
   * The new leaves start with zero gradient.
   */
  step(): void {
    const lr = this.learningRate;
    this.module.updateParameters(p => new Value(p.data - lr * p.grad, p.label));
  }

  /**
   * Sets grads of all trainables to zero.
   */
  zeroGrad(): void {
    this.module.zeroGrad();
  }
}
