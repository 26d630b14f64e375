import { type Operand, Value } from './Value';

/**
 * Throws an error if outputs and targets length do not match.
 */
function checkLengthMatch(outputs: readonly unknown[], targets: readonly unknown[]): void {
  if (outputs.length !== targets.length) {
    throw new Error('Outputs and targets must have the same length');
  }
}

/**
 * Collection of loss functions built from the core operations.
 * All methods except `accuracy` return a scalar Value to call backward() on.
 * @public
 */
export class Losses {
  /**
   * Computes mean squared error (MSE) loss between outputs and targets.
   * @param outputs Predictions
   * @param targets Targets, as Values or plain numbers
   * @returns Mean squared error as a Value.
   */
  public static mse(outputs: readonly Value[], targets: readonly Operand[]): Value {
    checkLengthMatch(outputs, targets);
    if (!outputs.length) return new Value(0);
    const diffs = outputs.map((out, i) => out.sub(targets[i]).pow(2));
    return Value.sum(diffs).div(outputs.length);
  }

  /**
   * Max-margin loss: mean of relu(1 - y * score), labels being +1 or -1.
   * @param scores Raw model outputs
   * @param labels Class labels, +1 or -1
   */
  public static hinge(scores: readonly Value[], labels: readonly number[]): Value {
    checkLengthMatch(scores, labels);
    if (!scores.length) return new Value(0);
    const margins = scores.map((s, i) => s.mul(-labels[i]).add(1).relu());
    return Value.sum(margins).mul(1 / scores.length);
  }

  /**
   * L2 penalty alpha * sum(p^2).
   */
  public static l2(params: readonly Value[], alpha: number): Value {
    return Value.sum(params.map(p => p.pow(2))).mul(alpha);
  }

  /**
   * Fraction of scores whose sign agrees with the label. Not differentiable,
   * so a plain number.
   */
  public static accuracy(scores: readonly Value[], labels: readonly number[]): number {
    checkLengthMatch(scores, labels);
    if (!scores.length) return 0;
    let hits = 0;
    for (let i = 0; i < scores.length; i++) {
      if ((scores[i].data > 0) === (labels[i] > 0)) hits++;
    }
    return hits / scores.length;
  }
}
