import { makeCircles } from '../Datasets';
import { debugLog } from '../log';
import { Losses } from '../Losses';
import { MLP } from '../NeuralNet';
import { SGD } from '../Optimizers';
import { mulberry32 } from '../Random';
import type { Value } from '../Value';
import type { TrainOptions } from './options';

export interface EpochStats {
  epoch: number;
  loss: number;
  accuracy: number;
}

export interface TrainResult {
  model: MLP;
  history: EpochStats[];
  /** Loss graph of the last epoch, gradients filled in. */
  finalLoss: Value;
}

/**
 * Fits an MLP to the synthetic circles dataset with hinge loss, an L2
 * penalty and SGD on a linearly decaying learning rate.
 */
export function train(opts: Omit<TrainOptions, 'dot' | 'verbose'>): TrainResult {
  const random = mulberry32(opts.seed);
  const data = makeCircles(opts.samples, random);
  const labels = data.map(p => p.y);
  const model = new MLP(2, [...opts.hidden, 1], { random });
  const optimizer = new SGD(model, { learningRate: opts.learningRate });

  const history: EpochStats[] = [];
  let finalLoss: Value | undefined;

  for (let epoch = 0; epoch < opts.epochs; epoch++) {
    const scores = data.map(p => model.forward(p.x)[0]);
    const loss = Losses.hinge(scores, labels).add(Losses.l2(model.parameters(), opts.alpha));
    const accuracy = Losses.accuracy(scores, labels);

    optimizer.zeroGrad();
    loss.backward();
    optimizer.learningRate = opts.learningRate * (1 - (0.9 * epoch) / opts.epochs);
    optimizer.step();

    history.push({ epoch, loss: loss.data, accuracy });
    debugLog(`epoch ${epoch} loss ${loss.data.toFixed(4)} accuracy ${(accuracy * 100).toFixed(1)}%`);
    finalLoss = loss;
  }

  if (finalLoss === undefined) {
    throw new RangeError('train needs at least one epoch');
  }
  return { model, history, finalLoss };
}
