import { type RandomSource, uniform } from './Random';

export interface LabelledPoint {
  x: [number, number];
  /** +1 or -1 */
  y: number;
}

/**
 * Points drawn uniformly from [-1, 1]^2, labelled +1 inside the circle of
 * radius sqrt(0.5) and -1 outside.
 */
export function makeCircles(n: number, random: RandomSource): LabelledPoint[] {
  return Array.from({ length: n }, (): LabelledPoint => {
    const a = uniform(random, -1, 1);
    const b = uniform(random, -1, 1);
    return { x: [a, b], y: a * a + b * b < 0.5 ? 1 : -1 };
  });
}
