import { z } from 'zod';
import { CliError } from './cli-error';

const layerSizes = z
  .string()
  .regex(/^\d+(,\d+)*$/, '--hidden must be a comma-separated list of layer widths')
  .transform(s => s.split(',').map(Number))
  .refine(sizes => sizes.every(n => n > 0), '--hidden widths must be positive');

export const trainSchema = z.object({
  epochs: z.coerce.number().int().min(1, '--epochs must be at least 1').default(50),
  samples: z.coerce.number().int().min(4, '--samples must be at least 4').default(60),
  hidden: layerSizes.default('8,8'),
  learningRate: z.coerce.number().positive('--learning-rate must be positive').default(0.05),
  alpha: z.coerce.number().min(0, '--alpha must not be negative').default(1e-4),
  seed: z.coerce.number().int().default(1337),
  dot: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type TrainOptions = z.infer<typeof trainSchema>;

/**
 * Validates raw CLI arguments; unknown keys (yargs aliases, `$0`, `_`) are dropped.
 */
export function parseTrainOptions(argv: unknown): TrainOptions {
  const parsed = trainSchema.safeParse(argv);
  if (!parsed.success) {
    throw new CliError(parsed.error.issues.map(issue => issue.message).join('\n'), 2);
  }
  return parsed.data;
}
