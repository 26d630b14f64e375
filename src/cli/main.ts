#!/usr/bin/env node
/**
 * autograd-train - fits a small MLP to a synthetic two-class dataset and
 * reports the final loss. Optionally dumps the last loss graph as DOT.
 */

import * as fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { toDot } from '../GraphDot';
import { setVerbose } from '../log';
import { CliError } from './cli-error';
import { parseTrainOptions } from './options';
import { train } from './train';

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120;

yargs(hideBin(process.argv))
  .scriptName('autograd-train')
  .usage('$0 [options]')
  .strict()
  .command(
    '$0',
    'Train an MLP on points inside/outside a circle.',
    cmd => cmd
      .option('epochs', { type: 'number', default: 50, describe: 'Number of full-batch steps.' })
      .option('samples', { type: 'number', default: 60, describe: 'Dataset size.' })
      .option('hidden', { type: 'string', default: '8,8', describe: 'Hidden layer widths, comma separated.' })
      .option('learning-rate', { type: 'number', default: 0.05, describe: 'Initial SGD step size.' })
      .option('alpha', { type: 'number', default: 1e-4, describe: 'L2 penalty weight.' })
      .option('seed', { type: 'number', default: 1337, describe: 'Seed for data and weights.' })
      .option('dot', { type: 'string', describe: 'Write the final loss graph as Graphviz DOT to this file.' })
      .option('verbose', { type: 'boolean', default: false, describe: 'Log every epoch.' }),
    argv => {
      const options = parseTrainOptions(argv);
      setVerbose(options.verbose);
      const { history, finalLoss, model } = train(options);
      const last = history[history.length - 1];
      console.log(`${model}`);
      console.log(`parameters: ${model.parameters().length}`);
      console.log(`final loss ${last.loss.toFixed(4)} accuracy ${(last.accuracy * 100).toFixed(1)}%`);
      if (options.dot) {
        fs.writeFileSync(options.dot, toDot(finalLoss));
        console.log(`graph written to ${options.dot}`);
      }
    }
  )
  .fail((msg, err, instance) => {
    if (err instanceof CliError) {
      console.error(err.message);
      process.exit(err.exitCode);
    }
    if (msg) {
      console.error(msg);
    }
    if (err) {
      console.error(err.message);
    }
    instance.showHelp();
    process.exit(1);
  })
  .help()
  .wrap(Math.min(terminalWidth, 120))
  .parseSync();
