#!/usr/bin/env node
/**
 * scalar-autograd - evaluate an expression and print its gradients.
 *
 * Built with Yargs + Zod: yargs declares the commands, zod validates what they receive.
 */

import { writeFileSync } from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { exitCodeFor } from './cli-error';
import { evalArgsSchema, formatOps, formatReport, runEval } from './run';

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120;

yargs(hideBin(process.argv))
  .scriptName('scalar-autograd')
  .usage('$0 <command> [options]')
  .strict()
  .demandCommand(1, 'Specify a command.')
  .command(
    'eval <expression>',
    'Evaluate an expression, backpropagate, and print d(output)/d(name) for each binding.',
    cmd => cmd
      .positional('expression', { type: 'string', demandOption: true, describe: 'Expression, e.g. "z = x*y; z + x".' })
      .option('at', { type: 'string', array: true, describe: 'Bindings as name=value (repeat or comma-separate).' })
      .option('check', { type: 'boolean', default: false, describe: 'Compare gradients with finite differences.' })
      .option('dot', { type: 'string', describe: 'Write the computation graph as Graphviz DOT to this file.' })
      .option('json', { type: 'boolean', default: false, describe: 'Emit machine-readable JSON.' }),
    argv => {
      const options = evalArgsSchema.parse(argv);
      const report = runEval(options);

      if (options.dot !== undefined && report.dot !== undefined) {
        writeFileSync(options.dot, `${report.dot}\n`);
      }
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of formatReport(report)) {
        console.log(line);
      }
      if (options.dot !== undefined) {
        console.log(`[dot] wrote ${options.dot}`);
      }
      if (report.check && !report.check.passed) {
        process.exitCode = 3;
      }
    }
  )
  .command(
    'ops',
    'List the supported operations with their symbols and arity.',
    cmd => cmd,
    () => {
      for (const line of formatOps()) {
        console.log(line);
      }
    }
  )
  .fail((msg, err, instance) => {
    if (err) {
      console.error(`${err.name}: ${err.message}`);
      process.exit(exitCodeFor(err));
    }
    if (msg) {
      console.error(msg);
    }
    instance.showHelp();
    process.exit(1);
  })
  .help()
  .wrap(Math.min(terminalWidth, 120))
  .parse();
