#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { init } from './init.js';
import { mask } from './mask.js';
import type { IntegerWidth } from '../interfaces/index.js';

const fail = (error: unknown): never => {
  console.error('✗', error instanceof Error ? error.message : error);
  process.exit(1);
};

const toIntegerWidth = (value?: number): IntegerWidth | undefined => {
  if (value === undefined || value === 32 || value === 64) {
    return value;
  }
  throw new TypeError('`--integer-width` must be 32 or 64');
};

/**
 * Main CLI entry point using yargs for command parsing and routing.
 */
void yargs(hideBin(process.argv))
  .scriptName('permission-store')
  .command(
    'init',
    'Write a permission store config file holding the defaults',
    (yargs) => {
      return yargs
        .options({
          directory: {
            demandOption: false,
            alias: 'd',
            type: 'string',
            default: process.cwd(),
            defaultDescription: 'current directory',
            description: 'Directory to write the config file into',
            nargs: 1,
          },
          force: {
            demandOption: false,
            alias: 'f',
            type: 'boolean',
            default: false,
            description: 'Overwrite an existing config file',
          },
        })
        .example(
          '$0 init --force',
          'Resets the config file in the current directory'
        );
    },
    async (argv) => {
      try {
        const path = await init(argv);
        console.log(`✓ Wrote ${path}`);
        process.exit(0);
      } catch (error) {
        fail(error);
      }
    }
  )
  .command(
    'mask <flags..>',
    'Print the bitmask produced by setting the given flags',
    (yargs) => {
      return yargs
        .positional('flags', {
          type: 'string',
          array: true,
          demandOption: true,
          description: 'Flag identifiers (numeric)',
        })
        .options({
          'flag-space': {
            alias: 's',
            type: 'string',
            description: 'Number of addressable flag slots, overrides config',
            nargs: 1,
          },
          'integer-width': {
            alias: 'w',
            type: 'number',
            choices: [32, 64] as const,
            description: 'Mask width in bits, overrides config',
            nargs: 1,
          },
          config: {
            demandOption: false,
            alias: 'c',
            type: 'string',
            description: 'Point to custom/own config file',
            nargs: 1,
          },
        })
        .example(
          '$0 mask 1 2 7 --flag-space=10',
          'Prints the mask with bits 1, 2 and 7 set'
        );
    },
    async (argv) => {
      try {
        const lines = await mask({
          flags: argv.flags,
          flagSpace: argv.flagSpace,
          integerWidth: toIntegerWidth(argv.integerWidth),
          config: argv.config,
        });
        lines.forEach((line) => console.log(line));
        process.exit(0);
      } catch (error) {
        fail(error);
      }
    }
  )
  .usage('Usage: $0 <command> [options]')
  .demandCommand(1, 'Expected a command, e.g. `mask`')
  .strict()
  .help()
  .alias('help', 'h')
  .version()
  .alias('version', 'v')
  .parse();
