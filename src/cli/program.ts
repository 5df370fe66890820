import { Command } from 'commander';
import type { TransformCommandOptions } from './commands/index.js';
import { VERSION } from '../version.js';

export type RunTransform = (options: TransformCommandOptions) => Promise<void>;

/**
 * Argument surface of `b64url`. The caller supplies what runs once the
 * arguments are parsed; usage errors never reach it.
 */
export function createProgram(run: RunTransform): Command {
  return new Command()
    .name('b64url')
    .description('Base64url encode or decode FILE, or standard input, to standard output')
    .version(VERSION)
    .option('-d, --decode', 'Decode data')
    .argument('[file]', 'With no FILE, or when FILE is -, read standard input')
    .allowExcessArguments(false)
    .action(async (file: string | undefined, options: { decode?: boolean }) => {
      await run({ decode: options.decode === true, file });
    });
}
