import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { setVerbose } from './context.js';
import { registerPrCommands } from './commands/pr.js';
import { setLogLevel } from '../utils/logger.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pullcraft')
    .description('Open GitHub pull requests from the current branch')
    .version('0.1.0')
    .option('--json', 'output in JSON format')
    .option('--verbose', 'log git and API calls')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.json) {
        setJsonOutput(true);
      }
      if (opts.verbose) {
        setVerbose(true);
        setLogLevel('debug');
      }
    });

  registerPrCommands(program);

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
