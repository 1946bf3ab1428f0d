/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createInitCommand } from './commands/init.js';
import { createValidateCommand } from './commands/validate.js';
import { createCheckCommand } from './commands/check.js';
import { createRunCommand } from './commands/run.js';
import { createTraceCommand } from './commands/trace.js';
import { createScoreCommand } from './commands/score.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('AgentLayer — check model output against a constitution of rules')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Pretty-print logs to the console');

  program.addCommand(createInitCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createTraceCommand());
  program.addCommand(createScoreCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\n❌ ${String(error)}\n`);
    }
    process.exit(1);
  }
}
