/**
 * `agentlayer score` — aggregate scores and violations across the history.
 */

import { Command } from 'commander';
import { JsonHistoryStore } from '../../history/json-store.js';
import { formatSummary } from '../format.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

type ScoreOptions = {
  json?: boolean;
}

export function createScoreCommand(): Command {
  const cmd = new Command('score');

  cmd
    .description('Summarize recorded scores and violations')
    .option('--json', 'Output as JSON')
    .action(async (_options: ScoreOptions, command: Command) => {
      process.exitCode = await executeScore(command.optsWithGlobals<GlobalOptions & ScoreOptions>());
    });

  return cmd;
}

export async function executeScore(options: GlobalOptions & ScoreOptions, deps: CommandDeps = {}): Promise<number> {
  const { config, logger } = loadCommandContext(options, {}, deps);
  const history = new JsonHistoryStore(config.history.path, { logger });
  const summary = await history.summarize();

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }
  for (const line of formatSummary(summary, config.report.passThreshold)) {
    console.log(line);
  }
  return 0;
}
