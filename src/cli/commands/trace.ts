/**
 * `agentlayer trace <id>` — show one recorded execution.
 */

import { Command } from 'commander';
import { JsonHistoryStore } from '../../history/json-store.js';
import { formatRecord } from '../format.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

type TraceOptions = {
  json?: boolean;
}

export function createTraceCommand(): Command {
  const cmd = new Command('trace');

  cmd
    .description('Show a recorded execution by id')
    .argument('<id>', 'Execution id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, _options: TraceOptions, command: Command) => {
      process.exitCode = await executeTrace(id, command.optsWithGlobals<GlobalOptions & TraceOptions>());
    });

  return cmd;
}

export async function executeTrace(id: string, options: GlobalOptions & TraceOptions, deps: CommandDeps = {}): Promise<number> {
  const { config, logger } = loadCommandContext(options, {}, deps);
  const history = new JsonHistoryStore(config.history.path, { logger });

  const record = await history.find(id);
  if (!record) {
    console.log(`❌ No execution with id ${id}`);
    return 1;
  }

  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
  } else {
    for (const line of formatRecord(record, config.report.passThreshold)) {
      console.log(line);
    }
  }
  return 0;
}
