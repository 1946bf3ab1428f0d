/**
 * `agentlayer check <input>` — evaluate text against the constitution without generating.
 */

import { Command } from 'commander';
import { RuleStore } from '../../constitution/rule-store.js';
import { evaluate, isPassing } from '../../constitution/evaluator.js';
import { formatEvaluation, formatWarning } from '../format.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

type CheckOptions = {
  output?: string;
  role?: string;
  json?: boolean;
}

export function createCheckCommand(): Command {
  const cmd = new Command('check');

  cmd
    .description('Check input and output text against the constitution')
    .argument('<input>', 'Input text to check')
    .option('-o, --output <text>', 'Output text to check', '')
    .option('-r, --role <role>', 'Role of the caller')
    .option('--json', 'Output as JSON')
    .action((input: string, _options: CheckOptions, command: Command) => {
      process.exitCode = executeCheck(input, command.optsWithGlobals<GlobalOptions & CheckOptions>());
    });

  return cmd;
}

/** Exit code 1 when the score does not pass the configured threshold */
export function executeCheck(input: string, options: GlobalOptions & CheckOptions, deps: CommandDeps = {}): number {
  const { config, logger } = loadCommandContext(options, {}, deps);
  const store = new RuleStore(config.constitution.path, { logger });
  const role = options.role ?? config.defaults.role;
  const output = options.output ?? '';

  const constitution = store.load();
  const result = evaluate(input, output, role, constitution.rules);
  const passed = isPassing(result.score, config.report.passThreshold);

  if (options.json) {
    console.log(JSON.stringify({ ...result, role, passed }, null, 2));
  } else {
    for (const warning of constitution.warnings) {
      console.log(formatWarning(warning));
    }
    for (const line of formatEvaluation(result, config.report.passThreshold)) {
      console.log(line);
    }
  }
  return passed ? 0 : 1;
}
