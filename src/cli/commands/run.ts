/**
 * `agentlayer run "prompt"` — generate, check and record one execution.
 */

import { Command } from 'commander';
import { isPassing } from '../../constitution/evaluator.js';
import { runPipeline } from '../../pipeline/pipeline.js';
import { createRuntime } from '../../pipeline/runtime.js';
import type { TextGenerator } from '../../providers/generator.js';
import { Timer, formatDuration } from '../../utils/timer.js';
import { SEPARATOR, formatRecord, formatWarning } from '../format.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

type RunOptions = {
  role?: string;
  model?: string;
  json?: boolean;
}

export interface RunDeps extends CommandDeps {
  /** Replaces the configured provider */
  generator?: TextGenerator;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Generate a response and check it against the constitution')
    .argument('<input>', 'Prompt to send to the model')
    .option('-r, --role <role>', 'Role of the caller')
    .option('-m, --model <model>', 'Override the configured model')
    .option('--json', 'Output the execution record as JSON')
    .action(async (input: string, _options: RunOptions, command: Command) => {
      process.exitCode = await executeRun(input, command.optsWithGlobals<GlobalOptions & RunOptions>());
    });

  return cmd;
}

/** Exit code 1 when the score does not pass the configured threshold */
export async function executeRun(input: string, options: GlobalOptions & RunOptions, deps: RunDeps = {}): Promise<number> {
  const { config, logger } = loadCommandContext(options, { provider: { model: options.model } }, deps);
  const runtime = createRuntime(config, logger);
  const context = deps.generator ? { ...runtime, generator: deps.generator } : runtime;

  if (!options.json) {
    console.log(`Running with role ${options.role ?? config.defaults.role}...`);
  }

  const timer = new Timer();
  const result = await runPipeline({ input, role: options.role, model: options.model }, context);
  const passed = isPassing(result.record.score, config.report.passThreshold);

  if (options.json) {
    console.log(JSON.stringify(result.record, null, 2));
    return passed ? 0 : 1;
  }

  for (const warning of result.warnings) {
    console.log(formatWarning(warning));
  }
  console.log(SEPARATOR);
  for (const line of formatRecord(result.record, config.report.passThreshold)) {
    console.log(line);
  }
  console.log(`Time: ${formatDuration(timer.elapsed)}`);
  return passed ? 0 : 1;
}
