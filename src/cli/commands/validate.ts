/**
 * `agentlayer validate` — load the constitution and report its rules and warnings.
 */

import { Command } from 'commander';
import { loadRules } from '../../constitution/rule-store.js';
import { formatRule, formatWarning } from '../format.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

type ValidateOptions = {
  json?: boolean;
}

export function createValidateCommand(): Command {
  const cmd = new Command('validate');

  cmd
    .description('Validate the constitution file')
    .option('--json', 'Output as JSON')
    .action((_options: ValidateOptions, command: Command) => {
      process.exitCode = executeValidate(command.optsWithGlobals<GlobalOptions & ValidateOptions>());
    });

  return cmd;
}

export function executeValidate(options: GlobalOptions & ValidateOptions, deps: CommandDeps = {}): number {
  const { config } = loadCommandContext(options, {}, deps);
  const loaded = loadRules(config.constitution.path);

  if (options.json) {
    console.log(JSON.stringify(loaded, null, 2));
    return loaded.exists ? 0 : 1;
  }

  if (!loaded.exists) {
    console.log(`❌ ${config.constitution.path} not found. Run 'agentlayer init' first.`);
    return 1;
  }

  console.log(`Constitution: ${loaded.source}`);
  if (loaded.rules.length === 0) {
    console.log('No rules defined; every run will score 100.');
  }
  for (const rule of loaded.rules) {
    console.log(formatRule(rule));
  }
  for (const warning of loaded.warnings) {
    console.log(formatWarning(warning));
  }

  const active = loaded.rules.filter((rule) => rule.kind === 'keyword' || rule.kind === 'role').length;
  console.log(`✅ ${loaded.rules.length} rules loaded, ${active} active, ${loaded.warnings.length} warnings`);
  return 0;
}
