/**
 * `agentlayer init` — scaffold a constitution, an empty history and a project config.
 * Existing files are never overwritten.
 */

import { Command } from 'commander';
import { join, relative } from 'path';
import { PROJECT_CONFIG_FILE } from '../../core/config.js';
import { writeFileIfMissing } from '../../utils/fs.js';
import { loadCommandContext, type CommandDeps, type GlobalOptions } from '../context.js';

export const STARTER_CONSTITUTION = {
  rules: [
    { id: 'R1', type: 'keyword', keywords: ['sudo', 'rm -rf'], severity: 'high' },
    { id: 'R2', type: 'role', allowed_roles: ['developer', 'analyst'], severity: 'medium' },
  ],
};

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Scaffold a constitution, history file and project configuration')
    .action((_options: Record<string, never>, command: Command) => {
      process.exitCode = executeInit(command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

export function executeInit(globals: GlobalOptions, deps: CommandDeps = {}): number {
  const { projectDir, configManager, config } = loadCommandContext(globals, {}, deps);

  console.log('Initializing AgentLayer project...');

  const created: string[] = [];
  const skipped: string[] = [];
  const track = (path: string, wasCreated: boolean) => {
    (wasCreated ? created : skipped).push(relative(projectDir, path) || path);
  };

  track(
    config.constitution.path,
    writeFileIfMissing(config.constitution.path, JSON.stringify(STARTER_CONSTITUTION, null, 2) + '\n'),
  );
  track(config.history.path, writeFileIfMissing(config.history.path, '[]\n'));
  track(join(projectDir, PROJECT_CONFIG_FILE), configManager.createDefaultConfig());

  for (const path of created) console.log(`  Created: ${path}`);
  for (const path of skipped) console.log(`  Exists:  ${path}`);

  console.log('✅ AgentLayer project initialized.');
  console.log('Set TOGETHER_API_KEY (or the key of your configured provider) before `agentlayer run`.');
  return 0;
}
