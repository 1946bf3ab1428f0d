import pino, { type Logger, type LevelWithSilent } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Pretty-print to stdout instead of writing JSON lines to the log file */
  verbose?: boolean;
  /** Directory holding `agentlayer.log`; defaults to `<cwd>/.agentlayer/logs` */
  logDir?: string;
}

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(name: string = 'agentlayer', options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  const logDir = options.logDir ?? join(process.cwd(), '.agentlayer', 'logs');
  ensureLogDir(logDir);

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(logDir, 'agentlayer.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
