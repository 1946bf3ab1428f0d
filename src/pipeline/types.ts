import type { Logger } from '../core/logger.js';
import type { RuleSource } from '../constitution/rule-store.js';
import type { RuleWarning, Violation } from '../constitution/types.js';
import type { HistorySink, ExecutionRecord } from '../history/types.js';
import type { TextGenerator } from '../providers/generator.js';

export interface PipelineRequest {
  input: string;
  /** Defaults to `context.defaultRole` */
  role?: string;
  /** Defaults to `context.defaultModel` */
  model?: string;
}

export interface PipelineContext {
  generator: TextGenerator;
  rules: RuleSource;
  history: HistorySink;
  logger: Logger;
  clock?: () => Date;
  newId?: () => string;
  defaultRole: string;
  defaultModel?: string;
}

// ─── Stage outputs ───────────────────────────────────────────────

export interface GeneratedRun {
  readonly id: string;
  readonly timestamp: string;
  readonly input: string;
  readonly role: string;
  readonly output: string;
  readonly model: string;
}

export interface CheckedRun extends GeneratedRun {
  readonly violations: readonly Violation[];
  readonly score: number;
  readonly warnings: readonly RuleWarning[];
}

export interface PipelineResult {
  readonly record: Readonly<ExecutionRecord>;
  readonly warnings: readonly RuleWarning[];
  /** Milliseconds per stage */
  readonly timings: Readonly<Record<string, number>>;
}
