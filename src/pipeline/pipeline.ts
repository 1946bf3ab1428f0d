/**
 * Execution Pipeline — GENERATE → CHECK → RECORD
 *
 * Each stage takes the previous stage's readonly output and returns a new
 * object. Collaborators arrive through the context; nothing is global.
 */

import { randomUUID } from 'crypto';
import { InvalidRequestError } from '../core/errors.js';
import { evaluate } from '../constitution/evaluator.js';
import type { ExecutionRecord } from '../history/types.js';
import { Timer } from '../utils/timer.js';
import type { CheckedRun, GeneratedRun, PipelineContext, PipelineRequest, PipelineResult } from './types.js';

export async function runPipeline(request: PipelineRequest, context: PipelineContext): Promise<PipelineResult> {
  if (request.input.trim() === '') {
    throw new InvalidRequestError('Input must not be empty');
  }

  const timer = new Timer();
  const generated = await generateStage(request, context);
  timer.lap('generate');
  const checked = checkStage(generated, context);
  timer.lap('check');
  const record = await recordStage(checked, context);
  timer.lap('record');

  const timings = timer.getLaps();
  context.logger.info(
    { id: record.id, role: record.role, model: record.model, score: record.score, violations: record.violations.length, timings },
    'Pipeline run complete',
  );

  return { record, warnings: checked.warnings, timings };
}

// ═══════════════════════════════════════════════════════════════
// STAGES
// ═══════════════════════════════════════════════════════════════

export async function generateStage(request: PipelineRequest, context: PipelineContext): Promise<GeneratedRun> {
  const clock = context.clock ?? (() => new Date());
  const newId = context.newId ?? randomUUID;
  const role = request.role ?? context.defaultRole;
  const requestedModel = request.model ?? context.defaultModel;

  context.logger.debug({ role, model: requestedModel }, 'Generating output');
  const generation = await context.generator.generate({ prompt: request.input, model: requestedModel });

  return {
    id: newId(),
    timestamp: clock().toISOString(),
    input: request.input,
    role,
    output: generation.text,
    model: generation.model,
  };
}

export function checkStage(run: GeneratedRun, context: PipelineContext): CheckedRun {
  const loaded = context.rules.load();
  const result = evaluate(run.input, run.output, run.role, loaded.rules);

  context.logger.debug(
    { id: run.id, rules: loaded.rules.length, violations: result.violations.length, score: result.score },
    'Output checked',
  );

  return {
    ...run,
    violations: result.violations,
    score: result.score,
    warnings: loaded.warnings,
  };
}

export async function recordStage(run: CheckedRun, context: PipelineContext): Promise<Readonly<ExecutionRecord>> {
  const record: ExecutionRecord = {
    id: run.id,
    timestamp: run.timestamp,
    input: run.input,
    output: run.output,
    role: run.role,
    model: run.model,
    violations: run.violations,
    score: run.score,
  };
  await context.history.append(record);
  return record;
}
