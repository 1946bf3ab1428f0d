/**
 * Console formatting for CLI output. Pure: every function returns lines.
 */

import { isPassing } from '../constitution/evaluator.js';
import type { EvaluationResult, Rule, RuleWarning, Violation } from '../constitution/types.js';
import type { ExecutionRecord, ScoreSummary } from '../history/types.js';

export const SEPARATOR = '─'.repeat(60);

export function passMark(score: number, threshold: number): string {
  return isPassing(score, threshold) ? '✅' : '❌';
}

export function formatViolation(violation: Violation): string {
  return `  - ${violation.ruleId} [${violation.kind}] '${violation.trigger}' in ${violation.field} (severity: ${violation.declaredSeverity ?? violation.severity})`;
}

export function formatEvaluation(result: Pick<EvaluationResult, 'violations' | 'score'>, threshold: number): string[] {
  const lines: string[] = [];
  if (result.violations.length === 0) {
    lines.push('Violations: None');
  } else {
    lines.push(`Violations Detected (${result.violations.length}):`);
    for (const violation of result.violations) {
      lines.push(formatViolation(violation));
    }
  }
  lines.push(`Score: ${result.score} / 100 ${passMark(result.score, threshold)}`);
  return lines;
}

export function formatRecord(record: ExecutionRecord, threshold: number): string[] {
  return [
    `ID: ${record.id}`,
    `Timestamp: ${record.timestamp}`,
    `Role: ${record.role}`,
    `Model: ${record.model}`,
    `Input: ${record.input}`,
    `Output: ${record.output}`,
    ...formatEvaluation(record, threshold),
  ];
}

export function formatRule(rule: Rule): string {
  switch (rule.kind) {
    case 'keyword':
      return `  ${rule.id} keyword [${severityLabel(rule)}]: ${rule.keywords.join(', ')}`;
    case 'role':
      return `  ${rule.id} role [${severityLabel(rule)}]: allowed ${rule.allowedRoles.join(', ')}`;
    case 'noop':
      return `  ${rule.id} inactive [${severityLabel(rule)}]: ${rule.reason}`;
    case 'unknown':
      return `  ${rule.id} ignored [${severityLabel(rule)}]: unknown type "${rule.declaredKind ?? ''}"`;
  }
}

/** The operator's own spelling when the severity was not recognized */
function severityLabel(rule: Rule): string {
  return rule.declaredSeverity ?? rule.severity;
}

export function formatWarning(warning: RuleWarning): string {
  return `⚠️  ${warning.message}`;
}

/** Rule ids ordered by violation count, highest first, then by id */
export function formatSummary(summary: ScoreSummary, threshold: number): string[] {
  const lines = [
    `Total runs: ${summary.totalRuns}`,
    `Average score: ${summary.averageScore} / 100 ${passMark(summary.averageScore, threshold)}`,
  ];

  const entries = Object.entries(summary.violationSummary).sort(
    ([idA, countA], [idB, countB]) => countB - countA || idA.localeCompare(idB),
  );
  if (entries.length === 0) {
    lines.push('Violations by rule: none');
    return lines;
  }
  lines.push('Violations by rule:');
  for (const [ruleId, count] of entries) {
    lines.push(`  ${ruleId}: ${count}`);
  }
  return lines;
}
