import { MAX_SCORE } from '../constitution/evaluator.js';
import type { ExecutionRecord, ScoreSummary } from './types.js';

export function summarizeRecords(records: readonly ExecutionRecord[]): ScoreSummary {
  if (records.length === 0) {
    return { totalRuns: 0, averageScore: MAX_SCORE, violationSummary: {} };
  }

  let total = 0;
  const counts = new Map<string, number>();
  for (const record of records) {
    total += record.score;
    for (const violation of record.violations) {
      counts.set(violation.ruleId, (counts.get(violation.ruleId) ?? 0) + 1);
    }
  }

  return {
    totalRuns: records.length,
    averageScore: Math.round((total / records.length) * 100) / 100,
    violationSummary: Object.fromEntries(counts),
  };
}
