import { describe, it, expect } from 'vitest';
import { summarizeRecords } from '../../../src/history/summary.js';
import { makeRecord, makeViolation } from '../../helpers/records.js';

describe('summarizeRecords', () => {
  it('should report a perfect average for an empty history', () => {
    expect(summarizeRecords([])).toEqual({ totalRuns: 0, averageScore: 100, violationSummary: {} });
  });

  it('should average scores to two decimals and count violations per rule', () => {
    const records = [
      makeRecord({ id: 'a', score: 90 }),
      makeRecord({
        id: 'b',
        score: 60,
        violations: [
          makeViolation(),
          makeViolation({ ruleId: 'R2', kind: 'role', trigger: 'guest', severity: 'medium', field: 'role' }),
          makeViolation({ ruleId: 'R3', trigger: 'badword', field: 'output' }),
          makeViolation({ ruleId: 'R3', trigger: 'badword', field: 'input' }),
        ],
      }),
      makeRecord({ id: 'c', score: 100, violations: [] }),
    ];

    expect(summarizeRecords(records)).toEqual({
      totalRuns: 3,
      averageScore: 83.33,
      violationSummary: { R1: 2, R2: 1, R3: 2 },
    });
  });

  it('should count rule ids that collide with object prototype keys', () => {
    const records = [makeRecord({ violations: [makeViolation({ ruleId: 'constructor' })] })];
    expect(summarizeRecords(records).violationSummary).toEqual({ constructor: 1 });
  });
});
