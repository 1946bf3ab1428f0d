/**
 * Violation Evaluator
 *
 * Pure function of (input, output, role, rules): no clock, no randomness,
 * no state between calls. Rules are evaluated independently and violations
 * are reported in rule order.
 */

import type {
  EvaluationResult,
  KeywordRule,
  RoleRule,
  RuleSet,
  Violation,
  ViolationField,
} from './types.js';

export const MAX_SCORE = 100;
export const PENALTY_PER_VIOLATION = 10;
export const DEFAULT_PASS_THRESHOLD = 70;

export function evaluate(
  inputText: string,
  outputText: string,
  role: string,
  rules: RuleSet,
): EvaluationResult {
  const violations: Violation[] = [];
  const foldedInput = inputText.toLowerCase();
  const foldedOutput = outputText.toLowerCase();
  const foldedRole = role.toLowerCase();

  for (const rule of rules) {
    switch (rule.kind) {
      case 'keyword':
        violations.push(...matchKeywords(rule, foldedInput, 'input'));
        violations.push(...matchKeywords(rule, foldedOutput, 'output'));
        break;
      case 'role': {
        const violation = checkRole(rule, role, foldedRole);
        if (violation) violations.push(violation);
        break;
      }
      case 'noop':
      case 'unknown':
        break;
    }
  }

  return { violations, score: computeScore(violations.length) };
}

/** `100 - 10 × count`, clamped to [0, 100] */
export function computeScore(violationCount: number): number {
  const raw = MAX_SCORE - PENALTY_PER_VIOLATION * violationCount;
  return Math.min(MAX_SCORE, Math.max(0, raw));
}

/** Presentation helper: a run passes when its score is strictly above the threshold */
export function isPassing(score: number, threshold: number = DEFAULT_PASS_THRESHOLD): boolean {
  return score > threshold;
}

// One violation per keyword per field, however often it occurs
function matchKeywords(rule: KeywordRule, foldedText: string, field: ViolationField): Violation[] {
  const matches: Violation[] = [];
  for (const keyword of rule.keywords) {
    if (foldedText.includes(keyword.toLowerCase())) {
      matches.push({
        ruleId: rule.id,
        kind: 'keyword',
        trigger: keyword,
        ...severityOf(rule),
        field,
      });
    }
  }
  return matches;
}

function checkRole(rule: RoleRule, role: string, foldedRole: string): Violation | null {
  const allowed = rule.allowedRoles.some((candidate) => candidate.toLowerCase() === foldedRole);
  if (allowed) {
    return null;
  }
  return {
    ruleId: rule.id,
    kind: 'role',
    trigger: role,
    ...severityOf(rule),
    field: 'role',
  };
}

function severityOf(rule: KeywordRule | RoleRule): Pick<Violation, 'severity' | 'declaredSeverity'> {
  return rule.declaredSeverity === undefined
    ? { severity: rule.severity }
    : { severity: rule.severity, declaredSeverity: rule.declaredSeverity };
}
