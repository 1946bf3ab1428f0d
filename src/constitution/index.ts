/**
 * Constitution — rule loading and violation evaluation.
 *
 * @example
 * ```typescript
 * import { RuleStore, evaluate } from 'agentlayer';
 *
 * const store = new RuleStore('agentlayer/constitution.json');
 * const { rules } = store.load();
 * const result = evaluate('Access the secret database.', 'Accessing data.', 'developer', rules);
 * console.log(result.score); // 90 when "secret" is a forbidden keyword
 * ```
 */

export { evaluate, computeScore, isPassing, MAX_SCORE, PENALTY_PER_VIOLATION, DEFAULT_PASS_THRESHOLD } from './evaluator.js';
export { loadRules, parseRuleDocument, RuleStore, type RuleSource, type RuleStoreOptions, type ReloadPolicy } from './rule-store.js';
export { SEVERITIES, SEVERITY_VALUES, isKnownSeverity } from './types.js';
export type {
  KnownSeverity,
  Severity,
  KeywordRule,
  RoleRule,
  NoopRule,
  UnknownRule,
  Rule,
  RuleKind,
  RuleSet,
  RuleWarningCode,
  RuleWarning,
  LoadedRuleSet,
  ViolationKind,
  ViolationField,
  Violation,
  EvaluationResult,
} from './types.js';
