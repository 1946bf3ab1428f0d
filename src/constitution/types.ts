/**
 * Constitution Types
 *
 * Rules, violations and evaluation results for the constitution check.
 * Rules are a closed tagged union on `kind`; anything the loader cannot
 * turn into a working keyword or role rule becomes an inert variant.
 */

// ═══════════════════════════════════════════════════════════════
// SEVERITY
// ═══════════════════════════════════════════════════════════════

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type KnownSeverity = (typeof SEVERITIES)[number];

/** `unspecified` marks a rule whose severity was missing or unrecognized */
export const SEVERITY_VALUES = [...SEVERITIES, 'unspecified'] as const;

export type Severity = (typeof SEVERITY_VALUES)[number];

export function isKnownSeverity(value: string): value is KnownSeverity {
  return SEVERITIES.some((severity) => severity === value);
}

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

interface RuleBase {
  id: string;
  severity: Severity;
  /** The configured value, kept only when it was not a known severity */
  declaredSeverity?: string;
}

/** Fires when a keyword appears in the input or the output, case-insensitively */
export interface KeywordRule extends RuleBase {
  kind: 'keyword';
  /** Non-empty, in configured order and casing */
  keywords: readonly string[];
}

/** Fires when the caller's role is not on the allow-list, case-insensitively */
export interface RoleRule extends RuleBase {
  kind: 'role';
  /** Non-empty, in configured order and casing */
  allowedRoles: readonly string[];
}

/** A keyword or role rule too malformed to evaluate. Never matches. */
export interface NoopRule extends RuleBase {
  kind: 'noop';
  declaredKind: string | undefined;
  reason: string;
}

/** A rule of a kind this engine does not know. Never matches. */
export interface UnknownRule extends RuleBase {
  kind: 'unknown';
  declaredKind: string | undefined;
}

export type Rule = KeywordRule | RoleRule | NoopRule | UnknownRule;

export type RuleKind = Rule['kind'];

/** Ordered; order fixes report order only */
export type RuleSet = readonly Rule[];

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

export type RuleWarningCode =
  | 'NOT_AN_OBJECT'
  | 'MISSING_ID'
  | 'MISSING_KIND'
  | 'MISSING_SEVERITY'
  | 'INVALID_SEVERITY'
  | 'MISSING_KEYWORDS'
  | 'MISSING_ALLOWED_ROLES'
  | 'INVALID_KEYWORD'
  | 'INVALID_ROLE';

/** Operator-correctable defect in a single rule. Advisory, never thrown. */
export interface RuleWarning {
  /** Zero-based position in the `rules` array */
  index: number;
  ruleId?: string;
  code: RuleWarningCode;
  message: string;
}

export interface LoadedRuleSet {
  /** Path or label the rules came from */
  source: string;
  /** False when the source did not exist and the set is empty by default */
  exists: boolean;
  rules: RuleSet;
  warnings: readonly RuleWarning[];
}

// ═══════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════

export type ViolationKind = 'keyword' | 'role';

/** Which evaluated value triggered a violation */
export type ViolationField = 'input' | 'output' | 'role';

export interface Violation {
  ruleId: string;
  kind: ViolationKind;
  /** Keyword in rule-defined casing, or the caller's role verbatim */
  trigger: string;
  severity: Severity;
  /** Copied from the rule when its severity was not recognized */
  declaredSeverity?: string;
  field: ViolationField;
}

export interface EvaluationResult {
  violations: readonly Violation[];
  /** Integer in [0, 100] */
  score: number;
}
