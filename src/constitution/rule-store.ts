/**
 * Rule Store — loads a constitution document into a validated RuleSet.
 *
 * Document shape: `{ "rules": [ { id, type, severity, keywords | allowed_roles } ] }`,
 * JSON by default or YAML for `.yaml` / `.yml` sources.
 *
 * A missing source is an empty rule set (no policy enforced). A source that
 * exists but cannot be decoded into that shape throws MalformedRuleSetError.
 * Defects inside individual rules never throw: the rule is kept, coerced to a
 * `noop` variant where it cannot be evaluated, and reported as a RuleWarning.
 */

import { readFileSync, statSync } from 'fs';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { MalformedRuleSetError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import { isErrnoException } from '../utils/fs.js';
import {
  SEVERITIES,
  isKnownSeverity,
  type LoadedRuleSet,
  type Rule,
  type RuleWarning,
  type RuleWarningCode,
  type Severity,
} from './types.js';

const RuleDocumentSchema = z.object({
  rules: z.array(z.unknown()),
}).passthrough();

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

/**
 * Read and normalise the rule document at `source`.
 * Re-reads the file on every call; see RuleStore for memoized loading.
 */
export function loadRules(source: string): LoadedRuleSet {
  let text: string;
  try {
    text = readFileSync(source, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return { source, exists: false, rules: [], warnings: [] };
    }
    throw new MalformedRuleSetError(`Cannot read rule source ${source}`, source, toError(err));
  }

  return parseRuleDocument(decodeDocument(text, source), source);
}

/**
 * Normalise an already-decoded rule document.
 */
export function parseRuleDocument(document: unknown, source: string = '<memory>'): LoadedRuleSet {
  const parsed = RuleDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new MalformedRuleSetError(
      `Rule source ${source} must be a mapping with a "rules" array`,
      source,
      parsed.error,
    );
  }

  const rules: Rule[] = [];
  const warnings: RuleWarning[] = [];
  parsed.data.rules.forEach((entry, index) => {
    const normalized = normalizeRule(entry, index);
    rules.push(normalized.rule);
    warnings.push(...normalized.warnings);
  });

  return { source, exists: true, rules, warnings };
}

function decodeDocument(text: string, source: string): unknown {
  const ext = extname(source).toLowerCase();
  const isYaml = ext === '.yaml' || ext === '.yml';
  try {
    return isYaml ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new MalformedRuleSetError(
      `Rule source ${source} is not valid ${isYaml ? 'YAML' : 'JSON'}`,
      source,
      toError(err),
    );
  }
}

// ═══════════════════════════════════════════════════════════════
// PER-RULE NORMALISATION
// ═══════════════════════════════════════════════════════════════

interface NormalizedRule {
  rule: Rule;
  warnings: RuleWarning[];
}

function normalizeRule(entry: unknown, index: number): NormalizedRule {
  const warnings: RuleWarning[] = [];
  const fallbackId = `rule#${index + 1}`;
  const warn = (code: RuleWarningCode, message: string, ruleId?: string) => {
    warnings.push({ index, ruleId, code, message });
  };

  if (!isRecord(entry)) {
    warn('NOT_AN_OBJECT', `Rule ${index + 1} is not an object and will never match`);
    return {
      rule: { kind: 'noop', id: fallbackId, severity: 'unspecified', declaredKind: undefined, reason: 'not an object' },
      warnings,
    };
  }

  let id = fallbackId;
  if (isNonBlankString(entry.id)) {
    id = entry.id;
  } else {
    warn('MISSING_ID', `Rule ${index + 1} is missing "id"; reported as "${fallbackId}"`);
  }
  const ruleId = id === fallbackId ? undefined : id;

  const severityReading = readSeverity(entry.severity, (code, message) => warn(code, message, ruleId), id);

  const rawKind = entry.type ?? entry.kind;
  const declaredKind = typeof rawKind === 'string' && rawKind.trim().length > 0
    ? rawKind.trim()
    : undefined;

  if (declaredKind === undefined) {
    warn('MISSING_KIND', `Rule ${id} is missing "type" and will never match`, ruleId);
    return { rule: { kind: 'noop', id, ...severityReading, declaredKind, reason: 'missing type' }, warnings };
  }

  switch (declaredKind.toLowerCase()) {
    case 'keyword': {
      const keywords = readStringList(entry.keywords, 'keyword', id, (code, message) => warn(code, message, ruleId));
      if (keywords === null) {
        warn('MISSING_KEYWORDS', `Keyword rule ${id} has no usable "keywords" and will never match`, ruleId);
        return { rule: { kind: 'noop', id, ...severityReading, declaredKind, reason: 'missing keywords' }, warnings };
      }
      return { rule: { kind: 'keyword', id, ...severityReading, keywords }, warnings };
    }
    case 'role': {
      const allowedRoles = readStringList(entry.allowed_roles ?? entry.allowedRoles, 'role', id, (code, message) => warn(code, message, ruleId));
      if (allowedRoles === null) {
        warn('MISSING_ALLOWED_ROLES', `Role rule ${id} has no usable "allowed_roles" and will never match`, ruleId);
        return { rule: { kind: 'noop', id, ...severityReading, declaredKind, reason: 'missing allowed_roles' }, warnings };
      }
      return { rule: { kind: 'role', id, ...severityReading, allowedRoles }, warnings };
    }
    default:
      // Unrecognized kinds stay inert and silent so newer rule files load on older engines
      return { rule: { kind: 'unknown', id, ...severityReading, declaredKind }, warnings };
  }
}

interface SeverityReading {
  severity: Severity;
  declaredSeverity?: string;
}

function readSeverity(
  value: unknown,
  warn: (code: RuleWarningCode, message: string) => void,
  id: string,
): SeverityReading {
  if (value === undefined || value === null) {
    warn('MISSING_SEVERITY', `Rule ${id} is missing "severity"`);
    return { severity: 'unspecified' };
  }
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (isKnownSeverity(normalized)) {
    return { severity: normalized };
  }
  warn('INVALID_SEVERITY', `Rule ${id} has unrecognized severity ${JSON.stringify(value)}; expected one of ${SEVERITIES.join(', ')}`);
  const declared = typeof value === 'string' ? value.trim() : JSON.stringify(value);
  return declared === '' ? { severity: 'unspecified' } : { severity: 'unspecified', declaredSeverity: declared };
}

/**
 * Usable entries of a keyword or role list, de-duplicated case-insensitively
 * with the first spelling kept. Null when nothing usable remains.
 */
function readStringList(
  value: unknown,
  entryKind: 'keyword' | 'role',
  id: string,
  warn: (code: RuleWarningCode, message: string) => void,
): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const seen = new Set<string>();
  const result: string[] = [];
  value.forEach((item: unknown, position) => {
    if (!isNonBlankString(item)) {
      warn(
        entryKind === 'keyword' ? 'INVALID_KEYWORD' : 'INVALID_ROLE',
        `Rule ${id} ignores ${entryKind} #${position + 1}: expected a non-empty string, got ${JSON.stringify(item)}`,
      );
      return;
    }
    const folded = item.toLowerCase();
    if (seen.has(folded)) return;
    seen.add(folded);
    result.push(item);
  });

  return result.length > 0 ? result : null;
}

function isNonBlankString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isMissingFile(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════
// RULE STORE
// ═══════════════════════════════════════════════════════════════

/** Anything that can hand the pipeline a freshly loaded rule set */
export interface RuleSource {
  load(): LoadedRuleSet;
}

export type ReloadPolicy = 'always' | 'on-change';

export interface RuleStoreOptions {
  /** `always` re-reads on every load; `on-change` memoizes until mtime or size changes */
  reload?: ReloadPolicy;
  logger?: Logger;
}

export class RuleStore implements RuleSource {
  private readonly path: string;
  private readonly reload: ReloadPolicy;
  private readonly logger: Logger;
  private cached: { stamp: string; value: LoadedRuleSet } | null = null;

  constructor(path: string, options: RuleStoreOptions = {}) {
    this.path = path;
    this.reload = options.reload ?? 'always';
    this.logger = options.logger ?? getLogger();
  }

  getPath(): string {
    return this.path;
  }

  load(): LoadedRuleSet {
    if (this.reload === 'on-change') {
      const stamp = this.stamp();
      if (this.cached && this.cached.stamp === stamp) {
        return this.cached.value;
      }
      const value = this.read();
      this.cached = { stamp, value };
      return value;
    }
    return this.read();
  }

  private read(): LoadedRuleSet {
    const loaded = loadRules(this.path);

    if (!loaded.exists) {
      this.logger.debug({ source: this.path }, 'No constitution found; enforcing no rules');
    }
    for (const warning of loaded.warnings) {
      this.logger.warn({ source: this.path, ...warning }, 'Constitution rule warning');
    }
    this.logger.debug({ source: this.path, rules: loaded.rules.length }, 'Constitution loaded');

    return loaded;
  }

  private stamp(): string {
    try {
      const stat = statSync(this.path);
      return `${stat.mtimeMs}:${stat.size}`;
    } catch (err) {
      if (isMissingFile(err)) {
        return 'absent';
      }
      throw new MalformedRuleSetError(`Cannot stat rule source ${this.path}`, this.path, toError(err));
    }
  }
}
