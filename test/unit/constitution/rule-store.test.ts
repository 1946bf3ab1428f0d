import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import pino from 'pino';
import { loadRules, parseRuleDocument, RuleStore } from '../../../src/constitution/rule-store.js';
import { MalformedRuleSetError } from '../../../src/core/errors.js';
import { createTempDir, removeTempDir } from '../../helpers/temp-dir.js';

describe('loadRules', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should return an empty rule set when the source does not exist', () => {
    const source = join(dir, 'missing.json');
    expect(loadRules(source)).toEqual({ source, exists: false, rules: [], warnings: [] });
  });

  it('should throw MalformedRuleSetError when the source cannot be read', () => {
    const source = join(dir, 'constitution.json');
    mkdirSync(source);

    expect(() => loadRules(source)).toThrow(MalformedRuleSetError);
    expect(() => loadRules(source)).toThrow(`Cannot read rule source ${source}`);
  });

  it('should load keyword and role rules from JSON', () => {
    const source = join(dir, 'constitution.json');
    writeFileSync(source, JSON.stringify({
      rules: [
        { id: 'R1', type: 'keyword', keywords: ['sudo', 'rm -rf'], severity: 'high' },
        { id: 'R2', type: 'role', allowed_roles: ['developer', 'analyst'], severity: 'medium' },
      ],
    }));

    expect(loadRules(source)).toEqual({
      source,
      exists: true,
      rules: [
        { kind: 'keyword', id: 'R1', severity: 'high', keywords: ['sudo', 'rm -rf'] },
        { kind: 'role', id: 'R2', severity: 'medium', allowedRoles: ['developer', 'analyst'] },
      ],
      warnings: [],
    });
  });

  it('should load YAML sources', () => {
    const source = join(dir, 'constitution.yaml');
    writeFileSync(source, [
      'rules:',
      '  - id: Y1',
      '    type: keyword',
      '    severity: low',
      '    keywords: [password]',
    ].join('\n'));

    expect(loadRules(source).rules).toEqual([
      { kind: 'keyword', id: 'Y1', severity: 'low', keywords: ['password'] },
    ]);
  });

  it('should throw MalformedRuleSetError for invalid JSON', () => {
    const source = join(dir, 'broken.json');
    writeFileSync(source, '{ "rules": [');

    expect(() => loadRules(source)).toThrow(MalformedRuleSetError);
    expect(() => loadRules(source)).toThrow(`Rule source ${source} is not valid JSON`);
  });

  it('should carry the source path on the error', () => {
    const source = join(dir, 'broken.json');
    writeFileSync(source, 'not json');

    try {
      loadRules(source);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRuleSetError);
      expect(err).toMatchObject({ source, code: 'MALFORMED_RULE_SET' });
    }
  });
});

describe('parseRuleDocument', () => {
  describe('document shape', () => {
    it('should reject a top-level array', () => {
      expect(() => parseRuleDocument([{ id: 'R1' }])).toThrow(
        'Rule source <memory> must be a mapping with a "rules" array',
      );
    });

    it('should reject a document without rules', () => {
      expect(() => parseRuleDocument({ policies: [] }, 'policy.json')).toThrow(MalformedRuleSetError);
    });

    it('should reject rules that are not an array', () => {
      expect(() => parseRuleDocument({ rules: 'R1' })).toThrow(MalformedRuleSetError);
    });

    it('should accept an empty rules array', () => {
      expect(parseRuleDocument({ rules: [] })).toEqual({ source: '<memory>', exists: true, rules: [], warnings: [] });
    });
  });

  describe('rule normalisation', () => {
    it('should read the kind from "kind" and match it case-insensitively', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'R2', kind: 'Role', allowedRoles: ['admin'], severity: 'low' }],
      });
      expect(rules).toEqual([{ kind: 'role', id: 'R2', severity: 'low', allowedRoles: ['admin'] }]);
      expect(warnings).toEqual([]);
    });

    it('should normalise severity casing', () => {
      const { rules } = parseRuleDocument({
        rules: [{ id: 'R1', type: 'keyword', keywords: ['x'], severity: 'HIGH' }],
      });
      expect(rules[0]?.severity).toBe('high');
    });

    it('should name a rule without an id by its position', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ type: 'keyword', keywords: ['x'], severity: 'low' }],
      });
      expect(rules).toEqual([{ kind: 'keyword', id: 'rule#1', severity: 'low', keywords: ['x'] }]);
      expect(warnings).toEqual([
        { index: 0, ruleId: undefined, code: 'MISSING_ID', message: 'Rule 1 is missing "id"; reported as "rule#1"' },
      ]);
    });

    it('should load a rule without severity as unspecified', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'A', type: 'keyword', keywords: ['x'] }],
      });
      expect(rules[0]?.severity).toBe('unspecified');
      expect(warnings).toEqual([
        { index: 0, ruleId: 'A', code: 'MISSING_SEVERITY', message: 'Rule A is missing "severity"' },
      ]);
    });

    it('should warn about an unrecognised severity', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'A', type: 'keyword', keywords: ['x'], severity: 'urgent' }],
      });
      expect(rules[0]).toEqual({
        kind: 'keyword',
        id: 'A',
        severity: 'unspecified',
        declaredSeverity: 'urgent',
        keywords: ['x'],
      });
      expect(warnings).toEqual([
        {
          index: 0,
          ruleId: 'A',
          code: 'INVALID_SEVERITY',
          message: 'Rule A has unrecognized severity "urgent"; expected one of low, medium, high, critical',
        },
      ]);
    });

    it('should load a rule without a type as noop', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'A', keywords: ['x'], severity: 'high' }],
      });
      expect(rules).toEqual([
        { kind: 'noop', id: 'A', severity: 'high', declaredKind: undefined, reason: 'missing type' },
      ]);
      expect(warnings.map((w) => w.code)).toEqual(['MISSING_KIND']);
    });

    it('should load a keyword rule without keywords as noop', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'K', type: 'keyword', severity: 'high' }],
      });
      expect(rules).toEqual([
        { kind: 'noop', id: 'K', severity: 'high', declaredKind: 'keyword', reason: 'missing keywords' },
      ]);
      expect(warnings).toEqual([
        { index: 0, ruleId: 'K', code: 'MISSING_KEYWORDS', message: 'Keyword rule K has no usable "keywords" and will never match' },
      ]);
    });

    it('should load a role rule with an empty allow-list as noop', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'R', type: 'role', allowed_roles: [], severity: 'medium' }],
      });
      expect(rules).toEqual([
        { kind: 'noop', id: 'R', severity: 'medium', declaredKind: 'role', reason: 'missing allowed_roles' },
      ]);
      expect(warnings.map((w) => w.code)).toEqual(['MISSING_ALLOWED_ROLES']);
    });

    it('should drop unusable keywords and de-duplicate the rest', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'K', type: 'keyword', keywords: ['', 42, 'ok', 'OK'], severity: 'low' }],
      });
      expect(rules).toEqual([{ kind: 'keyword', id: 'K', severity: 'low', keywords: ['ok'] }]);
      expect(warnings).toEqual([
        { index: 0, ruleId: 'K', code: 'INVALID_KEYWORD', message: 'Rule K ignores keyword #1: expected a non-empty string, got ""' },
        { index: 0, ruleId: 'K', code: 'INVALID_KEYWORD', message: 'Rule K ignores keyword #2: expected a non-empty string, got 42' },
      ]);
    });

    it('should turn a rule whose keywords are all unusable into noop', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'K', type: 'keyword', keywords: ['  '], severity: 'low' }],
      });
      expect(rules[0]?.kind).toBe('noop');
      expect(warnings.map((w) => w.code)).toEqual(['INVALID_KEYWORD', 'MISSING_KEYWORDS']);
    });

    it('should keep unknown kinds as inert rules without warning', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [{ id: 'X', type: 'regex', pattern: 'a+', severity: 'critical' }],
      });
      expect(rules).toEqual([{ kind: 'unknown', id: 'X', severity: 'critical', declaredKind: 'regex' }]);
      expect(warnings).toEqual([]);
    });

    it('should load a non-object entry as noop', () => {
      const { rules, warnings } = parseRuleDocument({ rules: ['R1'] });
      expect(rules).toEqual([
        { kind: 'noop', id: 'rule#1', severity: 'unspecified', declaredKind: undefined, reason: 'not an object' },
      ]);
      expect(warnings).toEqual([
        { index: 0, ruleId: undefined, code: 'NOT_AN_OBJECT', message: 'Rule 1 is not an object and will never match' },
      ]);
    });

    it('should keep rule order and report warnings by index', () => {
      const { rules, warnings } = parseRuleDocument({
        rules: [
          { id: 'A', type: 'keyword', keywords: ['a'], severity: 'low' },
          { id: 'B', type: 'keyword', severity: 'low' },
          { id: 'C', type: 'role', allowed_roles: ['admin'], severity: 'low' },
        ],
      });
      expect(rules.map((r) => r.id)).toEqual(['A', 'B', 'C']);
      expect(warnings.map((w) => w.index)).toEqual([1]);
    });
  });
});

describe('RuleStore', () => {
  let dir: string;
  let source: string;

  beforeEach(() => {
    dir = createTempDir();
    source = join(dir, 'constitution.json');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function writeRules(keywords: string[]): void {
    writeFileSync(source, JSON.stringify({ rules: [{ id: 'K', type: 'keyword', keywords, severity: 'high' }] }));
  }

  it('should re-read the file on every load by default', () => {
    const store = new RuleStore(source);
    writeRules(['alpha']);
    const first = store.load();
    writeRules(['beta']);
    const second = store.load();

    expect(first.rules).toEqual([{ kind: 'keyword', id: 'K', severity: 'high', keywords: ['alpha'] }]);
    expect(second.rules).toEqual([{ kind: 'keyword', id: 'K', severity: 'high', keywords: ['beta'] }]);
  });

  it('should memoize until the file changes with the on-change policy', () => {
    const store = new RuleStore(source, { reload: 'on-change' });
    writeRules(['alpha']);
    const first = store.load();

    expect(store.load()).toBe(first);

    writeRules(['alpha', 'gamma']);
    const changed = store.load();
    expect(changed).not.toBe(first);
    expect(changed.rules).toEqual([{ kind: 'keyword', id: 'K', severity: 'high', keywords: ['alpha', 'gamma'] }]);
  });

  it('should pick up a constitution created after the first load', () => {
    const store = new RuleStore(source, { reload: 'on-change' });
    expect(store.load().exists).toBe(false);

    writeRules(['alpha']);
    expect(store.load().exists).toBe(true);
  });

  it('should fall back to an empty rule set when the constitution is deleted', () => {
    const store = new RuleStore(source, { reload: 'on-change' });
    writeRules(['alpha']);
    expect(store.load().rules).toHaveLength(1);

    unlinkSync(source);
    expect(store.load()).toEqual({ source, exists: false, rules: [], warnings: [] });
  });

  it('should log rule warnings through the injected logger', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
    writeFileSync(source, JSON.stringify({ rules: [{ id: 'K', type: 'keyword', severity: 'high' }] }));

    new RuleStore(source, { logger }).load();

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 40,
      msg: 'Constitution rule warning',
      source,
      code: 'MISSING_KEYWORDS',
      ruleId: 'K',
    });
  });

  it('should expose its path', () => {
    expect(new RuleStore(source).getPath()).toBe(source);
  });
});
