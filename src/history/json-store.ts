/**
 * JSON-file execution history.
 *
 * The whole history is one pretty-printed JSON array, rewritten on each
 * append. Appends within a process are serialized so concurrent pipeline
 * runs never drop each other's records. A file that is not an array of
 * records is an error, never silently replaced. Snake-case records from
 * earlier releases are upgraded on read and rewritten on the next append.
 */

import { z } from 'zod';
import { AsyncMutex } from '../core/mutex.js';
import { HistoryStoreError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs.js';
import { SEVERITY_VALUES, isKnownSeverity, type Violation, type ViolationField } from '../constitution/types.js';
import { summarizeRecords } from './summary.js';
import type { ExecutionRecord, HistoryStore, ScoreSummary } from './types.js';

const ViolationSchema = z.object({
  ruleId: z.string(),
  kind: z.enum(['keyword', 'role']),
  trigger: z.string(),
  severity: z.enum(SEVERITY_VALUES),
  declaredSeverity: z.string().optional(),
  field: z.enum(['input', 'output', 'role']),
});

const ExecutionRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  input: z.string(),
  output: z.string(),
  role: z.string(),
  model: z.string(),
  violations: z.array(ViolationSchema),
  score: z.number(),
});

const HistorySchema = z.array(z.preprocess(upgradeLegacyRecord, ExecutionRecordSchema));

// ═══════════════════════════════════════════════════════════════
// LEGACY RECORDS
// ═══════════════════════════════════════════════════════════════

// Earlier releases wrote snake-case records: `uuid` and `llm_model`, with
// violations keyed `rule_id` / `type` and no matched field.
function upgradeLegacyRecord(value: unknown): unknown {
  if (!isRecord(value) || !('uuid' in value) || 'id' in value) {
    return value;
  }
  const { uuid, llm_model, violations, ...rest } = value;
  const input = typeof rest.input === 'string' ? rest.input : '';
  return {
    ...rest,
    id: uuid,
    model: llm_model ?? 'unknown',
    output: rest.output ?? '',
    violations: Array.isArray(violations)
      ? violations.map((violation: unknown) => upgradeLegacyViolation(violation, input))
      : violations,
  };
}

function upgradeLegacyViolation(value: unknown, input: string): unknown {
  if (!isRecord(value) || !('rule_id' in value)) {
    return value;
  }
  const { rule_id, type, severity, ...rest } = value;
  const trigger = typeof rest.trigger === 'string' ? rest.trigger : '';
  // Keyword hits did not record where they matched; input wins when both could.
  const field: ViolationField = type === 'role'
    ? 'role'
    : input.toLowerCase().includes(trigger.toLowerCase()) ? 'input' : 'output';
  return { ...rest, ruleId: rule_id, kind: type, ...readLegacySeverity(severity), field };
}

function readLegacySeverity(value: unknown): Pick<Violation, 'severity' | 'declaredSeverity'> {
  const declared = typeof value === 'string' ? value.trim() : '';
  const folded = declared.toLowerCase();
  if (isKnownSeverity(folded)) {
    return { severity: folded };
  }
  return declared === '' ? { severity: 'unspecified' } : { severity: 'unspecified', declaredSeverity: declared };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface JsonHistoryStoreOptions {
  logger?: Logger;
}

export class JsonHistoryStore implements HistoryStore {
  private readonly path: string;
  private readonly logger: Logger;
  private readonly mutex = new AsyncMutex();

  constructor(path: string, options: JsonHistoryStoreOptions = {}) {
    this.path = path;
    this.logger = options.logger ?? getLogger();
  }

  getPath(): string {
    return this.path;
  }

  async list(): Promise<ExecutionRecord[]> {
    return this.read();
  }

  async append(record: ExecutionRecord): Promise<void> {
    await this.mutex.withLock(async () => {
      const records = await this.read();
      records.push(record);
      try {
        await writeFileAtomic(this.path, JSON.stringify(records, null, 2) + '\n');
      } catch (err) {
        throw new HistoryStoreError(`Failed to write history ${this.path}`, this.path, toError(err));
      }
      this.logger.debug({ path: this.path, id: record.id, total: records.length }, 'Execution recorded');
    });
  }

  async find(id: string): Promise<ExecutionRecord | undefined> {
    const records = await this.read();
    return records.find((record) => record.id === id);
  }

  async summarize(): Promise<ScoreSummary> {
    return summarizeRecords(await this.read());
  }

  private async read(): Promise<ExecutionRecord[]> {
    let text: string | null;
    try {
      text = await readFileIfExists(this.path);
    } catch (err) {
      throw new HistoryStoreError(`Failed to read history ${this.path}`, this.path, toError(err));
    }
    if (text === null || text.trim() === '') {
      return [];
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw new HistoryStoreError(`History ${this.path} is not valid JSON`, this.path, toError(err));
    }

    const parsed = HistorySchema.safeParse(decoded);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : '';
      throw new HistoryStoreError(`History ${this.path} is not a list of execution records${where}`, this.path, parsed.error);
    }
    return parsed.data;
  }
}
