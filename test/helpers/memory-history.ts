import { summarizeRecords } from '../../src/history/summary.js';
import type { ExecutionRecord, HistoryStore, ScoreSummary } from '../../src/history/types.js';

export class MemoryHistoryStore implements HistoryStore {
  records: ExecutionRecord[] = [];

  async append(record: ExecutionRecord): Promise<void> {
    this.records.push(record);
  }

  async list(): Promise<ExecutionRecord[]> {
    return [...this.records];
  }

  async find(id: string): Promise<ExecutionRecord | undefined> {
    return this.records.find((record) => record.id === id);
  }

  async summarize(): Promise<ScoreSummary> {
    return summarizeRecords(this.records);
  }
}
