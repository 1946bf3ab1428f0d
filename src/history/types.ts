import type { Violation } from '../constitution/types.js';

/** One persisted generate → check run */
export interface ExecutionRecord {
  /** Random UUID */
  id: string;
  /** ISO-8601, UTC */
  timestamp: string;
  input: string;
  output: string;
  role: string;
  model: string;
  violations: readonly Violation[];
  score: number;
}

export interface ScoreSummary {
  totalRuns: number;
  /** Mean score rounded to two decimals; 100 when there are no runs */
  averageScore: number;
  /** Rule id → number of violations across all runs */
  violationSummary: Record<string, number>;
}

/** Write side of the history, as the pipeline sees it */
export interface HistorySink {
  append(record: ExecutionRecord): Promise<void>;
}

export interface HistoryReader {
  list(): Promise<ExecutionRecord[]>;
  /** The record with this id, or undefined when there is none */
  find(id: string): Promise<ExecutionRecord | undefined>;
  summarize(): Promise<ScoreSummary>;
}

export interface HistoryStore extends HistorySink, HistoryReader {}
