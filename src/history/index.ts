export { JsonHistoryStore, type JsonHistoryStoreOptions } from './json-store.js';
export { summarizeRecords } from './summary.js';
export type { ExecutionRecord, ScoreSummary, HistorySink, HistoryReader, HistoryStore } from './types.js';
