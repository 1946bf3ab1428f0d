export { runPipeline, generateStage, checkStage, recordStage } from './pipeline.js';
export { createRuntime, type Runtime } from './runtime.js';
export type {
  PipelineRequest,
  PipelineContext,
  GeneratedRun,
  CheckedRun,
  PipelineResult,
} from './types.js';
