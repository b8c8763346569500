export { PipelineController, type PipelineControllerOptions, type PipelineRunner } from './controller';
export { STRATEGY_TABLE, selectRunStrategy, sizeTierFor, type RunStrategy, type SizeTier } from './strategy';
export type {
  PipelineDiagnostics,
  PipelineResult,
  RunOutcome,
  SegmentDiagnostics,
  SegmentRunStatus,
} from './types';
