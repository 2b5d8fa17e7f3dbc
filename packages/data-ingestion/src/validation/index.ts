// Cleaning pipeline stages and the runner that chains them

export { default as StagingLoader } from './StagingLoader';
export { default as DeduplicationEngine } from './DeduplicationEngine';
export { default as DataNormalizer } from './DataNormalizer';
export { default as GapFiller, describeAmbiguity } from './GapFiller';
export { default as RecordPruner } from './RecordPruner';
export { default as Projector } from './Projector';
export { default as SchemaValidator, buildCsvRowSchema, CleanedRecordSchema } from './SchemaValidator';
export { default as ETLPipeline } from './ETLPipeline';

export type {
  DeduplicationMetrics,
  NormalizationMetrics,
  GapFillMetrics,
  AmbiguousGapFill,
  PipelineResult
} from '../types';
