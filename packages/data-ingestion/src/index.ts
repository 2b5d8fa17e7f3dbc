// Main exports for the data-ingestion package

// Types
export * from './types';

// Configuration
export { loadConfig } from './config';
export type { IngestionConfig } from './config';

// Parsers
export { CsvParser } from './parsers/CsvParser';

// Pipeline stages
export {
  StagingLoader,
  DeduplicationEngine,
  DataNormalizer,
  GapFiller,
  RecordPruner,
  Projector,
  SchemaValidator,
  ETLPipeline,
  describeAmbiguity,
  buildCsvRowSchema,
  CleanedRecordSchema
} from './validation';

// Job tracking and orchestration
export { JobTracker } from './workers/JobTracker';
export { ETLOrchestrator } from './workers/ETLOrchestrator';
export type { OrchestratorResult, CsvRunOptions } from './workers/ETLOrchestrator';

// Reporting
export { LayoffAnalytics } from './reporting/LayoffAnalytics';

// Errors
export {
  PipelineError,
  MalformedDateError,
  getErrorMessage,
  isError
} from './utils/errorUtils';
export type { DateFailure, SchemaIssue, PipelineErrorCode } from './utils/errorUtils';
