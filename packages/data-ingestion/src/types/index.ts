import type { GapFillField, LayoffRecord, RawLayoffRow } from '@layoffs/types';

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

// Processing Step const enum - for use as both type and value
export const ProcessingStep = {
  QUEUED: 'queued' as const,
  LOADING: 'loading' as const,
  DEDUPLICATION: 'deduplication' as const,
  NORMALIZATION: 'normalization' as const,
  GAP_FILL: 'gap_fill' as const,
  PRUNING: 'pruning' as const,
  PROJECTION: 'projection' as const,
  STORAGE: 'storage' as const,
  COMPLETED: 'completed' as const
} as const;

export type ProcessingStep = typeof ProcessingStep[keyof typeof ProcessingStep];

export type GapFillStrategy = 'last_match' | 'most_frequent';

export interface ProcessingConfig {
  gapFillFields: GapFillField[];
  gapFillStrategy: GapFillStrategy;
  pruneIncomplete: boolean;
  industryPrefixes: ReadonlyArray<{ prefix: string; label: string }>;
  dateFormats: readonly string[];
}

export type ProgressCallback = (progress: number, step: ProcessingStep) => void;

// Error tracking
export type ErrorType =
  | 'malformed_date'
  | 'validation_error'
  | 'parsing_error'
  | 'database_error'
  | 'system_error';

export interface IngestionError {
  id: string;
  job_id: string;
  row_number?: number;
  error_type: ErrorType;
  error_message: string;
  raw_data?: unknown;
  severity: 'warning' | 'error' | 'critical';
  created_at: string;
}

export interface JobProgress {
  job_id: string;
  status: JobStatus;
  progress: number; // 0-100
  current_step: ProcessingStep;
  total_rows?: number;
  processed_rows: number;
  errors_count: number;
  warnings_count: number;
  started_at: string;
  completed_at?: string;
}

// Stage results
export interface DuplicateGroup {
  key: string;
  copies: number;
}

export interface DeduplicationMetrics {
  totalRecords: number;
  uniqueRecords: number;
  duplicatesRemoved: number;
  duplicateRate: number;
}

export interface NormalizationMetrics {
  companiesTrimmed: number;
  industriesCanonicalized: number;
  blankIndustriesNulled: number;
  countriesCleaned: number;
  datesParsed: number;
  datesNull: number;
}

export interface AmbiguousGapFill {
  company: string;
  field: GapFillField;
  candidates: string[];
  chosen: string;
}

export interface GapFillMetrics {
  filled: number;
  unresolved: number;
  ambiguous: AmbiguousGapFill[];
}

export interface StageResult<T, M> {
  records: T[];
  metrics: M;
}

export interface PipelineMetrics {
  inputCount: number;
  outputCount: number;
  processing_time_ms: number;
  deduplication: DeduplicationMetrics;
  normalization: NormalizationMetrics;
  gapFill: GapFillMetrics;
  // Rows that became identical only after normalization and gap fill
  mergedAfterCleaning: number;
  pruned: number;
}

export interface PipelineResult {
  records: LayoffRecord[];
  metrics: PipelineMetrics;
  warnings: string[];
}

export interface CsvParseResult {
  rows: RawLayoffRow[];
  errors: IngestionError[];
  warnings: string[];
  metadata: {
    total_rows: number;
    parsed_rows: number;
    error_rows: number;
    headers: string[];
  };
}
