import { v4 as uuidv4 } from 'uuid';
import type { LayoffRecord } from '@layoffs/types';
import {
  InMemoryLayoffStore,
  StorageError,
  SupabaseLayoffStore,
  createLayoffsClient,
  type LayoffStore
} from '@layoffs/database';
import type { IngestionConfig } from '../config';
import {
  CsvParseResult,
  ErrorType,
  IngestionError,
  PipelineMetrics,
  ProcessingConfig,
  ProcessingStep
} from '../types';
import { ETLPipeline } from '../validation/ETLPipeline';
import { CsvParser } from '../parsers/CsvParser';
import { JobTracker } from './JobTracker';
import { MalformedDateError, PipelineError, getErrorMessage } from '../utils/errorUtils';
import logger, { setLogLevel } from '../utils/logger';

export interface OrchestratorResult {
  success: boolean;
  jobId: string;
  records: LayoffRecord[];
  metrics?: PipelineMetrics;
  errors: IngestionError[];
  warnings: string[];
}

export interface CsvRunOptions {
  config?: Partial<ProcessingConfig>;
  nullToken?: string;
  jobTracker?: JobTracker;
}

/**
 * ETL Orchestrator: reads the source table, runs the cleaning pipeline and
 * commits the result to staging in one write. On failure nothing is committed.
 */
export class ETLOrchestrator {
  private etlPipeline: ETLPipeline;

  constructor(
    private readonly store: LayoffStore,
    config: Partial<ProcessingConfig> = {},
    private readonly jobTracker: JobTracker = new JobTracker()
  ) {
    this.etlPipeline = new ETLPipeline(config);
  }

  /**
   * Build an orchestrator against Supabase from loaded configuration
   */
  static fromConfig(config: IngestionConfig): ETLOrchestrator {
    setLogLevel(config.logLevel);

    const client = createLayoffsClient(config.supabase);
    const store = new SupabaseLayoffStore(client, {
      sourceTable: config.sourceTable,
      stagingTable: config.stagingTable
    });

    return new ETLOrchestrator(store, ETLOrchestrator.runOptions(config).config);
  }

  /**
   * Pipeline and CSV settings carried by loaded configuration
   */
  static runOptions(config: IngestionConfig): Required<Pick<CsvRunOptions, 'config' | 'nullToken'>> {
    return {
      config: {
        gapFillStrategy: config.gapFillStrategy,
        pruneIncomplete: config.pruneIncomplete
      },
      nullToken: config.nullToken
    };
  }

  /**
   * Clean the store's source rows into its staging table
   */
  async processSource(jobId: string = uuidv4()): Promise<OrchestratorResult> {
    try {
      this.jobTracker.startJob(jobId);
      this.jobTracker.updateProgress(jobId, { current_step: ProcessingStep.LOADING });

      const source = await this.store.loadSource();
      return await this.runAndCommit(jobId, source);
    } catch (error) {
      return this.fail(jobId, error);
    }
  }

  /**
   * Load a CSV export into a fresh in-memory store and clean it
   */
  static async processCsv(
    buffer: Buffer,
    options: CsvRunOptions = {}
  ): Promise<OrchestratorResult & { store: InMemoryLayoffStore }> {
    const jobId = uuidv4();
    let parsed: CsvParseResult;
    try {
      parsed = await new CsvParser(jobId, options.nullToken).parseFile(buffer);
    } catch (error) {
      const empty = new InMemoryLayoffStore();
      const failed = new ETLOrchestrator(empty, options.config, options.jobTracker).fail(jobId, error);
      return { ...failed, store: empty };
    }

    const store = new InMemoryLayoffStore(parsed.rows);
    const orchestrator = new ETLOrchestrator(store, options.config, options.jobTracker);

    const result = await orchestrator.processSource(jobId);
    return {
      ...result,
      errors: [...parsed.errors, ...result.errors],
      warnings: [...parsed.warnings, ...result.warnings],
      store
    };
  }

  private async runAndCommit(jobId: string, source: LayoffRecord[]): Promise<OrchestratorResult> {
    this.jobTracker.updateProgress(jobId, { total_rows: source.length });

    const result = this.etlPipeline.run(source, (progress, step) => {
      // Pipeline covers 0-90%; the commit takes the rest
      this.jobTracker.updateProgress(jobId, { progress: Math.round(progress * 0.9), current_step: step });
    });

    this.jobTracker.updateProgress(jobId, { progress: 95, current_step: ProcessingStep.STORAGE });
    await this.store.replaceStaging(result.records);

    this.jobTracker.completeJob(jobId, result.records.length, result.warnings.length);

    logger.info('Staging table replaced', {
      job_id: jobId,
      rows: result.records.length,
      duplicates_removed: result.metrics.deduplication.duplicatesRemoved
    });

    return {
      success: true,
      jobId,
      records: result.records,
      metrics: result.metrics,
      errors: [],
      warnings: result.warnings
    };
  }

  private fail(jobId: string, error: unknown): OrchestratorResult {
    const message = getErrorMessage(error);
    const errorType = this.classifyError(error);

    logger.error('ETL job failed', { job_id: jobId, error_type: errorType, error: message });

    if (this.jobTracker.getJob(jobId)) {
      this.jobTracker.failJob(jobId, message);
    }

    return {
      success: false,
      jobId,
      records: [],
      errors: [this.createIngestionError(jobId, errorType, message, error)],
      warnings: []
    };
  }

  private classifyError(error: unknown): ErrorType {
    if (error instanceof MalformedDateError) return 'malformed_date';
    if (error instanceof StorageError) return 'database_error';
    if (error instanceof PipelineError && error.code === 'CSV_PARSE_FAILED') return 'parsing_error';
    return 'system_error';
  }

  /**
   * Create standardized ingestion error
   */
  private createIngestionError(
    jobId: string,
    errorType: ErrorType,
    message: string,
    error: unknown
  ): IngestionError {
    return {
      id: uuidv4(),
      job_id: jobId,
      error_type: errorType,
      error_message: message,
      raw_data: error instanceof MalformedDateError ? error.failures : undefined,
      severity: errorType === 'malformed_date' ? 'error' : 'critical',
      created_at: new Date().toISOString()
    };
  }
}

export default ETLOrchestrator;
