import type { RawLayoffRow } from '@layoffs/types';
import { DATE_INPUT_FORMATS, INDUSTRY_CANONICAL_PREFIXES } from '@layoffs/shared';
import { ProcessingConfig, ProcessingStep, PipelineResult, ProgressCallback } from '../types';
import { PipelineError } from '../utils/errorUtils';
import logger from '../utils/logger';

import StagingLoader from './StagingLoader';
import DeduplicationEngine from './DeduplicationEngine';
import DataNormalizer from './DataNormalizer';
import GapFiller, { describeAmbiguity } from './GapFiller';
import RecordPruner from './RecordPruner';
import Projector from './Projector';
import SchemaValidator from './SchemaValidator';

/**
 * Main ETL Pipeline coordinator: Load -> Dedupe -> Normalize -> Fill -> (Prune) -> Project.
 * Rows that only become equal after cleaning are merged once more before pruning.
 * Each stage returns a fresh copy; the input rows are never touched.
 * A MalformedDateError from normalization aborts the run and reaches the caller.
 */
export class ETLPipeline {
  private loader: StagingLoader;
  private deduplicationEngine: DeduplicationEngine;
  private dataNormalizer: DataNormalizer;
  private gapFiller: GapFiller;
  private pruner: RecordPruner;
  private projector: Projector;
  private schemaValidator: SchemaValidator;
  private processingConfig: ProcessingConfig;

  constructor(config: Partial<ProcessingConfig> = {}) {
    this.processingConfig = {
      gapFillFields: ['industry'],
      gapFillStrategy: 'last_match',
      pruneIncomplete: false,
      industryPrefixes: INDUSTRY_CANONICAL_PREFIXES,
      dateFormats: DATE_INPUT_FORMATS,
      ...config
    };

    this.loader = new StagingLoader();
    this.deduplicationEngine = new DeduplicationEngine();
    this.pruner = new RecordPruner();
    this.projector = new Projector();
    this.schemaValidator = new SchemaValidator();
    this.dataNormalizer = new DataNormalizer(
      this.processingConfig.industryPrefixes,
      this.processingConfig.dateFormats
    );
    this.gapFiller = new GapFiller(
      this.processingConfig.gapFillFields,
      this.processingConfig.gapFillStrategy
    );
  }

  /**
   * Run every stage over the source rows
   */
  run(source: ReadonlyArray<RawLayoffRow>, progressCallback?: ProgressCallback): PipelineResult {
    const startTime = Date.now();
    const warnings: string[] = [];

    // Step 1: Staging copy
    progressCallback?.(0, ProcessingStep.LOADING);
    const loaded = this.loader.load(source);
    warnings.push(...loaded.warnings);

    // Step 2: Deduplication
    progressCallback?.(20, ProcessingStep.DEDUPLICATION);
    const deduped = this.deduplicationEngine.deduplicate(loaded.records);
    logger.debug('Deduplication finished', deduped.metrics);

    // Step 3: Normalization (throws on any unparseable date)
    progressCallback?.(40, ProcessingStep.NORMALIZATION);
    const normalized = this.dataNormalizer.normalizeRecords(deduped.records);
    logger.debug('Normalization finished', normalized.metrics);

    // Step 4: Gap fill
    progressCallback?.(60, ProcessingStep.GAP_FILL);
    const filled = this.gapFiller.fill(normalized.records);
    warnings.push(...filled.metrics.ambiguous.map(describeAmbiguity));
    logger.debug('Gap fill finished', {
      filled: filled.metrics.filled,
      unresolved: filled.metrics.unresolved,
      ambiguous: filled.metrics.ambiguous.length
    });

    // Normalization and fill can make distinct source rows equal; collapse them again
    const reconciled = this.deduplicationEngine.deduplicate(filled.records);
    if (reconciled.metrics.duplicatesRemoved > 0) {
      logger.debug('Cleaning merged rows', { merged: reconciled.metrics.duplicatesRemoved });
    }

    // Step 5: Optional pruning
    let survivors = reconciled.records;
    let pruned = 0;
    if (this.processingConfig.pruneIncomplete) {
      progressCallback?.(75, ProcessingStep.PRUNING);
      const result = this.pruner.prune(survivors);
      survivors = result.records;
      pruned = result.pruned;
    }

    // Step 6: Projection
    progressCallback?.(90, ProcessingStep.PROJECTION);
    const records = this.projector.project(survivors);

    const issues = this.schemaValidator.validateCleaned(records);
    if (issues.length > 0) {
      const first = issues[0];
      throw new PipelineError(
        'PIPELINE_FAILED',
        `Cleaned output violates its schema at row ${first.row} (${first.field}): ${first.message}`
      );
    }

    progressCallback?.(100, ProcessingStep.COMPLETED);

    const result: PipelineResult = {
      records,
      metrics: {
        inputCount: source.length,
        outputCount: records.length,
        processing_time_ms: Date.now() - startTime,
        deduplication: deduped.metrics,
        normalization: normalized.metrics,
        gapFill: filled.metrics,
        mergedAfterCleaning: reconciled.metrics.duplicatesRemoved,
        pruned
      },
      warnings
    };

    logger.info('ETL pipeline completed', {
      input: result.metrics.inputCount,
      output: result.metrics.outputCount,
      duplicatesRemoved: deduped.metrics.duplicatesRemoved,
      mergedAfterCleaning: reconciled.metrics.duplicatesRemoved,
      warnings: warnings.length
    });

    return result;
  }
}

export default ETLPipeline;
