import { EventEmitter } from 'events';
import { JobProgress, ProcessingStep } from '../types';

/**
 * In-process job progress tracking.
 * Emits jobStarted, progressUpdated, jobCompleted and jobFailed.
 */
export class JobTracker extends EventEmitter {
  private jobs = new Map<string, JobProgress>();

  /**
   * Start tracking a job
   */
  startJob(jobId: string, totalRows?: number): JobProgress {
    const progress: JobProgress = {
      job_id: jobId,
      status: 'processing',
      progress: 0,
      current_step: ProcessingStep.QUEUED,
      total_rows: totalRows,
      processed_rows: 0,
      errors_count: 0,
      warnings_count: 0,
      started_at: new Date().toISOString()
    };

    this.jobs.set(jobId, progress);
    this.emit('jobStarted', { ...progress });
    return { ...progress };
  }

  /**
   * Update job progress
   */
  updateProgress(jobId: string, updates: Partial<Omit<JobProgress, 'job_id'>>): JobProgress {
    const current = this.requireJob(jobId);
    const updated: JobProgress = {
      ...current,
      ...updates,
      progress: Math.min(100, Math.max(0, updates.progress ?? current.progress))
    };

    this.jobs.set(jobId, updated);
    this.emit('progressUpdated', { ...updated });
    return { ...updated };
  }

  completeJob(jobId: string, processedRows: number, warningsCount: number): JobProgress {
    const completed: JobProgress = {
      ...this.requireJob(jobId),
      status: 'completed',
      progress: 100,
      current_step: ProcessingStep.COMPLETED,
      processed_rows: processedRows,
      warnings_count: warningsCount,
      completed_at: new Date().toISOString()
    };

    this.jobs.set(jobId, completed);
    this.emit('jobCompleted', { ...completed });
    return { ...completed };
  }

  failJob(jobId: string, errorMessage: string): JobProgress {
    const current = this.requireJob(jobId);
    const failed: JobProgress = {
      ...current,
      status: 'failed',
      errors_count: current.errors_count + 1,
      completed_at: new Date().toISOString()
    };

    this.jobs.set(jobId, failed);
    this.emit('jobFailed', { ...failed }, errorMessage);
    return { ...failed };
  }

  getJob(jobId: string): JobProgress | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  private requireJob(jobId: string): JobProgress {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found in active jobs`);
    }
    return job;
  }
}

export default JobTracker;
