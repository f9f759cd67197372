/**
 * Job Service
 *
 * In-memory tracking of quality gate runs started over HTTP. Jobs are lost
 * on restart; the audit trail in the EventStore is not.
 */

import { v4 as uuidv4 } from 'uuid';
import type { QualityGateConfig } from '../config/gate-config';
import { serializeError, type SerializedError } from '../errors/gate-error';
import type { Document } from '../models/document';
import type { LoopResult } from '../models/loop';
import type { QualityGateController } from '../quality-gate/quality-gate-controller';
import { createJobEvent } from '../events/event';
import type { EventStore } from '../events/event-store';
import { GateLogger } from '../logging/gate-logger';

/**
 * PENDING -> RUNNING -> COMPLETED | FAILED
 */
export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  PENDING: ['RUNNING', 'FAILED'],
  RUNNING: ['COMPLETED', 'FAILED'],
  COMPLETED: [], // Terminal state
  FAILED: [], // Terminal state
};

export function isValidJobTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_JOB_TRANSITIONS[from].includes(to);
}

export interface Job {
  job_id: string;
  status: JobStatus;
  document_id: string;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  result?: LoopResult;
  error?: SerializedError;
}

interface JobRecord {
  job: Job;
  document: Document;
  config: Partial<QualityGateConfig>;
}

export interface JobServiceOptions {
  logger?: GateLogger;
  eventStore?: EventStore;
}

export class JobService {
  private readonly controller: QualityGateController;
  private readonly logger: GateLogger;
  private readonly eventStore?: EventStore;
  private readonly jobs: Map<string, JobRecord> = new Map();
  private readonly inFlight: Map<string, Promise<Job>> = new Map();

  constructor(controller: QualityGateController, options: JobServiceOptions = {}) {
    this.controller = controller;
    this.logger = options.logger ?? new GateLogger();
    this.eventStore = options.eventStore;
  }

  createJob(document: Document, config: Partial<QualityGateConfig> = {}): Job {
    const job: Job = {
      job_id: `job-${uuidv4()}`,
      status: 'PENDING',
      document_id: document.id,
      created_at: new Date().toISOString(),
    };

    this.jobs.set(job.job_id, { job, document, config });
    this.logger.log('info', 'JOB', `Created job ${job.job_id}`, { documentId: document.id, jobId: job.job_id });
    return { ...job };
  }

  getJob(jobId: string): Job | undefined {
    const record = this.jobs.get(jobId);
    return record ? { ...record.job } : undefined;
  }

  /**
   * Newest first
   */
  listJobs(): Job[] {
    return [...this.jobs.values()]
      .map(record => ({ ...record.job }))
      .reverse();
  }

  /**
   * Run a PENDING job to completion. Never rejects for a known job: a thrown
   * error marks the job FAILED.
   *
   * @throws Error when the job does not exist or is not PENDING
   */
  async runJob(jobId: string): Promise<Job> {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw new Error(`Job ${jobId} not found`);
    }
    if (record.job.status !== 'PENDING') {
      throw new Error(`Job ${jobId} is ${record.job.status}, not PENDING`);
    }

    await this.transition(record, 'RUNNING');
    record.job.started_at = new Date().toISOString();

    try {
      const result = await this.controller.run(record.document, record.config, { jobId });
      record.job.result = result;
      if (result.terminalReason === 'error') {
        record.job.error = result.error;
        await this.transition(record, 'FAILED');
      } else {
        await this.transition(record, 'COMPLETED');
      }
    } catch (error) {
      record.job.error = serializeError(error);
      this.logger.logError(`Job ${jobId} failed`, error, { documentId: record.job.document_id, jobId });
      await this.transition(record, 'FAILED');
    }

    record.job.completed_at = new Date().toISOString();
    return { ...record.job };
  }

  /**
   * Create a job and start it in the background
   */
  submit(document: Document, config: Partial<QualityGateConfig> = {}): Job {
    const job = this.createJob(document, config);
    const running = this.runJob(job.job_id).finally(() => this.inFlight.delete(job.job_id));
    this.inFlight.set(job.job_id, running);
    return job;
  }

  /**
   * Resolves when a submitted job settles; immediately for jobs not running
   */
  async waitFor(jobId: string): Promise<Job | undefined> {
    const running = this.inFlight.get(jobId);
    if (running) {
      return running;
    }
    return this.getJob(jobId);
  }

  async waitForAll(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  private async transition(record: JobRecord, to: JobStatus): Promise<void> {
    const from = record.job.status;
    if (!isValidJobTransition(from, to)) {
      throw new Error(`Invalid job transition ${from} -> ${to}`);
    }
    record.job.status = to;

    this.logger.log(to === 'FAILED' ? 'warn' : 'info', 'JOB', `Job ${record.job.job_id}: ${from} → ${to}`, {
      documentId: record.job.document_id,
      jobId: record.job.job_id,
    });

    if (this.eventStore) {
      const event = createJobEvent(record.job.job_id, to, {
        previousStatus: from,
        documentId: record.job.document_id,
        error: to === 'FAILED' ? record.job.error : undefined,
      });
      try {
        await this.eventStore.record(event);
      } catch (error) {
        this.logger.logError(`Failed to record job event for ${record.job.job_id}`, error, {
          jobId: record.job.job_id,
        });
      }
    }
  }
}
