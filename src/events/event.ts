/**
 * Audit Event Model
 *
 * One event shape for everything the quality gate and the job layer
 * report: loop transitions, iteration records and job status changes.
 */

import { v4 as uuidv4 } from 'uuid';
import { isRecord } from '../utils/type-guards';

/**
 * What generated this event
 */
export type EventSource =
  | 'quality_gate'     // Controller transitions and iteration records
  | 'job'              // Job status changes
  | 'system';          // Server / CLI lifecycle

export const EVENT_SOURCES: readonly EventSource[] = ['quality_gate', 'job', 'system'];

/**
 * Job status change payload
 */
export interface JobEventData {
  jobId: string;
  previousStatus?: string;
  newStatus: string;
  error?: { code: string; message: string };
}

export interface Event {
  /** Unique event identifier */
  id: string;

  /** ISO 8601 timestamp */
  timestamp: string;

  source: EventSource;

  /** Human-readable summary */
  summary: string;

  data: JobEventData | Record<string, unknown>;

  /** Related entity IDs for tracing */
  relations: {
    documentId?: string;
    jobId?: string;
    parentEventId?: string;
  };

  tags?: string[];
}

export function createEvent(
  source: EventSource,
  summary: string,
  data: Event['data'],
  relations?: Event['relations'],
  tags?: string[]
): Event {
  return {
    id: `evt-${uuidv4()}`,
    timestamp: new Date().toISOString(),
    source,
    summary,
    data,
    relations: relations || {},
    tags,
  };
}

export function createJobEvent(
  jobId: string,
  newStatus: string,
  options?: {
    previousStatus?: string;
    documentId?: string;
    error?: { code: string; message: string };
  }
): Event {
  const data: JobEventData = {
    jobId,
    previousStatus: options?.previousStatus,
    newStatus,
    error: options?.error,
  };

  const summary = options?.previousStatus
    ? `Job ${jobId}: ${options.previousStatus} → ${newStatus}`
    : `Job ${jobId}: ${newStatus}`;

  return createEvent('job', summary, data, {
    jobId,
    documentId: options?.documentId,
  });
}

export function isJobEventData(data: Event['data']): data is JobEventData {
  return 'jobId' in data && 'newStatus' in data;
}

/**
 * Structural check for events read back from disk
 */
export function isEvent(value: unknown): value is Event {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.timestamp === 'string' &&
    typeof value.source === 'string' &&
    (EVENT_SOURCES as readonly string[]).includes(value.source) &&
    typeof value.summary === 'string' &&
    isRecord(value.data) &&
    isRecord(value.relations)
  );
}
