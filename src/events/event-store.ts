/**
 * EventStore - JSONL audit trail
 *
 * Events are appended to one file per day (`events-YYYY-MM-DD.jsonl`) under
 * `<stateDir>/events`, so an audit directory survives restarts and can be
 * read with ordinary line tools.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isEvent, type Event, type EventSource } from './event';
import type { GateLogger } from '../logging/gate-logger';

export interface EventQueryOptions {
  source?: EventSource;

  /** Events after this ISO 8601 time */
  after?: string;

  /** Events before this ISO 8601 time */
  before?: string;

  documentId?: string;

  jobId?: string;

  limit?: number;

  offset?: number;

  /** Default: descending by timestamp */
  order?: 'asc' | 'desc';
}

export interface EventStoreConfig {
  /** Base directory for storing events */
  stateDir: string;

  /** fsync after every append */
  syncWrites?: boolean;

  /** Receives warnings about unreadable lines */
  logger?: GateLogger;
}

export class EventStore {
  private readonly eventsDir: string;
  private readonly syncWrites: boolean;
  private readonly logger?: GateLogger;

  // Recent events, newest first
  private eventCache: Event[] = [];
  private cacheLoaded = false;
  private readonly MAX_CACHE_SIZE = 1000;

  constructor(config: EventStoreConfig) {
    this.eventsDir = path.join(config.stateDir, 'events');
    this.syncWrites = config.syncWrites ?? false;
    this.logger = config.logger;

    this.ensureDirectories();
  }

  private ensureDirectories(): void {
    if (!fs.existsSync(this.eventsDir)) {
      fs.mkdirSync(this.eventsDir, { recursive: true });
    }
  }

  private getFilePath(timestamp: string): string {
    return path.join(this.eventsDir, `events-${timestamp.slice(0, 10)}.jsonl`);
  }

  /**
   * Event files, newest date first
   */
  private getEventFilePaths(): string[] {
    if (!fs.existsSync(this.eventsDir)) {
      return [];
    }

    return fs
      .readdirSync(this.eventsDir)
      .filter(f => f.startsWith('events-') && f.endsWith('.jsonl'))
      .sort()
      .reverse()
      .map(f => path.join(this.eventsDir, f));
  }

  async record(event: Event): Promise<void> {
    const filePath = this.getFilePath(event.timestamp);
    await fs.promises.appendFile(filePath, JSON.stringify(event) + '\n', { flag: 'a' });

    if (this.syncWrites) {
      const fd = await fs.promises.open(filePath, 'r');
      try {
        await fd.sync();
      } finally {
        await fd.close();
      }
    }

    this.addToCache(event);
  }

  recordSync(event: Event): void {
    const filePath = this.getFilePath(event.timestamp);
    fs.appendFileSync(filePath, JSON.stringify(event) + '\n', { flag: 'a' });

    if (this.syncWrites) {
      const fd = fs.openSync(filePath, 'r');
      try {
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
    }

    this.addToCache(event);
  }

  private addToCache(event: Event): void {
    if (!this.cacheLoaded) {
      // Loaded from disk on first query
      return;
    }
    this.eventCache.unshift(event);
    if (this.eventCache.length > this.MAX_CACHE_SIZE) {
      this.eventCache.pop();
    }
  }

  private async loadFromDisk(): Promise<Event[]> {
    const events: Event[] = [];

    for (const filePath of this.getEventFilePaths()) {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      const lines = content.split('\n').filter(line => line.trim().length > 0);

      // Newest line first, matching the cache order
      lines.reverse().forEach((line, index) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (error) {
          parsed = undefined;
          this.logger?.warn('ERROR', `Skipping malformed event line ${lines.length - index} in ${filePath}`, {
            error: error instanceof Error ? error.message : String(error),
          });
        }
        if (isEvent(parsed)) {
          events.push(parsed);
        }
      });
    }

    events.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    return events.slice(0, this.MAX_CACHE_SIZE);
  }

  async query(options?: EventQueryOptions): Promise<Event[]> {
    if (!this.cacheLoaded) {
      this.eventCache = await this.loadFromDisk();
      this.cacheLoaded = true;
    }

    const after = options?.after;
    const before = options?.before;
    let events = [...this.eventCache];

    if (options?.source) {
      events = events.filter(e => e.source === options.source);
    }
    if (after) {
      events = events.filter(e => e.timestamp > after);
    }
    if (before) {
      events = events.filter(e => e.timestamp < before);
    }
    if (options?.documentId) {
      events = events.filter(e => e.relations.documentId === options.documentId);
    }
    if (options?.jobId) {
      events = events.filter(e => e.relations.jobId === options.jobId);
    }

    // Stable sorts keep append order for equal timestamps
    if (options?.order === 'asc') {
      events.reverse();
      events.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    } else {
      events.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    }

    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? events.length;
    return events.slice(offset, offset + limit);
  }

  async get(eventId: string): Promise<Event | null> {
    const events = await this.query();
    return events.find(e => e.id === eventId) || null;
  }

  async count(options?: EventQueryOptions): Promise<number> {
    const events = await this.query({ ...options, limit: undefined, offset: undefined });
    return events.length;
  }

  /**
   * Delete every event file
   */
  async clear(): Promise<void> {
    for (const filePath of this.getEventFilePaths()) {
      await fs.promises.unlink(filePath);
    }
    this.eventCache = [];
    this.cacheLoaded = true;
  }

  async reload(): Promise<void> {
    this.eventCache = await this.loadFromDisk();
    this.cacheLoaded = true;
  }

  async getStats(): Promise<{
    totalEvents: number;
    fileCount: number;
    oldestEvent?: string;
    newestEvent?: string;
    bySource: Partial<Record<EventSource, number>>;
  }> {
    const events = await this.query();
    const bySource: Partial<Record<EventSource, number>> = {};

    for (const event of events) {
      bySource[event.source] = (bySource[event.source] ?? 0) + 1;
    }

    return {
      totalEvents: events.length,
      fileCount: this.getEventFilePaths().length,
      oldestEvent: events[events.length - 1]?.timestamp,
      newestEvent: events[0]?.timestamp,
      bySource,
    };
  }
}
