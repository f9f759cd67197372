/**
 * Gate Logger - structured decision log
 *
 * Captures evaluation, routing, retry and revision decisions of the quality
 * gate. Entries are kept in a bounded in-memory buffer, streamed to
 * subscribers, and optionally echoed to the console.
 */

export type GateLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type GateLogCategory =
  | 'EVALUATION'
  | 'ROUTING'
  | 'REVISION'
  | 'RETRY'
  | 'CAPABILITY'
  | 'JOB'
  | 'CONFIG'
  | 'ERROR';

export interface GateLogEntry {
  timestamp: string;
  level: GateLogLevel;
  category: GateLogCategory;
  message: string;
  details?: Record<string, unknown>;
  documentId?: string;
  jobId?: string;
}

export interface GateLogSubscriber {
  onLog(entry: GateLogEntry): void;
}

export interface GateLoggerOptions {
  maxEntries?: number;
  /** Echo entries at or above this level to the console */
  consoleLevel?: GateLogLevel | 'silent';
}

export interface GateLogFilter {
  level?: GateLogLevel;
  category?: GateLogCategory;
  documentId?: string;
  jobId?: string;
}

const LEVEL_ORDER: Record<GateLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class GateLogger {
  private entries: GateLogEntry[] = [];
  private subscribers: Set<GateLogSubscriber> = new Set();
  private readonly maxEntries: number;
  private readonly consoleLevel: GateLogLevel | 'silent';

  constructor(options: GateLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.consoleLevel = options.consoleLevel ?? 'silent';
  }

  log(
    level: GateLogLevel,
    category: GateLogCategory,
    message: string,
    options: {
      details?: Record<string, unknown>;
      documentId?: string;
      jobId?: string;
    } = {}
  ): GateLogEntry {
    const entry: GateLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      documentId: options.documentId,
      jobId: options.jobId,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    this.writeToConsole(entry);

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Subscriber failures are reported, never rethrown
        console.error(`[quality-gate] log subscriber failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return entry;
  }

  debug(category: GateLogCategory, message: string, details?: Record<string, unknown>): GateLogEntry {
    return this.log('debug', category, message, { details });
  }

  info(category: GateLogCategory, message: string, details?: Record<string, unknown>): GateLogEntry {
    return this.log('info', category, message, { details });
  }

  warn(category: GateLogCategory, message: string, details?: Record<string, unknown>): GateLogEntry {
    return this.log('warn', category, message, { details });
  }

  error(category: GateLogCategory, message: string, details?: Record<string, unknown>): GateLogEntry {
    return this.log('error', category, message, { details });
  }

  logEvaluation(
    documentId: string,
    revisionNumber: number,
    overallScore: number,
    passed: boolean,
    issueCount: number
  ): GateLogEntry {
    return this.log(
      passed ? 'info' : 'warn',
      'EVALUATION',
      `Revision ${revisionNumber} scored ${overallScore}/10 (${passed ? 'PASS' : 'FAIL'}, ${issueCount} issue(s))`,
      {
        details: { revisionNumber, overallScore, passed, issueCount },
        documentId,
      }
    );
  }

  logRouting(
    documentId: string,
    decision: string,
    iterationCount: number,
    maxIterations: number
  ): GateLogEntry {
    return this.log('info', 'ROUTING', `Route: ${decision} (${iterationCount}/${maxIterations} revisions used)`, {
      details: { decision, iterationCount, maxIterations },
      documentId,
    });
  }

  logRetry(
    capability: string,
    attempt: number,
    delayMs: number,
    reason: string,
    documentId?: string
  ): GateLogEntry {
    return this.log('warn', 'RETRY', `RETRY ${capability} after attempt ${attempt} in ${delayMs}ms: ${reason}`, {
      details: { capability, attempt, delayMs, reason },
      documentId,
    });
  }

  logError(message: string, error: unknown, options: { documentId?: string; jobId?: string } = {}): GateLogEntry {
    return this.log('error', 'ERROR', message, {
      details: {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      ...options,
    });
  }

  getEntries(filter: GateLogFilter = {}): GateLogEntry[] {
    return this.entries.filter(e =>
      (filter.level === undefined || LEVEL_ORDER[e.level] >= LEVEL_ORDER[filter.level]) &&
      (filter.category === undefined || e.category === filter.category) &&
      (filter.documentId === undefined || e.documentId === filter.documentId) &&
      (filter.jobId === undefined || e.jobId === filter.jobId)
    );
  }

  getRecent(count: number = 50): GateLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: GateLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  private writeToConsole(entry: GateLogEntry): void {
    if (this.consoleLevel === 'silent' || LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.consoleLevel]) {
      return;
    }

    const scope = entry.documentId ? ` ${entry.documentId}` : '';
    const line = `[quality-gate] ${entry.level.toUpperCase()} ${entry.category}${scope}: ${entry.message}`;
    // stderr only; stdout carries command output
    if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }
}

// Shared instance for the CLI and web server
let globalLogger: GateLogger | null = null;

export function getGateLogger(): GateLogger {
  if (!globalLogger) {
    globalLogger = new GateLogger({ consoleLevel: 'info' });
  }
  return globalLogger;
}

export function resetGateLogger(): void {
  globalLogger = null;
}
