/**
 * Loop Models - controller bookkeeping and the final LoopResult
 */

import type { SerializedError } from '../errors/gate-error';
import type { Document } from './document';
import type { QualityReport } from './quality';

export type LoopPhase = 'EVALUATE' | 'REVISE' | 'DONE';

export type TerminalReason = 'passed' | 'exhausted' | 'error' | 'cancelled';

/**
 * Routing decision taken after an evaluation pass
 */
export type RoutingDecision = 'PASS' | 'REVISE' | 'EXHAUSTED';

/**
 * Controller bookkeeping, owned by a single run() invocation
 */
export interface LoopState {
  phase: LoopPhase;
  iterationCount: number;
  maxIterations: number;
  currentDocument: Document;
  /** Highest-scoring document seen so far; ties keep the earlier one */
  bestDocument: Document;
  bestScore: number;
  bestReport?: QualityReport;
  terminalReason: TerminalReason | 'none';
}

/**
 * Audit record emitted once per evaluation pass
 */
export interface IterationRecord {
  iteration: number;
  documentId: string;
  revisionNumber: number;
  started_at: string;
  ended_at: string;
  duration_ms: number;
  report: QualityReport;
  decision: RoutingDecision;
}

export interface LoopResult {
  /** Best-scoring document observed, not necessarily the last one */
  finalDocument: Document;
  /** Report of finalDocument; absent when no evaluation completed */
  finalReport?: QualityReport;
  /** Number of REVISE transitions performed */
  iterationsUsed: number;
  terminalReason: TerminalReason;
  history: IterationRecord[];
  error?: SerializedError;
}
