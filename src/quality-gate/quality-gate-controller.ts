/**
 * Quality Gate Controller
 *
 * Drives a draft through EVALUATE -> (PASS | REVISE | EXHAUSTED) until it
 * passes, the revision budget runs out, the caller cancels, or a capability
 * fails for good. The best draft seen is always returned.
 *
 * - At most `maxIterations` REVISE transitions
 * - Every pass re-evaluates the current draft from scratch
 * - Transport retries never consume the revision budget
 * - `run()` throws only for invalid input; every other failure ends in a
 *   LoopResult with terminalReason "error"
 */

import { ErrorCode } from '../errors/error-codes';
import {
  ContractViolationError,
  TransientCapabilityError,
  serializeError,
  type SerializedError,
} from '../errors/gate-error';
import { resolveGateConfig, type QualityGateConfig } from '../config/gate-config';
import { validateDocument, type Document } from '../models/document';
import type { Claim, Issue, QualityReport } from '../models/quality';
import type {
  IterationRecord,
  LoopResult,
  LoopState,
  RoutingDecision,
  TerminalReason,
} from '../models/loop';
import type { CritiqueResult, QualityGateCapabilities } from '../capabilities/types';
import { GateLogger } from '../logging/gate-logger';
import { createEvent } from '../events/event';
import type { EventStore } from '../events/event-store';
import {
  withTransportRetry,
  type RetryHooks,
  type TransportRetryPolicy,
} from '../retry/transport-retry';
import {
  buildQualityReport,
  checkClaims,
  checkWordCount,
  claimVerificationUnavailableIssue,
  validateCritique,
  validateExtractedClaims,
  validateVerifiedClaim,
} from './aggregation';

// ============================================================================
// Types
// ============================================================================

export type QualityGateEventType =
  | 'QUALITY_GATE_START'
  | 'EVALUATION_COMPLETE'
  | 'REVISION_START'
  | 'REVISION_COMPLETE'
  | 'QUALITY_GATE_END';

/**
 * Event emitter callback for observers
 */
export type QualityGateEventCallback = (
  eventType: QualityGateEventType,
  content: Record<string, unknown>
) => void;

export interface QualityGateControllerOptions {
  /** Defaults to a silent logger */
  logger?: GateLogger;
  eventCallback?: QualityGateEventCallback;
  /** Persistent audit trail; every emitted event is recorded here too */
  eventStore?: EventStore;
  /** Sleep / random overrides for the transport retry */
  retryHooks?: RetryHooks;
}

export interface RunOptions {
  /** Checked between iterations, never mid-evaluation */
  signal?: AbortSignal;
  /** Job this run belongs to, for log and event correlation */
  jobId?: string;
}

interface RunContext {
  config: QualityGateConfig;
  documentId: string;
  jobId?: string;
}

interface ClaimCheck {
  claims: Claim[];
  issues: Issue[];
}

/**
 * A passing report outranks a failing one; otherwise the higher score wins.
 * Ties keep the earlier draft.
 */
function improvesOn(report: QualityReport, best: QualityReport | undefined): boolean {
  if (!best) {
    return true;
  }
  if (report.passed !== best.passed) {
    return report.passed;
  }
  return report.overallScore > best.overallScore;
}

// ============================================================================
// Controller
// ============================================================================

export class QualityGateController {
  private readonly capabilities: QualityGateCapabilities;
  private readonly logger: GateLogger;
  private readonly eventCallback?: QualityGateEventCallback;
  private readonly eventStore?: EventStore;
  private readonly retryHooks: RetryHooks;

  constructor(capabilities: QualityGateCapabilities, options: QualityGateControllerOptions = {}) {
    this.capabilities = capabilities;
    this.logger = options.logger ?? new GateLogger();
    this.eventCallback = options.eventCallback;
    this.eventStore = options.eventStore;
    this.retryHooks = options.retryHooks ?? {};
  }

  /**
   * Run the quality loop on a draft
   *
   * @throws InputValidationError for an invalid document or options, before
   *   any capability is called
   */
  async run(
    initialDocument: Document,
    config: Partial<QualityGateConfig> = {},
    runOptions: RunOptions = {}
  ): Promise<LoopResult> {
    const document = validateDocument(initialDocument);
    const resolved = Object.freeze(resolveGateConfig(config));
    const ctx: RunContext = { config: resolved, documentId: document.id, jobId: runOptions.jobId };
    const signal = runOptions.signal;

    const state: LoopState = {
      phase: 'EVALUATE',
      iterationCount: 0,
      maxIterations: resolved.maxIterations,
      currentDocument: document,
      bestDocument: document,
      bestScore: Number.NEGATIVE_INFINITY,
      terminalReason: 'none',
    };
    const history: IterationRecord[] = [];
    let error: SerializedError | undefined;

    this.logger.log('info', 'EVALUATION', `Quality gate started (max ${resolved.maxIterations} revisions)`, {
      details: { passThreshold: resolved.passThreshold, minWordCount: resolved.minWordCount },
      documentId: ctx.documentId,
      jobId: ctx.jobId,
    });
    await this.emitEvent(ctx, 'QUALITY_GATE_START', {
      revision_number: document.revisionNumber,
      max_iterations: resolved.maxIterations,
      pass_threshold: resolved.passThreshold,
    });

    let terminalReason: TerminalReason | undefined;
    try {
      while (terminalReason === undefined) {
        if (signal?.aborted) {
          terminalReason = 'cancelled';
          break;
        }

        const current = state.currentDocument;
        const startedAt = new Date();
        const report = await this.evaluate(current, ctx);
        const endedAt = new Date();

        if (improvesOn(report, state.bestReport)) {
          state.bestDocument = current;
          state.bestScore = report.overallScore;
          state.bestReport = report;
        }

        let decision: RoutingDecision;
        if (report.passed) {
          decision = 'PASS';
        } else if (state.iterationCount >= state.maxIterations) {
          decision = 'EXHAUSTED';
        } else {
          decision = 'REVISE';
        }

        const record: IterationRecord = {
          iteration: history.length + 1,
          documentId: current.id,
          revisionNumber: current.revisionNumber,
          started_at: startedAt.toISOString(),
          ended_at: endedAt.toISOString(),
          duration_ms: endedAt.getTime() - startedAt.getTime(),
          report,
          decision,
        };
        history.push(record);

        this.logger.logEvaluation(
          current.id,
          current.revisionNumber,
          report.overallScore,
          report.passed,
          report.issues.length
        );
        this.logger.logRouting(current.id, decision, state.iterationCount, state.maxIterations);
        await this.emitEvent(ctx, 'EVALUATION_COMPLETE', { ...record });

        if (decision === 'PASS') {
          terminalReason = 'passed';
        } else if (decision === 'EXHAUSTED') {
          terminalReason = 'exhausted';
        } else if (signal?.aborted) {
          terminalReason = 'cancelled';
        } else {
          state.phase = 'REVISE';
          state.currentDocument = await this.revise(current, report.issues, ctx);
          state.iterationCount += 1;
          state.phase = 'EVALUATE';
        }
      }
    } catch (caught) {
      terminalReason = 'error';
      error = serializeError(caught);
      this.logger.logError('Quality gate failed', caught, { documentId: ctx.documentId, jobId: ctx.jobId });
    }

    const reason: TerminalReason = terminalReason ?? 'error';
    state.phase = 'DONE';
    state.terminalReason = reason;

    const result: LoopResult = {
      finalDocument: state.bestDocument,
      finalReport: state.bestReport,
      iterationsUsed: state.iterationCount,
      terminalReason: reason,
      history,
      error,
    };

    this.logger.log(
      reason === 'error' ? 'error' : 'info',
      'ROUTING',
      `Quality gate finished: ${reason} after ${state.iterationCount} revision(s)`,
      {
        details: { bestScore: state.bestReport ? state.bestScore : null, bestRevision: state.bestDocument.revisionNumber },
        documentId: ctx.documentId,
        jobId: ctx.jobId,
      }
    );
    await this.emitEvent(ctx, 'QUALITY_GATE_END', {
      terminal_reason: reason,
      iterations_used: state.iterationCount,
      best_score: state.bestReport ? state.bestScore : null,
      best_revision: state.bestDocument.revisionNumber,
      error,
    });

    return result;
  }

  // ==========================================================================
  // Evaluation
  // ==========================================================================

  /**
   * Fan-out evaluation; the three checks are independent
   */
  private async evaluate(document: Document, ctx: RunContext): Promise<QualityReport> {
    const [claimCheck, critique] = await Promise.all([
      this.checkClaims(document, ctx),
      this.critique(document, ctx),
    ]);
    const wordCheck = checkWordCount(document, ctx.config.minWordCount);

    return buildQualityReport({
      document,
      wordCheck,
      claims: claimCheck.claims,
      claimIssues: claimCheck.issues,
      critique,
      passThreshold: ctx.config.passThreshold,
      rubricWeights: ctx.config.rubricWeights,
    });
  }

  private async checkClaims(document: Document, ctx: RunContext): Promise<ClaimCheck> {
    let extracted: Claim[];
    try {
      extracted = validateExtractedClaims(
        await this.call('claimExtractor', () => this.capabilities.claimExtractor.extractClaims(document), ctx)
      );
    } catch (error) {
      if (error instanceof TransientCapabilityError) {
        this.logger.log('warn', 'CAPABILITY', 'Claim extraction unavailable; blocking the pass', {
          details: { error: error.message },
          documentId: ctx.documentId,
          jobId: ctx.jobId,
        });
        return { claims: [], issues: [claimVerificationUnavailableIssue(error.message)] };
      }
      throw error;
    }

    const claims = await Promise.all(extracted.map(claim => this.verifyClaim(claim, ctx)));
    return { claims, issues: checkClaims(claims, ctx.config.claimShortfallThreshold) };
  }

  private async verifyClaim(claim: Claim, ctx: RunContext): Promise<Claim> {
    const frozen = Object.freeze({ ...claim });
    try {
      const verified = await this.call(
        'verifier',
        () => this.capabilities.verifier.verify(frozen, this.capabilities.knowledgeStore),
        ctx
      );
      return validateVerifiedClaim(frozen, verified);
    } catch (error) {
      if (error instanceof TransientCapabilityError) {
        this.logger.log('warn', 'CAPABILITY', `Verifier unavailable; treating claim as unverified: "${claim.text}"`, {
          details: { error: error.message },
          documentId: ctx.documentId,
          jobId: ctx.jobId,
        });
        return { text: claim.text, locationHint: claim.locationHint, verdict: 'unverified', confidence: 0 };
      }
      throw error;
    }
  }

  private async critique(document: Document, ctx: RunContext): Promise<CritiqueResult> {
    const result = await this.call(
      'criticJudge',
      () => this.capabilities.criticJudge.critique(document, ctx.config.rubric),
      ctx
    );
    return validateCritique(result);
  }

  // ==========================================================================
  // Revision
  // ==========================================================================

  /**
   * @throws ContractViolationError when the revision counter does not move
   *   by exactly one or the body comes back empty
   * @throws Error when there is nothing to fix
   */
  private async revise(document: Document, issues: readonly Issue[], ctx: RunContext): Promise<Document> {
    if (issues.length === 0) {
      throw new Error(`Revision ${document.revisionNumber} routed to REVISE without issues`);
    }

    await this.emitEvent(ctx, 'REVISION_START', {
      revision_number: document.revisionNumber,
      issue_count: issues.length,
    });
    this.logger.log('info', 'REVISION', `Revising revision ${document.revisionNumber} (${issues.length} issue(s))`, {
      documentId: ctx.documentId,
      jobId: ctx.jobId,
    });

    const revised = await this.call(
      'revisionEngine',
      () => this.capabilities.revisionEngine.revise(document, issues),
      ctx
    );

    const expected = document.revisionNumber + 1;
    if (revised.revisionNumber !== expected) {
      throw new ContractViolationError(
        ErrorCode.E301_REVISION_COUNTER_NOT_INCREMENTED,
        'revisionEngine',
        `expected revisionNumber ${expected}, got ${String(revised.revisionNumber)}`
      );
    }
    if (typeof revised.body !== 'string' || revised.body.trim() === '') {
      throw new ContractViolationError(ErrorCode.E305_EMPTY_REVISION, 'revisionEngine', `revision ${expected}`);
    }

    const next = Object.isFrozen(revised) ? revised : Object.freeze({ ...revised });
    await this.emitEvent(ctx, 'REVISION_COMPLETE', {
      revision_number: next.revisionNumber,
      section_count: next.sectionCount,
    });
    return next;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private call<T>(capability: string, operation: () => Promise<T>, ctx: RunContext): Promise<T> {
    const policy: TransportRetryPolicy = ctx.config.transport;
    return withTransportRetry(capability, operation, policy, {
      ...this.retryHooks,
      onRetry: event => {
        this.logger.logRetry(event.capability, event.attempt, event.delay_ms, event.error, ctx.documentId);
        this.retryHooks.onRetry?.(event);
      },
    });
  }

  /**
   * Emit event through the callback and the audit store
   */
  private async emitEvent(
    ctx: RunContext,
    eventType: QualityGateEventType,
    content: Record<string, unknown>
  ): Promise<void> {
    if (this.eventCallback) {
      try {
        this.eventCallback(eventType, content);
      } catch (error) {
        this.logger.logError(`Event callback failed for ${eventType}`, error, {
          documentId: ctx.documentId,
          jobId: ctx.jobId,
        });
      }
    }

    if (this.eventStore) {
      const event = createEvent(
        'quality_gate',
        `${eventType} ${ctx.documentId}`,
        { event_type: eventType, ...content },
        { documentId: ctx.documentId, jobId: ctx.jobId },
        [eventType]
      );
      try {
        await this.eventStore.record(event);
      } catch (error) {
        this.logger.logError(`Failed to record ${eventType} event`, error, {
          documentId: ctx.documentId,
          jobId: ctx.jobId,
        });
      }
    }
  }
}
