/**
 * Quality Gate Controller Tests
 *
 * Every scenario runs against fake capabilities with instant retries.
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  QualityGateController,
  type QualityGateEventType,
} from '../../../src/quality-gate/quality-gate-controller';
import { InputValidationError } from '../../../src/errors/gate-error';
import { ErrorCode } from '../../../src/errors/error-codes';
import { LLMAPIError } from '../../../src/llm/llm-client';
import { EventStore } from '../../../src/events/event-store';
import { isJobEventData } from '../../../src/events/event';
import { GateLogger } from '../../../src/logging/gate-logger';
import { createDocument, reviseDocument, type Document } from '../../../src/models/document';
import type { Claim } from '../../../src/models/quality';
import type { RetryEvent } from '../../../src/retry/transport-retry';
import {
  AppendingRevisionEngine,
  FixedClaimExtractor,
  INSTANT_RETRY,
  ScriptedCriticJudge,
  VerdictVerifier,
  buildArticle,
  buildDocument,
  createFakeCapabilities,
  uniformScores,
} from '../../helpers/fake-capabilities';

const SMALL_FLOOR = { minWordCount: 50 };

describe('QualityGateController', () => {
  let doc: Document;

  beforeEach(() => {
    doc = buildDocument(120);
  });

  describe('routing', () => {
    it('should pass immediately without revising a good draft', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([9.5]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'passed');
      assert.equal(result.iterationsUsed, 0);
      assert.equal(result.history.length, 1);
      assert.equal(result.history[0].decision, 'PASS');
      assert.equal(result.history[0].iteration, 1);
      assert.equal(result.finalDocument.revisionNumber, 0);
      assert.equal(result.finalDocument.body, doc.body);
      assert.equal(result.finalReport?.overallScore, 9.5);
      assert.equal(result.finalReport?.wordCount, 120);
      assert.equal(capabilities.revisionEngine.calls, 0);
      assert.equal(result.error, undefined);
    });

    it('should revise once and pass on the revised draft', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7, 9.2]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'passed');
      assert.equal(result.iterationsUsed, 1);
      assert.deepEqual(result.history.map(h => h.decision), ['REVISE', 'PASS']);
      assert.deepEqual(result.history.map(h => h.revisionNumber), [0, 1]);
      assert.equal(result.finalDocument.revisionNumber, 1);
      assert.equal(result.finalDocument.id, doc.id);
      assert.equal(result.finalReport?.overallScore, 9.2);
      assert.equal(result.finalReport?.evaluatedRevision, 1);
    });

    it('should stop after maxIterations revisions and keep the earliest draft on ties', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([8]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, { ...SMALL_FLOOR, maxIterations: 3 });

      assert.equal(result.terminalReason, 'exhausted');
      assert.equal(result.iterationsUsed, 3);
      assert.deepEqual(result.history.map(h => h.decision), ['REVISE', 'REVISE', 'REVISE', 'EXHAUSTED']);
      assert.equal(capabilities.revisionEngine.calls, 3);
      assert.equal(capabilities.criticJudge.calls, 4);
      assert.equal(result.finalDocument.revisionNumber, 0);
      assert.equal(result.finalReport?.overallScore, 8);
    });

    it('should return the best draft rather than the last one', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([6, 8, 7]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, { ...SMALL_FLOOR, maxIterations: 2 });

      assert.equal(result.terminalReason, 'exhausted');
      assert.equal(result.finalDocument.revisionNumber, 1);
      assert.equal(result.finalReport?.overallScore, 8);
      assert.equal(result.finalReport?.evaluatedRevision, 1);
    });

    it('should hand the issues of the failed pass to the revision engine', async () => {
      const critic = ScriptedCriticJudge.byRevision([7, 9.5], [
        { category: 'quality', severity: 'low', description: 'Intro is vague', targetLocation: 'Introduction', source: 'critic' },
      ]);
      const capabilities = createFakeCapabilities({ criticJudge: critic });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      await controller.run(doc, SMALL_FLOOR);

      assert.equal(capabilities.revisionEngine.received.length, 1);
      assert.deepEqual(capabilities.revisionEngine.received[0], [
        { category: 'quality', severity: 'low', description: 'Intro is vague', targetLocation: 'Introduction', source: 'critic' },
      ]);
    });

    it('should give the revision engine a score issue when the critic itemises nothing', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([5]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, { ...SMALL_FLOOR, maxIterations: 3 });

      assert.equal(result.terminalReason, 'exhausted');
      assert.equal(capabilities.revisionEngine.received.length, 3);
      for (const issues of capabilities.revisionEngine.received) {
        assert.deepEqual(issues, [{
          category: 'quality',
          severity: 'high',
          description: 'Overall score 5 is below the pass threshold 9',
          suggestion: 'Strengthen the weakest rubric categories: eeat (5), readability (5)',
          source: 'critic',
        }]);
      }
    });

    it('should pass after one revision removes a contradicted claim', async () => {
      const claim: Claim = { text: 'The bridge opened in 1850', locationHint: 'Details' };
      const extractor = new (class extends FixedClaimExtractor {
        async extractClaims(document: Document): Promise<Claim[]> {
          this.calls++;
          return document.revisionNumber === 0 ? [{ ...claim }] : [];
        }
      })();
      const capabilities = createFakeCapabilities({
        claimExtractor: extractor,
        verifier: new VerdictVerifier({ [claim.text]: { verdict: 'contradicted', confidence: 0.95 } }),
        criticJudge: ScriptedCriticJudge.byRevision([9.5]),
      });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'passed');
      assert.equal(result.iterationsUsed, 1);
      assert.deepEqual(result.history.map(h => h.decision), ['REVISE', 'PASS']);
      assert.equal(result.finalDocument.revisionNumber, 1);
      assert.deepEqual(capabilities.revisionEngine.received[0].map(i => [i.category, i.severity, i.source]), [
        ['factual', 'critical', 'claim_verification'],
      ]);
    });

    it('should pass the configured rubric to the critic', async () => {
      const capabilities = createFakeCapabilities();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });
      const rubric = { categories: [{ name: 'tone', description: 'Friendly tone' }] };

      await controller.run(doc, { ...SMALL_FLOOR, rubric });

      assert.deepEqual(capabilities.criticJudge.rubrics[0], rubric);
    });
  });

  describe('word-count floor', () => {
    it('should force the score to 0 and block the pass below the floor', async () => {
      const short = buildDocument(20);
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([10]) });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(short, { minWordCount: 100, maxIterations: 1 });

      assert.equal(result.terminalReason, 'exhausted');
      assert.equal(result.history.length, 2);
      const report = result.history[0].report;
      assert.equal(report.overallScore, 0);
      assert.equal(report.passed, false);
      assert.equal(report.wordCount, 20);
      assert.deepEqual(report.issues[0], {
        category: 'length',
        severity: 'critical',
        description: 'Article has 20 words; at least 100 are required',
        suggestion: 'Expand the article by at least 80 words',
        source: 'word_count',
      });
    });
  });

  describe('claims', () => {
    it('should block the pass on a contradicted claim', async () => {
      const capabilities = createFakeCapabilities({
        claimExtractor: new FixedClaimExtractor([{ text: 'The tower opened in 1850', locationHint: 'Details' }]),
        verifier: new VerdictVerifier({ 'The tower opened in 1850': { verdict: 'contradicted', confidence: 0.9 } }),
        criticJudge: ScriptedCriticJudge.byRevision([10]),
      });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, { ...SMALL_FLOOR, maxIterations: 1 });

      assert.equal(result.terminalReason, 'exhausted');
      const report = result.history[0].report;
      assert.equal(report.overallScore, 10);
      assert.equal(report.passed, false);
      assert.deepEqual(report.issues[0], {
        category: 'factual',
        severity: 'critical',
        description: 'Claim contradicted by sources: "The tower opened in 1850"',
        targetLocation: 'Details',
        suggestion: 'Correct or remove the claim',
        source: 'claim_verification',
      });
    });

    it('should give the verifier a frozen claim', async () => {
      const verifier = new VerdictVerifier();
      const capabilities = createFakeCapabilities({
        claimExtractor: new FixedClaimExtractor([{ text: 'Water boils at 100 C', locationHint: 'Details' }]),
        verifier,
      });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      await controller.run(doc, SMALL_FLOOR);

      assert.equal(verifier.calls, 1);
      assert.equal(Object.isFrozen(verifier.seen[0]), true);
    });

    it('should block the pass with a critical issue when claim extraction stays down', async () => {
      const extractor = new FixedClaimExtractor([], 100);
      const capabilities = createFakeCapabilities({
        claimExtractor: extractor,
        criticJudge: ScriptedCriticJudge.byRevision([10]),
      });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, { ...SMALL_FLOOR, maxIterations: 1 });

      assert.equal(result.terminalReason, 'exhausted');
      // 3 attempts per evaluation pass, two passes
      assert.equal(extractor.calls, 6);
      const issue = result.history[0].report.issues[0];
      assert.equal(issue.severity, 'critical');
      assert.equal(issue.category, 'factual');
      assert.equal(issue.source, 'claim_verification');
      assert.equal(issue.targetLocation, undefined);
      assert.ok(issue.description.startsWith('Claim verification unavailable: [E201]'));
    });

    it('should treat a claim as unverified when the verifier stays down', async () => {
      const capabilities = createFakeCapabilities({
        claimExtractor: new FixedClaimExtractor([{ text: 'Sales doubled in 2023', locationHint: 'Introduction' }]),
        verifier: new VerdictVerifier({}, { alwaysFail: true }),
        criticJudge: ScriptedCriticJudge.byRevision([10]),
      });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      // A medium issue does not block a passing score
      assert.equal(result.terminalReason, 'passed');
      const report = result.history[0].report;
      assert.deepEqual(report.claims, [
        { text: 'Sales doubled in 2023', locationHint: 'Introduction', verdict: 'unverified', confidence: 0 },
      ]);
      assert.deepEqual(report.issues, [{
        category: 'factual',
        severity: 'medium',
        description: 'Claim could not be verified: "Sales doubled in 2023"',
        targetLocation: 'Introduction',
        suggestion: 'Cite a source, soften the wording or remove the claim',
        source: 'claim_verification',
      }]);
    });
  });

  describe('transport retry', () => {
    it('should retry a transient critic failure without consuming an iteration', async () => {
      let failed = false;
      const critic = new ScriptedCriticJudge(() => {
        if (!failed) {
          failed = true;
          throw new Error('socket hang up');
        }
        return { subScores: uniformScores(9.5), issues: [] };
      });
      const retries: RetryEvent[] = [];
      const logger = new GateLogger();
      const controller = new QualityGateController(createFakeCapabilities({ criticJudge: critic }), {
        logger,
        retryHooks: { ...INSTANT_RETRY, onRetry: event => retries.push(event) },
      });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'passed');
      assert.equal(result.iterationsUsed, 0);
      assert.equal(critic.calls, 2);
      assert.equal(retries.length, 1);
      assert.equal(retries[0].capability, 'criticJudge');
      assert.equal(retries[0].attempt, 1);
      assert.equal(retries[0].failure_type, 'TRANSIENT_ERROR');
      assert.equal(logger.getEntries({ category: 'RETRY' }).length, 1);
    });

    it('should end in error once the critic exhausts its attempts', async () => {
      const critic = new ScriptedCriticJudge(() => {
        throw new Error('service unavailable');
      });
      const controller = new QualityGateController(createFakeCapabilities({ criticJudge: critic }), {
        retryHooks: INSTANT_RETRY,
      });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E201_CAPABILITY_UNAVAILABLE);
      assert.equal(critic.calls, 3);
      assert.equal(result.history.length, 0);
      assert.equal(result.finalReport, undefined);
      assert.equal(result.finalDocument.body, doc.body);
    });

    it('should not retry a client error from the provider', async () => {
      const critic = new ScriptedCriticJudge(() => {
        throw new LLMAPIError('openai', 400, 'bad request');
      });
      const controller = new QualityGateController(createFakeCapabilities({ criticJudge: critic }), {
        retryHooks: INSTANT_RETRY,
      });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E402_PROVIDER_REQUEST_FAILED);
      assert.equal(critic.calls, 1);
    });
  });

  describe('contract violations', () => {
    it('should end in error when a sub-score is out of range', async () => {
      const critic = new ScriptedCriticJudge(() => ({ subScores: { seo: 11 }, issues: [] }));
      const controller = new QualityGateController(createFakeCapabilities({ criticJudge: critic }), {
        retryHooks: INSTANT_RETRY,
      });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E302_SUB_SCORE_OUT_OF_RANGE);
      assert.equal(critic.calls, 1);
      assert.equal(result.history.length, 0);
    });

    it('should end in error when the revision counter skips', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7]) });
      capabilities.revisionEngine = new (class extends AppendingRevisionEngine {
        async revise(document: Document): Promise<Document> {
          this.calls++;
          return createDocument(document.body, { id: document.id, revisionNumber: document.revisionNumber + 2 });
        }
      })();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E301_REVISION_COUNTER_NOT_INCREMENTED);
      assert.equal(
        result.error?.message,
        '[E301] Revision engine did not increment the revision number: revisionEngine: expected revisionNumber 1, got 2'
      );
      assert.equal(capabilities.revisionEngine.calls, 1);
      assert.equal(result.iterationsUsed, 0);
      assert.equal(result.finalDocument.revisionNumber, 0);
      assert.equal(result.finalReport?.overallScore, 7);
    });

    it('should end in error when the revision counter does not move', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7]) });
      capabilities.revisionEngine = new (class extends AppendingRevisionEngine {
        async revise(document: Document): Promise<Document> {
          this.calls++;
          return createDocument(`${document.body}\n\nMore text`, { id: document.id, revisionNumber: document.revisionNumber });
        }
      })();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E301_REVISION_COUNTER_NOT_INCREMENTED);
      assert.equal(
        result.error?.message,
        '[E301] Revision engine did not increment the revision number: revisionEngine: expected revisionNumber 1, got 0'
      );
      assert.equal(capabilities.revisionEngine.calls, 1);
    });

    it('should end in error when the revision counter goes backwards', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7]) });
      capabilities.revisionEngine = new (class extends AppendingRevisionEngine {
        async revise(document: Document): Promise<Document> {
          this.calls++;
          return createDocument(document.body, { id: document.id, revisionNumber: document.revisionNumber - 1 });
        }
      })();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });
      const revised = createDocument(buildArticle(120), { id: 'doc-test', revisionNumber: 1 });

      const result = await controller.run(revised, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E301_REVISION_COUNTER_NOT_INCREMENTED);
      assert.ok(result.error?.message.endsWith('expected revisionNumber 2, got 0'));
      assert.equal(result.iterationsUsed, 0);
      assert.equal(result.finalDocument.revisionNumber, 1);
    });

    it('should end in error when a revision comes back empty', async () => {
      const capabilities = createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7]) });
      capabilities.revisionEngine = new (class extends AppendingRevisionEngine {
        async revise(document: Document): Promise<Document> {
          return { ...reviseDocument(document, 'x'), body: '   ' };
        }
      })();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'error');
      assert.equal(result.error?.code, ErrorCode.E305_EMPTY_REVISION);
    });
  });

  describe('cancellation', () => {
    it('should stop before the first evaluation when already aborted', async () => {
      const capabilities = createFakeCapabilities();
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });
      const abort = new AbortController();
      abort.abort();

      const result = await controller.run(doc, SMALL_FLOOR, { signal: abort.signal });

      assert.equal(result.terminalReason, 'cancelled');
      assert.equal(result.history.length, 0);
      assert.equal(result.finalReport, undefined);
      assert.equal(capabilities.criticJudge.calls, 0);
    });

    it('should stop before revising when aborted during evaluation', async () => {
      const abort = new AbortController();
      const critic = new ScriptedCriticJudge(() => {
        abort.abort();
        return { subScores: uniformScores(7), issues: [] };
      });
      const capabilities = createFakeCapabilities({ criticJudge: critic });
      const controller = new QualityGateController(capabilities, { retryHooks: INSTANT_RETRY });

      const result = await controller.run(doc, SMALL_FLOOR, { signal: abort.signal });

      assert.equal(result.terminalReason, 'cancelled');
      assert.equal(result.history.length, 1);
      assert.equal(result.history[0].decision, 'REVISE');
      assert.equal(capabilities.revisionEngine.calls, 0);
      assert.equal(result.finalReport?.overallScore, 7);
    });
  });

  describe('input validation', () => {
    it('should reject an empty body before calling any capability', async () => {
      const capabilities = createFakeCapabilities();
      const controller = new QualityGateController(capabilities);
      const empty: Document = { id: 'doc-empty', body: '   ', sectionCount: 0, revisionNumber: 0 };

      await assert.rejects(controller.run(empty), InputValidationError);
      assert.equal(capabilities.criticJudge.calls, 0);
    });

    it('should reject an out-of-range maxIterations with E104', async () => {
      const controller = new QualityGateController(createFakeCapabilities());

      await assert.rejects(controller.run(doc, { maxIterations: 0 }), (error: unknown) => {
        assert.ok(error instanceof InputValidationError);
        assert.equal(error.code, ErrorCode.E104_INVALID_GATE_OPTIONS);
        assert.equal(error.field, 'maxIterations');
        return true;
      });
    });
  });

  describe('events', () => {
    it('should emit loop events in order', async () => {
      const events: QualityGateEventType[] = [];
      const controller = new QualityGateController(
        createFakeCapabilities({ criticJudge: ScriptedCriticJudge.byRevision([7, 9.5]) }),
        { retryHooks: INSTANT_RETRY, eventCallback: type => events.push(type) }
      );

      await controller.run(doc, SMALL_FLOOR);

      assert.deepEqual(events, [
        'QUALITY_GATE_START',
        'EVALUATION_COMPLETE',
        'REVISION_START',
        'REVISION_COMPLETE',
        'EVALUATION_COMPLETE',
        'QUALITY_GATE_END',
      ]);
    });

    it('should keep running when the event callback throws', async () => {
      const logger = new GateLogger();
      const controller = new QualityGateController(createFakeCapabilities(), {
        logger,
        retryHooks: INSTANT_RETRY,
        eventCallback: () => {
          throw new Error('observer crashed');
        },
      });

      const result = await controller.run(doc, SMALL_FLOOR);

      assert.equal(result.terminalReason, 'passed');
      assert.equal(logger.getEntries({ category: 'ERROR' }).length, 3);
    });

    describe('with an event store', () => {
      let tempDir: string;

      beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gate-controller-test-'));
      });

      afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
      });

      it('should record every loop event against the document and job', async () => {
        const eventStore = new EventStore({ stateDir: tempDir });
        const controller = new QualityGateController(createFakeCapabilities(), {
          retryHooks: INSTANT_RETRY,
          eventStore,
        });

        await controller.run(doc, SMALL_FLOOR, { jobId: 'job-1' });

        const events = await eventStore.query({ documentId: doc.id, order: 'asc' });
        assert.deepEqual(events.map(e => e.tags), [
          ['QUALITY_GATE_START'],
          ['EVALUATION_COMPLETE'],
          ['QUALITY_GATE_END'],
        ]);
        assert.ok(events.every(e => e.source === 'quality_gate' && e.relations.jobId === 'job-1'));
        const end = events[2].data;
        assert.ok(!isJobEventData(end));
        assert.equal(end.terminal_reason, 'passed');
      });
    });
  });
});
