/**
 * Aggregation Tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  buildQualityReport,
  checkClaims,
  checkWordCount,
  claimVerificationUnavailableIssue,
  combineSubScores,
  compareIssues,
  scoreShortfallIssue,
  sortIssues,
  validateCritique,
  validateExtractedClaims,
  validateVerifiedClaim,
} from '../../../src/quality-gate/aggregation';
import { ContractViolationError } from '../../../src/errors/gate-error';
import { ErrorCode } from '../../../src/errors/error-codes';
import { DEFAULT_RUBRIC_WEIGHTS } from '../../../src/config/gate-config';
import { createDocument } from '../../../src/models/document';
import type { Issue } from '../../../src/models/quality';
import { buildDocument, uniformScores } from '../../helpers/fake-capabilities';

function expectContractError(fn: () => unknown, code: ErrorCode): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof ContractViolationError);
    assert.equal(error.code, code);
    return true;
  });
}

describe('Aggregation', () => {
  describe('checkWordCount', () => {
    it('should raise nothing at or above the floor', () => {
      const check = checkWordCount(buildDocument(60), 60);
      assert.deepEqual(check, { wordCount: 60, issues: [] });
    });

    it('should raise one critical length issue below the floor', () => {
      const check = checkWordCount(createDocument('## Intro\n\nOnly five words here.'), 10);
      assert.equal(check.wordCount, 5);
      assert.deepEqual(check.issues, [{
        category: 'length',
        severity: 'critical',
        description: 'Article has 5 words; at least 10 are required',
        suggestion: 'Expand the article by at least 5 words',
        source: 'word_count',
      }]);
    });
  });

  describe('checkClaims', () => {
    it('should flag contradicted claims as critical', () => {
      const issues = checkClaims([
        { text: 'Mars has three moons', locationHint: 'Space', verdict: 'contradicted', confidence: 0.95 },
      ], 0.5);
      assert.equal(issues.length, 1);
      assert.equal(issues[0].severity, 'critical');
      assert.equal(issues[0].targetLocation, 'Space');
    });

    it('should flag unverified claims only when the shortfall exceeds the threshold', () => {
      const issues = checkClaims([
        { text: 'high confidence', locationHint: 'A', verdict: 'unverified', confidence: 0.6 },
        { text: 'at threshold', locationHint: 'A', verdict: 'unverified', confidence: 0.5 },
        { text: 'low confidence', locationHint: 'A', verdict: 'unverified', confidence: 0.4 },
        { text: 'no confidence', locationHint: '', verdict: 'unverified' },
      ], 0.5);

      assert.deepEqual(issues.map(i => i.description), [
        'Claim could not be verified: "low confidence"',
        'Claim could not be verified: "no confidence"',
      ]);
      assert.ok(issues.every(i => i.severity === 'medium' && i.category === 'factual'));
      assert.equal(issues[1].targetLocation, undefined);
    });

    it('should ignore verified claims', () => {
      assert.deepEqual(checkClaims([
        { text: 'fine', locationHint: 'A', verdict: 'verified', confidence: 0.1 },
      ], 0), []);
    });

    it('should describe an unavailable verification as a whole-document critical issue', () => {
      assert.deepEqual(claimVerificationUnavailableIssue('timeout'), {
        category: 'factual',
        severity: 'critical',
        description: 'Claim verification unavailable: timeout',
        source: 'claim_verification',
      });
    });
  });

  describe('combineSubScores', () => {
    it('should take the weighted mean under the default weights', () => {
      const score = combineSubScores({ seo: 8, eeat: 9, structure: 10, readability: 7 }, DEFAULT_RUBRIC_WEIGHTS);
      assert.equal(score, 8.5);
    });

    it('should ignore categories without a positive weight', () => {
      assert.equal(combineSubScores({ seo: 10, tone: 0 }, DEFAULT_RUBRIC_WEIGHTS), 10);
    });

    it('should fall back to the plain mean when no category is weighted', () => {
      assert.equal(combineSubScores({ tone: 6, style: 8 }, DEFAULT_RUBRIC_WEIGHTS), 7);
    });

    it('should round to two decimals', () => {
      assert.equal(combineSubScores({ a: 1, b: 2, c: 2 }, {}), 1.67);
    });

    it('should return 0 for no sub-scores', () => {
      assert.equal(combineSubScores({}, DEFAULT_RUBRIC_WEIGHTS), 0);
    });
  });

  describe('validateCritique', () => {
    it('should accept a well-formed critique and tag issues with their source', () => {
      const result = validateCritique({
        subScores: { seo: 7.5 },
        issues: [
          { category: 'structural', severity: 'high', description: 'No FAQ', targetLocation: '  ', suggestion: 'Add one' },
          { category: 'quality', severity: 'low', description: 'Wordy', targetLocation: 'Intro' },
        ],
      });

      assert.deepEqual(result, {
        subScores: { seo: 7.5 },
        issues: [
          { category: 'structural', severity: 'high', description: 'No FAQ', suggestion: 'Add one', source: 'critic' },
          { category: 'quality', severity: 'low', description: 'Wordy', targetLocation: 'Intro', source: 'critic' },
        ],
      });
    });

    it('should reject sub-scores outside 0-10 rather than clamp them', () => {
      expectContractError(() => validateCritique({ subScores: { seo: 10.5 }, issues: [] }), ErrorCode.E302_SUB_SCORE_OUT_OF_RANGE);
      expectContractError(() => validateCritique({ subScores: { seo: -1 }, issues: [] }), ErrorCode.E302_SUB_SCORE_OUT_OF_RANGE);
      expectContractError(() => validateCritique({ subScores: { seo: 'high' }, issues: [] }), ErrorCode.E302_SUB_SCORE_OUT_OF_RANGE);
    });

    it('should reject malformed shapes', () => {
      expectContractError(() => validateCritique(null), ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT);
      expectContractError(() => validateCritique({ subScores: {}, issues: [] }), ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT);
      expectContractError(
        () => validateCritique({ subScores: { seo: 5 }, issues: [{ category: 'style', severity: 'low', description: 'x' }] }),
        ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT
      );
    });
  });

  describe('validateExtractedClaims', () => {
    it('should default a missing location to the empty string', () => {
      assert.deepEqual(validateExtractedClaims([{ text: 'A claim' }]), [{ text: 'A claim', locationHint: '' }]);
    });

    it('should reject non-arrays and claims without text', () => {
      expectContractError(() => validateExtractedClaims({ claims: [] }), ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT);
      expectContractError(() => validateExtractedClaims([{ text: ' ' }]), ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT);
    });
  });

  describe('validateVerifiedClaim', () => {
    const original = { text: 'The bridge is 2 km long', locationHint: 'Facts' };

    it('should keep the original text and string sources', () => {
      const claim = validateVerifiedClaim(original, {
        text: 'rewritten by the verifier',
        verdict: 'verified',
        confidence: 0.8,
        sources: ['notes.md#1', 42],
      });
      assert.deepEqual(claim, {
        text: 'The bridge is 2 km long',
        locationHint: 'Facts',
        verdict: 'verified',
        confidence: 0.8,
        sources: ['notes.md#1'],
      });
    });

    it('should reject unknown verdicts and out-of-range confidence', () => {
      expectContractError(() => validateVerifiedClaim(original, { verdict: 'maybe', confidence: 0.5 }), ErrorCode.E304_INVALID_CLAIM_VERDICT);
      expectContractError(() => validateVerifiedClaim(original, { verdict: 'verified', confidence: 1.2 }), ErrorCode.E304_INVALID_CLAIM_VERDICT);
      expectContractError(() => validateVerifiedClaim(original, { verdict: 'verified' }), ErrorCode.E304_INVALID_CLAIM_VERDICT);
    });
  });

  describe('issue ordering', () => {
    const issue = (overrides: Partial<Issue>): Issue => ({
      category: 'quality',
      severity: 'low',
      description: 'd',
      source: 'critic',
      ...overrides,
    });

    it('should order by severity, category, then located before whole-document', () => {
      const sorted = sortIssues([
        issue({ description: 'low whole' }),
        issue({ description: 'low located', targetLocation: 'Intro' }),
        issue({ description: 'critical quality', severity: 'critical' }),
        issue({ description: 'critical factual', severity: 'critical', category: 'factual' }),
        issue({ description: 'high length', severity: 'high', category: 'length' }),
      ]);

      assert.deepEqual(sorted.map(i => i.description), [
        'critical factual',
        'critical quality',
        'high length',
        'low located',
        'low whole',
      ]);
    });

    it('should break remaining ties by location then description', () => {
      assert.ok(compareIssues(issue({ targetLocation: 'A' }), issue({ targetLocation: 'B' })) < 0);
      assert.ok(compareIssues(issue({ description: 'b' }), issue({ description: 'a' })) > 0);
      assert.equal(compareIssues(issue({}), issue({})), 0);
    });

    it('should not modify its input', () => {
      const input = [issue({ severity: 'low' }), issue({ severity: 'critical' })];
      sortIssues(input);
      assert.equal(input[0].severity, 'low');
    });
  });

  describe('buildQualityReport', () => {
    const document = buildDocument(60);

    it('should pass when the score meets the threshold and nothing is critical', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [],
        critique: { subScores: uniformScores(9), issues: [] },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.equal(report.overallScore, 9);
      assert.equal(report.passed, true);
      assert.equal(report.evaluatedRevision, 0);
      assert.ok(Object.isFrozen(report));
      assert.ok(Object.isFrozen(report.issues));
    });

    it('should fail a high score with a critical issue', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [claimVerificationUnavailableIssue('down')],
        critique: { subScores: uniformScores(10), issues: [] },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.equal(report.overallScore, 10);
      assert.equal(report.passed, false);
    });

    it('should add a score shortfall issue when the critic names no defect', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [],
        critique: { subScores: { seo: 6, eeat: 4, structure: 5, readability: 8 }, issues: [] },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.equal(report.overallScore, 5.6);
      assert.equal(report.passed, false);
      assert.deepEqual(report.issues, [{
        category: 'quality',
        severity: 'high',
        description: 'Overall score 5.6 is below the pass threshold 9',
        suggestion: 'Strengthen the weakest rubric categories: eeat (4), structure (5)',
        source: 'critic',
      }]);
    });

    it('should add the shortfall issue next to claim issues', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [claimVerificationUnavailableIssue('down')],
        critique: { subScores: uniformScores(5), issues: [] },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.deepEqual(report.issues.map(i => [i.category, i.severity]), [['factual', 'critical'], ['quality', 'high']]);
    });

    it('should leave itemised critic issues alone', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [],
        critique: {
          subScores: uniformScores(5),
          issues: [{ category: 'structural', severity: 'medium', description: 'No FAQ section', source: 'critic' }],
        },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.deepEqual(report.issues.map(i => i.description), ['No FAQ section']);
    });

    it('should not add the shortfall issue to a passing score', () => {
      const report = buildQualityReport({
        document,
        wordCheck: { wordCount: 60, issues: [] },
        claims: [],
        claimIssues: [],
        critique: { subScores: uniformScores(9.5), issues: [] },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.deepEqual(report.issues, []);
    });

    it('should name the two weakest categories, ties by name', () => {
      const issue = scoreShortfallIssue(5, 9, uniformScores(5));
      assert.equal(issue.suggestion, 'Strengthen the weakest rubric categories: eeat (5), readability (5)');
      assert.equal(issue.targetLocation, undefined);
    });

    it('should merge all issues in priority order', () => {
      const report = buildQualityReport({
        document,
        wordCheck: checkWordCount(document, 100),
        claims: [],
        claimIssues: [claimVerificationUnavailableIssue('down')],
        critique: {
          subScores: uniformScores(10),
          issues: [{ category: 'quality', severity: 'critical', description: 'Plagiarised intro', source: 'critic' }],
        },
        passThreshold: 9,
        rubricWeights: DEFAULT_RUBRIC_WEIGHTS,
      });

      assert.equal(report.overallScore, 0);
      assert.deepEqual(report.issues.map(i => i.category), ['factual', 'length', 'quality']);
    });
  });
});
