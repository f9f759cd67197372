/**
 * Aggregation - merge the three checks of one evaluation pass into a
 * QualityReport
 *
 * All functions here are pure. The merge does not depend on the order the
 * checks finished in: issues are put in a total order before they are
 * stored.
 */

import { ErrorCode } from '../errors/error-codes';
import { ContractViolationError } from '../errors/gate-error';
import { countWords } from '../document/word-counter';
import type { Document } from '../models/document';
import {
  CATEGORY_PRIORITY,
  SEVERITY_RANK,
  hasCriticalIssue,
  isClaimVerdict,
  isIssueCategory,
  isIssueSeverity,
  type Claim,
  type Issue,
  type QualityReport,
} from '../models/quality';
import type { CritiqueResult } from '../capabilities/types';
import { isRecord } from '../utils/type-guards';

// ============================================================================
// Word count
// ============================================================================

export interface WordCountCheck {
  wordCount: number;
  /** Empty, or a single length/critical issue */
  issues: Issue[];
}

export function checkWordCount(document: Document, minWordCount: number): WordCountCheck {
  const wordCount = countWords(document.body);
  if (wordCount >= minWordCount) {
    return { wordCount, issues: [] };
  }

  return {
    wordCount,
    issues: [{
      category: 'length',
      severity: 'critical',
      description: `Article has ${wordCount} words; at least ${minWordCount} are required`,
      suggestion: `Expand the article by at least ${minWordCount - wordCount} words`,
      source: 'word_count',
    }],
  };
}

// ============================================================================
// Claims
// ============================================================================

/**
 * Contradicted claims are critical. Unverified claims become medium issues
 * when their confidence shortfall (1 - confidence) exceeds the threshold.
 */
export function checkClaims(claims: readonly Claim[], shortfallThreshold: number): Issue[] {
  const issues: Issue[] = [];

  for (const claim of claims) {
    if (claim.verdict === 'contradicted') {
      issues.push({
        category: 'factual',
        severity: 'critical',
        description: `Claim contradicted by sources: "${claim.text}"`,
        targetLocation: claim.locationHint || undefined,
        suggestion: 'Correct or remove the claim',
        source: 'claim_verification',
      });
    } else if (claim.verdict === 'unverified') {
      const shortfall = 1 - (claim.confidence ?? 0);
      if (shortfall > shortfallThreshold) {
        issues.push({
          category: 'factual',
          severity: 'medium',
          description: `Claim could not be verified: "${claim.text}"`,
          targetLocation: claim.locationHint || undefined,
          suggestion: 'Cite a source, soften the wording or remove the claim',
          source: 'claim_verification',
        });
      }
    }
  }

  return issues;
}

/**
 * Issue raised in place of claim verification when the extractor is
 * unreachable. Critical, so the pass is blocked.
 */
export function claimVerificationUnavailableIssue(reason: string): Issue {
  return {
    category: 'factual',
    severity: 'critical',
    description: `Claim verification unavailable: ${reason}`,
    source: 'claim_verification',
  };
}

// ============================================================================
// Scoring
// ============================================================================

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Weighted mean of the sub-scores whose category has a positive weight.
 * Falls back to the plain mean when none does; 0 for an empty map.
 */
export function combineSubScores(
  subScores: Readonly<Record<string, number>>,
  weights: Readonly<Record<string, number>>
): number {
  const entries = Object.entries(subScores);
  if (entries.length === 0) {
    return 0;
  }

  let weightedSum = 0;
  let totalWeight = 0;
  for (const [category, score] of entries) {
    const weight = weights[category];
    if (weight !== undefined && weight > 0) {
      weightedSum += score * weight;
      totalWeight += weight;
    }
  }

  if (totalWeight > 0) {
    return round2(weightedSum / totalWeight);
  }

  const sum = entries.reduce((acc, [, score]) => acc + score, 0);
  return round2(sum / entries.length);
}

// ============================================================================
// Contract checks
// ============================================================================

/**
 * Validate a CriticJudge result. Out-of-range scores are rejected, not
 * clamped.
 *
 * @throws ContractViolationError
 */
export function validateCritique(result: unknown): CritiqueResult {
  if (!isRecord(result) || !isRecord(result.subScores) || !Array.isArray(result.issues)) {
    throw new ContractViolationError(
      ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
      'criticJudge',
      'expected { subScores, issues }'
    );
  }

  const subScores: Record<string, number> = {};
  for (const [category, score] of Object.entries(result.subScores)) {
    if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 10) {
      throw new ContractViolationError(
        ErrorCode.E302_SUB_SCORE_OUT_OF_RANGE,
        'criticJudge',
        `${category} = ${String(score)}`
      );
    }
    subScores[category] = score;
  }
  if (Object.keys(subScores).length === 0) {
    throw new ContractViolationError(
      ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
      'criticJudge',
      'no sub-scores returned'
    );
  }

  const issues: Issue[] = result.issues.map((raw: unknown, index: number) => {
    if (
      !isRecord(raw) ||
      !isIssueCategory(raw.category) ||
      !isIssueSeverity(raw.severity) ||
      typeof raw.description !== 'string'
    ) {
      throw new ContractViolationError(
        ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
        'criticJudge',
        `issue ${index} has an unknown category or severity`
      );
    }
    const issue: Issue = {
      category: raw.category,
      severity: raw.severity,
      description: raw.description,
      source: 'critic',
    };
    if (typeof raw.targetLocation === 'string' && raw.targetLocation.trim() !== '') {
      issue.targetLocation = raw.targetLocation;
    }
    if (typeof raw.suggestion === 'string') {
      issue.suggestion = raw.suggestion;
    }
    return issue;
  });

  return { subScores, issues };
}

/**
 * Validate extractor output: an array of claims with text
 *
 * @throws ContractViolationError
 */
export function validateExtractedClaims(result: unknown): Claim[] {
  if (!Array.isArray(result)) {
    throw new ContractViolationError(
      ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
      'claimExtractor',
      'expected an array of claims'
    );
  }

  return result.map((raw: unknown, index: number) => {
    if (!isRecord(raw) || typeof raw.text !== 'string' || raw.text.trim() === '') {
      throw new ContractViolationError(
        ErrorCode.E303_MALFORMED_CAPABILITY_OUTPUT,
        'claimExtractor',
        `claim ${index} has no text`
      );
    }
    return {
      text: raw.text,
      locationHint: typeof raw.locationHint === 'string' ? raw.locationHint : '',
    };
  });
}

/**
 * Validate a Verifier result: known verdict, confidence in [0,1]
 *
 * @throws ContractViolationError
 */
export function validateVerifiedClaim(original: Claim, result: unknown): Claim {
  if (!isRecord(result) || !isClaimVerdict(result.verdict)) {
    throw new ContractViolationError(
      ErrorCode.E304_INVALID_CLAIM_VERDICT,
      'verifier',
      `missing or unknown verdict for "${original.text}"`
    );
  }
  const confidence = result.confidence;
  if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new ContractViolationError(
      ErrorCode.E304_INVALID_CLAIM_VERDICT,
      'verifier',
      `confidence ${String(confidence)} outside [0,1] for "${original.text}"`
    );
  }

  const claim: Claim = {
    text: original.text,
    locationHint: original.locationHint,
    verdict: result.verdict,
    confidence,
  };
  if (Array.isArray(result.sources)) {
    claim.sources = result.sources.filter((s: unknown): s is string => typeof s === 'string');
  }
  return claim;
}

// ============================================================================
// Ordering
// ============================================================================

export function compareIssues(a: Issue, b: Issue): number {
  const bySeverity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
  if (bySeverity !== 0) {
    return bySeverity;
  }
  const byCategory = CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category];
  if (byCategory !== 0) {
    return byCategory;
  }
  // Located issues before whole-document issues
  if (a.targetLocation === undefined || b.targetLocation === undefined) {
    if (a.targetLocation !== b.targetLocation) {
      return a.targetLocation === undefined ? 1 : -1;
    }
  } else if (a.targetLocation !== b.targetLocation) {
    return a.targetLocation < b.targetLocation ? -1 : 1;
  }
  if (a.description !== b.description) {
    return a.description < b.description ? -1 : 1;
  }
  if (a.source !== b.source) {
    return a.source < b.source ? -1 : 1;
  }
  return 0;
}

export function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort(compareIssues);
}

// ============================================================================
// Report
// ============================================================================

export interface ReportInputs {
  document: Document;
  wordCheck: WordCountCheck;
  claims: readonly Claim[];
  claimIssues: readonly Issue[];
  critique: CritiqueResult;
  passThreshold: number;
  rubricWeights: Readonly<Record<string, number>>;
}

/**
 * Whole-document issue for a score below the threshold that the critic did
 * not itemise. Names the two weakest rubric categories.
 */
export function scoreShortfallIssue(
  overallScore: number,
  passThreshold: number,
  subScores: Readonly<Record<string, number>>
): Issue {
  const weakest = Object.entries(subScores)
    .sort(([a, x], [b, y]) => x - y || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, 2)
    .map(([category, score]) => `${category} (${score})`);

  return {
    category: 'quality',
    severity: 'high',
    description: `Overall score ${overallScore} is below the pass threshold ${passThreshold}`,
    suggestion: `Strengthen the weakest rubric categories: ${weakest.join(', ')}`,
    source: 'critic',
  };
}

/**
 * Build the frozen report. A failed word-count floor forces the overall
 * score to 0. A failing report always carries at least one issue.
 */
export function buildQualityReport(inputs: ReportInputs): QualityReport {
  const lengthFailed = inputs.wordCheck.issues.length > 0;
  const overallScore = lengthFailed
    ? 0
    : combineSubScores(inputs.critique.subScores, inputs.rubricWeights);

  const critiqueIssues = [...inputs.critique.issues];
  if (!lengthFailed && overallScore < inputs.passThreshold && critiqueIssues.length === 0) {
    critiqueIssues.push(scoreShortfallIssue(overallScore, inputs.passThreshold, inputs.critique.subScores));
  }

  const issues = sortIssues([
    ...inputs.wordCheck.issues,
    ...inputs.claimIssues,
    ...critiqueIssues,
  ]);

  return Object.freeze({
    overallScore,
    subScores: Object.freeze({ ...inputs.critique.subScores }),
    wordCount: inputs.wordCheck.wordCount,
    claims: Object.freeze([...inputs.claims]),
    issues: Object.freeze(issues),
    passed: overallScore >= inputs.passThreshold && !hasCriticalIssue(issues),
    evaluatedRevision: inputs.document.revisionNumber,
  });
}
