/**
 * Quality Models - claims, issues and the per-pass QualityReport
 *
 * Claims and Issues are created fresh on every evaluation pass and never
 * carried into the next one.
 */

export type ClaimVerdict = 'verified' | 'unverified' | 'contradicted';

export const CLAIM_VERDICTS: readonly ClaimVerdict[] = ['verified', 'unverified', 'contradicted'];

/**
 * One checkable factual assertion extracted from a Document
 */
export interface Claim {
  text: string;
  /** Heading of the section the claim came from */
  locationHint: string;
  /** Unset until verified */
  verdict?: ClaimVerdict;
  /** 0-1, unset until verified */
  confidence?: number;
  sources?: string[];
}

export type IssueCategory = 'factual' | 'structural' | 'length' | 'quality';

export type IssueSeverity = 'critical' | 'high' | 'medium' | 'low';

export type IssueSource = 'word_count' | 'claim_verification' | 'critic';

export const ISSUE_CATEGORIES: readonly IssueCategory[] = ['factual', 'structural', 'length', 'quality'];

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ['critical', 'high', 'medium', 'low'];

/**
 * Lower rank sorts first
 */
export const SEVERITY_RANK: Record<IssueSeverity, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

export const CATEGORY_PRIORITY: Record<IssueCategory, number> = {
  factual: 0,
  structural: 1,
  length: 2,
  quality: 3,
};

/**
 * A single actionable defect. Issues without targetLocation are
 * whole-document issues and are fixed last.
 */
export interface Issue {
  category: IssueCategory;
  severity: IssueSeverity;
  description: string;
  targetLocation?: string;
  suggestion?: string;
  source: IssueSource;
}

export function isIssueCategory(value: unknown): value is IssueCategory {
  return typeof value === 'string' && (ISSUE_CATEGORIES as readonly string[]).includes(value);
}

export function isIssueSeverity(value: unknown): value is IssueSeverity {
  return typeof value === 'string' && (ISSUE_SEVERITIES as readonly string[]).includes(value);
}

export function isClaimVerdict(value: unknown): value is ClaimVerdict {
  return typeof value === 'string' && (CLAIM_VERDICTS as readonly string[]).includes(value);
}

/**
 * Aggregate verdict for one evaluation pass. Immutable once built.
 */
export interface QualityReport {
  /** 0-10; forced to 0 when the word-count floor fails */
  overallScore: number;
  /** Critic sub-scores by rubric category */
  subScores: Readonly<Record<string, number>>;
  wordCount: number;
  claims: readonly Claim[];
  /** Severity desc, then category priority, then located before whole-document */
  issues: readonly Issue[];
  /** overallScore >= passThreshold and no critical issue */
  passed: boolean;
  /** revisionNumber of the evaluated Document */
  evaluatedRevision: number;
}

export function hasCriticalIssue(issues: readonly Issue[]): boolean {
  return issues.some(issue => issue.severity === 'critical');
}
