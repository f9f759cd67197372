/**
 * Models Index
 */

export {
  createDocument,
  reviseDocument,
  validateDocument,
  type Document,
  type CreateDocumentOptions,
} from './document';

export {
  CLAIM_VERDICTS,
  ISSUE_CATEGORIES,
  ISSUE_SEVERITIES,
  SEVERITY_RANK,
  CATEGORY_PRIORITY,
  isIssueCategory,
  isIssueSeverity,
  isClaimVerdict,
  hasCriticalIssue,
  type Claim,
  type ClaimVerdict,
  type Issue,
  type IssueCategory,
  type IssueSeverity,
  type IssueSource,
  type QualityReport,
} from './quality';

export type {
  LoopPhase,
  TerminalReason,
  RoutingDecision,
  LoopState,
  IterationRecord,
  LoopResult,
} from './loop';
