/**
 * Quality Gate Module
 *
 * Exports:
 * - QualityGateController (the revision loop)
 * - Pure aggregation functions used to build each QualityReport
 */

export {
  QualityGateController,
  type QualityGateControllerOptions,
  type QualityGateEventCallback,
  type QualityGateEventType,
  type RunOptions,
} from './quality-gate-controller';

export {
  buildQualityReport,
  checkClaims,
  checkWordCount,
  claimVerificationUnavailableIssue,
  scoreShortfallIssue,
  combineSubScores,
  compareIssues,
  sortIssues,
  validateCritique,
  validateExtractedClaims,
  validateVerifiedClaim,
  type ReportInputs,
  type WordCountCheck,
} from './aggregation';
