/**
 * Capabilities Module Index
 */

export {
  DEFAULT_RUBRIC,
  type ClaimExtractor,
  type CriticJudge,
  type CritiqueResult,
  type KnowledgePassage,
  type KnowledgeStore,
  type QualityGateCapabilities,
  type RevisionEngine,
  type Rubric,
  type RubricCategory,
  type Verifier,
} from './types';

export {
  LLMClaimExtractor,
  LLMCriticJudge,
  LLMRevisionEngine,
  LLMVerifier,
  createLLMCapabilities,
  createCriticPrompt,
  formatIssues,
  groupIssues,
  parseJsonResponse,
  stripCodeFence,
  type IssueGroups,
  type LLMClaimExtractorOptions,
  type LLMVerifierOptions,
} from './llm';
