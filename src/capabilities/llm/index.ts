/**
 * LLM-backed capabilities
 */

import type { ChatModel } from '../../llm/llm-client';
import type { KnowledgeStore, QualityGateCapabilities } from '../types';
import { LLMClaimExtractor, type LLMClaimExtractorOptions } from './llm-claim-extractor';
import { LLMCriticJudge } from './llm-critic-judge';
import { LLMRevisionEngine } from './llm-revision-engine';
import { LLMVerifier, type LLMVerifierOptions } from './llm-verifier';

export { LLMClaimExtractor, type LLMClaimExtractorOptions } from './llm-claim-extractor';
export { LLMVerifier, type LLMVerifierOptions } from './llm-verifier';
export { LLMCriticJudge, createCriticPrompt } from './llm-critic-judge';
export { LLMRevisionEngine, groupIssues, formatIssues, type IssueGroups } from './llm-revision-engine';
export { parseJsonResponse, stripCodeFence } from './json-response';

/**
 * Wire all four capabilities to one chat model
 */
export function createLLMCapabilities(
  model: ChatModel,
  knowledgeStore: KnowledgeStore,
  options: LLMClaimExtractorOptions & LLMVerifierOptions = {}
): QualityGateCapabilities {
  return {
    claimExtractor: new LLMClaimExtractor(model, { maxClaims: options.maxClaims }),
    verifier: new LLMVerifier(model, { passagesPerClaim: options.passagesPerClaim }),
    criticJudge: new LLMCriticJudge(model),
    revisionEngine: new LLMRevisionEngine(model),
    knowledgeStore,
  };
}
