/**
 * LLM Verifier - checks one claim against retrieved passages
 */

import type { ChatModel } from '../../llm/llm-client';
import type { Claim } from '../../models/quality';
import type { KnowledgePassage, KnowledgeStore, Verifier } from '../types';
import { validateVerifiedClaim } from '../../quality-gate/aggregation';
import { parseJsonResponse } from './json-response';

const VERIFIER_SYSTEM_PROMPT = `You are a Digital Fact Checker. Judge a single claim using ONLY the evidence passages provided.

- "verified": the passages support the claim
- "contradicted": the passages state something incompatible with the claim
- "unverified": the passages do not settle it

You MUST respond in valid JSON format only:
{
  "verdict": "verified" | "unverified" | "contradicted",
  "confidence": 0.0-1.0
}`;

export interface LLMVerifierOptions {
  /** Passages retrieved per claim; defaults to 3 */
  passagesPerClaim?: number;
}

function createVerifierPrompt(claim: Claim, passages: KnowledgePassage[]): string {
  const evidence = passages
    .map((p, i) => `[${i + 1}] (${p.source})\n${p.text}`)
    .join('\n\n');

  return `CLAIM: ${claim.text}\n\nEVIDENCE:\n${evidence}\n\nProvide your verdict as JSON.`;
}

export class LLMVerifier implements Verifier {
  private readonly model: ChatModel;
  private readonly passagesPerClaim: number;

  constructor(model: ChatModel, options: LLMVerifierOptions = {}) {
    this.model = model;
    this.passagesPerClaim = options.passagesPerClaim ?? 3;
  }

  /**
   * No evidence means "unverified" with zero confidence; the model is not
   * asked to judge from its own knowledge.
   */
  async verify(claim: Claim, knowledgeStore: KnowledgeStore): Promise<Claim> {
    const passages = await knowledgeStore.search(claim.text, this.passagesPerClaim);
    if (passages.length === 0) {
      return { ...claim, verdict: 'unverified', confidence: 0, sources: [] };
    }

    const response = await this.model.chat([
      { role: 'system', content: VERIFIER_SYSTEM_PROMPT },
      { role: 'user', content: createVerifierPrompt(claim, passages) },
    ]);

    const verified = validateVerifiedClaim(claim, parseJsonResponse(response.content, 'verifier'));
    return { ...verified, sources: passages.map(p => p.id) };
  }
}
