/**
 * LLM Claim Extractor
 */

import type { ChatModel } from '../../llm/llm-client';
import type { Document } from '../../models/document';
import type { Claim } from '../../models/quality';
import type { ClaimExtractor } from '../types';
import { validateExtractedClaims } from '../../quality-gate/aggregation';
import { isRecord } from '../../utils/type-guards';
import { parseJsonResponse } from './json-response';

const CLAIM_EXTRACTOR_SYSTEM_PROMPT = `You are a fact-checking assistant. List the checkable factual claims in a blog article.

A claim is a single assertion that can be confirmed or refuted from sources: dates, prices, statistics, product names and model numbers, named studies or events. Skip opinions, advice and style.

You MUST respond in valid JSON format only:
[
  { "text": "the claim, quoted or closely paraphrased", "locationHint": "heading of the section it appears in" }
]

Return [] when the article makes no checkable claims.`;

export interface LLMClaimExtractorOptions {
  /** Claims beyond this many are dropped; defaults to 20 */
  maxClaims?: number;
}

export class LLMClaimExtractor implements ClaimExtractor {
  private readonly model: ChatModel;
  private readonly maxClaims: number;

  constructor(model: ChatModel, options: LLMClaimExtractorOptions = {}) {
    this.model = model;
    this.maxClaims = options.maxClaims ?? 20;
  }

  async extractClaims(document: Document): Promise<Claim[]> {
    const response = await this.model.chat([
      { role: 'system', content: CLAIM_EXTRACTOR_SYSTEM_PROMPT },
      { role: 'user', content: `Article:\n\n${document.body}\n\nExtract the claims as JSON.` },
    ]);

    const parsed = parseJsonResponse(response.content, 'claimExtractor');
    const items = isRecord(parsed) && Array.isArray(parsed.claims) ? parsed.claims : parsed;
    return validateExtractedClaims(items).slice(0, this.maxClaims);
  }
}
