/**
 * LLM Critic Judge - rubric scoring with actionable issues
 */

import type { ChatModel } from '../../llm/llm-client';
import type { Document } from '../../models/document';
import type { CriticJudge, CritiqueResult, Rubric } from '../types';
import { validateCritique } from '../../quality-gate/aggregation';
import { parseJsonResponse } from './json-response';

const CRITIC_SYSTEM_PROMPT = `You are an SEO and content quality reviewer for blog articles. Score the article against each rubric category and list concrete defects.

Issue categories: "factual", "structural", "length", "quality".
Issue severities: "critical", "high", "medium", "low".
Set "targetLocation" to the heading of the section an issue is in; omit it for issues about the whole article.

You MUST respond in valid JSON format only:
{
  "subScores": { "<category>": 0-10 },
  "issues": [
    { "category": "...", "severity": "...", "description": "...", "targetLocation": "...", "suggestion": "..." }
  ]
}

Score guidelines:
- 9-10: Publication ready
- 7-8: Minor fixes needed
- 5-6: Significant gaps
- 0-4: Major rewrite needed`;

export function createCriticPrompt(document: Document, rubric: Rubric): string {
  const categories = rubric.categories
    .map(c => `- ${c.name}: ${c.description}`)
    .join('\n');

  return `RUBRIC:\n${categories}\n\nARTICLE:\n\n${document.body}\n\nProvide your evaluation as JSON.`;
}

export class LLMCriticJudge implements CriticJudge {
  private readonly model: ChatModel;

  constructor(model: ChatModel) {
    this.model = model;
  }

  async critique(document: Document, rubric: Rubric): Promise<CritiqueResult> {
    const response = await this.model.chat([
      { role: 'system', content: CRITIC_SYSTEM_PROMPT },
      { role: 'user', content: createCriticPrompt(document, rubric) },
    ]);

    return validateCritique(parseJsonResponse(response.content, 'criticJudge'));
  }
}
