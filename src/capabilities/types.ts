/**
 * Capability Interfaces
 *
 * The four model-backed collaborators of the quality gate. Each is a narrow
 * interface so tests can substitute a fake for any one of them.
 */

import type { Document } from '../models/document';
import type { Claim, Issue } from '../models/quality';

/**
 * A retrieved evidence passage
 */
export interface KnowledgePassage {
  id: string;
  text: string;
  source: string;
  score: number;
}

export interface KnowledgeStore {
  search(query: string, limit: number): Promise<KnowledgePassage[]>;
}

export interface ClaimExtractor {
  /** Claims with text and location only; verdict unset */
  extractClaims(document: Document): Promise<Claim[]>;
}

export interface Verifier {
  /** Same claim with verdict and confidence filled in */
  verify(claim: Claim, knowledgeStore: KnowledgeStore): Promise<Claim>;
}

export interface RubricCategory {
  name: string;
  description: string;
}

export interface Rubric {
  categories: RubricCategory[];
}

export interface CritiqueResult {
  /** 0-10 per rubric category */
  subScores: Record<string, number>;
  issues: Issue[];
}

export interface CriticJudge {
  critique(document: Document, rubric: Rubric): Promise<CritiqueResult>;
}

export interface RevisionEngine {
  /**
   * Fix issues in priority order, touching only implicated sections.
   * The result's revisionNumber must be exactly input.revisionNumber + 1.
   */
  revise(document: Document, issues: readonly Issue[]): Promise<Document>;
}

export interface QualityGateCapabilities {
  claimExtractor: ClaimExtractor;
  verifier: Verifier;
  criticJudge: CriticJudge;
  revisionEngine: RevisionEngine;
  knowledgeStore: KnowledgeStore;
}

/**
 * SEO / E-E-A-T rubric used when none is configured
 */
export const DEFAULT_RUBRIC: Rubric = {
  categories: [
    { name: 'seo', description: 'Keyword placement, heading hierarchy, meta-friendly formatting' },
    { name: 'eeat', description: 'Experience, expertise, authoritativeness and trustworthiness signals' },
    { name: 'structure', description: 'Logical section order, intro, FAQ and conclusion present' },
    { name: 'readability', description: 'Sentence length, clarity, consistent tone' },
  ],
};
