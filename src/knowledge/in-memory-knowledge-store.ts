/**
 * In-Memory Knowledge Store
 *
 * Evidence passages ranked by term overlap with the query. Passages come
 * from strings or from the `.md` / `.txt` files of a directory, split on
 * blank lines.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { KnowledgePassage, KnowledgeStore } from '../capabilities/types';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'have',
  'in', 'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was',
  'were', 'which', 'with',
]);

const SUPPORTED_EXTENSIONS = ['.md', '.markdown', '.txt'];

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 1 && !STOP_WORDS.has(token));
}

interface IndexedPassage {
  id: string;
  text: string;
  source: string;
  terms: Set<string>;
}

export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly passages: IndexedPassage[] = [];

  /**
   * Add a document; each blank-line separated paragraph becomes a passage
   */
  add(text: string, source: string): number {
    const paragraphs = text
      .split(/\n\s*\n/)
      .map(p => p.trim())
      .filter(p => p.length > 0);

    for (const paragraph of paragraphs) {
      this.passages.push({
        id: `${source}#${this.passages.length + 1}`,
        text: paragraph,
        source,
        terms: new Set(tokenize(paragraph)),
      });
    }
    return paragraphs.length;
  }

  /**
   * Load every supported file of a directory (non-recursive)
   */
  static fromDirectory(directory: string): InMemoryKnowledgeStore {
    const store = new InMemoryKnowledgeStore();
    const files = fs
      .readdirSync(directory)
      .filter(name => SUPPORTED_EXTENSIONS.includes(path.extname(name).toLowerCase()))
      .sort();

    for (const name of files) {
      store.add(fs.readFileSync(path.join(directory, name), 'utf-8'), name);
    }
    return store;
  }

  get size(): number {
    return this.passages.length;
  }

  /**
   * Score = shared terms / query terms. Ties keep insertion order.
   */
  async search(query: string, limit: number): Promise<KnowledgePassage[]> {
    const queryTerms = new Set(tokenize(query));
    if (queryTerms.size === 0 || limit <= 0) {
      return [];
    }

    const scored: KnowledgePassage[] = [];
    for (const passage of this.passages) {
      let shared = 0;
      for (const term of queryTerms) {
        if (passage.terms.has(term)) {
          shared++;
        }
      }
      if (shared > 0) {
        scored.push({
          id: passage.id,
          text: passage.text,
          source: passage.source,
          score: shared / queryTerms.size,
        });
      }
    }

    return scored
      .map((passage, index) => ({ passage, index }))
      .sort((a, b) => b.passage.score - a.passage.score || a.index - b.index)
      .slice(0, limit)
      .map(entry => entry.passage);
  }
}
