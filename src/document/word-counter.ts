/**
 * Word Counter
 *
 * Markdown is rendered to HTML first so that heading markers, list bullets,
 * emphasis markers and link targets never count as words. Tags are replaced
 * with whitespace (not removed) so `<br>` and adjacent block elements keep
 * their word boundaries. Entities marked leaves in place (`&nbsp;`,
 * `&amp;`) are decoded by cheerio before splitting.
 */

import * as cheerio from 'cheerio';
import { marked } from 'marked';

const TAG_PATTERN = /<[^>]*>/g;

/**
 * Render a Markdown body to plain text
 */
export function toPlainText(body: string): string {
  if (body.trim().length === 0) {
    return '';
  }
  const html = marked.parser(marked.lexer(body));
  const text = cheerio.load(html.replace(TAG_PATTERN, ' '), null, false).root().text();
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Count prose words in a Markdown body
 */
export function countWords(body: string): number {
  const text = toPlainText(body);
  if (text.length === 0) {
    return 0;
  }
  return text.split(' ').length;
}

/**
 * Injectable wrapper around countWords
 */
export class WordCounter {
  count(body: string): number {
    return countWords(body);
  }
}
