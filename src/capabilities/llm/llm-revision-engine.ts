/**
 * LLM Revision Engine
 *
 * Surgical revision: issues are grouped by section and each section is
 * rewritten on its own, then spliced back so untouched sections keep every
 * byte. Whole-document issues, and issues naming a section that does not
 * exist, are applied last in one pass over the full body.
 */

import { ErrorCode } from '../../errors/error-codes';
import { ContractViolationError } from '../../errors/gate-error';
import type { ChatModel } from '../../llm/llm-client';
import { reviseDocument, type Document } from '../../models/document';
import type { Issue } from '../../models/quality';
import { findSection, normalizeLocation, replaceSection, type Section } from '../../document/sections';
import type { RevisionEngine } from '../types';
import { stripCodeFence } from './json-response';

const SECTION_REVISER_SYSTEM_PROMPT = `You are an SEO revision editor. Rewrite ONE section of a blog article to fix the listed issues.

- Fix every listed issue and change nothing else
- Keep the section's heading level and keep its facts unless an issue says they are wrong
- Return ONLY the revised section content in Markdown, without the heading line`;

const DOCUMENT_REVISER_SYSTEM_PROMPT = `You are an SEO revision editor. Revise a blog article to fix the listed issues.

- Fix every listed issue and leave unaffected sections as they are
- Keep the Markdown heading structure
- Return ONLY the FULL revised article in Markdown`;

export interface IssueGroups {
  /** Keyed by normalized location, in first-seen (priority) order */
  located: Map<string, { location: string; issues: Issue[] }>;
  global: Issue[];
}

/**
 * Group issues by target section. Input order is kept within each group.
 */
export function groupIssues(issues: readonly Issue[]): IssueGroups {
  const located = new Map<string, { location: string; issues: Issue[] }>();
  const global: Issue[] = [];

  for (const issue of issues) {
    const location = issue.targetLocation;
    if (location === undefined || normalizeLocation(location) === '') {
      global.push(issue);
      continue;
    }
    const key = normalizeLocation(location);
    const group = located.get(key);
    if (group) {
      group.issues.push(issue);
    } else {
      located.set(key, { location, issues: [issue] });
    }
  }

  return { located, global };
}

export function formatIssues(issues: readonly Issue[]): string {
  return issues
    .map((issue, i) => {
      const suggestion = issue.suggestion ? ` Suggestion: ${issue.suggestion}` : '';
      return `${i + 1}. [${issue.severity}/${issue.category}] ${issue.description}${suggestion}`;
    })
    .join('\n');
}

export class LLMRevisionEngine implements RevisionEngine {
  private readonly model: ChatModel;

  constructor(model: ChatModel) {
    this.model = model;
  }

  async revise(document: Document, issues: readonly Issue[]): Promise<Document> {
    const { located, global } = groupIssues(issues);
    const deferred: Issue[] = [];
    let body = document.body;

    for (const { location, issues: sectionIssues } of located.values()) {
      const section = findSection(body, location);
      if (!section || section.heading === null) {
        deferred.push(...sectionIssues);
        continue;
      }

      const rewritten = await this.rewriteSection(section, sectionIssues);
      const next = replaceSection(body, location, rewritten);
      if (next === null) {
        deferred.push(...sectionIssues);
      } else {
        body = next;
      }
    }

    const remaining = [...deferred, ...global];
    if (remaining.length > 0) {
      body = await this.rewriteDocument(body, remaining);
    }

    return reviseDocument(document, body);
  }

  private async rewriteSection(section: Section, issues: readonly Issue[]): Promise<string> {
    const response = await this.model.chat([
      { role: 'system', content: SECTION_REVISER_SYSTEM_PROMPT },
      {
        role: 'user',
        content: `SECTION: ${section.heading ?? ''}\n\n${section.content.trim()}\n\nISSUES:\n${formatIssues(issues)}`,
      },
    ]);

    const content = stripCodeFence(response.content);
    if (content.length === 0) {
      throw new ContractViolationError(
        ErrorCode.E305_EMPTY_REVISION,
        'revisionEngine',
        `empty rewrite for section "${section.heading ?? ''}"`
      );
    }
    return content;
  }

  private async rewriteDocument(body: string, issues: readonly Issue[]): Promise<string> {
    const response = await this.model.chat([
      { role: 'system', content: DOCUMENT_REVISER_SYSTEM_PROMPT },
      { role: 'user', content: `ARTICLE:\n\n${body}\n\nISSUES:\n${formatIssues(issues)}` },
    ]);

    const content = stripCodeFence(response.content);
    if (content.length === 0) {
      throw new ContractViolationError(ErrorCode.E305_EMPTY_REVISION, 'revisionEngine', 'empty article rewrite');
    }
    return content;
  }
}
