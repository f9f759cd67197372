/**
 * Document Model
 *
 * The candidate article under revision. Documents are frozen before they
 * reach any evaluator; a revision always produces a new Document.
 */

import { v4 as uuidv4 } from 'uuid';
import { countSections } from '../document/sections';
import { InputValidationError } from '../errors/gate-error';
import { isRecord } from '../utils/type-guards';

export interface Document {
  readonly id: string;
  readonly title?: string;
  /** Markdown body with section headings */
  readonly body: string;
  readonly sectionCount: number;
  /** Starts at 0, +1 per revision */
  readonly revisionNumber: number;
}

export interface CreateDocumentOptions {
  id?: string;
  title?: string;
  revisionNumber?: number;
}

/**
 * Create a frozen Document, deriving sectionCount from the body headings
 */
export function createDocument(body: string, options: CreateDocumentOptions = {}): Document {
  return Object.freeze({
    id: options.id ?? `doc-${uuidv4()}`,
    title: options.title,
    body,
    sectionCount: countSections(body),
    revisionNumber: options.revisionNumber ?? 0,
  });
}

/**
 * Next revision of a document with a new body
 */
export function reviseDocument(previous: Document, body: string): Document {
  return createDocument(body, {
    id: previous.id,
    title: previous.title,
    revisionNumber: previous.revisionNumber + 1,
  });
}

/**
 * Validate an untrusted value as a Document.
 * Missing sectionCount is derived; a mismatching one is rejected.
 *
 * @throws InputValidationError
 */
export function validateDocument(value: unknown): Document {
  if (!isRecord(value)) {
    throw new InputValidationError('document must be an object');
  }

  const { id, title, body, revisionNumber, sectionCount } = value;

  if (typeof body !== 'string' || body.trim().length === 0) {
    throw new InputValidationError('document body must be a non-empty string', 'body');
  }
  if (id !== undefined && (typeof id !== 'string' || id.length === 0)) {
    throw new InputValidationError('document id must be a non-empty string', 'id');
  }
  if (title !== undefined && typeof title !== 'string') {
    throw new InputValidationError('document title must be a string', 'title');
  }
  if (
    revisionNumber !== undefined &&
    (typeof revisionNumber !== 'number' || !Number.isInteger(revisionNumber) || revisionNumber < 0)
  ) {
    throw new InputValidationError('revisionNumber must be a non-negative integer', 'revisionNumber');
  }

  const document = createDocument(body, {
    id: typeof id === 'string' ? id : undefined,
    title: typeof title === 'string' ? title : undefined,
    revisionNumber: typeof revisionNumber === 'number' ? revisionNumber : 0,
  });

  if (sectionCount !== undefined && sectionCount !== document.sectionCount) {
    throw new InputValidationError(
      `sectionCount ${String(sectionCount)} does not match the ${document.sectionCount} heading(s) in the body`,
      'sectionCount'
    );
  }

  return document;
}
