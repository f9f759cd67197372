/**
 * Markdown section handling
 *
 * Sections are delimited by ATX headings (`#` .. `######`). Headings inside
 * fenced code blocks are ignored. Text before the first heading forms a
 * preamble section with a null heading, kept only when it has content.
 */

/**
 * One heading-delimited region of a document body
 */
export interface Section {
  /** Heading text without the `#` marker; null for the preamble */
  heading: string | null;
  /** Heading level 1-6; 0 for the preamble */
  level: number;
  /** Offset of the heading line */
  start: number;
  /** Offset just after the heading line */
  contentStart: number;
  /** Offset where the next section starts (or body length) */
  end: number;
  content: string;
}

const HEADING_PATTERN = /^(#{1,6})[ \t]+(.+?)[ \t#]*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;

export function splitSections(body: string): Section[] {
  const sections: Section[] = [];
  let current: Omit<Section, 'end' | 'content'> = { heading: null, level: 0, start: 0, contentStart: 0 };
  let offset = 0;
  let inFence = false;

  const close = (end: number): void => {
    const content = body.slice(current.contentStart, end);
    if (current.heading !== null || content.trim().length > 0) {
      sections.push({ ...current, end, content });
    }
  };

  for (const rawLine of body.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    const lineEnd = Math.min(offset + rawLine.length + 1, body.length);

    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      const match = HEADING_PATTERN.exec(line);
      if (match) {
        close(offset);
        current = {
          heading: match[2].trim(),
          level: match[1].length,
          start: offset,
          contentStart: lineEnd,
        };
      }
    }

    offset = lineEnd;
  }

  close(body.length);
  return sections;
}

/**
 * Number of headed sections in a body
 */
export function countSections(body: string): number {
  return splitSections(body).filter(s => s.heading !== null).length;
}

/**
 * Normalize a section reference: `"## Benefits "` → `"benefits"`
 */
export function normalizeLocation(location: string): string {
  return location.replace(/^#+\s*/, '').trim().toLowerCase();
}

/**
 * Find the section a location refers to.
 * Exact heading match first, then the first heading containing the location.
 */
export function findSection(body: string, location: string): Section | undefined {
  const wanted = normalizeLocation(location);
  if (wanted.length === 0) {
    return undefined;
  }

  const headed = splitSections(body).filter(s => s.heading !== null);
  return (
    headed.find(s => normalizeLocation(s.heading ?? '') === wanted) ??
    headed.find(s => normalizeLocation(s.heading ?? '').includes(wanted))
  );
}

/**
 * Replace one section's content, leaving every other byte of the body as is.
 * A repeated heading line at the top of `content` is dropped.
 *
 * @returns the new body, or null when no section matches `location`
 */
export function replaceSection(body: string, location: string, content: string): string | null {
  const section = findSection(body, location);
  if (!section || section.heading === null) {
    return null;
  }

  const lines = content.trim().split('\n');
  const first = HEADING_PATTERN.exec(lines[0] ?? '');
  if (first && normalizeLocation(first[2]) === normalizeLocation(section.heading)) {
    lines.shift();
  }

  const replacement = lines.join('\n').trim();
  const isLast = section.end >= body.length;
  const region = `\n${replacement}\n${isLast ? '' : '\n'}`;

  return body.slice(0, section.contentStart) + region + body.slice(section.end);
}
