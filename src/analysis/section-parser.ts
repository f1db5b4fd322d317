import { SECTION_DELIMITER, SECTION_TITLES } from '../config/constants';

export interface ParsedSection {
  title: string;
  body: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Locates one titled section in raw model output.
 *
 * The title is matched case-insensitively and only its first occurrence
 * counts. The body starts after the first line break following the title and
 * runs up to the next delimiter after the title, or to the end of the text.
 * A title with no line break before that point has an empty body.
 */
export function findSection(
  rawText: string,
  title: string,
  delimiter: string = SECTION_DELIMITER
): ParsedSection | undefined {
  const match = new RegExp(escapeRegExp(title), 'i').exec(rawText);
  if (!match) {
    return undefined;
  }

  const start = match.index;
  const delimiterAt = rawText.indexOf(delimiter, start + 1);
  const end = delimiterAt === -1 ? rawText.length : delimiterAt;
  const span = rawText.slice(start, end);

  const lineBreak = span.indexOf('\n');
  const body = lineBreak === -1 ? '' : span.slice(lineBreak + 1).trim();

  return { title, body };
}

/**
 * Splits raw model output into (title, body) pairs for the known section
 * titles, in title order. Missing titles are skipped.
 */
export function parseSections(
  rawText: string,
  titles: readonly string[] = SECTION_TITLES
): ParsedSection[] {
  const sections: ParsedSection[] = [];
  for (const title of titles) {
    const section = findSection(rawText, title);
    if (section) {
      sections.push(section);
    }
  }
  return sections;
}
