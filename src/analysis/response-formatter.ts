import { parseSections, type ParsedSection } from './section-parser';
import { threatHeading } from './urgency';
import { formatTimestamp } from '../output/timestamp';

export const REPORT_BANNER = '🚨 EMERGENCY RESPONSE ANALYSIS 🚨';
export const REPORT_CLOSING = '⚠️ URGENT ACTION REQUIRED ⚠️';

const BANNER_RULE = '='.repeat(40);
const SECTION_RULE = '-'.repeat(50);
const INDENT = '   ';

/**
 * Renders a section body line by line: trimmed, "-" lines become bullets,
 * blank lines are dropped.
 */
export function formatBodyLines(body: string): string[] {
  const lines: string[] = [];
  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('-')) {
      lines.push(`${INDENT}• ${line.slice(1).trim()}`);
    } else if (line) {
      lines.push(`${INDENT}${line}`);
    }
  }
  return lines;
}

export function formatSection(section: ParsedSection): string {
  return [`🔍 ${section.title.toUpperCase()}`, SECTION_RULE, ...formatBodyLines(section.body)].join('\n');
}

/**
 * Formats the parsed analysis under the banner, followed by the timestamp and closing line.
 */
export function formatAnalysis(rawText: string, now: Date = new Date()): string {
  const report = [REPORT_BANNER, BANNER_RULE];

  for (const section of parseSections(rawText)) {
    report.push(`\n${formatSection(section)}`);
  }

  report.push(`\n🕒 Analysis Timestamp: ${formatTimestamp(now)}`, REPORT_CLOSING);

  return report.join('\n');
}

/**
 * Full report text: threat heading for the urgency, a blank line, then the formatted analysis.
 */
export function formatReport(rawText: string, urgency: string, now: Date = new Date()): string {
  return `${threatHeading(urgency)}\n\n${formatAnalysis(rawText, now)}`;
}
