import type { UrgencyLevel } from '../config/constants';

export const URGENCY_GLYPHS: Readonly<Record<UrgencyLevel, string>> = {
  Low: '🟢',
  Medium: '🟠',
  High: '🔴',
};

export const FALLBACK_GLYPH = '🚨';

function isUrgencyLevel(value: string): value is UrgencyLevel {
  return Object.prototype.hasOwnProperty.call(URGENCY_GLYPHS, value);
}

// Exact, case-sensitive match; "high" gets the fallback
export function urgencyGlyph(urgency: string): string {
  return isUrgencyLevel(urgency) ? URGENCY_GLYPHS[urgency] : FALLBACK_GLYPH;
}

export function threatHeading(urgency: string): string {
  return `${urgencyGlyph(urgency)} ${urgency.toUpperCase()} THREAT LEVEL`;
}
