/**
 * Configuration constants
 */

export const APP_NAME = 'emergency-desk';
export const LOG_PREFIX = `[${APP_NAME}]`;

// Fixed section titles the formatter looks for, in output order
export const SECTION_TITLES = [
  'Potential Disaster Type Classification',
  'Severity Assessment',
  'Recommended Emergency Response',
  'Resource Allocation Suggestions',
] as const;

export type SectionTitle = (typeof SECTION_TITLES)[number];

export const SECTION_DELIMITER = '####';

export const URGENCY_LEVELS = ['High', 'Medium', 'Low'] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];
export const DEFAULT_URGENCY: UrgencyLevel = 'Medium';

export const DEFAULT_XAI_BASE_URL = 'https://api.x.ai/v1';
export const DEFAULT_XAI_MODEL = 'grok-beta';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_PORT = 7860;
export const DEFAULT_HOST = '0.0.0.0';

// Uploaded images arrive base64-encoded inside JSON
export const MAX_BODY_BYTES = 15 * 1024 * 1024;
