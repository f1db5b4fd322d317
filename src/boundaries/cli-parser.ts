import { z } from 'zod';
import {
  ANALYZE_OPTIONS_SCHEMA,
  GLOBAL_OPTIONS_SCHEMA,
  SERVE_OPTIONS_SCHEMA,
  type AnalyzeOptions,
  type GlobalOptions,
  type ServeOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.output<T> {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid ${label} options: ${e.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
    }
    const err = handleUnknownError(e, `${label} option parsing`);
    throw new ValidationError(`${label} option parsing failed: ${err.message}`);
  }
}

export function parseGlobalOptions(raw: unknown): GlobalOptions {
  return parseOptions(GLOBAL_OPTIONS_SCHEMA, raw, 'global');
}

export function parseServeOptions(raw: unknown): ServeOptions {
  return parseOptions(SERVE_OPTIONS_SCHEMA, raw, 'serve');
}

export function parseAnalyzeOptions(raw: unknown): AnalyzeOptions {
  return parseOptions(ANALYZE_OPTIONS_SCHEMA, raw, 'analyze');
}
