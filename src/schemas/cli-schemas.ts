import { z } from 'zod';

// Options shared by every command
export const GLOBAL_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
});

export const SERVE_OPTIONS_SCHEMA = z.object({
  port: z.coerce.number().int().min(0).max(65535).optional(),
  host: z.string().min(1).optional(),
});

export const ANALYZE_OPTIONS_SCHEMA = z.object({
  urgency: z.string().min(1).default('Medium'),
});

// Inferred types
export type GlobalOptions = z.infer<typeof GLOBAL_OPTIONS_SCHEMA>;
export type ServeOptions = z.infer<typeof SERVE_OPTIONS_SCHEMA>;
export type AnalyzeOptions = z.infer<typeof ANALYZE_OPTIONS_SCHEMA>;
