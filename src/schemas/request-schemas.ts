import { z } from 'zod';
import { DEFAULT_URGENCY } from '../config/constants';

// Bodies posted by the three panels
export const REPORT_REQUEST_SCHEMA = z.object({
  reportText: z.string(),
  urgency: z.string().default(DEFAULT_URGENCY),
});

export const WEATHER_REQUEST_SCHEMA = z.object({
  location: z.string(),
});

// Base64 payload, optionally as a data URL; absent or empty means no upload
export const IMAGE_REQUEST_SCHEMA = z.object({
  image: z.string().nullish(),
});

// Inferred types
export type ReportRequest = z.infer<typeof REPORT_REQUEST_SCHEMA>;
export type WeatherRequest = z.infer<typeof WEATHER_REQUEST_SCHEMA>;
export type ImageRequest = z.infer<typeof IMAGE_REQUEST_SCHEMA>;
