import { z } from 'zod';
import {
  IMAGE_REQUEST_SCHEMA,
  REPORT_REQUEST_SCHEMA,
  WEATHER_REQUEST_SCHEMA,
} from '../schemas/request-schemas';
import { ValidationError } from '../errors/index';
import type { DamageImageInput, EmergencyReportInput, WeatherInput } from '../handlers/types';

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${label} request: ${detail}`);
  }
  return result.data;
}

export function parseReportRequest(raw: unknown): EmergencyReportInput {
  return parseWith(REPORT_REQUEST_SCHEMA, raw, 'report');
}

export function parseWeatherRequest(raw: unknown): WeatherInput {
  return parseWith(WEATHER_REQUEST_SCHEMA, raw, 'weather');
}

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;

export function decodeImagePayload(payload: string | null | undefined): Buffer | undefined {
  if (!payload) {
    return undefined;
  }
  const base64 = payload.replace(DATA_URL_PREFIX, '');
  const image = Buffer.from(base64, 'base64');
  return image.length > 0 ? image : undefined;
}

export function parseImageRequest(raw: unknown): DamageImageInput {
  const { image } = parseWith(IMAGE_REQUEST_SCHEMA, raw, 'image');
  return { image: decodeImagePayload(image) };
}
