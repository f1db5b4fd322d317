import { describe, it, expect } from 'vitest';
import {
  decodeImagePayload,
  parseImageRequest,
  parseReportRequest,
  parseWeatherRequest,
} from '../src/boundaries/request-parser';
import { ValidationError } from '../src/errors/index';

describe('request parser', () => {
  it('defaults urgency to Medium', () => {
    expect(parseReportRequest({ reportText: 'Fire on 5th' })).toEqual({ reportText: 'Fire on 5th', urgency: 'Medium' });
  });

  it('keeps empty report text for the handler to reject', () => {
    expect(parseReportRequest({ reportText: '', urgency: 'Low' })).toEqual({ reportText: '', urgency: 'Low' });
  });

  it('rejects bodies with missing or mistyped fields', () => {
    expect(() => parseReportRequest({})).toThrow(ValidationError);
    expect(() => parseReportRequest({})).toThrow('Invalid report request: reportText: Required');
    expect(() => parseWeatherRequest({ location: 42 })).toThrow(
      'Invalid weather request: location: Expected string, received number'
    );
    expect(() => parseWeatherRequest(null)).toThrow(/^Invalid weather request: \(body\)/);
  });

  it('decodes plain base64 and data URLs', () => {
    const bytes = Buffer.from([1, 2, 3, 4]);
    const base64 = bytes.toString('base64');

    expect(decodeImagePayload(base64)).toEqual(bytes);
    expect(decodeImagePayload(`data:image/png;base64,${base64}`)).toEqual(bytes);
  });

  it('treats missing or empty images as no upload', () => {
    expect(decodeImagePayload(undefined)).toBeUndefined();
    expect(decodeImagePayload(null)).toBeUndefined();
    expect(decodeImagePayload('')).toBeUndefined();
    expect(parseImageRequest({})).toEqual({ image: undefined });
  });
});
