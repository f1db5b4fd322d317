import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createReportHandler } from '../src/handlers/report-handler';
import { DefaultRequestBuilder } from '../src/providers/request-builder';
import type { CompletionProvider, CompletionRequest, CompletionResult } from '../src/providers/llm-provider';
import { MalformedResponseError, TransportError, UpstreamError } from '../src/errors/provider-errors';
import { formatReport } from '../src/analysis/response-formatter';
import { present } from '../src/output/presenter';
import { HandlerName } from '../src/handlers/types';
import { FIXED_DATE, FULL_ANALYSIS } from './fixtures/analysis';

const COMPLETE = vi.fn<(request: CompletionRequest) => Promise<CompletionResult>>();
const provider: CompletionProvider = { complete: COMPLETE };

function handler() {
  return createReportHandler({ builder: new DefaultRequestBuilder(), provider, now: () => FIXED_DATE });
}

async function run(reportText: string, urgency = 'High'): Promise<string> {
  return present(HandlerName.Report, await handler()({ reportText, urgency }));
}

describe('report handler', () => {
  beforeEach(() => {
    COMPLETE.mockReset();
  });

  it.each(['', '    ', '\n'])('returns a validation message for %j without calling the provider', async (text) => {
    const result = await handler()({ reportText: text, urgency: 'Medium' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('validation');
    expect(present(HandlerName.Report, result)).toBe('🚨 Error: Please provide a detailed emergency description.');
    expect(COMPLETE).not.toHaveBeenCalled();
  });

  it('formats the completion text with the submitted urgency', async () => {
    COMPLETE.mockResolvedValueOnce({ statusCode: 200, rawText: FULL_ANALYSIS });

    const text = await run('River burst its banks near the school', 'High');

    expect(text).toBe(formatReport(FULL_ANALYSIS, 'High', FIXED_DATE));
    expect(COMPLETE).toHaveBeenCalledTimes(1);
    expect(COMPLETE.mock.calls[0]?.[0].userPrompt).toContain("Emergency Report: 'River burst its banks near the school'");
  });

  it('reports upstream status and body without throwing', async () => {
    COMPLETE.mockRejectedValueOnce(new UpstreamError(500, 'server busy'));

    const text = await run('Power outage across the valley');

    expect(text).toBe('🚨 API Error: 500 - server busy');
    expect(text).toContain('500');
    expect(text).toContain('server busy');
  });

  it('reports transport failures as network errors', async () => {
    COMPLETE.mockRejectedValueOnce(new TransportError('connect ECONNREFUSED 127.0.0.1:443'));

    expect(await run('Bridge collapse')).toBe('🚨 Network Error: connect ECONNREFUSED 127.0.0.1:443');
  });

  it('reports malformed responses as critical errors', async () => {
    COMPLETE.mockRejectedValueOnce(new MalformedResponseError('choices: Required', {}));

    expect(await run('Chemical spill')).toBe('🚨 Critical Error: Malformed completion response: choices: Required');
  });

  it('wraps unknown failures as critical errors', async () => {
    COMPLETE.mockRejectedValueOnce(new Error('boom'));
    expect(await run('Landslide')).toBe('🚨 Critical Error: boom');

    COMPLETE.mockRejectedValueOnce('weird');
    expect(await run('Landslide')).toBe('🚨 Critical Error: Analyzing emergency report: weird');
  });

  it('calls the provider exactly once per submission', async () => {
    COMPLETE.mockRejectedValue(new UpstreamError(503, 'unavailable'));

    await run('Tornado sighted');

    expect(COMPLETE).toHaveBeenCalledTimes(1);
  });
});
