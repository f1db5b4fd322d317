import type { CompletionProvider } from '../providers/llm-provider';
import type { RequestBuilder } from '../providers/request-builder';
import { formatReport } from '../analysis/response-formatter';
import { toHandlerError } from '../errors/provider-errors';
import { systemClock, type Clock, type EmergencyReportInput, type Handler } from './types';

export interface ReportHandlerDeps {
  builder: RequestBuilder;
  provider: CompletionProvider;
  now?: Clock;
}

/**
 * Report text → completion request → one provider call → formatted report.
 * Every failure comes back as a result; nothing is retried.
 */
export function createReportHandler(deps: ReportHandlerDeps): Handler<EmergencyReportInput> {
  const now = deps.now ?? systemClock;

  return async ({ reportText, urgency }) => {
    const built = deps.builder.build(reportText, urgency);
    if (!built.ok) {
      return { ok: false, error: built.error };
    }

    try {
      const completion = await deps.provider.complete(built.request);
      return { ok: true, text: formatReport(completion.rawText, urgency, now()) };
    } catch (e: unknown) {
      return { ok: false, error: toHandlerError(e, 'Analyzing emergency report') };
    }
  };
}
