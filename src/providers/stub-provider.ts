import type { CompletionProvider, CompletionRequest, CompletionResult } from './llm-provider';

// Canned analysis in the layout the formatter expects; no network involved.
export const STUB_ANALYSIS = `#### Potential Disaster Type Classification
- Unverified local emergency reported by a member of the public
- Classification pending confirmation from field teams

#### Severity Assessment
Severity cannot be measured without live data.
- Treat as potentially serious until confirmed otherwise

#### Recommended Emergency Response
- Move people away from the affected area
- Contact local emergency services
- Keep access routes clear for responders

#### Resource Allocation Suggestions
- Dispatch one assessment team to the reported location
- Place medical support on standby
`;

export class StubProvider implements CompletionProvider {
  complete(_request: CompletionRequest): Promise<CompletionResult> {
    return Promise.resolve({ statusCode: 200, rawText: STUB_ANALYSIS });
  }
}
