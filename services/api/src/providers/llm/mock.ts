import type { LlmCompletionRequest, LlmCompletionResult, LlmProvider } from '@papercast/pipeline';

function paperSection(prompt: string): string {
  const start = prompt.indexOf('PAPER:\n');
  const end = prompt.lastIndexOf('\n\nOUTPUT:');
  if (start < 0 || end <= start) return prompt;
  return prompt.slice(start + 'PAPER:\n'.length, end);
}

/** Deterministic summary built from the opening words of the paper. */
export class MockLlmProvider implements LlmProvider {
  readonly name = 'mock';

  async complete(request: LlmCompletionRequest): Promise<LlmCompletionResult> {
    const opening = paperSection(request.prompt).split(/\s+/).filter(Boolean).slice(0, 60).join(' ');

    return {
      text: `Here is a short briefing on this paper. It opens as follows: ${opening}. That is the gist of the work.`,
      model: `mock:${request.model}`,
    };
  }
}
