import Anthropic from '@anthropic-ai/sdk';
import {
  categoryForStatus,
  ProviderFailure,
  toProviderFailure,
  type LlmCompletionRequest,
  type LlmCompletionResult,
  type LlmProvider,
} from '@papercast/pipeline';

function retryAfterMs(headers: unknown): number | undefined {
  if (!(headers instanceof Headers)) return undefined;
  const raw = headers.get('retry-after');
  if (!raw) return undefined;
  const seconds = Number.parseFloat(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : undefined;
}

export function toAnthropicFailure(error: unknown): ProviderFailure {
  if (error instanceof ProviderFailure) return error;
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ProviderFailure('timeout', error.message, undefined, undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ProviderFailure('network', error.message, undefined, undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
    return new ProviderFailure(
      categoryForStatus(error.status),
      error.message,
      error.status,
      retryAfterMs(error.headers),
      { cause: error },
    );
  }
  return toProviderFailure(error);
}

export class AnthropicLlmProvider implements LlmProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    // retried by the pipeline
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(request: LlmCompletionRequest): Promise<LlmCompletionResult> {
    try {
      const message = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { timeout: request.timeoutMs },
      );

      const text = message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
      if (!text.trim() && message.stop_reason === 'refusal') {
        throw new ProviderFailure('content_policy', 'Model declined to summarize this document');
      }

      return {
        text,
        model: message.model,
        usage: {
          inputTokens: message.usage.input_tokens,
          outputTokens: message.usage.output_tokens,
        },
      };
    } catch (error) {
      throw toAnthropicFailure(error);
    }
  }
}
