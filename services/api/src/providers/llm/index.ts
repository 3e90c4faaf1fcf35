import type { LlmProvider } from '@papercast/pipeline';
import { config, type ServiceConfig } from '../../config.js';
import { AnthropicLlmProvider } from './anthropic.js';
import { MockLlmProvider } from './mock.js';

export function createLlmProvider(cfg: ServiceConfig = config): LlmProvider {
  if (cfg.llmProvider === 'anthropic') {
    return new AnthropicLlmProvider(cfg.anthropicApiKey);
  }

  return new MockLlmProvider();
}
