import type { TtsProvider } from '@papercast/pipeline';
import { config, type ServiceConfig } from '../../config.js';
import { ElevenLabsTtsProvider } from './elevenlabs.js';
import { MockTtsProvider } from './mock.js';

export function createTtsProvider(cfg: ServiceConfig = config): TtsProvider {
  if (cfg.ttsProvider === 'elevenlabs') {
    return new ElevenLabsTtsProvider(cfg.elevenlabsApiKey);
  }

  return new MockTtsProvider(250);
}
