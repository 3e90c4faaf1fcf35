import type { TtsConvertRequest, TtsConvertResult, TtsProvider, TtsVoice } from '@papercast/pipeline';
import { mimeFromFormat } from '../../core/artifacts.js';

const MOCK_VOICES: TtsVoice[] = [
  { voice_id: 'mock-neutral', name: 'Mock Neutral' },
  { voice_id: 'mock-energetic', name: 'Mock Energetic' },
  { voice_id: 'mock-calm', name: 'Mock Calm' },
];

/** Deterministic stand-in: the "audio" is a tagged copy of the chunk text. */
export class MockTtsProvider implements TtsProvider {
  readonly name = 'mock';

  constructor(private readonly latencyMs = 0) {}

  async convert(input: TtsConvertRequest): Promise<TtsConvertResult> {
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }

    return {
      audio: Buffer.from(`MOCK_AUDIO[${input.voiceId}]::${input.text}\n`, 'utf8'),
      mimeType: mimeFromFormat(input.outputFormat),
      outputFormat: input.outputFormat,
    };
  }

  async listVoices(): Promise<TtsVoice[]> {
    return MOCK_VOICES;
  }
}
