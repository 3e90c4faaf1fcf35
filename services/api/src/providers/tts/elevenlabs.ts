import { ElevenLabsClient, ElevenLabsError, ElevenLabsTimeoutError } from '@elevenlabs/elevenlabs-js';
import {
  categoryForStatus,
  ProviderFailure,
  toProviderFailure,
  type TtsConvertRequest,
  type TtsConvertResult,
  type TtsProvider,
  type TtsVoice,
} from '@papercast/pipeline';
import { mimeFromFormat } from '../../core/artifacts.js';
import { audioLikeToBuffer } from '../../core/buffer.js';

type OutputFormat = NonNullable<Parameters<ElevenLabsClient['textToSpeech']['convert']>[1]['outputFormat']>;

const OUTPUT_FORMATS = [
  'mp3_22050_32',
  'mp3_44100_64',
  'mp3_44100_96',
  'mp3_44100_128',
  'mp3_44100_192',
  'pcm_16000',
  'pcm_22050',
  'pcm_24000',
  'pcm_44100',
] as const satisfies readonly OutputFormat[];

export function toOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ProviderFailure('invalid_request', `Unsupported ElevenLabs output format: ${value}`);
  }
  return format;
}

export function toElevenLabsFailure(error: unknown): ProviderFailure {
  if (error instanceof ProviderFailure) return error;
  if (error instanceof ElevenLabsTimeoutError) {
    return new ProviderFailure('timeout', error.message, undefined, undefined, { cause: error });
  }
  if (error instanceof ElevenLabsError) {
    const status = error.statusCode;
    if (status === undefined) {
      return new ProviderFailure('network', error.message, undefined, undefined, { cause: error });
    }
    return new ProviderFailure(categoryForStatus(status), error.message, status, undefined, { cause: error });
  }
  return toProviderFailure(error);
}

export class ElevenLabsTtsProvider implements TtsProvider {
  readonly name = 'elevenlabs';
  private readonly client: ElevenLabsClient;

  constructor(apiKey: string) {
    this.client = new ElevenLabsClient({ apiKey });
  }

  async convert(input: TtsConvertRequest): Promise<TtsConvertResult> {
    const outputFormat = toOutputFormat(input.outputFormat);

    try {
      const audioLike = await this.client.textToSpeech.convert(
        input.voiceId,
        {
          text: input.text,
          modelId: input.modelId,
          outputFormat,
        },
        {
          timeoutInSeconds: Math.ceil(input.timeoutMs / 1000),
          // retried by the pipeline
          maxRetries: 0,
        },
      );

      return {
        audio: await audioLikeToBuffer(audioLike),
        mimeType: mimeFromFormat(outputFormat),
        outputFormat,
      };
    } catch (error) {
      throw toElevenLabsFailure(error);
    }
  }

  async listVoices(): Promise<TtsVoice[]> {
    try {
      const response = await this.client.voices.search({}, { maxRetries: 0 });
      return response.voices
        .filter((voice) => voice.voiceId.length > 0)
        .map((voice) => ({
          voice_id: voice.voiceId,
          name: voice.name ?? 'unknown',
          category: voice.category,
        }));
    } catch (error) {
      throw toElevenLabsFailure(error);
    }
  }
}
