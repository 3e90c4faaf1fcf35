import { randomUUID } from 'crypto';
import { ExtractionError, NoTextLayerError, type ExtractionAttempt } from '../errors.js';
import type { Document, PipelineLogger } from '../types.js';
import { cleanExtractedText, countNonWhitespace } from './cleanup.js';
import { mupdfStrategy } from './mupdf.js';
import { EncryptedDocumentError, type ExtractionStrategy } from './strategy.js';
import { unpdfStrategy } from './unpdf.js';

export { cleanExtractedText, countNonWhitespace } from './cleanup.js';
export { EncryptedDocumentError, type ExtractionStrategy, type StrategyOutput } from './strategy.js';
export { mupdfStrategy } from './mupdf.js';
export { unpdfStrategy } from './unpdf.js';

export const DEFAULT_MIN_USABLE_CHARS = 200;

const PDF_SIGNATURE = '%PDF-';
const SIGNATURE_WINDOW = 1024;

export function defaultExtractionStrategies(): ExtractionStrategy[] {
  return [unpdfStrategy, mupdfStrategy];
}

export interface ExtractOptions {
  strategies?: readonly ExtractionStrategy[];
  minUsableChars?: number;
  documentId?: string;
  logger?: PipelineLogger;
}

export function hasPdfSignature(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, SIGNATURE_WINDOW)).toString('latin1');
  return head.includes(PDF_SIGNATURE);
}

export function isUsableText(text: string, minUsableChars: number): boolean {
  return countNonWhitespace(text) >= minUsableChars;
}

/**
 * Runs each strategy in order until one yields usable text.
 *
 * @throws NoTextLayerError when a strategy could open the file but found no text
 * @throws ExtractionError when the input is not a PDF or every strategy failed
 */
export async function extractDocument(bytes: Uint8Array, options: ExtractOptions = {}): Promise<Document> {
  const strategies = options.strategies ?? defaultExtractionStrategies();
  const minUsableChars = options.minUsableChars ?? DEFAULT_MIN_USABLE_CHARS;
  const logger = options.logger;

  if (bytes.byteLength === 0) {
    throw new ExtractionError('PDF payload is empty', 'EMPTY_INPUT');
  }
  if (!hasPdfSignature(bytes)) {
    throw new ExtractionError('Payload is not a PDF (missing %PDF- signature)', 'NOT_A_PDF');
  }
  if (strategies.length === 0) {
    throw new ExtractionError('No extraction strategies configured', 'NO_STRATEGIES');
  }

  const attempts: ExtractionAttempt[] = [];

  for (const [index, strategy] of strategies.entries()) {
    try {
      const output = await strategy.extract(bytes);
      const text = cleanExtractedText(output.text);

      if (isUsableText(text, minUsableChars)) {
        logger?.info(`extracted chars=${text.length} pages=${output.pageCount} strategy=${strategy.name}`);
        return {
          id: options.documentId ?? randomUUID(),
          bytes,
          byteLength: bytes.byteLength,
          pageCount: output.pageCount,
          text,
          extractionMethod: index === 0 ? 'primary' : 'fallback',
          strategy: strategy.name,
          status: 'extracted',
          title: output.title,
        };
      }

      const characters = countNonWhitespace(text);
      logger?.warn(`strategy=${strategy.name} produced ${characters} usable chars (< ${minUsableChars})`);
      attempts.push({
        strategy: strategy.name,
        outcome: 'unusable',
        message: `only ${characters} non-whitespace characters`,
        characters,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.warn(`strategy=${strategy.name} failed: ${message}`);
      attempts.push({
        strategy: strategy.name,
        outcome: error instanceof EncryptedDocumentError ? 'encrypted' : 'failed',
        message,
        characters: 0,
        cause: error,
      });
    }
  }

  if (attempts.some((attempt) => attempt.outcome === 'unusable')) {
    throw new NoTextLayerError('no_text', attempts);
  }
  if (attempts.some((attempt) => attempt.outcome === 'encrypted')) {
    throw new NoTextLayerError('encrypted', attempts);
  }
  throw new ExtractionError(
    `All extraction strategies failed: ${attempts.map((a) => `${a.strategy}: ${a.message}`).join('; ')}`,
    'ALL_STRATEGIES_FAILED',
    attempts,
  );
}
