import { PreparationError } from './errors.js';
import type { PreparedContent, Pricing } from './types.js';

const CHARS_PER_TOKEN = 4;

/** Anthropic Sonnet list price, USD per million tokens. */
export const DEFAULT_PRICING: Pricing = {
  inputUsdPerMillionTokens: 3,
  outputUsdPerMillionTokens: 15,
};

/** 100k-token input window less 1k reserved for the prompt scaffold, in characters. */
export const DEFAULT_MAX_INPUT_CHARS = (100_000 - 1_000) * CHARS_PER_TOKEN;

export const DEFAULT_OUTPUT_TOKEN_BUDGET = 2_000;

export interface PrepareOptions {
  pricing?: Pricing;
  outputTokenBudget?: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function estimateCostUsd(
  inputTokens: number,
  outputTokens: number,
  pricing: Pricing = DEFAULT_PRICING,
): number {
  return (
    (inputTokens * pricing.inputUsdPerMillionTokens + outputTokens * pricing.outputUsdPerMillionTokens) /
    1_000_000
  );
}

// Sentence end: terminal punctuation, optional closing quote or bracket, then whitespace.
const SENTENCE_END = /[.!?]["'”’)\]]?(?=\s)/g;

function lastBoundary(head: string): number {
  let cut = -1;

  const paragraph = head.lastIndexOf('\n\n');
  if (paragraph > 0) cut = paragraph;

  for (const match of head.matchAll(SENTENCE_END)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > cut) cut = end;
  }

  return cut;
}

/**
 * Cuts text to the last sentence or paragraph boundary inside the first
 * `maxChars` characters, falling back to a word boundary.
 */
export function truncateAtBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  // Include one character past the limit so a boundary right at the limit is visible.
  const head = text.slice(0, maxChars + 1);
  let cut = lastBoundary(head);

  if (cut <= 0) {
    const space = head.search(/\s\S*$/);
    cut = space > 0 ? space : maxChars;
  }

  return text.slice(0, Math.min(cut, maxChars)).trimEnd();
}

export function prepareContent(text: string, maxChars: number, options: PrepareOptions = {}): PreparedContent {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new PreparationError(`maxChars must be a positive integer (got ${maxChars})`);
  }

  const prepared = truncateAtBoundary(text, maxChars);
  // Counts the budgeted window rather than the cut point, so longer input never estimates lower.
  const estimatedTokens = Math.ceil(Math.min(text.length, maxChars) / CHARS_PER_TOKEN);

  return {
    text: prepared,
    originalLength: text.length,
    truncatedLength: prepared.length,
    truncated: prepared.length < text.length,
    estimatedTokens,
    estimatedCostUsd: estimateCostUsd(
      estimatedTokens,
      options.outputTokenBudget ?? DEFAULT_OUTPUT_TOKEN_BUDGET,
      options.pricing,
    ),
  };
}
