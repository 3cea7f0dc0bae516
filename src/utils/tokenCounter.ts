import { encode, decode } from 'gpt-tokenizer';

/**
 * Accurately count tokens using GPT tokenizer
 * Falls back to character-based estimation if tokenization fails
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    const tokens = encode(text);
    return tokens.length;
  } catch (error) {
    console.warn('Tokenization failed, using fallback estimation:', error);
    // Fallback: ~4 characters per token (rough approximation)
    return Math.max(1, Math.round(text.length / 4));
  }
}

/**
 * Cut `text` down to at most `maxTokens` tokens, preferring to end on a
 * sentence boundary when one exists in the last third of the kept text.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) return '';
  if (countTokens(text) <= maxTokens) return text;

  let kept: string;
  try {
    kept = decode(encode(text).slice(0, maxTokens));
  } catch {
    kept = text.slice(0, maxTokens * 4);
  }

  const lastStop = Math.max(kept.lastIndexOf('. '), kept.lastIndexOf('! '), kept.lastIndexOf('? '), kept.lastIndexOf('.\n'));
  if (lastStop >= Math.floor((kept.length * 2) / 3)) {
    return kept.slice(0, lastStop + 1).trim();
  }
  return kept.trim();
}
