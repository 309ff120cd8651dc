const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;
const SENTENCE_SPLIT = /(?<=[.!?])\s+/;

/** Lower-cased word tokens longer than three characters. */
export function significantTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((token) => token.length > 3);
}

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_SPLIT)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Shorten to at most `max` characters plus an ellipsis, breaking at the last
 * space when there is one.
 */
export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  const head = text.slice(0, max);
  const lastSpace = head.lastIndexOf(" ");
  const cut = lastSpace > 0 ? head.slice(0, lastSpace) : text.slice(0, Math.max(0, max - 3));
  return `${cut}...`;
}

export function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}
