const NBSP = /\u00a0/g;

/**
 * Normalizes whitespace in a markup fragment: NBSP becomes a plain space, every
 * line is right-trimmed, blank-line runs collapse to a single blank line and the
 * whole blob is trimmed. `cleanText(cleanText(x)) === cleanText(x)`.
 */
export function cleanText(text: string): string {
  return text
    .replace(NBSP, ' ')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
