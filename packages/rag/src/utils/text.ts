/**
 * Normalize extracted text: unix line endings, at most one blank line in a row, trimmed.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Cut text to at most `maxChars` characters, ending on a word boundary when there is one.
 */
export function cutAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const slice = text.slice(0, maxChars);
  const lastSpace = slice.search(/\s\S*$/);
  return (lastSpace > 0 ? slice.slice(0, lastSpace) : slice).trimEnd();
}

/**
 * Keep at most `maxWords` words, preferring to stop at the last sentence end that fits.
 * Falls back to a word boundary when even the first sentence is too long.
 */
export function truncateToSentence(text: string, maxWords: number): string {
  const trimmed = text.trim();
  if (countWords(trimmed) <= maxWords) {
    return trimmed;
  }

  let best = '';
  const sentenceEnd = /[.!?]+(?=\s|$)/g;
  let match: RegExpExecArray | null;
  while ((match = sentenceEnd.exec(trimmed)) !== null) {
    const candidate = trimmed.slice(0, match.index + match[0].length);
    if (countWords(candidate) > maxWords) {
      break;
    }
    best = candidate;
  }

  if (best !== '') {
    return best;
  }
  return trimmed.split(/\s+/).slice(0, maxWords).join(' ');
}
