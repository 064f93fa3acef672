export const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Grouping key for free-text mentions: lower case, punctuation replaced by
 * spaces, whitespace collapsed.
 */
export const normalizeText = (text: string): string =>
  collapseWhitespace(
    text
      .normalize('NFKC')
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
  );
