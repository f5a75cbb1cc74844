/**
 * Grouping key for a book title: lowercase, subtitle (from the first colon or dash)
 * removed, punctuation removed, whitespace collapsed. Many-to-one on purpose, so two
 * editions with different subtitles land in the same group.
 */
export const normalizeTitle = (title: string | null | undefined): string => {
  if (!title) return '';
  return title
    .toLowerCase()
    .replace(/[:\-–—].*$/s, '')
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
};
