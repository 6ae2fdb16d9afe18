const WHITESPACE_RUN = /\s+/g;
const LETTER_RUN = /\p{L}+/gu;

export function normalizeText(text: string): string {
  return text.trim().replace(WHITESPACE_RUN, " ");
}

/**
 * Normalizes whitespace, then capitalizes the first letter of every run of
 * letters and lowercases the rest ("o'brien" becomes "O'Brien").
 */
export function normalizeTitlecase(text: string): string {
  return normalizeText(text).replace(
    LETTER_RUN,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}
