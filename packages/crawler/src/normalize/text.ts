// Non-breaking, zero-width, thin and control spaces that publishers mix into tables
const SPECIAL_SPACES = /&nbsp;|[\u00A0\u0085\u2000-\u200D\u202F\u205F\u3000\uFEFF\t\n\r\v\f]/g;

/**
 * Replaces special whitespace with plain spaces, collapses runs and trims
 */
export function normalizeSpaces(text: string): string {
  return text.replace(SPECIAL_SPACES, " ").replace(/ {2,}/g, " ").trim();
}
