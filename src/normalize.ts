/**
 * Key used for every "same phrase?" comparison: trimmed, inner whitespace
 * collapsed, case-folded.
 */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().replace(/\s+/g, " ").toLowerCase();
}
