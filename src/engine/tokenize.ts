const TOKEN_PATTERN = /[\p{L}\p{N}']+/gu;

/**
 * Lowercase word tokens. Apostrophes stay inside a token ("don't")
 * and are trimmed from its edges; everything else splits.
 */
export function tokenize(text: string): string[] {
  const matches = text.toLowerCase().replace(/[‘’]/g, "'").match(TOKEN_PATTERN) ?? [];
  return matches.map((t) => t.replace(/^'+|'+$/g, "")).filter((t) => t.length > 0);
}
