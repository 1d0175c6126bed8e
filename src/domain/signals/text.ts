/** Lowercase and split on anything that is not a letter, digit or underscore. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 0);
}

// Checked in order; the first suffix that leaves at least MIN_STEM characters wins.
const SUFFIXES: ReadonlyArray<readonly [string, string]> = [
  ["ations", ""],
  ["ation", ""],
  ["ings", ""],
  ["ing", ""],
  ["ies", "y"],
  ["ed", ""],
  ["es", ""],
  ["s", ""],
  ["e", ""],
];

const MIN_STEM = 3;

/** Light suffix stripper: "caching" and "cache" both become "cach". */
export function stem(word: string): string {
  for (const [suffix, replacement] of SUFFIXES) {
    if (word.endsWith(suffix) && word.length - suffix.length >= MIN_STEM) {
      return word.slice(0, word.length - suffix.length) + replacement;
    }
  }
  return word;
}

export function tokenMatches(token: string, keywordToken: string): boolean {
  return (
    token === keywordToken ||
    token.startsWith(keywordToken) ||
    stem(token) === stem(keywordToken)
  );
}

/** True when the keyword's tokens appear consecutively somewhere in the input. */
export function containsKeyword(tokens: readonly string[], keywordTokens: readonly string[]): boolean {
  if (keywordTokens.length === 0) return false;
  for (let i = 0; i + keywordTokens.length <= tokens.length; i++) {
    if (keywordTokens.every((k, j) => tokenMatches(tokens[i + j], k))) return true;
  }
  return false;
}
