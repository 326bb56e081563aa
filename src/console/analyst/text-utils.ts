/**
 * Text helpers shared by the classifier, extractor and resolver
 */

export interface Token {
  text: string;
  start: number;
  end: number;
}

/**
 * Lower-case, trim and collapse whitespace
 */
export function normalizeQuery(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive global pattern for a phrase bounded by non-alphanumerics
 *
 * `\b` is not used because values such as "56+" end in a non-word character.
 */
export function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?![a-z0-9])`, 'gi');
}

/**
 * Alternation of phrases, longest first
 */
export function alternation(phrases: readonly string[]): string {
  return [...phrases]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

/**
 * Words with their offsets. Hyphens and "+" stay inside a word so "18-25"
 * and "56+" survive as one token.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/[a-z0-9][a-z0-9+\-']*/gi)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0].toLowerCase(), start, end: start + match[0].length });
  }
  return tokens;
}

export function overlaps(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Numbers written as digits or as words up to ten
 */
const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
};

export const NUMBER_PATTERN = `\\d+|${Object.keys(NUMBER_WORDS).join('|')}`;

export function parseCount(text: string): number | null {
  const word = NUMBER_WORDS[text.toLowerCase()];
  if (word !== undefined) return word;
  const parsed = parseInt(text, 10);
  return Number.isNaN(parsed) ? null : parsed;
}
