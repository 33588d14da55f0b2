/**
 * Split a camelCase or PascalCase identifier into lowercase space-separated words.
 *
 * Examples:
 *   authenticateUser  → "authenticate user"
 *   HTMLParser        → "html parser"
 *   _privateField     → "private field"
 */
export function splitCamelCase(str: string): string {
  return str
    .replace(/^[_]+/, '') // strip leading underscores
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2') // camelCase boundary: "tU" → "t U"
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2') // acronym boundary: "HTMLParser" → "HTML Parser"
    .replace(/[-_]+/g, ' ')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

const WORD_RE = /[\p{L}\p{N}_]+/gu;

/**
 * Lexical tokenizer shared by indexing and querying: case-folding and
 * punctuation stripping only. Identifiers such as `parseConfig` or
 * `load_file` produce the whole word followed by its parts, so both
 * `parseconfig` and `config` match.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(WORD_RE)) {
    const word = match[0];
    const lowered = word.toLowerCase().replace(/^_+|_+$/g, '');
    if (lowered === '') continue;
    tokens.push(lowered);

    const isMixedCase = /[A-Z]/.test(word) && /[a-z]/.test(word);
    if (isMixedCase || lowered.includes('_')) {
      const parts = splitCamelCase(word).split(' ');
      if (parts.length > 1) {
        for (const part of parts) {
          if (part !== '') tokens.push(part);
        }
      }
    }
  }
  return tokens;
}

/** Whitespace-collapsed, trimmed text; the input to chunk fingerprints. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
