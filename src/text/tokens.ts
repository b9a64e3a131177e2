/**
 * Word tokenization for shingle comparison.
 * Every document goes through the same normalization so shingles line up.
 */

/**
 * Unicode punctuation plus the ASCII symbols POSIX [:punct:] also counts
 * ($ + < = > ^ ` | ~).
 */
const PUNCTUATION = /[\p{P}$+<=>^`|~]/gu;

const WHITESPACE = /\s+/;

const utf8 = new TextDecoder("utf-8", { fatal: false });

/**
 * Decode UTF-8 bytes, substituting U+FFFD for malformed sequences.
 * A leading byte order mark is dropped.
 */
export function decodeText(bytes: Uint8Array): string {
  return utf8.decode(bytes);
}

/**
 * Normalize a single word: lowercase with all punctuation removed.
 * "Don't," becomes "dont".
 */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(PUNCTUATION, "");
}

/**
 * Tokenize text into normalized words.
 * Punctuation is removed before splitting, so "well-known" is one token.
 */
export function tokenize(text: string): string[] {
  return normalizeWord(text).split(WHITESPACE).filter(Boolean);
}
