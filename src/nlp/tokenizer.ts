/**
 * Scripts written without spaces between words. Runs of these characters
 * are split into overlapping two-character windows instead of words.
 */
const UNSEGMENTED = '\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}\\p{Script=Hangul}';

const RUN_PATTERN = new RegExp(
    `([${UNSEGMENTED}]+)|((?:(?![${UNSEGMENTED}])[\\p{L}\\p{N}\\p{M}])+)`,
    'gu'
);

/**
 * A function turning text into tokens. Duplicates are allowed; callers
 * that need sets build them.
 */
export type Tokenizer = (text: string) => string[];

/**
 * Emit overlapping bigrams for a run of unsegmented characters.
 * A single-character run yields that character.
 */
export function charBigrams(run: string): string[] {
    const chars = Array.from(run);
    if (chars.length === 1) return chars;

    const grams: string[] = [];
    for (let i = 0; i + 1 < chars.length; i++) {
        grams.push(`${chars[i]}${chars[i + 1]}`);
    }
    return grams;
}

/**
 * Tokenize text into lowercase tokens, script-aware.
 * - Case-fold (NFKC + lowercase)
 * - Punctuation and whitespace separate tokens
 * - Latin and other spaced scripts: one token per word
 * - CJK runs: overlapping bigrams
 * - No stopwords, no stemming (deterministic; identical text → identical tokens)
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    const folded = text.normalize('NFKC').toLowerCase();
    const tokens: string[] = [];

    for (const match of folded.matchAll(RUN_PATTERN)) {
        const [, unsegmented, word] = match;
        if (unsegmented) {
            tokens.push(...charBigrams(unsegmented));
        } else if (word) {
            tokens.push(word);
        }
    }

    return tokens;
}

/**
 * Lowercase and split on whitespace only. Kept as a baseline: it leaves
 * unsegmented text as one token per whitespace-delimited chunk.
 */
export function whitespaceTokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .split(/\s+/)
        .filter((token) => token.length > 0);
}
