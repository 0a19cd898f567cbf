import { tokenize, type Tokenizer } from './tokenizer.js';

/**
 * Jaccard similarity of two token sets: |A ∩ B| / |A ∪ B|.
 * Returns 0 when either set is empty.
 */
export function jaccardSimilarity(
    setA: ReadonlySet<string>,
    setB: ReadonlySet<string>
): number {
    if (setA.size === 0 || setB.size === 0) return 0;

    // Iterate the smaller set
    const [smaller, larger] = setA.size <= setB.size ? [setA, setB] : [setB, setA];

    let intersection = 0;
    for (const token of smaller) {
        if (larger.has(token)) intersection++;
    }

    const union = setA.size + setB.size - intersection;
    return intersection / union;
}

/**
 * Text-to-text similarity in [0, 1].
 *
 * Symmetric; 1.0 for two texts with identical token sets; 0.0 when either
 * side has no tokens. Holds no state besides its tokenizer, so one engine
 * may be shared across concurrent queries.
 */
export class SimilarityEngine {
    constructor(private readonly tokenizer: Tokenizer = tokenize) {}

    /**
     * Token set of a text under this engine's tokenizer.
     */
    tokenSet(text: string): Set<string> {
        return new Set(this.tokenizer(text));
    }

    similarity(textA: string, textB: string): number {
        return jaccardSimilarity(this.tokenSet(textA), this.tokenSet(textB));
    }

    /**
     * Similarity against a pre-tokenized query, for scoring one query
     * against many texts.
     */
    similarityToTokens(queryTokens: ReadonlySet<string>, text: string): number {
        return jaccardSimilarity(queryTokens, this.tokenSet(text));
    }
}

export const defaultSimilarityEngine = new SimilarityEngine();
