/**
 * Ascending code-unit order. Unlike localeCompare, independent of the host locale.
 */
export function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Highest scores first; equal scores by ascending id.
 */
export function byScoreThenId<T>(
    scoreOf: (item: T) => number,
    idOf: (item: T) => string
): (a: T, b: T) => number {
    return (a, b) => scoreOf(b) - scoreOf(a) || compareIds(idOf(a), idOf(b));
}

/**
 * The `k` best items under `byScoreThenId`. Does not modify `items`.
 */
export function selectTopK<T>(
    items: readonly T[],
    k: number,
    scoreOf: (item: T) => number,
    idOf: (item: T) => string
): T[] {
    return [...items].sort(byScoreThenId(scoreOf, idOf)).slice(0, k);
}

/**
 * Add `amount` to the entry for `key`.
 */
export function accumulate(scores: Map<string, number>, key: string, amount: number): void {
    scores.set(key, (scores.get(key) ?? 0) + amount);
}
