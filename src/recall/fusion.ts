import type { FusedPattern, FusionWeights, PathContribution, PathName, ScoreMap } from '../types/index.js';
import { byScoreThenId } from './select.js';

function contribution(rawScore: number, weight: number): Omit<PathContribution, 'percentage'> {
    return { rawScore, weight, contribution: rawScore * weight };
}

function withPercentage(part: Omit<PathContribution, 'percentage'>, finalScore: number): PathContribution {
    return {
        ...part,
        percentage: finalScore > 0 ? (part.contribution / finalScore) * 100 : 0,
    };
}

/**
 * Combine the three paths' raw scores into one ranked list.
 *
 * final = w_idea × idea + w_domain × domain + w_paper × paper
 *
 * Weights are applied as given (no normalization), so each path's share stays
 * visible in the breakdown. Only patterns present in at least one map are
 * ranked. Order: final score descending, then pattern id ascending.
 */
export function fuse(
    ideaScores: ScoreMap,
    domainScores: ScoreMap,
    paperScores: ScoreMap,
    weights: FusionWeights,
    finalTopK: number
): FusedPattern[] {
    const patternIds = new Set<string>([...ideaScores.keys(), ...domainScores.keys(), ...paperScores.keys()]);
    const fused: FusedPattern[] = [];

    for (const patternId of patternIds) {
        const parts: Record<PathName, Omit<PathContribution, 'percentage'>> = {
            idea: contribution(ideaScores.get(patternId) ?? 0, weights.idea),
            domain: contribution(domainScores.get(patternId) ?? 0, weights.domain),
            paper: contribution(paperScores.get(patternId) ?? 0, weights.paper),
        };
        const finalScore = parts.idea.contribution + parts.domain.contribution + parts.paper.contribution;

        fused.push({
            patternId,
            finalScore,
            breakdown: {
                idea: withPercentage(parts.idea, finalScore),
                domain: withPercentage(parts.domain, finalScore),
                paper: withPercentage(parts.paper, finalScore),
            },
        });
    }

    return fused
        .sort(byScoreThenId((p) => p.finalScore, (p) => p.patternId))
        .slice(0, finalTopK);
}
