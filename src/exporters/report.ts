import { PATH_NAMES } from '../types/index.js';
import type { PathName, RecallResult, ReportFormat } from '../types/index.js';

// ─── Main Report Function ────────────────────────────────

/**
 * Render ranked recall results in the requested format.
 */
export function formatRecallReport(results: readonly RecallResult[], format: ReportFormat): string {
    switch (format) {
        case 'text':
            return reportText(results);
        case 'json':
            return reportJson(results);
        case 'csv':
            return reportCSV(results);
        default:
            throw new Error(`Unsupported report format: ${String(format)}`);
    }
}

// ─── Format Implementations ─────────────────────────────

const PATH_LABELS: Record<PathName, string> = {
    idea: 'Path 1 (similar ideas)',
    domain: 'Path 2 (domain relevance)',
    paper: 'Path 3 (similar papers)',
};

function reportText(results: readonly RecallResult[]): string {
    if (results.length === 0) {
        return 'No patterns recalled.\n';
    }

    let text = '';
    results.forEach((result, index) => {
        text += `[Rank ${index + 1}] ${result.patternId}\n`;
        text += `  Name:         ${result.pattern.name || 'N/A'}\n`;
        text += `  Final score:  ${result.finalScore.toFixed(4)}\n`;
        for (const path of PATH_NAMES) {
            const part = result.breakdown[path];
            text += `  - ${PATH_LABELS[path].padEnd(26)} ${part.contribution.toFixed(4)} (${part.percentage.toFixed(1)}%)\n`;
        }
        text += `  Cluster size: ${result.pattern.cluster_size} papers\n`;
        text += `  Summary:      ${truncate(result.pattern.summary || 'N/A', 100)}\n`;
        text += '\n';
    });

    return text;
}

function reportJson(results: readonly RecallResult[]): string {
    return JSON.stringify({
        results: results.map((r, index) => ({
            rank: index + 1,
            pattern_id: r.patternId,
            final_score: r.finalScore,
            breakdown: r.breakdown,
            pattern: r.pattern,
        })),
    }, null, 2) + '\n';
}

function reportCSV(results: readonly RecallResult[]): string {
    let csv = 'rank,pattern_id,name,final_score,idea_contribution,domain_contribution,paper_contribution,cluster_size\n';
    results.forEach((r, index) => {
        csv += [
            index + 1,
            quote(r.patternId),
            quote(r.pattern.name),
            r.finalScore,
            r.breakdown.idea.contribution,
            r.breakdown.domain.contribution,
            r.breakdown.paper.contribution,
            r.pattern.cluster_size,
        ].join(',') + '\n';
    });
    return csv;
}

function quote(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Cut to `max` code points, so surrogate pairs stay whole.
 */
function truncate(value: string, max: number): string {
    const chars = Array.from(value);
    return chars.length > max ? `${chars.slice(0, max).join('')}...` : value;
}
