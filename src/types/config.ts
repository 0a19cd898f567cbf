/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * How PathScorer₂ derives domain relevance.
 *
 * - keywords: count of domain keywords contained in the query
 * - ideas: similarity-weighted belongs_to edges of the selected ideas
 * - keywords-then-ideas: keywords, falling back to ideas when no domain matches
 */
export type DomainStrategy = 'keywords' | 'ideas' | 'keywords-then-ideas';

export const DOMAIN_STRATEGIES: readonly DomainStrategy[] = ['keywords', 'ideas', 'keywords-then-ideas'];

/**
 * Report formats for recall results.
 */
export type ReportFormat = 'text' | 'json' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'csv'];

/**
 * Recall options. Passed by value into every `recall()` call.
 */
export interface RecallConfig {
    /** Ideas selected by PathScorer₁ */
    path1TopKIdeas: number;

    /** Domains selected by PathScorer₂ */
    path2TopKDomains: number;

    /** Papers selected by PathScorer₃ */
    path3TopKPapers: number;

    /** Fusion weights (not required to sum to 1.0) */
    path1Weight: number;
    path2Weight: number;
    path3Weight: number;

    /** Result list length */
    finalTopK: number;

    /** Papers with similarity below this are ignored by PathScorer₃ */
    paperSimilarityThreshold: number;

    /** Lower clamp applied to effectiveness before multiplying */
    effectivenessFloor: number;

    /** Frequency at which works_well_in confidence saturates upstream */
    confidenceSaturation: number;

    domainStrategy: DomainStrategy;
}

/**
 * Full application configuration merged from CLI flags, env vars, and config file.
 */
export interface PatternRecallConfig {
    /** Snapshot path (.json, .db or .sqlite) */
    snapshot?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Output
    format: ReportFormat;

    recall: RecallConfig;
}

/**
 * Default recall options.
 */
export const DEFAULT_RECALL_CONFIG: Readonly<RecallConfig> = {
    path1TopKIdeas: 10,
    path2TopKDomains: 5,
    path3TopKPapers: 20,
    path1Weight: 0.4,
    path2Weight: 0.3,
    path3Weight: 0.3,
    finalTopK: 10,
    paperSimilarityThreshold: 0.1,
    effectivenessFloor: 0.1,
    confidenceSaturation: 20,
    domainStrategy: 'keywords-then-ideas',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<PatternRecallConfig, 'snapshot'> = {
    logLevel: 'info',
    jsonLogs: false,
    format: 'text',
    recall: { ...DEFAULT_RECALL_CONFIG },
};
