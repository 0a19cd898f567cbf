import { DOMAIN_STRATEGIES } from '../types/index.js';
import type { FusionWeights, RecallConfig } from '../types/index.js';
import { ConfigurationError } from '../errors.js';

/** Recall options that hold numbers */
export type NumericRecallKey = Exclude<keyof RecallConfig, 'domainStrategy'>;

export const NUMERIC_RECALL_KEYS: readonly NumericRecallKey[] = [
    'path1TopKIdeas',
    'path2TopKDomains',
    'path3TopKPapers',
    'path1Weight',
    'path2Weight',
    'path3Weight',
    'finalTopK',
    'paperSimilarityThreshold',
    'effectivenessFloor',
    'confidenceSaturation',
];

const TOP_K_KEYS: readonly NumericRecallKey[] = ['path1TopKIdeas', 'path2TopKDomains', 'path3TopKPapers', 'finalTopK'];
const WEIGHT_KEYS: readonly NumericRecallKey[] = ['path1Weight', 'path2Weight', 'path3Weight'];

/**
 * Check a recall config. Throws ConfigurationError naming every invalid option.
 */
export function validateRecallConfig(config: RecallConfig): void {
    const problems: string[] = [];

    for (const key of NUMERIC_RECALL_KEYS) {
        if (!Number.isFinite(config[key])) {
            problems.push(`${key} must be a finite number (got ${config[key]})`);
        }
    }

    for (const key of TOP_K_KEYS) {
        const value = config[key];
        if (Number.isFinite(value) && (!Number.isInteger(value) || value <= 0)) {
            problems.push(`${key} must be a positive integer (got ${value})`);
        }
    }

    for (const key of WEIGHT_KEYS) {
        const value = config[key];
        if (value < 0) {
            problems.push(`${key} must not be negative (got ${value})`);
        }
    }

    const threshold = config.paperSimilarityThreshold;
    if (threshold < 0 || threshold > 1) {
        problems.push(`paperSimilarityThreshold must be within [0, 1] (got ${threshold})`);
    }

    if (config.effectivenessFloor < 0) {
        problems.push(`effectivenessFloor must not be negative (got ${config.effectivenessFloor})`);
    }

    if (config.confidenceSaturation <= 0) {
        problems.push(`confidenceSaturation must be positive (got ${config.confidenceSaturation})`);
    }

    if (!DOMAIN_STRATEGIES.includes(config.domainStrategy)) {
        problems.push(
            `domainStrategy must be one of ${DOMAIN_STRATEGIES.join(', ')} (got ${String(config.domainStrategy)})`
        );
    }

    if (problems.length > 0) {
        throw new ConfigurationError(problems);
    }
}

export function fusionWeights(config: RecallConfig): FusionWeights {
    return {
        idea: config.path1Weight,
        domain: config.path2Weight,
        paper: config.path3Weight,
    };
}

/**
 * Confidence a works_well_in edge should carry for a given frequency.
 */
export function expectedConfidence(frequency: number, saturation: number): number {
    return Math.min(frequency / saturation, 1.0);
}
