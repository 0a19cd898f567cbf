import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, DOMAIN_STRATEGIES, REPORT_FORMATS } from '../types/index.js';
import type { DomainStrategy, LogLevel, PatternRecallConfig, RecallConfig, ReportFormat } from '../types/index.js';
import { ConfigurationError } from '../errors.js';
import { NUMERIC_RECALL_KEYS, validateRecallConfig, type NumericRecallKey } from '../recall/config.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration from one source (file, environment, CLI flags).
 */
export interface ConfigOverrides {
    snapshot?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    format?: ReportFormat;
    recall?: Partial<RecallConfig>;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Environment variable → recall option.
 */
export const RECALL_ENV_VARS: Readonly<Record<string, NumericRecallKey>> = {
    PATH1_TOP_K_IDEAS: 'path1TopKIdeas',
    PATH2_TOP_K_DOMAINS: 'path2TopKDomains',
    PATH3_TOP_K_PAPERS: 'path3TopKPapers',
    PATH1_WEIGHT: 'path1Weight',
    PATH2_WEIGHT: 'path2Weight',
    PATH3_WEIGHT: 'path3Weight',
    FINAL_TOP_K: 'finalTopK',
    PAPER_SIMILARITY_THRESHOLD: 'paperSimilarityThreshold',
    EFFECTIVENESS_FLOOR: 'effectivenessFloor',
    CONFIDENCE_SATURATION: 'confidenceSaturation',
};

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function isReportFormat(value: unknown): value is ReportFormat {
    return REPORT_FORMATS.some((format) => format === value);
}

export function isDomainStrategy(value: unknown): value is DomainStrategy {
    return DOMAIN_STRATEGIES.some((strategy) => strategy === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the known keys of a parsed config file. Unknown keys are ignored;
 * known keys with the wrong type are reported.
 */
export function parseConfigFile(raw: unknown, problems: string[]): ConfigOverrides {
    if (!isRecord(raw)) {
        problems.push('config file must contain a JSON object');
        return {};
    }

    const overrides: ConfigOverrides = {};

    if (raw['snapshot'] !== undefined) {
        if (typeof raw['snapshot'] === 'string') overrides.snapshot = raw['snapshot'];
        else problems.push('snapshot must be a string');
    }
    if (raw['logLevel'] !== undefined) {
        if (isLogLevel(raw['logLevel'])) overrides.logLevel = raw['logLevel'];
        else problems.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    if (raw['jsonLogs'] !== undefined) {
        if (typeof raw['jsonLogs'] === 'boolean') overrides.jsonLogs = raw['jsonLogs'];
        else problems.push('jsonLogs must be a boolean');
    }
    if (raw['format'] !== undefined) {
        if (isReportFormat(raw['format'])) overrides.format = raw['format'];
        else problems.push(`format must be one of ${REPORT_FORMATS.join(', ')}`);
    }

    const recallRaw = raw['recall'];
    if (recallRaw !== undefined) {
        if (!isRecord(recallRaw)) {
            problems.push('recall must be an object');
        } else {
            const recall: Partial<RecallConfig> = {};
            for (const key of NUMERIC_RECALL_KEYS) {
                const value = recallRaw[key];
                if (value === undefined) continue;
                if (typeof value === 'number') recall[key] = value;
                else problems.push(`recall.${key} must be a number`);
            }
            const strategy = recallRaw['domainStrategy'];
            if (strategy !== undefined) {
                if (isDomainStrategy(strategy)) recall.domainStrategy = strategy;
                else problems.push(`recall.domainStrategy must be one of ${DOMAIN_STRATEGIES.join(', ')}`);
            }
            overrides.recall = recall;
        }
    }

    return overrides;
}

/**
 * Load configuration from patternrecall.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(problems: string[]): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('patternrecall', {
        searchPlaces: ['patternrecall.config.json'],
    });

    let raw: unknown;
    try {
        const result = await explorer.search();
        if (!result || result.isEmpty) return null;
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        raw = result.config;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    return parseConfigFile(raw, problems);
}

/**
 * Read recall options from environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv, problems: string[]): ConfigOverrides {
    const recall: Partial<RecallConfig> = {};

    for (const [name, key] of Object.entries(RECALL_ENV_VARS)) {
        const raw = env[name];
        if (raw === undefined || raw.trim() === '') continue;

        const value = Number(raw);
        if (Number.isNaN(value)) {
            problems.push(`${name} must be numeric (got "${raw}")`);
            continue;
        }
        recall[key] = value;
    }

    const strategy = env['DOMAIN_STRATEGY'];
    if (strategy !== undefined && strategy !== '') {
        if (isDomainStrategy(strategy)) recall.domainStrategy = strategy;
        else problems.push(`DOMAIN_STRATEGY must be one of ${DOMAIN_STRATEGIES.join(', ')} (got "${strategy}")`);
    }

    const overrides: ConfigOverrides = { recall };
    const level = env['LOG_LEVEL'];
    if (level !== undefined && level !== '') {
        if (isLogLevel(level)) overrides.logLevel = level;
        else problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${level}")`);
    }

    return overrides;
}

/**
 * Merge configuration sources over the defaults, later sources winning.
 * The merged recall options are validated.
 */
export function mergeConfig(...sources: Array<ConfigOverrides | null>): PatternRecallConfig {
    let merged: PatternRecallConfig = { ...DEFAULT_CONFIG, recall: { ...DEFAULT_CONFIG.recall } };

    for (const source of sources) {
        if (!source) continue;
        merged = {
            ...merged,
            ...source,
            // Deep merge nested objects
            recall: {
                ...merged.recall,
                ...source.recall,
            },
        };
    }

    validateRecallConfig(merged.recall);
    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    env: NodeJS.ProcessEnv = process.env
): Promise<PatternRecallConfig> {
    const problems: string[] = [];
    const fileConfig = await loadConfigFile(problems);
    const envConfig = loadEnvVars(env, problems);

    if (problems.length > 0) {
        throw new ConfigurationError(problems);
    }

    return mergeConfig(fileConfig, envConfig, cliFlags);
}
