import { describe, it, expect } from 'vitest';
import { loadEnvVars, mergeConfig, parseConfigFile, resolveConfig } from '../utils/config.js';
import { validateRecallConfig, expectedConfidence, fusionWeights } from '../recall/config.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_CONFIG, DEFAULT_RECALL_CONFIG } from '../types/index.js';

// Helper: the problem list of a ConfigurationError thrown by `fn`
function problemsOf(fn: () => unknown): readonly string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigurationError) return err.problems;
        throw err;
    }
    throw new Error('expected ConfigurationError');
}

describe('Config', () => {
    describe('defaults', () => {
        it('should use the documented recall defaults', () => {
            expect(DEFAULT_RECALL_CONFIG).toEqual({
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
            });
            expect(() => validateRecallConfig(DEFAULT_RECALL_CONFIG)).not.toThrow();
        });

        it('should map weights onto paths', () => {
            expect(fusionWeights(DEFAULT_RECALL_CONFIG)).toEqual({ idea: 0.4, domain: 0.3, paper: 0.3 });
        });

        it('expectedConfidence should saturate at 1', () => {
            expect(expectedConfidence(5, 20)).toBe(0.25);
            expect(expectedConfidence(40, 20)).toBe(1);
        });
    });

    describe('validateRecallConfig', () => {
        it('should name every invalid option', () => {
            const problems = problemsOf(() => validateRecallConfig({
                ...DEFAULT_RECALL_CONFIG,
                path1TopKIdeas: 0,
                path3Weight: -0.5,
                paperSimilarityThreshold: 1.5,
            }));
            expect(problems).toEqual([
                'path1TopKIdeas must be a positive integer (got 0)',
                'path3Weight must not be negative (got -0.5)',
                'paperSimilarityThreshold must be within [0, 1] (got 1.5)',
            ]);
        });

        it('should reject fractional and non-finite counts', () => {
            const problems = problemsOf(() => validateRecallConfig({
                ...DEFAULT_RECALL_CONFIG,
                finalTopK: 2.5,
                path2Weight: Number.NaN,
            }));
            expect(problems).toEqual([
                'path2Weight must be a finite number (got NaN)',
                'finalTopK must be a positive integer (got 2.5)',
            ]);
        });

        it('should reject a negative effectiveness floor', () => {
            const problems = problemsOf(() => validateRecallConfig({ ...DEFAULT_RECALL_CONFIG, effectivenessFloor: -1 }));
            expect(problems).toEqual(['effectivenessFloor must not be negative (got -1)']);
        });

        it('should accept weights that do not sum to 1', () => {
            expect(() => validateRecallConfig({
                ...DEFAULT_RECALL_CONFIG,
                path1Weight: 2,
                path2Weight: 0,
                path3Weight: 0,
            })).not.toThrow();
        });
    });

    describe('loadEnvVars', () => {
        it('should read numeric recall options and the domain strategy', () => {
            const problems: string[] = [];
            const overrides = loadEnvVars({
                PATH1_TOP_K_IDEAS: '3',
                PATH2_WEIGHT: '0.5',
                DOMAIN_STRATEGY: 'ideas',
                LOG_LEVEL: 'debug',
            }, problems);
            expect(problems).toEqual([]);
            expect(overrides).toEqual({
                recall: { path1TopKIdeas: 3, path2Weight: 0.5, domainStrategy: 'ideas' },
                logLevel: 'debug',
            });
        });

        it('should report unparsable values', () => {
            const problems: string[] = [];
            loadEnvVars({ FINAL_TOP_K: 'ten', DOMAIN_STRATEGY: 'random' }, problems);
            expect(problems).toEqual([
                'FINAL_TOP_K must be numeric (got "ten")',
                'DOMAIN_STRATEGY must be one of keywords, ideas, keywords-then-ideas (got "random")',
            ]);
        });

        it('should ignore empty variables', () => {
            const problems: string[] = [];
            expect(loadEnvVars({ PATH1_WEIGHT: '  ', LOG_LEVEL: '' }, problems)).toEqual({ recall: {} });
            expect(problems).toEqual([]);
        });
    });

    describe('parseConfigFile', () => {
        it('should read known keys', () => {
            const problems: string[] = [];
            const overrides = parseConfigFile({
                snapshot: 'graph.db',
                format: 'csv',
                recall: { finalTopK: 5, domainStrategy: 'keywords' },
                unknownKey: true,
            }, problems);
            expect(problems).toEqual([]);
            expect(overrides).toEqual({
                snapshot: 'graph.db',
                format: 'csv',
                recall: { finalTopK: 5, domainStrategy: 'keywords' },
            });
        });

        it('should report keys of the wrong type', () => {
            const problems: string[] = [];
            parseConfigFile({ jsonLogs: 'yes', recall: { path1Weight: '0.4' } }, problems);
            expect(problems).toEqual(['jsonLogs must be a boolean', 'recall.path1Weight must be a number']);
        });

        it('should reject a non-object document', () => {
            const problems: string[] = [];
            expect(parseConfigFile([1, 2], problems)).toEqual({});
            expect(problems).toEqual(['config file must contain a JSON object']);
        });
    });

    describe('mergeConfig', () => {
        it('should return defaults with no sources', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should let later sources win and merge recall options', () => {
            const merged = mergeConfig(
                { format: 'json', recall: { finalTopK: 5, path1Weight: 0.6 } },
                null,
                { recall: { finalTopK: 3 } }
            );
            expect(merged.format).toBe('json');
            expect(merged.recall.finalTopK).toBe(3);
            expect(merged.recall.path1Weight).toBe(0.6);
            expect(merged.recall.path2Weight).toBe(0.3);
        });

        it('should validate the merged recall options', () => {
            expect(() => mergeConfig({ recall: { path2TopKDomains: -1 } })).toThrow(ConfigurationError);
        });
    });

    describe('resolveConfig', () => {
        it('should apply CLI flags over environment variables', async () => {
            const config = await resolveConfig(
                { recall: { finalTopK: 4 } },
                { FINAL_TOP_K: '7', PATH3_WEIGHT: '0.1' }
            );
            expect(config.recall.finalTopK).toBe(4);
            expect(config.recall.path3Weight).toBe(0.1);
        });

        it('should reject invalid environment variables', async () => {
            await expect(resolveConfig({}, { PATH1_WEIGHT: 'heavy' })).rejects.toBeInstanceOf(ConfigurationError);
        });
    });
});
