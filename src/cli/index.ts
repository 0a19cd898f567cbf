#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, isDomainStrategy, isLogLevel, isReportFormat, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { loadSnapshot, readSnapshotMeta } from '../storage/load-snapshot.js';
import { readSnapshotFile } from '../storage/snapshot-file.js';
import { SnapshotDatabase } from '../storage/snapshot-db.js';
import { GraphStore } from '../graph/graph-store.js';
import { diagnoseSnapshot } from '../graph/diagnostics.js';
import { recall } from '../recall/recall.js';
import { formatRecallReport } from '../exporters/report.js';
import type { NumericRecallKey } from '../recall/config.js';
import type { DomainStrategy, LogLevel, RecallConfig, ReportFormat } from '../types/index.js';

const VERSION = '1.0.0';

// ─── Option parsers ──────────────────────────────────────

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function parseWeights(value: string): [number, number, number] {
    const parts = value.split(',').map((part) => parseNumber(part));
    const [idea, domain, paper] = parts;
    if (parts.length !== 3 || idea === undefined || domain === undefined || paper === undefined) {
        throw new InvalidArgumentError('Expected three comma-separated weights (idea,domain,paper).');
    }
    return [idea, domain, paper];
}

function parseChoice<T extends string>(guard: (value: unknown) => value is T, label: string) {
    return (value: string): T => {
        if (!guard(value)) {
            throw new InvalidArgumentError(`Invalid ${label}: ${value}`);
        }
        return value;
    };
}

interface CommonOptions {
    input?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface RecallOptions extends CommonOptions {
    ideas?: number;
    domains?: number;
    papers?: number;
    topK?: number;
    weights?: [number, number, number];
    threshold?: number;
    floor?: number;
    saturation?: number;
    domainStrategy?: DomainStrategy;
    format?: ReportFormat;
}

/**
 * CLI flags as config overrides. Only flags the user gave are set.
 */
function toOverrides(opts: RecallOptions): ConfigOverrides {
    const recallConfig: Partial<RecallConfig> = {};
    const numeric: Array<[NumericRecallKey, number | undefined]> = [
        ['path1TopKIdeas', opts.ideas],
        ['path2TopKDomains', opts.domains],
        ['path3TopKPapers', opts.papers],
        ['finalTopK', opts.topK],
        ['path1Weight', opts.weights?.[0]],
        ['path2Weight', opts.weights?.[1]],
        ['path3Weight', opts.weights?.[2]],
        ['paperSimilarityThreshold', opts.threshold],
        ['effectivenessFloor', opts.floor],
        ['confidenceSaturation', opts.saturation],
    ];
    for (const [key, value] of numeric) {
        if (value !== undefined) recallConfig[key] = value;
    }
    if (opts.domainStrategy !== undefined) recallConfig.domainStrategy = opts.domainStrategy;

    const overrides: ConfigOverrides = { recall: recallConfig };
    if (opts.input !== undefined) overrides.snapshot = opts.input;
    if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.format !== undefined) overrides.format = opts.format;
    return overrides;
}

const program = new Command();

program
    .name('patternrecall')
    .description('Recall ranked writing patterns for a research idea from a knowledge-graph snapshot.')
    .version(VERSION);

// ─── RECALL command ───────────────────────────────────────

program
    .command('recall')
    .description('Rank patterns for a free-text research idea')
    .argument('<query>', 'Research idea text')
    .option('-i, --input <path>', 'Snapshot path (.json, .db, .sqlite)')
    .option('--ideas <n>', 'Ideas selected by the idea path', parseInteger)
    .option('--domains <n>', 'Domains selected by the domain path', parseInteger)
    .option('--papers <n>', 'Papers selected by the paper path', parseInteger)
    .option('-k, --top-k <n>', 'Result list length', parseInteger)
    .option('-w, --weights <idea,domain,paper>', 'Fusion weights', parseWeights)
    .option('--threshold <x>', 'Paper similarity threshold', parseNumber)
    .option('--floor <x>', 'Effectiveness floor', parseNumber)
    .option('--saturation <n>', 'Confidence saturation frequency', parseNumber)
    .option('--domain-strategy <strategy>', 'keywords | ideas | keywords-then-ideas', parseChoice(isDomainStrategy, 'domain strategy'))
    .option('-f, --format <format>', 'Report format: text | json | csv', parseChoice(isReportFormat, 'format'))
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseChoice(isLogLevel, 'log level'))
    .option('--json-logs', 'Output JSON logs')
    .action(async (query: string, opts: RecallOptions) => {
        try {
            const config = await resolveConfig(toOverrides(opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            if (!config.snapshot) {
                throw new Error('No snapshot given: pass --input or set "snapshot" in patternrecall.config.json');
            }

            const store = await loadSnapshot(config.snapshot);
            const results = recall(query, store, config.recall);
            getLogger().info({ results: results.length }, 'Recall complete');
            process.stdout.write(formatRecallReport(results, config.format));
        } catch (error) {
            getLogger().error({ err: error }, 'Recall failed');
            process.exit(1);
        }
    });

// ─── IMPORT command ───────────────────────────────────────

program
    .command('import')
    .description('Validate a JSON snapshot and store it in a SQLite snapshot database')
    .requiredOption('-i, --input <path>', 'JSON snapshot path')
    .requiredOption('-o, --out <path>', 'Output database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseChoice(isLogLevel, 'log level'))
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & { input: string; out: string }) => {
        initLogger({ level: opts.logLevel ?? 'info', jsonLogs: opts.jsonLogs ?? false });

        try {
            const snapshot = await readSnapshotFile(opts.input);
            GraphStore.fromSnapshot(snapshot);

            const db = new SnapshotDatabase(opts.out);
            try {
                db.writeSnapshot(snapshot, { source: opts.input, imported_at: new Date().toISOString() });
            } finally {
                db.close();
            }
            console.log(`Imported ${opts.input} into ${opts.out}`);
        } catch (error) {
            getLogger().error({ err: error }, 'Import failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show snapshot statistics and consistency checks')
    .requiredOption('-i, --input <path>', 'Snapshot path (.json, .db, .sqlite)')
    .option('--saturation <n>', 'Confidence saturation frequency', parseNumber)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseChoice(isLogLevel, 'log level'))
    .action(async (opts: RecallOptions & { input: string }) => {
        try {
            const config = await resolveConfig(toOverrides(opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const store = await loadSnapshot(opts.input);
            const report = diagnoseSnapshot(store, config.recall.confidenceSaturation);

            console.log('\nSnapshot Statistics\n');
            for (const [type, count] of Object.entries(report.nodes)) {
                console.log(`  ${type.padEnd(14)} ${count}`);
            }
            console.log('\n  Relations:');
            for (const [relation, count] of Object.entries(report.edges)) {
                console.log(`    ${relation.padEnd(14)} ${count}`);
            }

            for (const [key, value] of Object.entries(readSnapshotMeta(opts.input))) {
                console.log(`  ${key}: ${value}`);
            }

            console.log(`\n  Confidence mismatches: ${report.confidenceMismatches.length}`);
            for (const line of report.confidenceMismatches.slice(0, 20)) {
                console.log(`    ${line}`);
            }
            console.log(`  Unreachable patterns:  ${report.unreachablePatterns.length}`);
            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Inspect failed');
            process.exit(1);
        }
    });

await program.parseAsync();
