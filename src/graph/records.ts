import { NodeType, Relation } from '../types/index.js';
import type {
    GraphNode,
    PatternRelevance,
    RawNodeRecord,
    RawEdgeRecord,
    RelationAttributes,
} from '../types/index.js';

// ─── Attribute readers ───────────────────────────────────

type Attributes = Readonly<Record<string, unknown>>;

/**
 * Collects violations while records are parsed, so a load can report all of them.
 */
export class ViolationLog {
    readonly entries: string[] = [];

    add(message: string): void {
        this.entries.push(message);
    }

    get size(): number {
        return this.entries.length;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readText(attrs: Attributes, ...keys: string[]): string {
    for (const key of keys) {
        const value = attrs[key];
        if (typeof value === 'string') return value;
        if (typeof value === 'number') return String(value);
    }
    return '';
}

function readNumber(
    attrs: Attributes,
    key: string,
    fallback: number,
    log: ViolationLog,
    label: string
): number {
    const value = attrs[key];
    if (value === undefined || value === null) return fallback;

    const num = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof num === 'number' && Number.isFinite(num)) return num;

    log.add(`${label}: ${key} is not a finite number (${JSON.stringify(value)})`);
    return fallback;
}

function checkUnitRange(value: number, key: string, log: ViolationLog, label: string): void {
    if (value < 0 || value > 1) {
        log.add(`${label}: ${key} ${value} is outside [0, 1]`);
    }
}

function readKeywords(attrs: Attributes): string[] {
    const value = attrs['keywords'];
    if (Array.isArray(value)) {
        return value.filter((k): k is string => typeof k === 'string' && k.trim() !== '');
    }
    if (typeof value === 'string') {
        return value.split(',').map((k) => k.trim()).filter((k) => k !== '');
    }
    return [];
}

/**
 * Accepts `[{ pattern_id, relevance }]`, `[[pattern_id, relevance]]`,
 * or a bare `pattern_ids` list (relevance 1.0).
 */
function readPatternRelevance(attrs: Attributes, log: ViolationLog, label: string): PatternRelevance[] {
    const pairs: PatternRelevance[] = [];
    const value = attrs['pattern_relevance'] ?? attrs['patterns'];

    if (Array.isArray(value)) {
        for (const entry of value) {
            let patternId: unknown;
            let relevance: unknown;
            if (Array.isArray(entry)) {
                [patternId, relevance] = entry;
            } else if (isRecord(entry)) {
                patternId = entry['pattern_id'];
                relevance = entry['relevance'] ?? entry['pattern_relevance'];
            }

            if (typeof patternId !== 'string' || typeof relevance !== 'number' || !Number.isFinite(relevance)) {
                log.add(`${label}: malformed pattern_relevance entry ${JSON.stringify(entry)}`);
                continue;
            }
            checkUnitRange(relevance, `relevance for ${patternId}`, log, label);
            pairs.push({ pattern_id: patternId, relevance });
        }
        return pairs;
    }

    const ids = attrs['pattern_ids'];
    if (Array.isArray(ids)) {
        for (const id of ids) {
            if (typeof id === 'string') pairs.push({ pattern_id: id, relevance: 1.0 });
        }
    }
    return pairs;
}

function extraAttributes(attrs: Attributes, consumed: readonly string[]): Record<string, unknown> {
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(attrs)) {
        if (!consumed.includes(key)) extra[key] = value;
    }
    return extra;
}

// ─── Nodes ───────────────────────────────────────────────

const MODELED_NODE_TYPES: ReadonlySet<string> = new Set(Object.values(NodeType));

export function isModeledNodeType(type: string): type is NodeType {
    return MODELED_NODE_TYPES.has(type);
}

/**
 * Parse a raw node record into its typed variant.
 * Missing text is read as ''; range problems are logged, not thrown.
 */
export function parseNode(record: RawNodeRecord & { type: NodeType }, log: ViolationLog): GraphNode {
    const attrs = record.attributes;
    const label = `${record.type} ${record.id}`;

    switch (record.type) {
        case NodeType.PAPER: {
            const quality = readNumber(attrs, 'quality', 0.5, log, label);
            checkUnitRange(quality, 'quality', log, label);
            const nestedIdea = attrs['idea'];
            const coreIdea = readText(attrs, 'core_idea') ||
                (isRecord(nestedIdea) ? readText(nestedIdea, 'core_idea') : '');
            return {
                type: NodeType.PAPER,
                id: record.id,
                quality,
                core_idea: coreIdea,
                extra: extraAttributes(attrs, ['quality', 'core_idea', 'idea']),
            };
        }
        case NodeType.DOMAIN:
            return {
                type: NodeType.DOMAIN,
                id: record.id,
                name: readText(attrs, 'name'),
                keywords: readKeywords(attrs),
                extra: extraAttributes(attrs, ['name', 'keywords']),
            };
        case NodeType.IDEA:
            return {
                type: NodeType.IDEA,
                id: record.id,
                description: readText(attrs, 'description'),
                pattern_relevance: readPatternRelevance(attrs, log, label),
                extra: extraAttributes(attrs, ['description', 'pattern_relevance', 'patterns', 'pattern_ids']),
            };
        case NodeType.PATTERN:
            return {
                type: NodeType.PATTERN,
                id: record.id,
                name: readText(attrs, 'name', 'pattern_name'),
                summary: readText(attrs, 'summary'),
                cluster_size: attrs['cluster_size'] !== undefined
                    ? readNumber(attrs, 'cluster_size', 0, log, label)
                    : readNumber(attrs, 'paper_count', 0, log, label),
                coherence: readNumber(attrs, 'coherence', 0, log, label),
                extra: extraAttributes(attrs, ['name', 'pattern_name', 'summary', 'cluster_size', 'paper_count', 'coherence']),
            };
    }
}

// ─── Edges ───────────────────────────────────────────────

const MODELED_RELATIONS: ReadonlySet<string> = new Set(Object.values(Relation));

export function isModeledRelation(relation: string): relation is Relation {
    return MODELED_RELATIONS.has(relation);
}

export function parseUsesPattern(record: RawEdgeRecord, log: ViolationLog): RelationAttributes[Relation.USES_PATTERN] {
    const label = edgeLabel(record);
    const quality = readNumber(record.attributes, 'quality', 0, log, label);
    checkUnitRange(quality, 'quality', log, label);
    return { quality };
}

export function parseBelongsTo(record: RawEdgeRecord, log: ViolationLog): RelationAttributes[Relation.BELONGS_TO] {
    const label = edgeLabel(record);
    const weight = readNumber(record.attributes, 'weight', 0, log, label);
    checkUnitRange(weight, 'weight', log, label);
    return { weight };
}

export function parseWorksWellIn(record: RawEdgeRecord, log: ViolationLog): RelationAttributes[Relation.WORKS_WELL_IN] {
    const label = edgeLabel(record);
    const frequency = readNumber(record.attributes, 'frequency', 0, log, label);
    const effectiveness = readNumber(record.attributes, 'effectiveness', 0, log, label);
    const confidence = readNumber(record.attributes, 'confidence', 0, log, label);
    checkUnitRange(confidence, 'confidence', log, label);
    return { frequency, effectiveness, confidence };
}

export function edgeLabel(record: RawEdgeRecord): string {
    return `edge ${record.source} -[${record.relation}]-> ${record.target}`;
}
