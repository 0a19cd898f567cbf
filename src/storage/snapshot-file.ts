import { readFile } from 'node:fs/promises';
import type { GraphSnapshot, RawEdgeRecord, RawNodeRecord } from '../types/index.js';
import { SnapshotFormatError } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a record into its identifying keys and its attribute bag.
 * Records with an `attributes` object use it; flat (node-link) records
 * contribute every other key.
 */
function attributesOf(record: Record<string, unknown>, identifying: readonly string[]): Record<string, unknown> {
    const nested = record['attributes'];
    if (isRecord(nested)) return { ...nested };

    const attributes: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
        if (!identifying.includes(key) && key !== 'attributes') attributes[key] = value;
    }
    return attributes;
}

function parseNodeRecord(raw: unknown, index: number, path?: string): RawNodeRecord {
    if (!isRecord(raw)) {
        throw new SnapshotFormatError(`nodes[${index}] is not an object`, path);
    }
    const { id } = raw;
    // Graph exports tag nodes with node_type
    const type = raw['type'] ?? raw['node_type'];
    if (typeof id !== 'string' || id === '') {
        throw new SnapshotFormatError(`nodes[${index}] has no string id`, path);
    }
    if (typeof type !== 'string' || type === '') {
        throw new SnapshotFormatError(`nodes[${index}] (${id}) has no string type`, path);
    }
    return { id, type, attributes: attributesOf(raw, ['id', 'type', 'node_type']) };
}

function parseEdgeRecord(raw: unknown, index: number, path?: string): RawEdgeRecord {
    if (!isRecord(raw)) {
        throw new SnapshotFormatError(`edges[${index}] is not an object`, path);
    }
    const { source, target, relation } = raw;
    if (typeof source !== 'string' || typeof target !== 'string') {
        throw new SnapshotFormatError(`edges[${index}] needs string source and target`, path);
    }
    if (typeof relation !== 'string' || relation === '') {
        throw new SnapshotFormatError(`edges[${index}] (${source} -> ${target}) has no string relation`, path);
    }
    return { source, target, relation, attributes: attributesOf(raw, ['source', 'target', 'relation']) };
}

/**
 * Normalize a parsed snapshot document.
 *
 * Accepts `{ nodes, edges }` with per-record `attributes`, or the node-link
 * layout `{ nodes, links }` with flat attributes.
 */
export function parseSnapshotDocument(doc: unknown, path?: string): GraphSnapshot {
    if (!isRecord(doc)) {
        throw new SnapshotFormatError('Snapshot must be a JSON object', path);
    }

    const nodes = doc['nodes'];
    const edges = doc['edges'] ?? doc['links'];
    if (!Array.isArray(nodes)) {
        throw new SnapshotFormatError('Snapshot has no nodes array', path);
    }
    if (!Array.isArray(edges)) {
        throw new SnapshotFormatError('Snapshot has no edges (or links) array', path);
    }

    return {
        nodes: nodes.map((raw: unknown, i) => parseNodeRecord(raw, i, path)),
        edges: edges.map((raw: unknown, i) => parseEdgeRecord(raw, i, path)),
    };
}

/**
 * Read a JSON snapshot file.
 */
export async function readSnapshotFile(path: string): Promise<GraphSnapshot> {
    const text = await readFile(path, 'utf-8');

    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (error) {
        throw new SnapshotFormatError(
            `Snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    return parseSnapshotDocument(doc, path);
}
