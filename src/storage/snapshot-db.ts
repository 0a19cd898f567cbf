import Database from 'better-sqlite3';
import type { GraphSnapshot, RawEdgeRecord, RawNodeRecord } from '../types/index.js';
import { SnapshotFormatError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One snapshot per database: nodes and edges with JSON attribute bags and
 * their load positions.
 */
const MIGRATION_V1 = `
-- Snapshot metadata (source file, import time)
CREATE TABLE IF NOT EXISTS snapshot_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

-- Nodes: ids are unique within a type namespace
CREATE TABLE IF NOT EXISTS nodes (
  position INTEGER NOT NULL,
  node_id TEXT NOT NULL,
  type TEXT NOT NULL,
  attributes_json TEXT NOT NULL DEFAULT '{}',
  PRIMARY KEY (type, node_id)
);

-- Edges: at most one per (source, target, relation)
CREATE TABLE IF NOT EXISTS edges (
  position INTEGER NOT NULL,
  source TEXT NOT NULL,
  target TEXT NOT NULL,
  relation TEXT NOT NULL,
  attributes_json TEXT NOT NULL DEFAULT '{}',
  PRIMARY KEY (source, target, relation)
);

CREATE INDEX IF NOT EXISTS idx_nodes_position ON nodes(position);
CREATE INDEX IF NOT EXISTS idx_edges_position ON edges(position);
CREATE INDEX IF NOT EXISTS idx_edges_relation ON edges(relation);
`;

interface NodeRow {
    node_id: string;
    type: string;
    attributes_json: string;
}

interface EdgeRow {
    source: string;
    target: string;
    relation: string;
    attributes_json: string;
}

interface CountRow {
    name: string;
    count: number;
}

export interface SnapshotDbStats {
    nodes: Record<string, number>;
    edges: Record<string, number>;
    meta: Record<string, string>;
}

function parseAttributes(json: string, label: string): Record<string, unknown> {
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch {
        throw new SnapshotFormatError(`${label}: attributes_json is not valid JSON`);
    }
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new SnapshotFormatError(`${label}: attributes_json is not an object`);
    }
    return { ...value };
}

/**
 * Snapshot database wrapper around better-sqlite3.
 * Handles schema migration and whole-snapshot reads and writes.
 */
export class SnapshotDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Snapshot database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Snapshot database migrated to v1');
        }
    }

    /**
     * Replace the stored snapshot in one transaction.
     * A repeated (source, target, relation) keeps its first position and
     * takes the later record's attributes.
     */
    writeSnapshot(snapshot: GraphSnapshot, meta: Record<string, string> = {}): void {
        const insertNode = this.db.prepare(`
      INSERT INTO nodes (position, node_id, type, attributes_json)
      VALUES (@position, @node_id, @type, @attributes_json)
    `);
        const upsertEdge = this.db.prepare(`
      INSERT INTO edges (position, source, target, relation, attributes_json)
      VALUES (@position, @source, @target, @relation, @attributes_json)
      ON CONFLICT(source, target, relation) DO UPDATE SET
        attributes_json = excluded.attributes_json
    `);
        const upsertMeta = this.db.prepare(`
      INSERT INTO snapshot_meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);

        const writeAll = this.db.transaction((data: GraphSnapshot) => {
            this.db.exec('DELETE FROM nodes; DELETE FROM edges; DELETE FROM snapshot_meta;');

            data.nodes.forEach((node, position) => {
                insertNode.run({
                    position,
                    node_id: node.id,
                    type: node.type,
                    attributes_json: JSON.stringify(node.attributes),
                });
            });

            data.edges.forEach((edge, position) => {
                upsertEdge.run({
                    position,
                    source: edge.source,
                    target: edge.target,
                    relation: edge.relation,
                    attributes_json: JSON.stringify(edge.attributes),
                });
            });

            for (const [key, value] of Object.entries(meta)) {
                upsertMeta.run(key, value);
            }
        });

        writeAll(snapshot);
        getLogger().info(
            { nodes: snapshot.nodes.length, edges: snapshot.edges.length },
            'Snapshot written'
        );
    }

    /**
     * Read the stored snapshot in load order.
     */
    readSnapshot(): GraphSnapshot {
        const nodeRows = this.db
            .prepare<[], NodeRow>('SELECT node_id, type, attributes_json FROM nodes ORDER BY position')
            .all();
        const edgeRows = this.db
            .prepare<[], EdgeRow>('SELECT source, target, relation, attributes_json FROM edges ORDER BY position')
            .all();

        const nodes: RawNodeRecord[] = nodeRows.map((row) => ({
            id: row.node_id,
            type: row.type,
            attributes: parseAttributes(row.attributes_json, `${row.type} ${row.node_id}`),
        }));
        const edges: RawEdgeRecord[] = edgeRows.map((row) => ({
            source: row.source,
            target: row.target,
            relation: row.relation,
            attributes: parseAttributes(
                row.attributes_json,
                `edge ${row.source} -[${row.relation}]-> ${row.target}`
            ),
        }));

        return { nodes, edges };
    }

    /**
     * Node counts per type, edge counts per relation, and metadata.
     */
    getStats(): SnapshotDbStats {
        const nodeCounts = this.db
            .prepare<[], CountRow>('SELECT type AS name, COUNT(*) AS count FROM nodes GROUP BY type ORDER BY type')
            .all();
        const edgeCounts = this.db
            .prepare<[], CountRow>(
                'SELECT relation AS name, COUNT(*) AS count FROM edges GROUP BY relation ORDER BY relation'
            )
            .all();
        const metaRows = this.db
            .prepare<[], { key: string; value: string }>('SELECT key, value FROM snapshot_meta ORDER BY key')
            .all();

        return {
            nodes: Object.fromEntries(nodeCounts.map((r) => [r.name, r.count])),
            edges: Object.fromEntries(edgeCounts.map((r) => [r.name, r.count])),
            meta: Object.fromEntries(metaRows.map((r) => [r.key, r.value])),
        };
    }

    /**
     * Get the raw database handle (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    close(): void {
        this.db.close();
    }
}
