/**
 * Node record as delivered by the offline pipeline.
 */
export interface RawNodeRecord {
    id: string;
    type: string;
    attributes: Record<string, unknown>;
}

/**
 * Edge record as delivered by the offline pipeline.
 */
export interface RawEdgeRecord {
    source: string;
    target: string;
    relation: string;
    attributes: Record<string, unknown>;
}

/**
 * A persisted graph snapshot: two ordered collections.
 */
export interface GraphSnapshot {
    nodes: RawNodeRecord[];
    edges: RawEdgeRecord[];
}
