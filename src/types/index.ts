/**
 * Barrel export for all shared types.
 */
export { NodeType, NODE_TYPES } from './node.js';
export type {
    GraphNode,
    NodeOfType,
    PaperNode,
    DomainNode,
    IdeaNode,
    PatternNode,
    PatternRelevance,
    ExtraAttributes,
} from './node.js';
export { Relation, RELATIONS, RELATION_ENDPOINTS } from './edge.js';
export type {
    GraphEdge,
    RelationAttributes,
    UsesPatternAttributes,
    BelongsToAttributes,
    WorksWellInAttributes,
} from './edge.js';
export type { GraphSnapshot, RawNodeRecord, RawEdgeRecord } from './snapshot.js';
export { DEFAULT_CONFIG, DEFAULT_RECALL_CONFIG, DOMAIN_STRATEGIES, REPORT_FORMATS } from './config.js';
export type {
    PatternRecallConfig,
    RecallConfig,
    DomainStrategy,
    ReportFormat,
    LogLevel,
} from './config.js';
export { PATH_NAMES } from './recall.js';
export type {
    ScoreMap,
    PathName,
    PathContribution,
    ScoreBreakdown,
    FusionWeights,
    FusedPattern,
    PatternSnapshot,
    RecallResult,
} from './recall.js';
