/**
 * Public API.
 */
export * from './types/index.js';
export { NotLoadedError, GraphIntegrityError, ConfigurationError, SnapshotFormatError } from './errors.js';
export { GraphStore } from './graph/graph-store.js';
export type { Neighbor, GraphStats } from './graph/graph-store.js';
export { SnapshotHandle } from './graph/snapshot-handle.js';
export { diagnoseSnapshot } from './graph/diagnostics.js';
export type { SnapshotDiagnostics } from './graph/diagnostics.js';
export { SimilarityEngine, jaccardSimilarity, defaultSimilarityEngine } from './nlp/similarity.js';
export { tokenize, whitespaceTokenize, charBigrams } from './nlp/tokenizer.js';
export type { Tokenizer } from './nlp/tokenizer.js';
export { recall, scorePaths } from './recall/recall.js';
export type { PathScores } from './recall/recall.js';
export { fuse } from './recall/fusion.js';
export { validateRecallConfig, expectedConfidence } from './recall/config.js';
export { RecallService } from './recall/service.js';
export { SnapshotDatabase } from './storage/snapshot-db.js';
export { readSnapshotFile, parseSnapshotDocument } from './storage/snapshot-file.js';
export { loadSnapshot, readSnapshot, readSnapshotMeta } from './storage/load-snapshot.js';
export { formatRecallReport } from './exporters/report.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
