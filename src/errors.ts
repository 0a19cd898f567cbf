/**
 * Query against a GraphStore (or SnapshotHandle) that holds no loaded snapshot.
 */
export class NotLoadedError extends Error {
    constructor(message = 'Graph snapshot is not loaded') {
        super(message);
        this.name = 'NotLoadedError';
    }
}

/**
 * Snapshot failed integrity checks. Lists every violation, not just the first.
 */
export class GraphIntegrityError extends Error {
    constructor(public readonly violations: readonly string[]) {
        super(`Graph snapshot failed integrity checks (${violations.length}):\n  ${violations.join('\n  ')}`);
        this.name = 'GraphIntegrityError';
    }
}

/**
 * Invalid recall or application configuration. Lists every problem.
 */
export class ConfigurationError extends Error {
    constructor(public readonly problems: readonly string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Snapshot document does not have the expected shape.
 */
export class SnapshotFormatError extends Error {
    constructor(
        message: string,
        public readonly path?: string
    ) {
        super(path ? `${message} (${path})` : message);
        this.name = 'SnapshotFormatError';
    }
}
