import { describe, it, expect } from 'vitest';
import { GraphStore } from '../graph/graph-store.js';
import { SnapshotHandle } from '../graph/snapshot-handle.js';
import { diagnoseSnapshot } from '../graph/diagnostics.js';
import { RecallService } from '../recall/service.js';
import { GraphIntegrityError, NotLoadedError } from '../errors.js';
import { NodeType } from '../types/index.js';
import type { GraphSnapshot } from '../types/index.js';
import { domain, idea, paper, pattern, snapshot, usesPattern, worksWellIn } from './helpers.js';

function versionOne(): GraphSnapshot {
    return snapshot([idea('idea_1', 'speech enhancement', [['pattern_old', 1.0]]), pattern('pattern_old')]);
}

function versionTwo(): GraphSnapshot {
    return snapshot([idea('idea_1', 'speech enhancement', [['pattern_new', 1.0]]), pattern('pattern_new')]);
}

describe('SnapshotHandle', () => {
    it('should throw NotLoadedError until a store is swapped in', () => {
        const handle = new SnapshotHandle();
        expect(() => handle.current()).toThrow(NotLoadedError);
        expect(handle.version).toBe(0);
    });

    it('should refuse an unloaded store', () => {
        expect(() => new SnapshotHandle().swap(new GraphStore())).toThrow(NotLoadedError);
    });

    it('should return the previous store on swap', () => {
        const first = GraphStore.fromSnapshot(versionOne());
        const second = GraphStore.fromSnapshot(versionTwo());
        const handle = new SnapshotHandle(first);

        expect(handle.version).toBe(1);
        expect(handle.swap(second)).toBe(first);
        expect(handle.current()).toBe(second);
        expect(handle.version).toBe(2);
    });

    it('should leave a store taken before the swap readable', () => {
        const handle = new SnapshotHandle(GraphStore.fromSnapshot(versionOne()));
        const inFlight = handle.current();
        handle.swap(GraphStore.fromSnapshot(versionTwo()));

        expect(inFlight.getNode(NodeType.PATTERN, 'pattern_old')?.id).toBe('pattern_old');
        expect(handle.current().getNode(NodeType.PATTERN, 'pattern_old')).toBeUndefined();
    });
});

describe('RecallService', () => {
    it('should serve queries from the current snapshot', async () => {
        const service = new RecallService(new SnapshotHandle(GraphStore.fromSnapshot(versionOne())));
        expect(service.recall('speech enhancement').map((r) => r.patternId)).toEqual(['pattern_old']);

        await service.reload(async () => versionTwo());
        expect(service.recall('speech enhancement').map((r) => r.patternId)).toEqual(['pattern_new']);
    });

    it('should keep the current snapshot when a reload fails', async () => {
        const handle = new SnapshotHandle(GraphStore.fromSnapshot(versionOne()));
        const service = new RecallService(handle);
        const broken = snapshot([paper('paper_1', 'x')], [usesPattern('paper_1', 'pattern_missing', 0.5)]);

        await expect(service.reload(async () => broken)).rejects.toBeInstanceOf(GraphIntegrityError);
        expect(handle.version).toBe(1);
        expect(service.recall('speech enhancement').map((r) => r.patternId)).toEqual(['pattern_old']);
    });

    it('should propagate loader failures', async () => {
        const service = new RecallService(new SnapshotHandle());
        await expect(service.reload(async () => {
            throw new Error('disk unavailable');
        })).rejects.toThrow('disk unavailable');
        expect(() => service.recall('speech')).toThrow(NotLoadedError);
    });
});

describe('diagnoseSnapshot', () => {
    it('should flag confidence that does not follow frequency', () => {
        const store = GraphStore.fromSnapshot(snapshot(
            [domain('domain_1', 'D'), pattern('pattern_1'), pattern('pattern_2')],
            [
                worksWellIn('pattern_1', 'domain_1', 0.3, 0.5, 10),
                worksWellIn('pattern_2', 'domain_1', 0.3, 0.9, 10),
            ]
        ));
        const report = diagnoseSnapshot(store, 20);
        expect(report.confidenceMismatches).toEqual(['pattern_2 -> domain_1: confidence 0.9, expected 0.5']);
    });

    it('should saturate expected confidence at 1', () => {
        const store = GraphStore.fromSnapshot(snapshot(
            [domain('domain_1', 'D'), pattern('pattern_1')],
            [worksWellIn('pattern_1', 'domain_1', 0.3, 1.0, 45)]
        ));
        expect(diagnoseSnapshot(store, 20).confidenceMismatches).toEqual([]);
    });

    it('should list patterns no path can reach', () => {
        const store = GraphStore.fromSnapshot(snapshot(
            [
                idea('idea_1', 'x', [['pattern_idea', 1.0]]),
                paper('paper_1', 'y'),
                domain('domain_1', 'D'),
                pattern('pattern_idea'),
                pattern('pattern_paper'),
                pattern('pattern_domain'),
                pattern('pattern_orphan'),
            ],
            [
                usesPattern('paper_1', 'pattern_paper', 0.5),
                worksWellIn('pattern_domain', 'domain_1', 0.3, 0.5),
            ]
        ));
        const report = diagnoseSnapshot(store, 20);
        expect(report.unreachablePatterns).toEqual(['pattern_orphan']);
        expect(report.nodes.Pattern).toBe(4);
    });
});
