import type { SourceName, SourceRowMap } from '../types/sources';
import type { ModelName, ModelRowMap } from '../pipeline/tables';
import type { TableStore } from './table-store';

export type SourceSnapshot = { [K in SourceName]?: readonly SourceRowMap[K][] };
type PublishedTables = { [K in ModelName]?: readonly ModelRowMap[K][] };

// Keeps everything in process; used by tests and local experiments
export class MemoryTableStore implements TableStore {
    private readonly published: PublishedTables = {};
    private readonly publishCounts = new Map<ModelName, number>();

    constructor(private readonly sources: SourceSnapshot = {}) {}

    async readSource<K extends SourceName>(name: K): Promise<SourceRowMap[K][]> {
        const rows: readonly SourceRowMap[K][] | undefined = this.sources[name];
        return rows ? [...rows] : [];
    }

    async publish<K extends ModelName>(name: K, rows: readonly ModelRowMap[K][]): Promise<void> {
        const slot: { [P in K]?: readonly ModelRowMap[P][] } = this.published;
        slot[name] = [...rows];
        this.publishCounts.set(name, (this.publishCounts.get(name) ?? 0) + 1);
    }

    has(name: ModelName): boolean {
        return this.published[name] !== undefined;
    }

    table<K extends ModelName>(name: K): readonly ModelRowMap[K][] {
        const rows: readonly ModelRowMap[K][] | undefined = this.published[name];
        if (rows === undefined) {
            throw new Error(`Table "${name}" has not been published`);
        }
        return rows;
    }

    tableNames(): ModelName[] {
        return [...this.publishCounts.keys()].sort();
    }

    timesPublished(name: ModelName): number {
        return this.publishCounts.get(name) ?? 0;
    }
}
