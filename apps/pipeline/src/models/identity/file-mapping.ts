import { indexBy } from '../../lib/rows';
import type { FileMappingRow, LocalFileRow, MappingPath } from '../../types/models';

const PATH_ORDER: readonly MappingPath[] = ['direct', 'indirect', 'transitive'];

/**
 * Collects (file, id) links from every path and emits each pair once, with
 * the paths that produced it. Files under an excluded prefix only accept
 * direct links.
 */
export class FileMappingBuilder {
    private readonly links = new Map<string, { filepath: string; mbid: string; paths: Set<MappingPath> }>();

    constructor(private readonly excludedPathPrefixes: readonly string[]) {}

    isExcluded(filepath: string): boolean {
        return this.excludedPathPrefixes.some((prefix) => filepath.startsWith(prefix));
    }

    link(filepath: string, mbid: string | null, path: MappingPath): this {
        if (mbid === null) return this;
        if (path !== 'direct' && this.isExcluded(filepath)) return this;

        const key = `${filepath}\u0000${mbid}`;
        const existing = this.links.get(key);
        if (existing) {
            existing.paths.add(path);
        } else {
            this.links.set(key, { filepath, mbid, paths: new Set([path]) });
        }
        return this;
    }

    linkAll(filepath: string, mbids: readonly string[], path: MappingPath): this {
        for (const mbid of mbids) this.link(filepath, mbid, path);
        return this;
    }

    rows(): FileMappingRow[] {
        return [...this.links.values()]
            .map(({ filepath, mbid, paths }) => ({
                filepath,
                mbid,
                paths: PATH_ORDER.filter((path) => paths.has(path)),
            }))
            .sort((a, b) => (a.filepath === b.filepath ? compare(a.mbid, b.mbid) : compare(a.filepath, b.filepath)));
    }
}

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function fileMappingKey(row: FileMappingRow): string {
    return `${row.filepath}\u0000${row.mbid}`;
}

// Files whose recording content key has a row in the name map
export function namedFiles<T extends { recordingKey: string }>(
    files: readonly LocalFileRow[],
    nameMap: readonly T[]
): Array<{ file: LocalFileRow; match: T }> {
    const byKey = indexBy(nameMap, (row) => row.recordingKey);
    const matched: Array<{ file: LocalFileRow; match: T }> = [];
    for (const file of files) {
        if (file.recordingKey === null) continue;
        const match = byKey.get(file.recordingKey);
        if (match) matched.push({ file, match });
    }
    return matched;
}
