import type { ActivityEntity, FileMappingRow, ListenRow } from '../../types/models';

/**
 * What a listener already knows: everything in their listen history plus
 * everything the shared library resolves to.
 */
export class KnownEntities {
    private readonly library = new Set<string>();
    private readonly listened = new Set<string>();

    static key(entity: ActivityEntity, mbid: string): string {
        return `${entity}:${mbid}`;
    }

    static build(
        listens: readonly ListenRow[],
        library: { recordings: readonly FileMappingRow[]; releases: readonly FileMappingRow[]; artists: readonly FileMappingRow[] }
    ): KnownEntities {
        const known = new KnownEntities();
        for (const listen of listens) {
            if (listen.recordingMbid !== null) known.addListened(listen.username, 'recording', listen.recordingMbid);
            if (listen.releaseMbid !== null) known.addListened(listen.username, 'release', listen.releaseMbid);
            for (const artistMbid of listen.artistMbids) known.addListened(listen.username, 'artist', artistMbid);
        }
        for (const row of library.recordings) known.library.add(KnownEntities.key('recording', row.mbid));
        for (const row of library.releases) known.library.add(KnownEntities.key('release', row.mbid));
        for (const row of library.artists) known.library.add(KnownEntities.key('artist', row.mbid));
        return known;
    }

    private addListened(username: string, entity: ActivityEntity, mbid: string): void {
        this.listened.add(`${username}\u0000${KnownEntities.key(entity, mbid)}`);
    }

    has(username: string, entity: ActivityEntity, mbid: string): boolean {
        const key = KnownEntities.key(entity, mbid);
        return this.library.has(key) || this.listened.has(`${username}\u0000${key}`);
    }
}
