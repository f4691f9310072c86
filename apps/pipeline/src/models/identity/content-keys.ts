import { asc, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ContentKeyRow } from '../../types/models';

type Kind = ContentKeyRow['kind'];
type Origin = ContentKeyRow['observedIn'][number];

interface Observation {
    kind: Kind;
    key: string | null;
    trackName: string | null;
    albumName: string | null;
    artistName: string | null;
    seenAt: Date | null;
    origin: Origin;
}

interface NamedSource {
    trackKey: string | null;
    albumKey: string | null;
    artistKey: string | null;
    trackName: string | null;
    albumName: string | null;
    artistName: string | null;
}

function observe(source: NamedSource, seenAt: Date | null, origin: Origin): Observation[] {
    const { trackName, albumName, artistName } = source;
    return [
        { kind: 'track', key: source.trackKey, trackName, albumName: null, artistName, seenAt, origin },
        { kind: 'album', key: source.albumKey, trackName: null, albumName, artistName, seenAt, origin },
        { kind: 'artist', key: source.artistKey, trackName: null, albumName: null, artistName, seenAt, origin },
    ];
}

function isEarlier(a: Date | null, b: Date | null): boolean {
    if (a === null) return false;
    return b === null || a.getTime() < b.getTime();
}

/**
 * Every content key seen in listens or library files. Display names come from
 * the earliest observation; a key with no dated observation keeps the names
 * of its first file in path order.
 */
export const contentKeysModel = defineModel({
    name: 'content_keys',
    description: 'Distinct name-derived identities with first-seen time',
    deps: ['listens', 'local_files'],
    materialized: 'table',
    uniqueKey: (row) => row.key,
    build(_ctx, input) {
        const observations: Observation[] = [
            ...input.get('listens').flatMap((listen) => observe(
                { ...listen, albumName: listen.releaseName },
                listen.listenedAt,
                'listen'
            )),
            ...input.get('local_files').flatMap((file) => observe(file, file.fileCreatedAt, 'local_file')),
        ];

        const keys = new Map<string, ContentKeyRow>();
        for (const observation of observations) {
            const { key, artistName } = observation;
            if (key === null || artistName === null) continue;

            const current = keys.get(key);
            if (!current) {
                keys.set(key, {
                    kind: observation.kind,
                    key,
                    trackName: observation.trackName,
                    albumName: observation.albumName,
                    artistName,
                    firstSeenAt: observation.seenAt,
                    observedIn: [observation.origin],
                });
                continue;
            }

            if (!current.observedIn.includes(observation.origin)) {
                current.observedIn = [...current.observedIn, observation.origin].sort();
            }
            if (isEarlier(observation.seenAt, current.firstSeenAt)) {
                current.firstSeenAt = observation.seenAt;
                current.trackName = observation.trackName;
                current.albumName = observation.albumName;
                current.artistName = artistName;
            }
        }

        return sortRows([...keys.values()], asc((row) => row.key));
    },
});
