import { md5 } from '../../lib/content-key';
import { asc, indexBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ModelContext } from '../../pipeline/model';
import type {
    ArtistListenCountRow,
    ListenRecencyRow,
    ListenStats,
    RecordingListenCountRow,
    ReleaseGroupListenCountRow,
    ReleaseListenCountRow,
} from '../../types/models';
import { latestName, summarizeListens } from './listen-stats';

interface EntityListens {
    username: string;
    mbid: string;
    listens: ListenRecencyRow[];
}

// Groups listens by (listener, id); one listen can count toward several ids
function groupByEntity(
    listens: readonly ListenRecencyRow[],
    idsOf: (listen: ListenRecencyRow) => readonly string[]
): EntityListens[] {
    const groups = new Map<string, EntityListens>();
    for (const listen of listens) {
        for (const mbid of idsOf(listen)) {
            const key = `${listen.username}\u0000${mbid}`;
            const group = groups.get(key);
            if (group) {
                group.listens.push(listen);
            } else {
                groups.set(key, { username: listen.username, mbid, listens: [listen] });
            }
        }
    }
    return [...groups.values()];
}

function stats(ctx: ModelContext, group: EntityListens): ListenStats {
    return summarizeListens(group.username, group.listens, ctx.now, ctx.config.scoring.windowDays);
}

export const recordingListenCountsModel = defineModel({
    name: 'recording_listen_counts',
    description: 'Listen statistics per listener and recording',
    deps: ['listen_recency', 'catalog_recordings'],
    materialized: 'table',
    uniqueKey: (row) => row.userRecordingKey,
    build(ctx, input) {
        const recordings = indexBy(input.get('catalog_recordings'), (row) => row.recordingMbid);
        const rows = groupByEntity(input.get('listen_recency'), (listen) => [listen.recordingMbid]).map(
            (group): RecordingListenCountRow => {
                const catalog = recordings.get(group.mbid);
                return {
                    userRecordingKey: md5(group.username, group.mbid),
                    recordingMbid: group.mbid,
                    recordingTitle: catalog?.recordingTitle ?? latestName(group.listens, (l) => l.trackName),
                    artistCreditPhrase:
                        catalog?.artistCreditPhrase ?? latestName(group.listens, (l) => l.artistName),
                    ...stats(ctx, group),
                };
            }
        );
        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.recordingMbid)
        );
    },
});

export const releaseListenCountsModel = defineModel({
    name: 'release_listen_counts',
    description: 'Listen statistics per listener and release',
    deps: ['listen_recency', 'catalog_releases'],
    materialized: 'table',
    uniqueKey: (row) => row.userReleaseKey,
    build(ctx, input) {
        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);
        const rows = groupByEntity(input.get('listen_recency'), (listen) => [listen.releaseMbid]).map(
            (group): ReleaseListenCountRow => {
                const catalog = releases.get(group.mbid);
                return {
                    userReleaseKey: md5(group.username, group.mbid),
                    releaseMbid: group.mbid,
                    releaseTitle: catalog?.releaseTitle ?? latestName(group.listens, (l) => l.releaseName),
                    artistCreditPhrase:
                        catalog?.artistCreditPhrase ?? latestName(group.listens, (l) => l.artistName),
                    ...stats(ctx, group),
                };
            }
        );
        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.releaseMbid)
        );
    },
});

// Only listens whose release has an annotated release group count here
export const releaseGroupListenCountsModel = defineModel({
    name: 'release_group_listen_counts',
    description: 'Listen statistics per listener and release group',
    deps: ['listen_recency', 'catalog_release_groups'],
    materialized: 'table',
    uniqueKey: (row) => row.userReleaseGroupKey,
    build(ctx, input) {
        const groups = indexBy(input.get('catalog_release_groups'), (row) => row.releaseGroupMbid);
        const rows = groupByEntity(input.get('listen_recency'), (listen) =>
            listen.releaseGroupMbid === null ? [] : [listen.releaseGroupMbid]
        ).map((group): ReleaseGroupListenCountRow => {
            const catalog = groups.get(group.mbid);
            return {
                userReleaseGroupKey: md5(group.username, group.mbid),
                releaseGroupMbid: group.mbid,
                releaseGroupTitle: catalog?.releaseGroupTitle ?? latestName(group.listens, (l) => l.releaseName),
                artistCreditPhrase:
                    catalog?.artistCreditPhrase ?? latestName(group.listens, (l) => l.artistName),
                ...stats(ctx, group),
            };
        });
        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.releaseGroupMbid)
        );
    },
});

export const artistListenCountsModel = defineModel({
    name: 'artist_listen_counts',
    description: 'Listen statistics per listener and credited artist',
    deps: ['listen_recency', 'catalog_artists'],
    materialized: 'table',
    uniqueKey: (row) => row.userArtistKey,
    build(ctx, input) {
        const artists = indexBy(input.get('catalog_artists'), (row) => row.artistMbid);
        const rows = groupByEntity(input.get('listen_recency'), (listen) => listen.artistMbids).map(
            (group): ArtistListenCountRow => {
                // A submitted artist name only identifies the artist on single-artist listens
                const soloNames = group.listens.filter((listen) => listen.artistMbids.length === 1);
                return {
                    userArtistKey: md5(group.username, group.mbid),
                    artistMbid: group.mbid,
                    artistName: artists.get(group.mbid)?.artistName ?? latestName(soloNames, (l) => l.artistName),
                    ...stats(ctx, group),
                };
            }
        );
        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.artistMbid)
        );
    },
});
