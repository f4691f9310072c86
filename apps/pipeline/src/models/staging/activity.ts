import { md5 } from '../../lib/content-key';
import { jsonArray, jsonInt, jsonNumber, jsonText, jsonTimestamp, tryCastUuid } from '../../lib/payload';
import { asc, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ActivityEntity, SimilarUserActivityRow } from '../../types/models';
import type { SimilarActivityEntity } from '../../types/sources';

const ACTIVITY_ENTITIES: Record<SimilarActivityEntity, ActivityEntity> = {
    artists: 'artist',
    releases: 'release',
    recordings: 'recording',
};

function isActivityEntity(value: string): value is SimilarActivityEntity {
    return Object.prototype.hasOwnProperty.call(ACTIVITY_ENTITIES, value);
}

/**
 * Explodes each similar-listener payload into one row per (payload, id).
 * A payload can list the same id twice; those listen counts are summed.
 */
export const similarUserActivityModel = defineModel({
    name: 'similar_user_activity',
    description: 'Top entities of listeners similar to each local listener',
    deps: ['listenbrainz_similar_user_activity'],
    materialized: 'table',
    uniqueKey: (row) => row.activityId,
    build(_ctx, input) {
        const payloads = latestBy(
            input.get('listenbrainz_similar_user_activity'),
            (row) => row.payloadId,
            (row) => row.insertTsUtc
        );

        const rows: SimilarUserActivityRow[] = [];
        for (const payload of payloads) {
            if (!isActivityEntity(payload.entity)) continue;
            const entity = ACTIVITY_ENTITIES[payload.entity];
            const idField = `${entity}_mbid`;

            const counts = new Map<string, number>();
            for (const item of jsonArray(payload.jsonData, [payload.entity])) {
                const mbid = tryCastUuid(jsonText(item, [idField]));
                if (mbid === null) continue;
                counts.set(mbid, (counts.get(mbid) ?? 0) + (jsonInt(item, ['listen_count']) ?? 0));
            }

            for (const [mbid, listenCount] of counts) {
                rows.push({
                    activityId: md5(payload.payloadId, mbid),
                    payloadId: payload.payloadId,
                    entity,
                    mbid,
                    listenCount,
                    fromUsername: payload.fromUsername,
                    toUsername: payload.toUsername,
                    userSimilarity: payload.userSimilarity,
                    timeRange: payload.timeRange,
                    activityFrom: jsonTimestamp(payload.jsonData, ['from_ts']),
                    activityTo: jsonTimestamp(payload.jsonData, ['to_ts']),
                });
            }
        }

        return sortRows(rows, asc((row) => row.activityId));
    },
});

export const artistStatsModel = defineModel({
    name: 'artist_stats',
    description: 'Catalog-wide listen totals per artist, used as popularity',
    deps: ['listenbrainz_artist_stats'],
    materialized: 'table',
    uniqueKey: (row) => row.artistMbid,
    build(_ctx, input) {
        const successful = input
            .get('listenbrainz_artist_stats')
            .filter((row) => jsonText(row.payloadJson, ['success']) === 'true');

        const rows = latestBy(successful, (row) => row.mbid, (row) => row.tsUtc).flatMap((row) => {
            const artistMbid = tryCastUuid(row.mbid);
            const totalListenCount = jsonNumber(row.payloadJson, ['data', 'total_listen_count']);
            if (artistMbid === null || totalListenCount === null) return [];
            return [
                {
                    artistMbid,
                    artistName: jsonText(row.payloadJson, ['data', 'artist_name']),
                    statsRange: jsonText(row.payloadJson, ['data', 'stats_range']),
                    totalListenCount,
                    totalUserCount: jsonInt(row.payloadJson, ['data', 'total_user_count']),
                    lastUpdated: jsonTimestamp(row.payloadJson, ['data', 'last_updated']),
                },
            ];
        });

        return sortRows(rows, asc((row) => row.artistMbid));
    },
});

// The external score table stores each unordered pair once; both directions are emitted
export const cfScoresModel = defineModel({
    name: 'cf_scores',
    description: 'Symmetric artist-to-artist collaborative filtering scores',
    deps: ['listenbrainz_collaborative_filtering_scores'],
    materialized: 'table',
    uniqueKey: (row) => `${row.artistMbidA}:${row.artistMbidB}`,
    build(_ctx, input) {
        const directed = input.get('listenbrainz_collaborative_filtering_scores').flatMap((row) => {
            const a = tryCastUuid(row.artistMbidA);
            const b = tryCastUuid(row.artistMbidB);
            if (a === null || b === null || a === b) return [];
            return [
                { artistMbidA: a, artistMbidB: b, score: row.scoreValue, at: row.insertTsUtc },
                { artistMbidA: b, artistMbidB: a, score: row.scoreValue, at: row.insertTsUtc },
            ];
        });

        const rows = latestBy(
            directed,
            (row) => `${row.artistMbidA}:${row.artistMbidB}`,
            (row) => row.at
        ).map(({ artistMbidA, artistMbidB, score }) => ({ artistMbidA, artistMbidB, score }));

        return sortRows(
            rows,
            asc((row) => row.artistMbidA),
            asc((row) => row.artistMbidB)
        );
    },
});
