import { albumKey, artistKey, recordingKey, trackKey } from '../../lib/content-key';
import { jsonArray, jsonInt, jsonText, jsonTimestamp, tryCastUuid, uuidList } from '../../lib/payload';
import { asc, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ListenRow } from '../../types/models';

const METADATA = ['track_metadata'] as const;
const MAPPING = ['track_metadata', 'mbid_mapping'] as const;
const INFO = ['track_metadata', 'additional_info'] as const;

export const listensModel = defineModel({
    name: 'listens',
    description: 'One row per listen event with the submitted payload unpacked',
    deps: ['listenbrainz_listens'],
    materialized: 'table',
    uniqueKey: (row) => row.listenMd5,
    build(ctx, input) {
        const raw = latestBy(
            input.get('listenbrainz_listens'),
            (row) => row.listenMd5,
            (row) => row.insertTsUtc
        );

        const rows: ListenRow[] = [];
        let skipped = 0;
        for (const { listenMd5, username, jsonData } of raw) {
            const listenedAt = jsonTimestamp(jsonData, ['listened_at']);
            if (listenedAt === null) {
                skipped++;
                continue;
            }

            const trackName = jsonText(jsonData, [...METADATA, 'track_name']);
            const artistName = jsonText(jsonData, [...METADATA, 'artist_name']);
            const releaseName = jsonText(jsonData, [...METADATA, 'release_name']);

            rows.push({
                listenMd5,
                username,
                listenedAt,
                recordingMsid: tryCastUuid(jsonText(jsonData, ['recording_msid'])),
                trackName,
                artistName,
                releaseName,
                recordingMbid: tryCastUuid(jsonText(jsonData, [...MAPPING, 'recording_mbid'])),
                releaseMbid: tryCastUuid(jsonText(jsonData, [...MAPPING, 'release_mbid'])),
                artistMbids: uuidList(jsonArray(jsonData, [...MAPPING, 'artist_mbids'])),
                durationMs: jsonInt(jsonData, [...INFO, 'duration_ms']),
                trackNumber: jsonInt(jsonData, [...INFO, 'tracknumber']),
                recordingKey: recordingKey(trackName, artistName, releaseName),
                trackKey: trackKey(trackName, artistName),
                albumKey: albumKey(releaseName, artistName),
                artistKey: artistKey(artistName),
            });
        }

        if (skipped > 0) {
            ctx.log.warn({ skipped }, 'Skipped listens without a listened_at timestamp');
        }

        return sortRows(rows, asc((row) => row.listenMd5));
    },
});
