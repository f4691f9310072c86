import { jsonArray, jsonText, tryCastUuid, uuidList } from '../../lib/payload';
import { asc, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';

/**
 * Results of the external fuzzy matcher, keyed by the same recording content
 * key the listens and local files carry. Failed lookups are dropped.
 */
export const nameMapModel = defineModel({
    name: 'name_map',
    description: 'Recording content key to catalog ids, from the external name matcher',
    deps: ['messybrainz_name_map'],
    materialized: 'table',
    uniqueKey: (row) => row.recordingKey,
    build(_ctx, input) {
        const matched = input.get('messybrainz_name_map').filter((row) => row.success);
        const rows = latestBy(
            matched,
            (row) => row.recordingMd5,
            (row) => row.tsUtc
        ).map((row) => {
            const payload = row.payloadJson;
            return {
                recordingKey: row.recordingMd5,
                recordingName: row.recordingName,
                artistName: row.artistName,
                recordingMbid: tryCastUuid(jsonText(payload, ['recording_mbid'])),
                releaseMbid: tryCastUuid(jsonText(payload, ['release_mbid'])),
                releaseGroupMbid: tryCastUuid(
                    jsonText(payload, ['metadata', 'release', 'release_group_mbid'])
                ),
                artistMbids: uuidList(jsonArray(payload, ['artist_mbids'])),
                mappedRecordingName: jsonText(payload, ['recording_name']),
                mappedReleaseName: jsonText(payload, ['release_name']),
                mappedArtistName: jsonText(payload, ['artist_credit_name']),
                insertedAt: row.tsUtc,
            };
        });
        return sortRows(rows, asc((row) => row.recordingKey));
    },
});
