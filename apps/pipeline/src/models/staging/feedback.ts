import { tryCastUuid } from '../../lib/payload';
import { asc, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';

export const feedbackModel = defineModel({
    name: 'feedback',
    description: 'Explicit love/hate feedback per listener and recording',
    deps: ['listenbrainz_user_feedback'],
    materialized: 'table',
    uniqueKey: (row) => row.feedbackMd5,
    build(_ctx, input) {
        const rows = latestBy(
            input.get('listenbrainz_user_feedback'),
            (row) => row.feedbackMd5,
            (row) => row.insertTsUtc
        ).map((row) => ({
            feedbackMd5: row.feedbackMd5,
            username: row.username,
            score: row.score,
            recordingMbid: tryCastUuid(row.recordingMbid),
            feedbackAt: row.feedbackAt,
        }));
        return sortRows(rows, asc((row) => row.feedbackMd5));
    },
});
