import { asc, daysBefore, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { UnmappedListenRow } from '../../types/models';

// Recent listens of recordings no library file maps to
export const unmappedListensModel = defineModel({
    name: 'unmapped_listens',
    description: 'Recent listens without a library file',
    deps: ['listens', 'map_file_recording'],
    materialized: 'table',
    uniqueKey: (row) => row.listenMd5,
    build(ctx, input) {
        const since = daysBefore(ctx.now, ctx.config.unmappedListens.windowDays).getTime();
        const mapped = new Set(input.get('map_file_recording').map((row) => row.mbid));

        const rows: UnmappedListenRow[] = [];
        for (const listen of input.get('listens')) {
            const { recordingMbid } = listen;
            if (recordingMbid === null || mapped.has(recordingMbid)) continue;
            if (listen.listenedAt.getTime() < since) continue;
            rows.push({
                listenMd5: listen.listenMd5,
                username: listen.username,
                listenedAt: listen.listenedAt,
                recordingMbid,
                trackName: listen.trackName,
                artistName: listen.artistName,
                releaseName: listen.releaseName,
            });
        }

        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.listenedAt),
            asc((row) => row.listenMd5)
        );
    },
});
