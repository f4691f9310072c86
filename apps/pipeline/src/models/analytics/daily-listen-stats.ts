import { md5 } from '../../lib/content-key';
import { asc, daysBefore, groupBy, round, sortRows, utcDate } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { DailyListenStatsRow } from '../../types/models';

const HOUR_MS = 60 * 60 * 1000;

export const dailyListenStatsModel = defineModel({
    name: 'daily_listen_stats',
    description: 'Per listener and UTC day: listens, share playable from the library, distinct recordings',
    deps: ['listens', 'map_file_recording'],
    materialized: 'table',
    uniqueKey: (row) => row.userDateKey,
    build(ctx, input) {
        const firstDate = utcDate(daysBefore(ctx.now, ctx.config.dailyStats.windowDays));
        const lastDate = utcDate(ctx.now);
        const mapped = new Set(input.get('map_file_recording').map((row) => row.mbid));

        const recent = input.get('listens').filter((listen) => {
            if (listen.recordingMbid === null) return false;
            const date = utcDate(listen.listenedAt);
            return date >= firstDate && date <= lastDate;
        });

        const rows: DailyListenStatsRow[] = [];
        for (const listens of groupBy(recent, (listen) => `${listen.username}\u0000${utcDate(listen.listenedAt)}`).values()) {
            const { username } = listens[0];
            const date = utcDate(listens[0].listenedAt);
            const mappedCount = listens.filter(
                (listen) => listen.recordingMbid !== null && mapped.has(listen.recordingMbid)
            ).length;
            const durationMs = listens.reduce((sum, listen) => sum + (listen.durationMs ?? 0), 0);

            rows.push({
                userDateKey: md5(username, date),
                username,
                date,
                listenCount: listens.length,
                pctListensMappedToFile: round(mappedCount / listens.length, 4),
                recordingCount: new Set(listens.map((listen) => listen.recordingMbid)).size,
                releaseCount: new Set(
                    listens.map((listen) => listen.releaseMbid).filter((mbid) => mbid !== null)
                ).size,
                listenHours: round(durationMs / HOUR_MS, 4),
            });
        }

        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.date)
        );
    },
});
