import { md5 } from '../../lib/content-key';
import { MultiMap } from '../../lib/multimap';
import { asc, daysBefore, indexBy, round, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { FileListenCountRow } from '../../types/models';

// Split listens leave fractional counts; rounded to this many places
const COUNT_DIGITS = 6;

/**
 * Listens per (file, listener). A listen whose recording maps to several
 * files is split evenly between them.
 */
export const fileListenCountsModel = defineModel({
    name: 'file_listen_counts',
    description: 'Lifetime and windowed listen counts per library file and listener',
    deps: ['listens', 'map_file_recording', 'local_files'],
    materialized: 'table',
    uniqueKey: (row) => row.filepathUsernameId,
    build(ctx, input) {
        const windowDays = ctx.config.fileListenCounts.windowDays;
        const windowStarts = windowDays.map((days) => daysBefore(ctx.now, days).getTime());
        const files = indexBy(input.get('local_files'), (row) => row.filepath);
        const filesByRecording = MultiMap.from(
            input.get('map_file_recording'),
            (row) => row.mbid,
            (row) => [row.filepath]
        );

        const totals = new Map<string, { filepath: string; username: string; lifetime: number; windows: number[] }>();
        for (const listen of input.get('listens')) {
            if (listen.recordingMbid === null) continue;
            const candidates = filesByRecording.get(listen.recordingMbid).filter((path) => files.has(path));
            if (candidates.length === 0) continue;

            const share = 1 / candidates.length;
            const at = listen.listenedAt.getTime();
            for (const filepath of candidates) {
                const key = `${filepath}\u0000${listen.username}`;
                const total = totals.get(key) ?? {
                    filepath,
                    username: listen.username,
                    lifetime: 0,
                    windows: windowDays.map(() => 0),
                };
                totals.set(key, total);
                total.lifetime += share;
                windowStarts.forEach((start, index) => {
                    if (at >= start) total.windows[index] += share;
                });
            }
        }

        const rows: FileListenCountRow[] = [];
        for (const total of totals.values()) {
            const file = files.get(total.filepath);
            if (!file) continue;
            rows.push({
                filepathUsernameId: md5(total.filepath, total.username),
                filepath: total.filepath,
                username: total.username,
                trackName: file.trackName,
                albumName: file.albumName,
                artistName: file.artistName,
                albumArtistName: file.albumArtistName,
                lifetimeListenCount: round(total.lifetime, COUNT_DIGITS),
                windows: windowDays.map((days, index) => ({
                    days,
                    listenCount: round(total.windows[index], COUNT_DIGITS),
                })),
            });
        }

        return sortRows(
            rows,
            asc((row) => row.filepath),
            asc((row) => row.username)
        );
    },
});
