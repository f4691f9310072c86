import { MultiMap } from '../../lib/multimap';
import { asc, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { LovedTrackRow } from '../../types/models';

interface Love {
    username: string;
    recordingMbid: string;
    lovedAt: Date;
}

/**
 * Explicit loves plus play spikes, keeping the earliest per listener and
 * recording, attached to every library file of the recording.
 */
export const lovedTracksModel = defineModel({
    name: 'loved_tracks',
    description: 'Loved recordings with their library files',
    deps: ['feedback', 'track_play_spikes', 'map_file_recording'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.recordingMbid}:${row.filepath}`,
    build(_ctx, input) {
        const loves: Love[] = [];
        for (const row of input.get('feedback')) {
            if (row.score > 0 && row.recordingMbid !== null) {
                loves.push({ username: row.username, recordingMbid: row.recordingMbid, lovedAt: row.feedbackAt });
            }
        }
        for (const spike of input.get('track_play_spikes')) {
            loves.push({ username: spike.username, recordingMbid: spike.recordingMbid, lovedAt: spike.periodStartAt });
        }

        const earliest = new Map<string, Love>();
        for (const love of loves) {
            const key = `${love.username}\u0000${love.recordingMbid}`;
            const current = earliest.get(key);
            if (!current || love.lovedAt.getTime() < current.lovedAt.getTime()) earliest.set(key, love);
        }

        const filesByRecording = MultiMap.from(
            input.get('map_file_recording'),
            (row) => row.mbid,
            (row) => [row.filepath]
        );
        const rows = [...earliest.values()].flatMap((love) =>
            filesByRecording.get(love.recordingMbid).map((filepath): LovedTrackRow => ({ ...love, filepath }))
        );

        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.lovedAt),
            asc((row) => row.recordingMbid),
            asc((row) => row.filepath)
        );
    },
});
