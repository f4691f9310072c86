import { asc, groupBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ListenRow, TrackPlaySpikeRow } from '../../types/models';

const HOUR_MS = 60 * 60 * 1000;

interface Spike {
    start: ListenRow;
    count: number;
}

// A spike is dropped when a stronger one, or an equal earlier one, starts within the same period.
// Equal starts fall back to the listen hash.
function isShadowed(spike: Spike, others: readonly Spike[], periodMs: number): boolean {
    const at = spike.start.listenedAt.getTime();
    return others.some((other) => {
        if (other === spike) return false;
        const otherAt = other.start.listenedAt.getTime();
        if (Math.abs(otherAt - at) >= periodMs) return false;
        if (other.count !== spike.count) return other.count > spike.count;
        if (otherAt !== at) return otherAt < at;
        return other.start.listenMd5 < spike.start.listenMd5;
    });
}

/**
 * Listens followed by a burst of plays of the same recording. Each spike
 * counts the plays strictly after its first listen and before the period ends.
 */
export const trackPlaySpikesModel = defineModel({
    name: 'track_play_spikes',
    description: 'Bursts of repeated plays of one recording by one listener',
    deps: ['listens'],
    materialized: 'table',
    uniqueKey: (row) => row.startListenMd5,
    build(ctx, input) {
        const { minListens, periodHours } = ctx.config.spikes;
        const periodMs = periodHours * HOUR_MS;

        const withRecording = input.get('listens').filter((listen) => listen.recordingMbid !== null);
        const series = groupBy(withRecording, (listen) => `${listen.username}\u0000${listen.recordingMbid}`);

        const rows: TrackPlaySpikeRow[] = [];
        for (const listens of series.values()) {
            const ordered = sortRows(
                listens,
                asc((listen) => listen.listenedAt),
                asc((listen) => listen.listenMd5)
            );

            const spikes: Spike[] = [];
            for (const start of ordered) {
                const from = start.listenedAt.getTime();
                const count = ordered.filter((listen) => {
                    const at = listen.listenedAt.getTime();
                    return at > from && at < from + periodMs;
                }).length;
                if (count >= minListens) spikes.push({ start, count });
            }

            for (const spike of spikes) {
                if (isShadowed(spike, spikes, periodMs)) continue;
                const { start } = spike;
                if (start.recordingMbid === null) continue;
                rows.push({
                    startListenMd5: start.listenMd5,
                    username: start.username,
                    recordingMbid: start.recordingMbid,
                    periodStartAt: start.listenedAt,
                    nextPeriodListenCount: spike.count,
                    trackName: start.trackName,
                    releaseName: start.releaseName,
                    artistName: start.artistName,
                });
            }
        }

        return sortRows(
            rows,
            asc((row) => row.username),
            asc((row) => row.periodStartAt),
            asc((row) => row.startListenMd5)
        );
    },
});
