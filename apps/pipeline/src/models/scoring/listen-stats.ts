import { daysBefore, round } from '../../lib/rows';
import type { ListenRecencyRow, ListenStats, WindowCounts } from '../../types/models';

function distinctCount(values: Iterable<string | null>): number {
    const seen = new Set<string>();
    for (const value of values) {
        if (value !== null) seen.add(value);
    }
    return seen.size;
}

/**
 * exp(Σ ln(inv_recency_pct)) · ln(n + 1): grows with the number of listens
 * and shrinks with every recent one.
 */
export function revisitScore(invRecencyPcts: readonly number[]): number {
    const logSum = invRecencyPcts.reduce((sum, inv) => sum + Math.log(inv), 0);
    return Math.exp(logSum) * Math.log(invRecencyPcts.length + 1);
}

export function windowCounts(
    listens: readonly ListenRecencyRow[],
    now: Date,
    windowDays: readonly number[]
): WindowCounts[] {
    return windowDays.map((days) => {
        const since = daysBefore(now, days).getTime();
        const recent = listens.filter((listen) => listen.listenedAt.getTime() >= since);
        return {
            days,
            listenCount: recent.length,
            recordingCount: distinctCount(recent.map((listen) => listen.recordingMbid)),
            releaseCount: distinctCount(recent.map((listen) => listen.releaseMbid)),
        };
    });
}

export function windowListenCount(stats: ListenStats, days: number): number {
    const window = stats.windows.find((candidate) => candidate.days === days);
    if (!window) {
        throw new Error(`No ${days}-day window in listen stats`);
    }
    return window.listenCount;
}

// Aggregates one listener's listens of one entity
export function summarizeListens(
    username: string,
    listens: readonly ListenRecencyRow[],
    now: Date,
    windowDays: readonly number[]
): ListenStats {
    const days = listens.map((listen) => listen.recencyDays);
    const recencySum = listens.reduce((sum, listen) => sum + listen.recencyPct, 0);

    return {
        username,
        recencyDays: Math.min(...days),
        avgRecencyDays: Math.round(days.reduce((sum, value) => sum + value, 0) / days.length),
        recencyScore: round(recencySum, 5),
        revisitScore: revisitScore(listens.map((listen) => listen.invRecencyPct)),
        lifetimeListenCount: listens.length,
        lifetimeRecordingCount: distinctCount(listens.map((listen) => listen.recordingMbid)),
        lifetimeReleaseCount: distinctCount(listens.map((listen) => listen.releaseMbid)),
        lifetimeReleaseGroupCount: distinctCount(listens.map((listen) => listen.releaseGroupMbid)),
        windows: windowCounts(listens, now, windowDays),
    };
}

// Most recent non-null value, for display names when the catalog has none
export function latestName(
    listens: readonly ListenRecencyRow[],
    pick: (listen: ListenRecencyRow) => string | null
): string | null {
    let best: { at: number; name: string } | null = null;
    for (const listen of listens) {
        const name = pick(listen);
        if (name === null) continue;
        const at = listen.listenedAt.getTime();
        if (best === null || at > best.at || (at === best.at && name < best.name)) {
            best = { at, name };
        }
    }
    return best ? best.name : null;
}
