import type { SimilarUserActivityRow } from '../../types/models';

/**
 * Weight of one similar listener's activity: similarity · log10(listen count).
 * A count below one carries no signal.
 */
export function activityScore(row: SimilarUserActivityRow): number {
    return row.listenCount >= 1 ? row.userSimilarity * Math.log10(row.listenCount) : 0;
}

export interface ScoredCandidate {
    username: string;
    timeRange: string;
    mbid: string;
    score: number;
}

// Sums activity scores per (listener, time range, id)
export function sumActivity(
    rows: readonly SimilarUserActivityRow[],
    idOf: (row: SimilarUserActivityRow) => string | null
): ScoredCandidate[] {
    const sums = new Map<string, ScoredCandidate>();
    for (const row of rows) {
        const mbid = idOf(row);
        if (mbid === null) continue;
        const key = `${row.fromUsername}\u0000${row.timeRange}\u0000${mbid}`;
        const candidate = sums.get(key) ?? { username: row.fromUsername, timeRange: row.timeRange, mbid, score: 0 };
        candidate.score += activityScore(row);
        sums.set(key, candidate);
    }
    return [...sums.values()];
}

export function rankPartition(candidate: { username: string; timeRange: string }): string {
    return `${candidate.username}\u0000${candidate.timeRange}`;
}
