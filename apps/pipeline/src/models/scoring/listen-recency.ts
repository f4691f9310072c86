import { asc, elapsedDays, indexBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ListenRecencyRow } from '../../types/models';

export interface RecencyWeights {
    recencyPct: number;
    invRecencyPct: number;
}

/**
 * Exponential decay of a listen's weight with age. The inverse is floored at
 * the one-day value so a same-day listen never contributes a zero factor to
 * the revisit product.
 */
export function recencyWeights(recencyDays: number, decayRate: number): RecencyWeights {
    const recencyPct = Math.exp(-decayRate * recencyDays);
    return {
        recencyPct,
        invRecencyPct: 1 - Math.min(recencyPct, Math.exp(-decayRate)),
    };
}

// Listens with a recording, a release and at least one artist resolved
export const listenRecencyModel = defineModel({
    name: 'listen_recency',
    description: 'Fully resolved listens with their recency weights',
    deps: ['listens', 'catalog_releases'],
    materialized: 'ephemeral',
    uniqueKey: (row) => row.listenMd5,
    build(ctx, input) {
        const { now, config } = ctx;
        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);

        const rows: ListenRecencyRow[] = [];
        for (const listen of input.get('listens')) {
            const { recordingMbid, releaseMbid, artistMbids } = listen;
            if (recordingMbid === null || releaseMbid === null || artistMbids.length === 0) continue;
            // Listens stamped after the run baseline are not scored
            if (listen.listenedAt.getTime() > now.getTime()) continue;

            const recencyDays = elapsedDays(now, listen.listenedAt);
            rows.push({
                listenMd5: listen.listenMd5,
                username: listen.username,
                listenedAt: listen.listenedAt,
                recordingMbid,
                releaseMbid,
                releaseGroupMbid: releases.get(releaseMbid)?.releaseGroupMbid ?? null,
                artistMbids,
                trackName: listen.trackName,
                releaseName: listen.releaseName,
                artistName: listen.artistName,
                recencyDays,
                ...recencyWeights(recencyDays, config.scoring.decayRate),
            });
        }

        return sortRows(rows, asc((row) => row.listenMd5));
    },
});
