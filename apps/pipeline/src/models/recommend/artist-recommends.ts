import { asc, comparator, desc, indexBy, rankWithin, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ArtistListenCountRow, ArtistRecommendRow } from '../../types/models';
import { KnownEntities } from './known-entities';
import { sumActivity } from './similarity';

interface ArtistCandidate {
    username: string;
    artistMbid: string;
    similarity: number;
    novelty: number;
    score: number;
}

/**
 * log(mean popularity + 1) / log(popularity + 1): above one for artists less
 * played than the average catalog artist. Zero popularity is read as one.
 */
export function novelty(popularity: number, meanPopularity: number): number {
    return Math.log(meanPopularity + 1) / Math.log(Math.max(popularity, 1) + 1);
}

// The listener's most played artists, most played first
function topArtists(rows: readonly ArtistListenCountRow[], limit: number): Map<string, string[]> {
    const ordered = sortRows(
        rows,
        asc((row) => row.username),
        desc((row) => row.lifetimeListenCount),
        asc((row) => row.artistMbid)
    );
    const top = new Map<string, string[]>();
    for (const row of ordered) {
        const artists = top.get(row.username) ?? [];
        if (artists.length < limit) artists.push(row.artistMbid);
        top.set(row.username, artists);
    }
    return top;
}

/**
 * Artists popular with similar listeners, weighted toward the less popular.
 * Collaborative filtering scores between the listener's top artists and a
 * candidate add to its similarity. Artists the listener has heard or the
 * library holds are never candidates.
 */
export const artistRecommendsModel = defineModel({
    name: 'artist_recommends',
    description: 'Novel artists ranked by similarity times novelty',
    deps: [
        'similar_user_activity',
        'artist_listen_counts',
        'artist_stats',
        'cf_scores',
        'catalog_artists',
        'listens',
        'map_file_artist',
    ],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.timeRange}:${row.artistMbid}`,
    build(ctx, input) {
        const policy = ctx.config.artistRecommends;
        const timeRange = policy.collaborativeTimeRange;
        const stats = input.get('artist_stats');
        const popularity = indexBy(stats, (row) => row.artistMbid);
        const meanPopularity =
            stats.length > 0 ? stats.reduce((sum, row) => sum + row.totalListenCount, 0) / stats.length : 0;

        const catalogTop = new Set(
            sortRows(
                stats,
                desc((row) => row.totalListenCount),
                asc((row) => row.artistMbid)
            )
                .slice(0, policy.catalogTopN)
                .map((row) => row.artistMbid)
        );

        const known = KnownEntities.build(input.get('listens'), {
            recordings: [],
            releases: [],
            artists: input.get('map_file_artist'),
        });

        const listenCounts = input.get('artist_listen_counts');
        const lifetime = new Map(
            listenCounts.map((row): [string, number] => [`${row.username}\u0000${row.artistMbid}`, row.lifetimeListenCount])
        );
        const listenerTop = topArtists(listenCounts, policy.listenerTopN);

        const similarity = new Map<string, { username: string; artistMbid: string; value: number }>();
        const addSimilarity = (username: string, artistMbid: string, value: number): void => {
            const key = `${username}\u0000${artistMbid}`;
            const current = similarity.get(key) ?? { username, artistMbid, value: 0 };
            current.value += value;
            similarity.set(key, current);
        };

        const activity = input
            .get('similar_user_activity')
            .filter((row) => row.entity === 'artist' && row.timeRange === timeRange);
        for (const candidate of sumActivity(activity, (row) => row.mbid)) {
            addSimilarity(candidate.username, candidate.mbid, candidate.score);
        }

        if (policy.collaborativeWeight > 0) {
            const neighbours = new Map<string, Array<{ artistMbid: string; score: number }>>();
            for (const pair of input.get('cf_scores')) {
                const list = neighbours.get(pair.artistMbidA) ?? [];
                list.push({ artistMbid: pair.artistMbidB, score: pair.score });
                neighbours.set(pair.artistMbidA, list);
            }
            for (const [username, artists] of listenerTop) {
                for (const seed of artists) {
                    for (const neighbour of neighbours.get(seed) ?? []) {
                        addSimilarity(username, neighbour.artistMbid, policy.collaborativeWeight * neighbour.score);
                    }
                }
            }
        }

        const candidates: ArtistCandidate[] = [];
        for (const { username, artistMbid, value } of similarity.values()) {
            const stat = popularity.get(artistMbid);
            if (!stat) continue;
            if (known.has(username, 'artist', artistMbid)) continue;
            if (catalogTop.has(artistMbid)) continue;
            if (listenerTop.get(username)?.includes(artistMbid)) continue;
            if ((lifetime.get(`${username}\u0000${artistMbid}`) ?? 0) > policy.knownArtistMinListens) continue;

            const artistNovelty = novelty(stat.totalListenCount, meanPopularity);
            candidates.push({
                username,
                artistMbid,
                similarity: value,
                novelty: artistNovelty,
                score: value * artistNovelty,
            });
        }

        const names = indexBy(input.get('catalog_artists'), (row) => row.artistMbid);
        return rankWithin(
            candidates,
            (candidate) => candidate.username,
            comparator<ArtistCandidate>(
                desc((candidate) => candidate.score),
                asc((candidate) => candidate.artistMbid)
            ),
            (candidate, rank): ArtistRecommendRow => ({
                username: candidate.username,
                timeRange,
                rank,
                artistMbid: candidate.artistMbid,
                artistName: names.get(candidate.artistMbid)?.artistName ?? popularity.get(candidate.artistMbid)?.artistName ?? null,
                similarity: candidate.similarity,
                novelty: candidate.novelty,
                score: candidate.score,
            }),
            policy.topK
        );
    },
});
