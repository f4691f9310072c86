import { MultiMap } from '../../lib/multimap';
import { asc, comparator, desc, indexBy, rankWithin } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { FreshReleaseRow, SimilarUserRecommendRow } from '../../types/models';
import { rankPartition } from './similarity';

/**
 * Unheard releases by artists the listener has barely played. A release is
 * dropped when any artist credited on it or on its release group is past the
 * listen threshold.
 */
export const freshReleasesModel = defineModel({
    name: 'fresh_releases',
    description: 'Similar-listener releases from artists new to the listener',
    deps: ['similar_user_recommends', 'catalog_releases', 'map_release_group_artist', 'artist_listen_counts'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.timeRange}:${row.releaseMbid}`,
    build(ctx, input) {
        const { maxArtistListens, topK } = ctx.config.freshReleases;
        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);
        const groupArtists = MultiMap.from(
            input.get('map_release_group_artist'),
            (row) => row.releaseGroupMbid,
            (row) => [row.artistMbid]
        );
        const artistListens = new Map(
            input.get('artist_listen_counts').map((row) => [`${row.username}\u0000${row.artistMbid}`, row.lifetimeListenCount])
        );

        const candidates = input.get('similar_user_recommends').filter((candidate) => {
            if (candidate.entity !== 'release') return false;
            const release = releases.get(candidate.mbid);
            const artists = new Set(release?.artistMbids ?? []);
            if (release?.releaseGroupMbid) {
                for (const artistMbid of groupArtists.get(release.releaseGroupMbid)) artists.add(artistMbid);
            }
            return [...artists].every(
                (artistMbid) => (artistListens.get(`${candidate.username}\u0000${artistMbid}`) ?? 0) <= maxArtistListens
            );
        });

        return rankWithin(
            candidates,
            rankPartition,
            comparator<SimilarUserRecommendRow>(
                desc((candidate) => candidate.score),
                asc((candidate) => candidate.mbid)
            ),
            (candidate, rank): FreshReleaseRow => {
                const release = releases.get(candidate.mbid);
                return {
                    username: candidate.username,
                    timeRange: candidate.timeRange,
                    rank,
                    releaseMbid: candidate.mbid,
                    releaseGroupMbid: release?.releaseGroupMbid ?? null,
                    releaseTitle: release?.releaseTitle ?? null,
                    artistCreditPhrase: release?.artistCreditPhrase ?? null,
                    score: candidate.score,
                };
            },
            topK
        );
    },
});
