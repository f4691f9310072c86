import { asc, comparator, desc, indexBy, rankWithin } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { LibraryReleaseAdditionRow } from '../../types/models';
import { rankPartition, sumActivity } from './similarity';
import type { ScoredCandidate } from './similarity';

// Release groups similar listeners play that nothing in the library maps to
export const libraryReleaseAdditionsModel = defineModel({
    name: 'library_release_additions',
    description: 'Release groups worth adding to the library',
    deps: ['similar_user_activity', 'catalog_releases', 'catalog_release_groups', 'map_file_release_group'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.timeRange}:${row.releaseGroupMbid}`,
    build(ctx, input) {
        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);
        const groups = indexBy(input.get('catalog_release_groups'), (row) => row.releaseGroupMbid);
        const owned = new Set(input.get('map_file_release_group').map((row) => row.mbid));

        const candidates = sumActivity(
            input.get('similar_user_activity').filter((row) => row.entity === 'release'),
            (row) => releases.get(row.mbid)?.releaseGroupMbid ?? null
        ).filter((candidate) => !owned.has(candidate.mbid));

        return rankWithin(
            candidates,
            rankPartition,
            comparator<ScoredCandidate>(
                desc((candidate) => candidate.score),
                asc((candidate) => candidate.mbid)
            ),
            (candidate, rank): LibraryReleaseAdditionRow => {
                const group = groups.get(candidate.mbid);
                return {
                    username: candidate.username,
                    timeRange: candidate.timeRange,
                    rank,
                    releaseGroupMbid: candidate.mbid,
                    releaseGroupTitle: group?.releaseGroupTitle ?? null,
                    artistCreditPhrase: group?.artistCreditPhrase ?? null,
                    score: candidate.score,
                };
            },
            ctx.config.libraryAdditions.topK
        );
    },
});
