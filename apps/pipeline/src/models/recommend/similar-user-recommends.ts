import { asc, comparator, desc, rankWithin } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { ActivityEntity, SimilarUserRecommendRow } from '../../types/models';
import { KnownEntities } from './known-entities';
import { rankPartition, sumActivity } from './similarity';
import type { ScoredCandidate } from './similarity';

const ENTITIES: readonly ActivityEntity[] = ['artist', 'recording', 'release'];

export const similarUserRecommendsModel = defineModel({
    name: 'similar_user_recommends',
    description: 'Entities similar listeners play that the listener does not know yet',
    deps: ['similar_user_activity', 'listens', 'map_file_recording', 'map_file_release', 'map_file_artist'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.timeRange}:${row.entity}:${row.mbid}`,
    build(ctx, input) {
        const known = KnownEntities.build(input.get('listens'), {
            recordings: input.get('map_file_recording'),
            releases: input.get('map_file_release'),
            artists: input.get('map_file_artist'),
        });
        const activity = input.get('similar_user_activity');

        return ENTITIES.flatMap((entity) => {
            const candidates = sumActivity(
                activity.filter((row) => row.entity === entity),
                (row) => row.mbid
            ).filter((candidate) => !known.has(candidate.username, entity, candidate.mbid));

            return rankWithin(
                candidates,
                rankPartition,
                comparator<ScoredCandidate>(
                    desc((candidate) => candidate.score),
                    asc((candidate) => candidate.mbid)
                ),
                (candidate, rank): SimilarUserRecommendRow => ({
                    username: candidate.username,
                    timeRange: candidate.timeRange,
                    entity,
                    mbid: candidate.mbid,
                    score: candidate.score,
                    rank,
                }),
                ctx.config.similarUserRecommends.topK
            );
        });
    },
});
