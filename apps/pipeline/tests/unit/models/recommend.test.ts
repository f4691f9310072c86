import { md5 } from '../../../src/lib/content-key';
import { artistRecommendsModel, novelty } from '../../../src/models/recommend/artist-recommends';
import { freshReleasesModel } from '../../../src/models/recommend/fresh-releases';
import { KnownEntities } from '../../../src/models/recommend/known-entities';
import { libraryReleaseAdditionsModel } from '../../../src/models/recommend/library-release-additions';
import { activityScore, sumActivity } from '../../../src/models/recommend/similarity';
import { similarUserRecommendsModel } from '../../../src/models/recommend/similar-user-recommends';
import { catalogReleaseGroupsModel, catalogReleasesModel } from '../../../src/models/staging/catalog';
import { listensModel } from '../../../src/models/staging/listens';
import type {
    ActivityEntity,
    ArtistListenCountRow,
    ArtistStatsRow,
    SimilarUserActivityRow,
    SimilarUserRecommendRow,
} from '../../../src/types/models';
import { rawListen, rawReleaseAnnotation, rawReleaseGroupAnnotation } from '../../fixtures/raw';
import { context, daysAgo, runModel, tables, uuid } from '../../helpers/harness';

function activity(
    entity: ActivityEntity,
    mbid: string,
    listenCount: number,
    userSimilarity = 1,
    extra: Partial<SimilarUserActivityRow> = {}
): SimilarUserActivityRow {
    const payloadId = extra.payloadId ?? `${entity}:${mbid}:${listenCount}:${userSimilarity}`;
    return {
        activityId: md5(payloadId, mbid),
        payloadId,
        entity,
        mbid,
        listenCount,
        fromUsername: 'alice',
        toUsername: 'neighbour',
        userSimilarity,
        timeRange: 'all_time',
        activityFrom: null,
        activityTo: null,
        ...extra,
    };
}

function artistCount(artistMbid: string, lifetime: number, username = 'alice'): ArtistListenCountRow {
    return {
        userArtistKey: md5(username, artistMbid),
        artistMbid,
        artistName: null,
        username,
        recencyDays: 1,
        avgRecencyDays: 1,
        recencyScore: 1,
        revisitScore: 0,
        lifetimeListenCount: lifetime,
        lifetimeRecordingCount: 1,
        lifetimeReleaseCount: 1,
        lifetimeReleaseGroupCount: 1,
        windows: [],
    };
}

function popularity(artistMbid: string, totalListenCount: number, artistName: string): ArtistStatsRow {
    return { artistMbid, artistName, statsRange: 'all_time', totalListenCount, totalUserCount: null, lastUpdated: null };
}

function recommend(mbid: string, score: number, entity: ActivityEntity = 'release'): SimilarUserRecommendRow {
    return { username: 'alice', timeRange: 'all_time', entity, mbid, score, rank: 0 };
}

describe('similarity scores', () => {
    it('should weight log10 listen counts by listener similarity', () => {
        expect(activityScore(activity('artist', uuid(20), 100, 0.5))).toBeCloseTo(1, 12);
        expect(activityScore(activity('artist', uuid(20), 1, 0.5))).toBe(0);
        expect(activityScore(activity('artist', uuid(20), 0, 0.5))).toBe(0);
    });

    it('should sum activity per listener, time range and id', () => {
        const sums = sumActivity(
            [
                activity('release', uuid(10), 100, 0.5),
                activity('release', uuid(10), 10, 0.2),
                activity('release', uuid(10), 10, 1, { timeRange: 'this_month' }),
            ],
            (row) => row.mbid
        );

        expect(sums.map((sum) => [sum.timeRange, sum.mbid])).toEqual([
            ['all_time', uuid(10)],
            ['this_month', uuid(10)],
        ]);
        expect(sums[0].score).toBeCloseTo(1.2, 12);
    });
});

describe('KnownEntities', () => {
    const listens = runModel(
        listensModel,
        tables().set('listenbrainz_listens', [
            rawListen({ md5: 'l1', at: daysAgo(1), recording: uuid(1), releaseMbid: uuid(10), artists: [uuid(20)] }),
        ])
    );
    const known = KnownEntities.build(listens, {
        recordings: [],
        releases: [{ filepath: '/music/a.flac', mbid: uuid(13), paths: ['direct'] }],
        artists: [],
    });

    it('should know what a listener has heard', () => {
        expect(known.has('alice', 'recording', uuid(1))).toBe(true);
        expect(known.has('alice', 'artist', uuid(20))).toBe(true);
        expect(known.has('bob', 'recording', uuid(1))).toBe(false);
        expect(known.has('alice', 'artist', uuid(1))).toBe(false);
    });

    it('should treat the shared library as known to every listener', () => {
        expect(known.has('alice', 'release', uuid(13))).toBe(true);
        expect(known.has('bob', 'release', uuid(13))).toBe(true);
    });
});

describe('recommendation models', () => {
    describe('similar_user_recommends', () => {
        it('should rank unknown entities per listener and time range', () => {
            const input = tables()
                .set('similar_user_activity', [
                    activity('release', uuid(10), 100, 0.5),
                    activity('release', uuid(10), 10, 0.2),
                    activity('release', uuid(11), 10, 1),
                    activity('release', uuid(12), 1000, 1),
                    activity('release', uuid(13), 1000, 1),
                    activity('artist', uuid(20), 1000, 1),
                    activity('release', uuid(12), 10, 1, { fromUsername: 'bob' }),
                ])
                .set(
                    'listens',
                    runModel(
                        listensModel,
                        tables().set('listenbrainz_listens', [
                            rawListen({ md5: 'l1', at: daysAgo(1), releaseMbid: uuid(12) }),
                        ])
                    )
                )
                .set('map_file_recording', [])
                .set('map_file_release', [{ filepath: '/music/a.flac', mbid: uuid(13), paths: ['direct'] }])
                .set('map_file_artist', []);

            const rows = runModel(similarUserRecommendsModel, input);

            expect(rows.map((row) => [row.username, row.entity, row.mbid, row.rank])).toEqual([
                ['alice', 'artist', uuid(20), 1],
                ['alice', 'release', uuid(10), 1],
                ['alice', 'release', uuid(11), 2],
                ['bob', 'release', uuid(12), 1],
            ]);
            expect(rows[0].score).toBeCloseTo(3, 12);
            expect(rows[1].score).toBeCloseTo(1.2, 12);
        });

        it('should apply the configured top-K per partition', () => {
            const input = tables()
                .set('similar_user_activity', [
                    activity('release', uuid(10), 100, 1),
                    activity('release', uuid(11), 10, 1),
                ])
                .set('listens', [])
                .set('map_file_recording', [])
                .set('map_file_release', [])
                .set('map_file_artist', []);

            const rows = runModel(similarUserRecommendsModel, input, context({ similarUserRecommends: { topK: 1 } }));

            expect(rows.map((row) => row.mbid)).toEqual([uuid(10)]);
        });
    });

    describe('fresh_releases', () => {
        it('should drop releases with any artist past the listen threshold', () => {
            const annotations = tables().set('musicbrainz_annotations', [
                rawReleaseAnnotation(uuid(10), 'Colours', uuid(30), [uuid(20)]),
                rawReleaseAnnotation(uuid(11), 'Shades', uuid(31), [uuid(21)]),
                rawReleaseAnnotation(uuid(12), 'Tints', null, [uuid(23)]),
            ]);
            const input = tables()
                .set('similar_user_recommends', [
                    recommend(uuid(10), 2),
                    recommend(uuid(11), 1),
                    recommend(uuid(12), 0.75),
                    recommend(uuid(14), 0.5),
                    recommend(uuid(20), 5, 'artist'),
                ])
                .set('catalog_releases', runModel(catalogReleasesModel, annotations))
                .set('map_release_group_artist', [
                    { releaseGroupMbid: uuid(30), artistMbid: uuid(22) },
                    { releaseGroupMbid: uuid(31), artistMbid: uuid(21) },
                ])
                .set('artist_listen_counts', [artistCount(uuid(22), 10), artistCount(uuid(23), 4)]);

            const rows = runModel(freshReleasesModel, input);

            expect(rows).toEqual([
                {
                    username: 'alice',
                    timeRange: 'all_time',
                    rank: 1,
                    releaseMbid: uuid(11),
                    releaseGroupMbid: uuid(31),
                    releaseTitle: 'Shades',
                    artistCreditPhrase: null,
                    score: 1,
                },
                {
                    username: 'alice',
                    timeRange: 'all_time',
                    rank: 2,
                    releaseMbid: uuid(12),
                    releaseGroupMbid: null,
                    releaseTitle: 'Tints',
                    artistCreditPhrase: null,
                    score: 0.75,
                },
                {
                    username: 'alice',
                    timeRange: 'all_time',
                    rank: 3,
                    releaseMbid: uuid(14),
                    releaseGroupMbid: null,
                    releaseTitle: null,
                    artistCreditPhrase: null,
                    score: 0.5,
                },
            ]);
        });
    });

    describe('artist_recommends', () => {
        it('should read zero popularity as one', () => {
            expect(novelty(0, 99)).toBeCloseTo(Math.log(100) / Math.log(2), 12);
            expect(novelty(99, 99)).toBe(1);
        });

        it('should rank novel artists and add collaborative scores from top artists', () => {
            const input = tables()
                .set('artist_stats', [
                    popularity(uuid(20), 1000, 'Headliner'),
                    popularity(uuid(21), 10, 'Small Act'),
                    popularity(uuid(22), 100, 'Known Act'),
                    popularity(uuid(23), 0, 'Newcomer'),
                ])
                .set('artist_listen_counts', [artistCount(uuid(25), 50), artistCount(uuid(22), 6)])
                .set('similar_user_activity', [
                    activity('artist', uuid(20), 100, 1),
                    activity('artist', uuid(21), 10, 1),
                    activity('artist', uuid(22), 10, 1),
                    activity('artist', uuid(23), 100, 0.5),
                    activity('artist', uuid(24), 10, 1),
                    activity('artist', uuid(21), 1000, 1, { timeRange: 'this_week' }),
                ])
                .set('cf_scores', [
                    { artistMbidA: uuid(25), artistMbidB: uuid(21), score: 0.5 },
                    { artistMbidA: uuid(21), artistMbidB: uuid(25), score: 0.5 },
                    { artistMbidA: uuid(25), artistMbidB: uuid(23), score: 0.25 },
                    { artistMbidA: uuid(23), artistMbidB: uuid(25), score: 0.25 },
                ])
                .set('catalog_artists', [])
                .set('listens', [])
                .set('map_file_artist', []);

            const rows = runModel(
                artistRecommendsModel,
                input,
                context({ artistRecommends: { listenerTopN: 1, catalogTopN: 1 } })
            );
            const mean = (1000 + 10 + 100 + 0) / 4;

            expect(rows.map((row) => [row.rank, row.artistMbid, row.artistName])).toEqual([
                [1, uuid(23), 'Newcomer'],
                [2, uuid(21), 'Small Act'],
            ]);
            expect(rows[0].similarity).toBeCloseTo(1.25, 12);
            expect(rows[0].novelty).toBeCloseTo(Math.log(mean + 1) / Math.log(2), 12);
            expect(rows[1].similarity).toBeCloseTo(1.5, 12);
            expect(rows[1].score).toBeCloseTo((1.5 * Math.log(mean + 1)) / Math.log(11), 12);
            expect(rows.every((row) => row.timeRange === 'all_time')).toBe(true);
        });

        it('should leave collaborative scores out when their weight is zero', () => {
            const input = tables()
                .set('artist_stats', [popularity(uuid(21), 10, 'Small Act')])
                .set('artist_listen_counts', [artistCount(uuid(25), 50)])
                .set('similar_user_activity', [])
                .set('cf_scores', [{ artistMbidA: uuid(25), artistMbidB: uuid(21), score: 0.5 }])
                .set('catalog_artists', [])
                .set('listens', [])
                .set('map_file_artist', []);

            const rows = runModel(
                artistRecommendsModel,
                input,
                context({ artistRecommends: { collaborativeWeight: 0 } })
            );

            expect(rows).toEqual([]);
        });

        it('should never recommend an artist the listener has heard or the library holds', () => {
            const listens = runModel(
                listensModel,
                tables().set(
                    'listenbrainz_listens',
                    [1, 2, 3].map((day) =>
                        rawListen({ md5: `heard-${day}`, at: daysAgo(day), recording: uuid(5), artists: [uuid(21)] })
                    )
                )
            );
            const input = tables()
                .set('artist_stats', [
                    popularity(uuid(21), 10, 'Heard Act'),
                    popularity(uuid(22), 10, 'Fresh Act'),
                    popularity(uuid(24), 10, 'Shelved Act'),
                ])
                .set('artist_listen_counts', [])
                .set('similar_user_activity', [
                    activity('artist', uuid(21), 100, 1),
                    activity('artist', uuid(22), 10, 1),
                    activity('artist', uuid(24), 100, 1),
                ])
                .set('cf_scores', [])
                .set('catalog_artists', [])
                .set('listens', listens)
                .set('map_file_artist', [{ filepath: '/music/shelf.flac', mbid: uuid(24), paths: ['direct'] }]);

            const rows = runModel(artistRecommendsModel, input, context({ artistRecommends: { catalogTopN: 0 } }));

            expect(rows.map((row) => [row.rank, row.artistMbid, row.artistName])).toEqual([[1, uuid(22), 'Fresh Act']]);
        });
    });

    describe('library_release_additions', () => {
        it('should sum release scores per release group and skip owned groups', () => {
            const annotations = tables().set('musicbrainz_annotations', [
                rawReleaseAnnotation(uuid(10), 'Colours', uuid(30)),
                rawReleaseAnnotation(uuid(11), 'Colours (Deluxe)', uuid(30)),
                rawReleaseAnnotation(uuid(12), 'Shades', uuid(31)),
                rawReleaseGroupAnnotation(uuid(30), 'Colours'),
            ]);
            const input = tables()
                .set('similar_user_activity', [
                    activity('release', uuid(10), 100, 1),
                    activity('release', uuid(11), 10, 1),
                    activity('release', uuid(12), 10, 1),
                    activity('release', uuid(13), 10, 1),
                ])
                .set('catalog_releases', runModel(catalogReleasesModel, annotations))
                .set('catalog_release_groups', runModel(catalogReleaseGroupsModel, annotations))
                .set('map_file_release_group', [{ filepath: '/music/a.flac', mbid: uuid(31), paths: ['transitive'] }]);

            const rows = runModel(libraryReleaseAdditionsModel, input);

            expect(rows).toHaveLength(1);
            expect(rows[0]).toMatchObject({
                username: 'alice',
                timeRange: 'all_time',
                rank: 1,
                releaseGroupMbid: uuid(30),
                releaseGroupTitle: 'Colours',
            });
            expect(rows[0].score).toBeCloseTo(3, 12);
        });
    });
});
