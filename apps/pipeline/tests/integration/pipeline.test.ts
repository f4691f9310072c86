import { defaultPipelineConfig } from '../../src/config';
import { ALL_MODELS } from '../../src/models';
import { windowListenCount } from '../../src/models/scoring/listen-stats';
import { runPipeline } from '../../src/pipeline/runner';
import type { ModelName } from '../../src/pipeline/tables';
import { MemoryTableStore } from '../../src/warehouse/memory-table-store';
import type { SourceSnapshot } from '../../src/warehouse/memory-table-store';
import type { ListenFixture } from '../fixtures/raw';
import {
    rawActivity,
    rawCollection,
    rawFeedback,
    rawListen,
    rawLocalFile,
    rawPlaylist,
    rawReleaseAnnotation,
    rawReleaseGroupAnnotation,
} from '../fixtures/raw';
import { NOW, daysAgo, uuid } from '../helpers/harness';

const RECORDING = uuid(1);
const RELEASE = uuid(10);
const ARTIST = uuid(20);

function aliceListens(days: readonly number[]): ListenFixture[] {
    return days.map((day, index) => ({
        md5: `alice-r-${index}`,
        at: daysAgo(day),
        track: 'Blue',
        artist: 'The Band',
        release: 'Colours',
        recording: RECORDING,
        releaseMbid: RELEASE,
        artists: [ARTIST],
    }));
}

// Ten listens, one per day, of an artist alice already knows well
const heavyArtistListens: ListenFixture[] = Array.from({ length: 10 }, (_, index) => ({
    md5: `alice-heavy-${index}`,
    at: daysAgo(10 + index),
    track: 'Loud',
    artist: 'Regular',
    recording: uuid(2),
    releaseMbid: uuid(13),
    artists: [uuid(22)],
}));

// Six plays on the run day, the least revisit-worthy history possible
const baselineListens: ListenFixture[] = Array.from({ length: 6 }, (_, index) => ({
    md5: `bob-${index}`,
    at: daysAgo(0, index + 1),
    username: 'bob',
    recording: RECORDING,
    releaseMbid: RELEASE,
    artists: [ARTIST],
}));

function snapshot(aliceDays: readonly number[]): SourceSnapshot {
    return {
        listenbrainz_listens: [...aliceListens(aliceDays), ...heavyArtistListens, ...baselineListens].map(rawListen),
        listenbrainz_user_feedback: [rawFeedback('love-1', RECORDING, 1, daysAgo(50))],
        local_music_files: [
            rawLocalFile({ path: '/music/tagged.flac', title: 'Tagged', artist: 'Tagger', recording: uuid(3), artistMbid: uuid(24) }),
            rawLocalFile({ path: '/music/blue.flac', title: 'Blue', artist: 'The Band', album: 'Colours', recording: RECORDING }),
        ],
        musicbrainz_annotations: [
            rawReleaseAnnotation(RELEASE, 'Colours', uuid(30), [ARTIST]),
            rawReleaseAnnotation(uuid(11), 'Quiet Debut', uuid(31), [uuid(21)]),
            rawReleaseAnnotation(uuid(12), 'Loud Again', uuid(32), [uuid(22)]),
            rawReleaseGroupAnnotation(uuid(30), 'Colours', [ARTIST]),
            rawReleaseGroupAnnotation(uuid(31), 'Quiet Debut', [uuid(21)]),
            rawReleaseGroupAnnotation(uuid(32), 'Loud Again', [uuid(22)]),
        ],
        listenbrainz_similar_user_activity: [
            rawActivity({
                payloadId: 'alice-recordings',
                entity: 'recordings',
                items: [
                    { mbid: RECORDING, count: 40 },
                    { mbid: uuid(3), count: 30 },
                    { mbid: uuid(5), count: 20 },
                ],
            }),
            rawActivity({
                payloadId: 'alice-releases',
                entity: 'releases',
                items: [
                    { mbid: RELEASE, count: 40 },
                    { mbid: uuid(11), count: 30 },
                    { mbid: uuid(12), count: 20 },
                ],
            }),
            rawActivity({
                payloadId: 'alice-artists',
                entity: 'artists',
                items: [
                    { mbid: ARTIST, count: 40 },
                    { mbid: uuid(24), count: 30 },
                    { mbid: uuid(23), count: 20 },
                ],
            }),
        ],
        playlist_collections: [rawCollection('c1', 'mixes')],
        playlist_collection_items: [
            rawPlaylist('p1', 'c1', ['/music/blue.flac', '/music/tagged.flac']),
            rawPlaylist('p2', 'c1', ['/music/blue.flac']),
        ],
    };
}

const SCENARIO_DAYS = [200, 190, 150, 100, 95, 5];

async function run(source: SourceSnapshot): Promise<MemoryTableStore> {
    const store = new MemoryTableStore(source);
    await runPipeline(store, { now: NOW, config: defaultPipelineConfig(), models: ALL_MODELS });
    return store;
}

function aliceRecording(store: MemoryTableStore) {
    const row = store
        .table('recording_listen_counts')
        .find((candidate) => candidate.username === 'alice' && candidate.recordingMbid === RECORDING);
    if (!row) throw new Error('alice has no listen counts for the recording');
    return row;
}

describe('full pipeline run', () => {
    let store: MemoryTableStore;

    beforeAll(async () => {
        store = await run(snapshot(SCENARIO_DAYS));
    });

    it('should publish every table model and no ephemeral one', () => {
        const expected = ALL_MODELS.filter((model) => model.materialized === 'table')
            .map((model) => model.name)
            .sort();

        expect(store.tableNames()).toEqual(expected);
        expect(store.has('listen_recency')).toBe(false);
    });

    it('should produce identical tables from an unchanged snapshot', async () => {
        const again = await run(snapshot(SCENARIO_DAYS));

        for (const name of store.tableNames()) {
            expect(again.table(name)).toEqual(store.table(name));
        }
    });

    it('should replace tables when run twice against one store', async () => {
        const first = new Map(store.tableNames().map((name): [ModelName, unknown] => [name, store.table(name)]));
        const reused = new MemoryTableStore(snapshot(SCENARIO_DAYS));
        await runPipeline(reused, { now: NOW, config: defaultPipelineConfig(), models: ALL_MODELS });
        await runPipeline(reused, { now: NOW, config: defaultPipelineConfig(), models: ALL_MODELS });

        expect(reused.timesPublished('listens')).toBe(2);
        for (const [name, rows] of first) {
            expect(reused.table(name)).toEqual(rows);
        }
    });

    it('should count windowed and lifetime listens of an old favourite', () => {
        const row = aliceRecording(store);

        expect(row.lifetimeListenCount).toBe(6);
        expect(windowListenCount(row, 90)).toBe(1);
    });

    it('should score an old favourite above a same-day burst', () => {
        const expected =
            SCENARIO_DAYS.reduce((product, day) => product * (1 - Math.min(Math.exp(-0.1 * day), Math.exp(-0.1))), 1) *
            Math.log(7);
        const baseline = store
            .table('recording_listen_counts')
            .find((candidate) => candidate.username === 'bob' && candidate.recordingMbid === RECORDING);

        expect(aliceRecording(store).revisitScore).toBeCloseTo(expected, 10);
        expect(baseline?.lifetimeListenCount).toBe(6);
        expect(aliceRecording(store).revisitScore).toBeGreaterThan(baseline?.revisitScore ?? Infinity);
    });

    it('should not lower the revisit score when a recent listen becomes an old one', async () => {
        const moreRecent = await run(snapshot([200, 190, 150, 100, 5, 5]));

        expect(aliceRecording(store).revisitScore).toBeGreaterThanOrEqual(aliceRecording(moreRecent).revisitScore);
    });

    it('should map a tagged file to its recording without a name map row', () => {
        expect(store.table('map_file_recording')).toContainEqual({
            filepath: '/music/tagged.flac',
            mbid: uuid(3),
            paths: ['direct'],
        });
    });

    it('should keep every identity mapping a distinct pair', () => {
        const tables = [
            store.table('map_file_recording'),
            store.table('map_file_release'),
            store.table('map_file_release_group'),
            store.table('map_file_artist'),
        ];

        for (const rows of tables) {
            const pairs = new Set(rows.map((row) => `${row.filepath}\u0000${row.mbid}`));
            expect(pairs.size).toBe(rows.length);
        }
    });

    it('should never recommend what the listener already knows', () => {
        const rows = store.table('similar_user_recommends').filter((row) => row.username === 'alice');

        expect(rows.map((row) => [row.entity, row.mbid])).toEqual([
            ['artist', uuid(23)],
            ['recording', uuid(5)],
            ['release', uuid(11)],
            ['release', uuid(12)],
        ]);
    });

    it('should offer a fresh release only when its artists are new to the listener', () => {
        const rows = store.table('fresh_releases').filter((row) => row.username === 'alice');

        expect(rows.map((row) => [row.releaseMbid, row.releaseGroupMbid])).toEqual([[uuid(11), uuid(31)]]);
    });

    it('should count a file referenced by two playlists', () => {
        expect(store.table('playlist_file_counts').map((row) => [row.filepath, row.playlistCount])).toEqual([
            ['/music/blue.flac', 2],
        ]);
    });

    it('should treat a love as loving every file of the recording', () => {
        expect(store.table('loved_tracks')).toContainEqual({
            username: 'alice',
            recordingMbid: RECORDING,
            filepath: '/music/blue.flac',
            lovedAt: daysAgo(50),
        });
    });
});
