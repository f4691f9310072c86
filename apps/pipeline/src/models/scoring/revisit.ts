import { MultiMap, pickByStableHash } from '../../lib/multimap';
import { comparator, desc, asc, indexBy, rankWithin } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { LocalFileRow, RevisitReleaseRow, RevisitTrackRow } from '../../types/models';
import { windowListenCount } from './listen-stats';

/**
 * Release groups played heavily in the past and barely in the recent window.
 * Bounded in size so singles and box sets stay out.
 */
export const revisitReleasesModel = defineModel({
    name: 'revisit_releases',
    description: 'Release groups worth revisiting, ranked per listener',
    deps: ['release_group_listen_counts'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.releaseGroupMbid}`,
    build(ctx, input) {
        const { recentWindowDays, releases: policy } = ctx.config.revisit;

        const candidates = input.get('release_group_listen_counts').flatMap((row) => {
            const listensRecent = windowListenCount(row, recentWindowDays);
            const listensOld = row.lifetimeListenCount - listensRecent;
            const numRecordings = row.lifetimeRecordingCount;

            const qualifies =
                row.lifetimeListenCount >= policy.minLifetimeListens &&
                numRecordings >= policy.minRecordings &&
                numRecordings <= policy.maxRecordings &&
                listensRecent < policy.maxRecentListens &&
                listensOld > policy.minOldListens &&
                listensOld > numRecordings * policy.oldListensPerRecording &&
                row.revisitScore > policy.minRevisitScore;
            return qualifies ? [{ row, listensOld, listensRecent, numRecordings }] : [];
        });

        return rankWithin(
            candidates,
            (candidate) => candidate.row.username,
            comparator(
                desc((candidate) => candidate.row.revisitScore),
                asc((candidate) => candidate.row.releaseGroupMbid)
            ),
            ({ row, listensOld, listensRecent, numRecordings }, rank): RevisitReleaseRow => ({
                username: row.username,
                rank,
                releaseGroupMbid: row.releaseGroupMbid,
                releaseGroupTitle: row.releaseGroupTitle,
                artistName: row.artistCreditPhrase,
                revisitScore: row.revisitScore,
                numRecordings,
                listensOld,
                listensRecent,
            })
        );
    },
});

/**
 * Recordings played often in the past and rarely lately, each with one
 * playable library file. The file is chosen by hash of its path so repeated
 * runs attach the same file.
 */
export const revisitTracksModel = defineModel({
    name: 'revisit_tracks',
    description: 'Recordings worth revisiting with a playable file, ranked per listener',
    deps: ['recording_listen_counts', 'map_file_recording', 'local_files'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.recordingMbid}`,
    build(ctx, input) {
        const { recentWindowDays, tracks: policy } = ctx.config.revisit;
        const files = indexBy(input.get('local_files'), (row) => row.filepath);
        const filesByRecording = MultiMap.from(
            input.get('map_file_recording'),
            (row) => row.mbid,
            (row) => [row.filepath]
        );

        const candidates = input.get('recording_listen_counts').flatMap((row) => {
            const listensRecent = windowListenCount(row, recentWindowDays);
            const listensOld = row.lifetimeListenCount - listensRecent;
            const qualifies =
                row.lifetimeListenCount >= policy.minLifetimeListens &&
                listensRecent < policy.maxRecentListens &&
                listensOld > policy.minOldListens &&
                row.revisitScore > policy.minRevisitScore;
            if (!qualifies) return [];

            const playable = filesByRecording
                .get(row.recordingMbid)
                .map((filepath) => files.get(filepath))
                .filter((file): file is LocalFileRow => file !== undefined && file.artistMbid !== null);
            const file = pickByStableHash(playable, (candidate) => candidate.filepath);
            return file ? [{ row, file, listensOld, listensRecent }] : [];
        });

        return rankWithin(
            candidates,
            (candidate) => candidate.row.username,
            comparator(
                desc((candidate) => candidate.row.revisitScore),
                asc((candidate) => candidate.row.recordingMbid)
            ),
            ({ row, file, listensOld, listensRecent }, rank): RevisitTrackRow => ({
                username: row.username,
                rank,
                recordingMbid: row.recordingMbid,
                filepath: file.filepath,
                recordingTitle: row.recordingTitle,
                artistName: row.artistCreditPhrase,
                artistMbid: file.artistMbid,
                albumArtistMbid: file.albumArtistMbid,
                revisitScore: row.revisitScore,
                listensOld,
                listensRecent,
            })
        );
    },
});
