import { MultiMap } from '../../lib/multimap';
import { asc, indexBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { RecordingReleaseRow, ReleaseGroupArtistRow } from '../../types/models';
import { FileMappingBuilder, fileMappingKey, namedFiles } from './file-mapping';

export const mapFileRecordingModel = defineModel({
    name: 'map_file_recording',
    description: 'Library file to candidate recording ids',
    deps: ['local_files', 'name_map'],
    materialized: 'table',
    uniqueKey: fileMappingKey,
    build(ctx, input) {
        const files = input.get('local_files');
        const builder = new FileMappingBuilder(ctx.config.identity.excludedPathPrefixes);

        for (const file of files) builder.link(file.filepath, file.recordingMbid, 'direct');
        for (const { file, match } of namedFiles(files, input.get('name_map'))) {
            builder.link(file.filepath, match.recordingMbid, 'indirect');
        }
        return builder.rows();
    },
});

export const mapFileReleaseModel = defineModel({
    name: 'map_file_release',
    description: 'Library file to candidate release ids, including via catalog recording release lists',
    deps: ['local_files', 'name_map', 'map_file_recording', 'map_recording_release'],
    materialized: 'table',
    uniqueKey: fileMappingKey,
    build(ctx, input) {
        const files = input.get('local_files');
        const builder = new FileMappingBuilder(ctx.config.identity.excludedPathPrefixes);

        for (const file of files) builder.link(file.filepath, file.releaseMbid, 'direct');
        for (const { file, match } of namedFiles(files, input.get('name_map'))) {
            builder.link(file.filepath, match.releaseMbid, 'indirect');
        }

        const recordingReleases = MultiMap.from(
            input.get('map_recording_release'),
            (row) => row.recordingMbid,
            (row) => [row.releaseMbid]
        );
        for (const { filepath, mbid } of input.get('map_file_recording')) {
            builder.linkAll(filepath, recordingReleases.get(mbid), 'transitive');
        }
        return builder.rows();
    },
});

export const mapFileReleaseGroupModel = defineModel({
    name: 'map_file_release_group',
    description: 'Library file to candidate release group ids, including via catalog releases',
    deps: ['local_files', 'name_map', 'map_file_release', 'catalog_releases'],
    materialized: 'table',
    uniqueKey: fileMappingKey,
    build(ctx, input) {
        const files = input.get('local_files');
        const builder = new FileMappingBuilder(ctx.config.identity.excludedPathPrefixes);

        for (const file of files) builder.link(file.filepath, file.releaseGroupMbid, 'direct');
        for (const { file, match } of namedFiles(files, input.get('name_map'))) {
            builder.link(file.filepath, match.releaseGroupMbid, 'indirect');
        }

        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);
        for (const { filepath, mbid } of input.get('map_file_release')) {
            builder.link(filepath, releases.get(mbid)?.releaseGroupMbid ?? null, 'transitive');
        }
        return builder.rows();
    },
});

export const mapFileArtistModel = defineModel({
    name: 'map_file_artist',
    description: 'Library file to candidate artist ids, including via catalog release groups',
    deps: ['local_files', 'name_map', 'map_file_release_group', 'map_release_group_artist'],
    materialized: 'table',
    uniqueKey: fileMappingKey,
    build(ctx, input) {
        const files = input.get('local_files');
        const builder = new FileMappingBuilder(ctx.config.identity.excludedPathPrefixes);

        for (const file of files) {
            builder.link(file.filepath, file.artistMbid, 'direct');
            builder.link(file.filepath, file.albumArtistMbid, 'direct');
        }
        for (const { file, match } of namedFiles(files, input.get('name_map'))) {
            builder.linkAll(file.filepath, match.artistMbids, 'indirect');
        }

        const groupArtists = MultiMap.from(
            input.get('map_release_group_artist'),
            (row) => row.releaseGroupMbid,
            (row) => [row.artistMbid]
        );
        for (const { filepath, mbid } of input.get('map_file_release_group')) {
            builder.linkAll(filepath, groupArtists.get(mbid), 'transitive');
        }
        return builder.rows();
    },
});

export const mapRecordingReleaseModel = defineModel({
    name: 'map_recording_release',
    description: 'Recording to the releases it appears on, with their release group when annotated',
    deps: ['catalog_recordings', 'catalog_releases'],
    materialized: 'table',
    uniqueKey: (row) => `${row.recordingMbid}:${row.releaseMbid}`,
    build(_ctx, input) {
        const releases = indexBy(input.get('catalog_releases'), (row) => row.releaseMbid);
        const rows = input.get('catalog_recordings').flatMap((recording) =>
            recording.releaseMbids.map((releaseMbid): RecordingReleaseRow => ({
                recordingMbid: recording.recordingMbid,
                releaseMbid,
                releaseGroupMbid: releases.get(releaseMbid)?.releaseGroupMbid ?? null,
            }))
        );
        return sortRows(
            rows,
            asc((row) => row.recordingMbid),
            asc((row) => row.releaseMbid)
        );
    },
});

export const mapReleaseGroupArtistModel = defineModel({
    name: 'map_release_group_artist',
    description: 'Release group to each credited artist',
    deps: ['catalog_release_groups'],
    materialized: 'table',
    uniqueKey: (row) => `${row.releaseGroupMbid}:${row.artistMbid}`,
    build(_ctx, input) {
        const rows = input.get('catalog_release_groups').flatMap((group) =>
            group.artistMbids.map((artistMbid): ReleaseGroupArtistRow => ({
                releaseGroupMbid: group.releaseGroupMbid,
                artistMbid,
            }))
        );
        return sortRows(
            rows,
            asc((row) => row.releaseGroupMbid),
            asc((row) => row.artistMbid)
        );
    },
});
