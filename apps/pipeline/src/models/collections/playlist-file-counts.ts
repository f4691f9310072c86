import { asc, desc, groupBy, indexBy, sortRows, uniqueSorted } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { PlaylistFileCountRow } from '../../types/models';

export const playlistFileCountsModel = defineModel({
    name: 'playlist_file_counts',
    description: 'Files referenced by several stored playlists, per listener',
    deps: ['playlist_tracks', 'local_files'],
    materialized: 'table',
    uniqueKey: (row) => `${row.username}:${row.filepath}`,
    build(ctx, input) {
        const { reservedNames, minPlaylistCount } = ctx.config.collections;
        const reserved = new Set(reservedNames);
        const files = indexBy(input.get('local_files'), (row) => row.filepath);

        const byFile = groupBy(
            input.get('playlist_tracks').filter((track) => !reserved.has(track.collectionName)),
            (track) => `${track.username}\u0000${track.filepath}`
        );

        const rows: PlaylistFileCountRow[] = [];
        for (const tracks of byFile.values()) {
            const { username, filepath } = tracks[0];
            const file = files.get(filepath);
            const playlistCount = new Set(tracks.map((track) => track.playlistId)).size;
            if (!file || playlistCount < minPlaylistCount) continue;

            rows.push({
                username,
                filepath,
                trackName: file.trackName,
                albumName: file.albumName,
                artistName: file.artistName,
                albumArtistName: file.albumArtistName,
                playlistCount,
                collectionNames: uniqueSorted(tracks.map((track) => track.collectionName)),
            });
        }

        return sortRows(
            rows,
            asc((row) => row.username),
            desc((row) => row.playlistCount),
            asc((row) => row.filepath)
        );
    },
});
